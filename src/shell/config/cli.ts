// CHANGE: Command-line arguments of conformance-ci
// WHY: Flags override the CI config file and the CONFORMANCE_* environment
// PURITY: CORE helper (argv is passed in)
// INVARIANT: Unknown flags are rejected; the first positional argument is the repository root
// COMPLEXITY: O(n) where n = argv length

import { Either } from "effect";

import { type CIMode, isCIMode } from "../../core/models.js";
import { DEFAULT_CI_CONFIG_PATH } from "./ci-config.js";

export type CIPreset = "github" | "azure";

export interface CIArgs {
	readonly repoRoot: string;
	readonly configPath: string;
	readonly mode?: CIMode;
	readonly baseRef?: string;
	readonly headRef?: string;
	readonly preset?: CIPreset;
	readonly updateBaseline: boolean;
	readonly writeOutputs: boolean;
	readonly help: boolean;
}

export const CI_USAGE = [
	"Usage: conformance-ci [repo] [options]",
	"",
	"  --config <path>      CI config file (default .conformance/ci.yaml)",
	"  --mode <mode>        full | incremental | pr",
	"  --base <ref>         base ref for changed files",
	"  --head <ref>         head ref for changed files (default HEAD)",
	"  --preset <name>      github | azure",
	"  --update-baseline    record the current violations as the new baseline",
	"  --no-outputs         skip SARIF, JUnit and Markdown files",
	"  --help               show this message",
].join("\n");

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type ValueFlag = (state: Mutable<CIArgs>, value: string) => string | null;

const valueFlags: Readonly<Record<string, ValueFlag>> = {
	"--config": (state, value) => {
		state.configPath = value;
		return null;
	},
	"--mode": (state, value) => {
		if (!isCIMode(value)) return `unknown mode '${value}'`;
		state.mode = value;
		return null;
	},
	"--base": (state, value) => {
		state.baseRef = value;
		return null;
	},
	"--head": (state, value) => {
		state.headRef = value;
		return null;
	},
	"--preset": (state, value) => {
		if (value !== "github" && value !== "azure") return `unknown preset '${value}'`;
		state.preset = value;
		return null;
	},
};

const booleanFlags: Readonly<Record<string, (state: Mutable<CIArgs>) => void>> = {
	"--update-baseline": (state) => {
		state.updateBaseline = true;
	},
	"--no-outputs": (state) => {
		state.writeOutputs = false;
	},
	"--help": (state) => {
		state.help = true;
	},
};

/**
 * @pure true
 * @postcondition left(message) for an unknown flag, a missing value or an invalid mode/preset
 *
 * @example
 * ```ts
 * parseCIArgs(["repo", "--mode", "pr", "--base", "origin/main"]);
 * // right({ repoRoot: "repo", mode: "pr", baseRef: "origin/main", ... })
 * ```
 */
export function parseCIArgs(argv: readonly string[]): Either.Either<CIArgs, string> {
	const state: Mutable<CIArgs> = {
		repoRoot: ".",
		configPath: DEFAULT_CI_CONFIG_PATH,
		updateBaseline: false,
		writeOutputs: true,
		help: false,
	};
	let positional = false;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg.length === 0) continue;

		const setValue = valueFlags[arg];
		if (setValue !== undefined) {
			const value = argv[i + 1];
			if (value === undefined || value.startsWith("--")) {
				return Either.left(`${arg} needs a value`);
			}
			const problem = setValue(state, value);
			if (problem !== null) return Either.left(problem);
			i++;
			continue;
		}

		const setFlag = booleanFlags[arg];
		if (setFlag !== undefined) {
			setFlag(state);
			continue;
		}

		if (arg.startsWith("-") || positional) return Either.left(`unexpected argument '${arg}'`);
		state.repoRoot = arg;
		positional = true;
	}

	return Either.right(state);
}
