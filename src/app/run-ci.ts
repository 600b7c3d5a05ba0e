// CHANGE: Application entry of the conformance-ci command
// WHY: APP turns argv and the environment into an ExitCode; the bin only exits
// PURITY: APP (console output, no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Bad arguments or config ⇒ 2; otherwise the runner's exit code
// COMPLEXITY: O(t) delegated to CIRunner

import { Effect, Either } from "effect";

import {
	applyEnvironment,
	type CIConfig,
	DEFAULT_CI_CONFIG,
	forAzureDevOps,
	forGitHubActions,
} from "../core/ci/config.js";
import { describeError } from "../core/errors.js";
import {
	EXIT_CONFIG_ERROR,
	EXIT_RUNTIME_ERROR,
	EXIT_SUCCESS,
	type ExitCode,
} from "../core/models.js";
import { BaselineManager } from "../shell/baseline/manager.js";
import { type CIArgs, CI_USAGE, parseCIArgs } from "../shell/config/cli.js";
import { loadCIConfig } from "../shell/config/ci-config.js";
import { ContractRegistry } from "../shell/contracts/registry.js";
import { printCIResult } from "../shell/output/printer.js";
import { logWarning } from "../shell/utils/log.js";
import { path } from "../shell/utils/node-mods.js";
import { CIRunner } from "./ci-runner.js";

function presetBase(args: CIArgs): CIConfig {
	if (args.preset === "github") return forGitHubActions();
	if (args.preset === "azure") return forAzureDevOps();
	return DEFAULT_CI_CONFIG;
}

/**
 * Config file, then CONFORMANCE_* variables, then command-line flags.
 *
 * @pure true
 */
export function overlayArgs(config: CIConfig, args: CIArgs): CIConfig {
	return {
		...config,
		...(args.mode === undefined ? {} : { mode: args.mode }),
		...(args.baseRef === undefined ? {} : { baseRef: args.baseRef }),
		...(args.headRef === undefined ? {} : { headRef: args.headRef }),
	};
}

/**
 * Run one CI pass for the given argv.
 *
 * @effect Effect<ExitCode, never>
 * @postcondition prints the run summary before returning the runner's exit code
 */
export function runCI(
	argv: readonly string[],
	env: Readonly<Record<string, string | undefined>>,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const parsed = parseCIArgs(argv);
		if (Either.isLeft(parsed)) {
			console.error(`Error: ${parsed.left}\n\n${CI_USAGE}`);
			return EXIT_CONFIG_ERROR;
		}
		const args = parsed.right;
		if (args.help) {
			console.log(CI_USAGE);
			return EXIT_SUCCESS;
		}

		const repoRoot = path.resolve(args.repoRoot);
		const loaded = yield* Effect.either(loadCIConfig(repoRoot, args.configPath, presetBase(args)));
		if (Either.isLeft(loaded)) {
			console.error(`Configuration error: ${describeError(loaded.left)}`);
			return loaded.left._tag === "ConfigError" ? EXIT_CONFIG_ERROR : EXIT_RUNTIME_ERROR;
		}
		const config = overlayArgs(applyEnvironment(loaded.right, env), args);

		const registry = new ContractRegistry({ repoRoot });
		const runner = new CIRunner({ repoRoot, config, registry });
		const result = yield* runner.run();
		yield* printCIResult(result);

		if (args.writeOutputs) {
			const written = yield* Effect.either(runner.writeOutputs(result));
			if (Either.isLeft(written)) {
				logWarning("ci", `Could not write outputs: ${describeError(written.left)}`);
			} else {
				for (const file of written.right) console.log(`Wrote ${file}`);
			}
		}

		if (args.updateBaseline && result.errors.length === 0) {
			const baseline = new BaselineManager(repoRoot, config.baselinePath);
			const updated = yield* Effect.either(baseline.update(result.violations));
			if (Either.isLeft(updated)) {
				console.error(`Baseline error: ${describeError(updated.left)}`);
				return EXIT_RUNTIME_ERROR;
			}
			console.log(
				`Baseline updated: ${updated.right.added} added, ${updated.right.removed} removed`,
			);
		}

		return result.exitCode;
	});
}
