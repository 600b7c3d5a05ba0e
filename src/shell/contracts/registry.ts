// CHANGE: Contract and exemption discovery across the builtin, global, workspace and repo tiers
// WHY: Contracts are loaded once per registry instance and resolved lazily with a cycle-safe DFS
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: A later tier replaces an earlier contract of the same name; malformed files become warnings
// COMPLEXITY: O(f) files read once, O(V + E) per resolution

import { Effect, Either } from "effect";

import {
	type CheckDefinition,
	type Contract,
	type ContractTier,
	contractApplies,
	isAbstractContract,
	parseContractDocument,
	type ResolvedContract,
} from "../../core/contracts/contract.js";
import { resolveContractChecks } from "../../core/contracts/resolve.js";
import { describeError, type StoreError } from "../../core/errors.js";
import {
	type Exemption,
	findExemption,
	parseExemptionEntry,
} from "../../core/exemptions/exemption.js";
import { isJSONArray, isJSONObject } from "../../core/types/json.js";
import { listFiles } from "../fs/files.js";
import { readYamlFile } from "../fs/yaml.js";
import { logWarning } from "../utils/log.js";
import { path } from "../utils/node-mods.js";

export interface ContractRegistryOptions {
	readonly repoRoot: string;
	readonly builtinRoot?: string;
	readonly globalRoot?: string;
	readonly workspaceRoot?: string;
}

interface TierRoot {
	readonly tier: ContractTier;
	readonly dir: string;
}

const CONTRACT_SUFFIX = ".contract.yaml";
const EXEMPTION_SUFFIX = ".exemptions.yaml";
const EXEMPTION_DIRS = ["exemptions", ".conformance/exemptions", "contracts/exemptions"];

export class ContractRegistry {
	private contracts: ReadonlyMap<string, Contract> | null = null;
	private exemptions: readonly Exemption[] | null = null;
	private readonly resolved = new Map<string, readonly CheckDefinition[]>();
	private readonly collectedWarnings: string[] = [];

	constructor(readonly options: ContractRegistryOptions) {}

	get repoRoot(): string {
		return this.options.repoRoot;
	}

	/** Warnings collected while loading and resolving, in order. */
	warnings(): readonly string[] {
		return [...this.collectedWarnings];
	}

	private warn(message: string): void {
		this.collectedWarnings.push(message);
		logWarning("registry", message);
	}

	private tierRoots(): readonly TierRoot[] {
		const { builtinRoot, globalRoot, workspaceRoot, repoRoot } = this.options;
		return [
			...(builtinRoot === undefined ? [] : [{ tier: "builtin" as const, dir: builtinRoot }]),
			...(globalRoot === undefined ? [] : [{ tier: "global" as const, dir: globalRoot }]),
			...(workspaceRoot === undefined ? [] : [{ tier: "workspace" as const, dir: workspaceRoot }]),
			{ tier: "repo", dir: path.join(repoRoot, "contracts") },
			{ tier: "repo", dir: path.join(repoRoot, ".conformance", "contracts") },
		];
	}

	/**
	 * Load every `*.contract.yaml` of every tier; repeated calls return the cached map.
	 *
	 * @effect Effect<ReadonlyMap<string, Contract>, StoreError>
	 */
	discover(): Effect.Effect<ReadonlyMap<string, Contract>, StoreError> {
		const cached = this.contracts;
		if (cached !== null) return Effect.succeed(cached);
		return Effect.gen(this, function* () {
			const found = new Map<string, Contract>();
			for (const root of this.tierRoots()) {
				const files = yield* listFiles(root.dir);
				for (const relative of files.filter((file) => file.endsWith(CONTRACT_SUFFIX))) {
					const file = path.join(root.dir, relative);
					const loaded = yield* Effect.either(readYamlFile(file));
					if (Either.isLeft(loaded)) {
						this.warn(`Skipping contract ${describeError(loaded.left)}`);
						continue;
					}
					const parsed = parseContractDocument(loaded.right, root.tier, file);
					if (Either.isLeft(parsed)) {
						this.warn(`Skipping contract ${describeError(parsed.left)}`);
						continue;
					}
					if (parsed.right !== null) found.set(parsed.right.name, parsed.right);
				}
			}
			this.contracts = found;
			return found;
		});
	}

	/**
	 * Own and inherited checks of a loaded contract.
	 *
	 * @precondition discover() has completed
	 */
	resolve(contract: Contract): ResolvedContract {
		const known = this.contracts ?? new Map<string, Contract>();
		const allChecks = resolveContractChecks(contract, {
			lookup: (name) => known.get(name),
			cache: this.resolved,
			warn: (message) => this.warn(message),
		});
		return { ...contract, allChecks };
	}

	get(name: string): Effect.Effect<ResolvedContract | undefined, StoreError> {
		return Effect.map(this.discover(), (contracts) => {
			const contract = contracts.get(name);
			return contract === undefined ? undefined : this.resolve(contract);
		});
	}

	/**
	 * Enabled, concrete contracts admitting the language and repo type, resolved.
	 */
	getApplicable(
		language?: string,
		repoType?: string,
	): Effect.Effect<readonly ResolvedContract[], StoreError> {
		return Effect.map(this.discover(), (contracts) =>
			[...contracts.values()]
				.filter(
					(contract) =>
						contract.enabled &&
						!isAbstractContract(contract.name) &&
						contractApplies(contract, language, repoType),
				)
				.map((contract) => this.resolve(contract)),
		);
	}

	/**
	 * Exemptions from `*.exemptions.yaml` files, in load order; invalid entries become warnings.
	 */
	loadExemptions(): Effect.Effect<readonly Exemption[], StoreError> {
		const cached = this.exemptions;
		if (cached !== null) return Effect.succeed(cached);
		return Effect.gen(this, function* () {
			const loaded: Exemption[] = [];
			for (const dir of EXEMPTION_DIRS.map((d) => path.join(this.options.repoRoot, d))) {
				const files = yield* listFiles(dir);
				for (const relative of files.filter((file) => file.endsWith(EXEMPTION_SUFFIX))) {
					const file = path.join(dir, relative);
					const doc = yield* Effect.either(readYamlFile(file));
					if (Either.isLeft(doc)) {
						this.warn(`Skipping exemptions ${describeError(doc.left)}`);
						continue;
					}
					const entries = isJSONObject(doc.right) ? doc.right["exemptions"] : undefined;
					if (!isJSONArray(entries)) continue;
					for (const entry of entries) {
						const parsed = parseExemptionEntry(entry, file);
						if (Either.isLeft(parsed)) this.warn(`Skipping exemption ${describeError(parsed.left)}`);
						else loaded.push(parsed.right);
					}
				}
			}
			this.exemptions = loaded;
			return loaded;
		});
	}

	findExemption(
		contract: string,
		checkId: string,
		today: string,
		location: { readonly file?: string; readonly line?: number; readonly violationId?: string } = {},
	): Effect.Effect<Exemption | undefined, StoreError> {
		return Effect.map(this.loadExemptions(), (exemptions) =>
			findExemption(exemptions, { contract, checkId, ...location }, today),
		);
	}
}
