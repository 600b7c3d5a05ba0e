// CHANGE: CI orchestration over contracts: file selection, check execution, caching, baseline gating
// WHY: APP layer turns a set of contracts into one CIResult and never fails
// PURITY: APP
// EFFECT: Effect<CIResult, never>
// INVARIANT: BaselineError ⇒ exit 4; any other fault ⇒ exit 3 with empty violations
// COMPLEXITY: O(t) checks with at most maxWorkers running at once

import { Effect } from "effect";

import type { BaselineComparison } from "../core/baseline/baseline.js";
import type { CIConfig } from "../core/ci/config.js";
import type { CIResult } from "../core/ci/result.js";
import { type CIViolation, toCIViolation } from "../core/ci/violation.js";
import type { CheckDefinition, ResolvedContract } from "../core/contracts/contract.js";
import { inScope, selectCheckFiles } from "../core/contracts/scope.js";
import { computeExitCode } from "../core/decision.js";
import { type AppError, describeError, messageOf, type StoreError } from "../core/errors.js";
import { normalizePath } from "../core/glob.js";
import {
	type CheckResult,
	compareCheckResults,
	EXIT_BASELINE_NOT_FOUND,
	EXIT_RUNTIME_ERROR,
	type ExitCode,
} from "../core/models.js";
import { BaselineManager } from "../shell/baseline/manager.js";
import { CheckCache } from "../shell/cache/check-cache.js";
import { type ExecutionEnvironment, runCheck } from "../shell/checks/executor.js";
import { createDefaultHandlers } from "../shell/checks/handlers/index.js";
import type { CheckHandlerRegistry } from "../shell/checks/registry.js";
import { faultResult } from "../shell/checks/results.js";
import type { ContractRegistry } from "../shell/contracts/registry.js";
import { listFiles } from "../shell/fs/files.js";
import { createGitChanges, type GitChanges } from "../shell/git/changes.js";
import { writeOutputs } from "../shell/output/reports.js";
import { debugLog, logWarning } from "../shell/utils/log.js";
import { path } from "../shell/utils/node-mods.js";

/** File recorded for findings that stand for a check fault. */
export const RUNTIME_FILE = "<runtime>";

export interface CIRunnerOptions {
	readonly repoRoot: string;
	readonly config: CIConfig;
	readonly registry: ContractRegistry;
	readonly handlers?: CheckHandlerRegistry;
	/** null disables caching; undefined builds one from config.cache. */
	readonly cache?: CheckCache | null;
	readonly git?: GitChanges;
	readonly baseline?: BaselineManager;
	readonly clock?: () => Date;
}

interface CheckTask {
	readonly contract: ResolvedContract;
	readonly check: CheckDefinition;
}

/**
 * Contracts with at least one enabled check in scope of a candidate file.
 *
 * @pure true
 * @postcondition candidates = null ⇒ result = contracts
 */
export function filterContracts(
	contracts: readonly ResolvedContract[],
	candidates: readonly string[] | null,
): readonly ResolvedContract[] {
	if (candidates === null) return contracts;
	return contracts.filter((contract) =>
		contract.allChecks.some(
			(check) => check.enabled && candidates.some((file) => inScope(check.appliesTo, file)),
		),
	);
}

/**
 * Failing results as CI violations; faults without a location are filed under `<runtime>`.
 *
 * @pure true
 * @postcondition sorted by severity, check id, file, line
 */
export function collectViolations(results: readonly CheckResult[]): readonly CIViolation[] {
	return results
		.filter((result) => !result.passed)
		.map((result) =>
			result.error === true && result.file === undefined ? { ...result, file: RUNTIME_FILE } : result,
		)
		.sort(compareCheckResults)
		.map(toCIViolation);
}

export class CIRunner {
	private readonly handlers: CheckHandlerRegistry;
	private readonly cache: CheckCache | null;
	private readonly git: GitChanges;
	private readonly baseline: BaselineManager;
	private readonly clock: () => Date;

	constructor(readonly options: CIRunnerOptions) {
		const { repoRoot, config } = options;
		this.clock = options.clock ?? (() => new Date());
		this.handlers = options.handlers ?? createDefaultHandlers();
		this.cache =
			options.cache !== undefined
				? options.cache
				: config.cache.enabled
					? new CheckCache(path.resolve(repoRoot, config.cache.dir), config.cache.ttlHours, this.clock)
					: null;
		this.git = options.git ?? createGitChanges(repoRoot);
		this.baseline = options.baseline ?? new BaselineManager(repoRoot, config.baselinePath, this.clock);
	}

	get config(): CIConfig {
		return this.options.config;
	}

	/**
	 * Candidate files of an incremental or PR run; null means every file.
	 *
	 * @postcondition mode = full ⇒ null
	 * @postcondition git failure ⇒ null
	 */
	getFilesToCheck(): Effect.Effect<readonly string[] | null> {
		const { mode, incrementalPaths, baseRef, headRef } = this.config;
		if (mode === "full") return Effect.succeed(null);
		if (incrementalPaths !== null && incrementalPaths.length > 0) {
			return Effect.succeed([...new Set(incrementalPaths.map(normalizePath))]);
		}
		if (baseRef === null) return Effect.succeed(null);
		return this.git.changedFiles(baseRef, headRef ?? "HEAD").pipe(
			Effect.catchAll((error) => {
				logWarning("ci", `Could not list changed files, checking every file: ${error.detail}`);
				return Effect.succeed(null);
			}),
		);
	}

	private runTask(task: CheckTask, env: ExecutionEnvironment): Effect.Effect<readonly CheckResult[]> {
		const { contract, check } = task;
		const execute = runCheck(contract, check, env).pipe(
			Effect.catchAllDefect((defect) =>
				Effect.succeed([
					faultResult(check, { contract: contract.name }, `Check execution failed: ${messageOf(defect)}`),
				]),
			),
		);
		const cache = this.cache;
		if (cache === null || this.config.mode === "full") return execute;

		return Effect.gen(this, function* () {
			const files = selectCheckFiles(check, env.repoFiles, env.candidates);
			const key = yield* cache.keyFor(this.options.repoRoot, `${contract.name}/${check.id}`, files);
			const cached = yield* cache.get(key);
			if (cached !== null) return cached;
			const results = yield* execute;
			if (!results.some((result) => result.error === true)) {
				yield* cache.set(key, results).pipe(
					Effect.catchAll((error) => {
						logWarning("cache", `Could not store ${key}: ${describeError(error)}`);
						return Effect.void;
					}),
				);
			}
			return results;
		});
	}

	private execute(
		contracts: readonly ResolvedContract[],
		startedAt: string,
	): Effect.Effect<CIResult, AppError> {
		const { config } = this;
		return Effect.gen(this, function* () {
			const repoFiles = yield* listFiles(this.options.repoRoot);
			const listed = new Set(repoFiles);
			const changed = yield* this.getFilesToCheck();
			const candidates = changed === null ? null : changed.filter((file) => listed.has(file));

			const applicable = filterContracts(contracts, candidates);
			const tasks: CheckTask[] = applicable.flatMap((contract) =>
				contract.allChecks.filter((check) => check.enabled).map((check) => ({ contract, check })),
			);
			const env: ExecutionEnvironment = {
				registry: this.options.registry,
				handlers: this.handlers,
				repoRoot: this.options.repoRoot,
				repoFiles,
				candidates,
			};
			const concurrency = config.parallel.enabled && tasks.length > 1 ? config.parallel.maxWorkers : 1;
			debugLog("ci", `${config.mode} run: ${tasks.length} checks, concurrency ${concurrency}`);
			const batches = yield* Effect.forEach(tasks, (task) => this.runTask(task, env), { concurrency });
			const violations = collectViolations(batches.flat());

			let comparison: BaselineComparison | undefined;
			if (config.mode === "pr" || config.ratchetEnabled) {
				comparison = yield* this.baseline.compare(violations);
			}
			const exitCode = computeExitCode({
				violations,
				...(comparison === undefined ? {} : { comparison }),
				totalErrorsThreshold: config.totalErrorsThreshold,
				ratchetEnabled: config.ratchetEnabled,
				failOnNewErrors: config.failOnNewErrors,
				failOnNewWarnings: config.failOnNewWarnings,
				minSeverity: config.minSeverity,
			});
			const commitSha = yield* this.git.headSha();

			const result: CIResult = {
				mode: config.mode,
				violations,
				...(comparison === undefined ? {} : { comparison }),
				exitCode,
				startedAt,
				finishedAt: this.clock().toISOString(),
				filesChecked: candidates === null ? repoFiles.length : candidates.length,
				checksRun: tasks.length,
				errors: [],
				...(commitSha === null ? {} : { commitSha }),
			};
			return result;
		});
	}

	private errorResult(exitCode: ExitCode, message: string, startedAt: string): CIResult {
		return {
			mode: this.config.mode,
			violations: [],
			exitCode,
			startedAt,
			finishedAt: this.clock().toISOString(),
			filesChecked: 0,
			checksRun: 0,
			errors: [message],
		};
	}

	/**
	 * Run the given contracts, or every applicable contract of the registry.
	 *
	 * @effect Effect<CIResult, never>
	 */
	run(contracts?: readonly ResolvedContract[]): Effect.Effect<CIResult> {
		const startedAt = this.clock().toISOString();
		const { registry } = this.options;
		const selected: Effect.Effect<readonly ResolvedContract[], StoreError> =
			contracts !== undefined
				? Effect.succeed(contracts)
				: registry.getApplicable(this.config.language ?? undefined, this.config.repoType ?? undefined);

		return selected.pipe(
			Effect.flatMap((chosen) => this.execute(chosen, startedAt)),
			Effect.catchAll((error) =>
				Effect.succeed(
					this.errorResult(
						error._tag === "BaselineError" ? EXIT_BASELINE_NOT_FOUND : EXIT_RUNTIME_ERROR,
						describeError(error),
						startedAt,
					),
				),
			),
			Effect.catchAllDefect((defect) =>
				Effect.succeed(this.errorResult(EXIT_RUNTIME_ERROR, messageOf(defect), startedAt)),
			),
		);
	}

	/**
	 * @returns absolute paths of the written SARIF, JUnit and Markdown files
	 */
	writeOutputs(result: CIResult): Effect.Effect<readonly string[], AppError> {
		return writeOutputs(result, this.config, this.options.repoRoot);
	}
}
