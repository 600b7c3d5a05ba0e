// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, the shell services callers construct, and CORE model functions
// PURITY: Re-exports only (meta-module)
// INVARIANT: Nothing here runs on import

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Violation tracking across runs.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { ConformanceManager } from "conformance-engine";
 *
 * const manager = new ConformanceManager({ repoRoot: process.cwd() });
 * const report = await Effect.runPromise(
 *   manager.runConformanceCheck({ results, contractsChecked: ["naming"], filesChecked: 12, isFullRun: true }),
 * );
 * ```
 */
export {
	ConformanceManager,
	type ConformanceManagerOptions,
	type ConformanceRunInput,
	type ExemptionFilter,
	type SummaryStats,
	type ViolationFilter,
} from "./app/conformance-manager.js";
export { CIRunner, type CIRunnerOptions, filterContracts } from "./app/ci-runner.js";
export { runCI } from "./app/run-ci.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { ContractRegistry, type ContractRegistryOptions } from "./shell/contracts/registry.js";
export { CheckHandlerRegistry, executeCheck } from "./shell/checks/registry.js";
export { runCheck, runContract, type ExecutionEnvironment } from "./shell/checks/executor.js";
export {
	createDefaultHandlers,
	CustomCheckRegistry,
	type CustomCheckFunction,
	type CustomFinding,
} from "./shell/checks/handlers/index.js";
export type { CheckContext, CheckHandler, NestedOutcome } from "./shell/checks/types.js";
export { BaselineManager, type BaselineStats, type BaselineUpdate } from "./shell/baseline/manager.js";
export { CheckCache } from "./shell/cache/check-cache.js";
export { HistoryStore } from "./shell/store/history.js";
export { createGitChanges, type GitChanges } from "./shell/git/changes.js";
export { loadCIConfig } from "./shell/config/ci-config.js";
export { writeJUnit, writeMarkdown, writeOutputs, writeSarif } from "./shell/output/reports.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE MODELS (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CheckResult,
	type CheckSeverity,
	type CIMode,
	describeExitCode,
	type ExitCode,
} from "./core/models.js";
export type { AppError } from "./core/errors.js";
export {
	BaselineError,
	CheckExecutionError,
	ConfigError,
	describeError,
	RuntimeError,
	StoreError,
	UnknownCheckType,
} from "./core/errors.js";
export type {
	CheckDefinition,
	Contract,
	ResolvedContract,
} from "./core/contracts/contract.js";
export {
	type Exemption,
	type ExemptionScope,
	findExemption,
	isExpired,
	needsReview,
} from "./core/exemptions/exemption.js";
export {
	type Violation,
	type ViolationSeverity,
	type ViolationStatus,
	trackingIdOf,
} from "./core/conformance/violation.js";
export {
	complianceRate,
	type ConformanceReport,
	type ConformanceSummary,
	hasBlockers,
	isPassing,
} from "./core/conformance/summary.js";
export {
	type Baseline,
	type BaselineComparison,
	compareWithBaseline,
	netChange,
	shouldFail,
	shouldFailRatchet,
} from "./core/baseline/baseline.js";
export { deltaFrom, type HistorySnapshot, type Trend } from "./core/history/snapshot.js";
export {
	applyEnvironment,
	type CIConfig,
	DEFAULT_CI_CONFIG,
	forAzureDevOps,
	forGitHubActions,
} from "./core/ci/config.js";
export type { CIResult } from "./core/ci/result.js";
export type { CIViolation } from "./core/ci/violation.js";
export { computeExitCode } from "./core/decision.js";
export { buildSarifReport } from "./core/ci/sarif.js";
export { renderJUnit } from "./core/ci/junit.js";
export { renderMarkdown } from "./core/ci/markdown.js";
