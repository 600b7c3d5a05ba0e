// CHANGE: Functional Core domain models shared by checks, conformance tracking and CI gating
// WHY: One definition of severity, exit codes and check results for every layer
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit code of a CI run.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1, 2, 3, 4}
 */
export type ExitCode = 0 | 1 | 2 | 3 | 4;

export const EXIT_SUCCESS = 0 satisfies ExitCode;
export const EXIT_VIOLATIONS_FOUND = 1 satisfies ExitCode;
export const EXIT_CONFIG_ERROR = 2 satisfies ExitCode;
export const EXIT_RUNTIME_ERROR = 3 satisfies ExitCode;
export const EXIT_BASELINE_NOT_FOUND = 4 satisfies ExitCode;

const EXIT_CODE_DESCRIPTIONS: Readonly<Record<ExitCode, string>> = {
	0: "All checks passed",
	1: "Violations found",
	2: "Configuration error",
	3: "Runtime error",
	4: "Baseline not found",
};

/**
 * Human-readable description of an exit code.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeExitCode(code: ExitCode): string {
	return EXIT_CODE_DESCRIPTIONS[code];
}

/**
 * Severity declared on a check definition.
 */
export type CheckSeverity = "error" | "warning" | "info";

const CHECK_SEVERITY_RANK: Readonly<Record<CheckSeverity, number>> = {
	error: 3,
	warning: 2,
	info: 1,
};

/**
 * Numeric rank of a check severity (higher is more severe).
 *
 * @pure true
 * @invariant rank(error) > rank(warning) > rank(info)
 */
export function checkSeverityRank(severity: CheckSeverity): number {
	return CHECK_SEVERITY_RANK[severity];
}

/**
 * Narrow an arbitrary string to a check severity; anything else maps to `fallback`.
 *
 * @pure true
 */
export function toCheckSeverity(
	value: string | undefined,
	fallback: CheckSeverity = "error",
): CheckSeverity {
	return value === "error" || value === "warning" || value === "info"
		? value
		: fallback;
}

/**
 * Run mode of the CI runner.
 */
export type CIMode = "full" | "incremental" | "pr";

export function isCIMode(value: string): value is CIMode {
	return value === "full" || value === "incremental" || value === "pr";
}

/**
 * Normalised output of a check handler.
 *
 * @remarks
 * - @invariant passed = false for every result a handler reports as a finding
 * - @invariant file is repo-relative with forward slashes when present
 */
export interface CheckResult {
	readonly checkId: string;
	readonly checkName: string;
	readonly contract: string;
	readonly passed: boolean;
	readonly severity: CheckSeverity;
	readonly message: string;
	readonly file?: string;
	readonly line?: number;
	readonly column?: number;
	readonly ruleId?: string;
	readonly fixHint?: string;
	/** Set when the result stands for a handler fault rather than a finding. */
	readonly error?: boolean;
}

/**
 * Deterministic ordering for result multisets: severity (most severe first), then id, file, line.
 *
 * @pure true
 * @complexity O(1) per comparison
 */
export function compareCheckResults(a: CheckResult, b: CheckResult): number {
	const bySeverity = checkSeverityRank(b.severity) - checkSeverityRank(a.severity);
	if (bySeverity !== 0) return bySeverity;
	if (a.checkId !== b.checkId) return a.checkId < b.checkId ? -1 : 1;
	const fileA = a.file ?? "";
	const fileB = b.file ?? "";
	if (fileA !== fileB) return fileA < fileB ? -1 : 1;
	return (a.line ?? 0) - (b.line ?? 0);
}
