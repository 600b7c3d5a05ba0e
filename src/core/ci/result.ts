// CHANGE: Outcome of one CI run and its derived counts
// PURITY: CORE
// INVARIANT: errorCount + warningCount + infoCount = |violations|
// COMPLEXITY: O(v)

import type { BaselineComparison } from "../baseline/baseline.js";
import { netChange } from "../baseline/baseline.js";
import type { CIMode, CheckSeverity, ExitCode } from "../models.js";
import type { CIViolation } from "./violation.js";

export interface CIResult {
	readonly mode: CIMode;
	readonly violations: readonly CIViolation[];
	readonly comparison?: BaselineComparison;
	readonly exitCode: ExitCode;
	readonly startedAt: string;
	readonly finishedAt: string;
	readonly filesChecked: number;
	readonly checksRun: number;
	readonly errors: readonly string[];
	readonly commitSha?: string;
}

export function countBySeverity(
	violations: readonly CIViolation[],
	severity: CheckSeverity,
): number {
	return violations.filter((v) => v.severity === severity).length;
}

export function durationSeconds(result: CIResult): number {
	const ms = Date.parse(result.finishedAt) - Date.parse(result.startedAt);
	return Number.isFinite(ms) ? Math.max(0, ms) / 1000 : 0;
}

/**
 * Group violations under a key, preserving encounter order inside each group.
 *
 * @pure true
 */
export function groupViolations(
	violations: readonly CIViolation[],
	keyOf: (violation: CIViolation) => string,
): ReadonlyMap<string, readonly CIViolation[]> {
	const groups = new Map<string, CIViolation[]>();
	for (const violation of violations) {
		const key = keyOf(violation);
		const bucket = groups.get(key);
		if (bucket === undefined) groups.set(key, [violation]);
		else bucket.push(violation);
	}
	return groups;
}

export interface CISummary {
	readonly mode: CIMode;
	readonly exitCode: ExitCode;
	readonly totalViolations: number;
	readonly errors: number;
	readonly warnings: number;
	readonly info: number;
	readonly filesChecked: number;
	readonly checksRun: number;
	readonly durationSeconds: number;
	readonly newViolations?: number;
	readonly fixedViolations?: number;
	readonly netChange?: number;
}

/**
 * @pure true
 */
export function summarizeCIResult(result: CIResult): CISummary {
	return {
		mode: result.mode,
		exitCode: result.exitCode,
		totalViolations: result.violations.length,
		errors: countBySeverity(result.violations, "error"),
		warnings: countBySeverity(result.violations, "warning"),
		info: countBySeverity(result.violations, "info"),
		filesChecked: result.filesChecked,
		checksRun: result.checksRun,
		durationSeconds: durationSeconds(result),
		...(result.comparison === undefined
			? {}
			: {
					newViolations: result.comparison.newViolations.length,
					fixedViolations: result.comparison.fixedEntries.length,
					netChange: netChange(result.comparison),
				}),
	};
}
