// CHANGE: Conformance summary, report model and trend computation
// WHY: Report numbers are derived data; keeping them pure makes determinism testable
// PURITY: CORE
// INVARIANT: total = passed + failed + exempted + stale
// COMPLEXITY: O(v) where v = number of violations

import {
	countKeys,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readNumber,
	readNumberRecord,
	readObject,
	readString,
	readStringList,
} from "../types/json.js";
import {
	VIOLATION_SEVERITIES,
	type Violation,
	type ViolationSeverity,
} from "./violation.js";

export interface ConformanceSummary {
	readonly total: number;
	readonly passed: number;
	readonly failed: number;
	readonly exempted: number;
	readonly stale: number;
}

export const EMPTY_SUMMARY: ConformanceSummary = {
	total: 0,
	passed: 0,
	failed: 0,
	exempted: 0,
	stale: 0,
};

/**
 * @pure true
 * @postcondition total = 0 ⇒ 1.0
 */
export function complianceRate(summary: ConformanceSummary): number {
	return summary.total === 0 ? 1.0 : summary.passed / summary.total;
}

export function openIssues(summary: ConformanceSummary): number {
	return summary.failed + summary.stale;
}

export interface ConformanceTrend {
	readonly passedDelta: number;
	readonly failedDelta: number;
	readonly exemptedDelta: number;
	readonly previousRunId: string;
}

export type RunType = "full" | "incremental";

export interface ConformanceReport {
	readonly schemaVersion: "1.0";
	readonly runId: string;
	readonly runType: RunType;
	readonly generatedAt: string;
	readonly contractsChecked: readonly string[];
	readonly filesChecked: number;
	readonly summary: ConformanceSummary;
	readonly bySeverity: Readonly<Record<ViolationSeverity, number>>;
	readonly byContract: Readonly<Record<string, number>>;
	readonly trend?: ConformanceTrend;
}

export interface Tally {
	readonly summary: ConformanceSummary;
	readonly bySeverity: Readonly<Record<ViolationSeverity, number>>;
	readonly byContract: Readonly<Record<string, number>>;
}

function zeroSeverities(): Record<ViolationSeverity, number> {
	return { blocker: 0, critical: 0, major: 0, minor: 0, info: 0 };
}

/**
 * Count violations into a summary.
 *
 * - failed: open without exemption
 * - exempted: open with an exemption link
 * - stale: stale records
 * - passed: passing check results reported by the run
 * - bySeverity/byContract count failed violations only
 *
 * @pure true
 * @complexity O(v)
 */
export function tallyViolations(violations: readonly Violation[], passed: number): Tally {
	let failed = 0;
	let exempted = 0;
	let stale = 0;
	const bySeverity = zeroSeverities();
	const failedContracts: string[] = [];

	for (const violation of violations) {
		if (violation.status === "stale") {
			stale += 1;
			continue;
		}
		if (violation.status !== "open") continue;
		if (violation.exemptionId !== undefined) {
			exempted += 1;
			continue;
		}
		failed += 1;
		bySeverity[violation.severity] += 1;
		failedContracts.push(violation.contract);
	}

	return {
		summary: { total: passed + failed + exempted + stale, passed, failed, exempted, stale },
		bySeverity,
		byContract: countKeys(failedContracts),
	};
}

/**
 * Deltas of this summary against the previous report.
 *
 * @pure true
 */
export function computeTrend(
	current: ConformanceSummary,
	previous: ConformanceReport | null,
): ConformanceTrend | undefined {
	if (previous === null) return undefined;
	return {
		passedDelta: current.passed - previous.summary.passed,
		failedDelta: current.failed - previous.summary.failed,
		exemptedDelta: current.exempted - previous.summary.exempted,
		previousRunId: previous.runId,
	};
}

/**
 * @pure true
 */
export function isPassing(report: ConformanceReport, threshold = 1.0): boolean {
	return complianceRate(report.summary) >= threshold;
}

export function hasBlockers(report: ConformanceReport): boolean {
	return report.bySeverity.blocker > 0;
}

function summaryToDocument(summary: ConformanceSummary): JSONObject {
	return {
		total: summary.total,
		passed: summary.passed,
		failed: summary.failed,
		exempted: summary.exempted,
		stale: summary.stale,
		compliance_rate: complianceRate(summary),
	};
}

/**
 * @pure true
 */
export function reportToDocument(report: ConformanceReport): JSONObject {
	return {
		schema_version: report.schemaVersion,
		run_id: report.runId,
		run_type: report.runType,
		generated_at: report.generatedAt,
		contracts_checked: [...report.contractsChecked],
		files_checked: report.filesChecked,
		summary: summaryToDocument(report.summary),
		by_severity: { ...report.bySeverity },
		by_contract: { ...report.byContract },
		...(report.trend === undefined
			? {}
			: {
					trend: {
						passed_delta: report.trend.passedDelta,
						failed_delta: report.trend.failedDelta,
						exempted_delta: report.trend.exemptedDelta,
						previous_run_id: report.trend.previousRunId,
					},
				}),
	};
}

export function summaryFromDocument(raw: JSONObject | undefined): ConformanceSummary {
	if (raw === undefined) return EMPTY_SUMMARY;
	return {
		total: readNumber(raw, "total") ?? 0,
		passed: readNumber(raw, "passed") ?? 0,
		failed: readNumber(raw, "failed") ?? 0,
		exempted: readNumber(raw, "exempted") ?? 0,
		stale: readNumber(raw, "stale") ?? 0,
	};
}

/**
 * @pure true
 * @returns null when the document is not a report
 */
export function reportFromDocument(doc: JSONValue): ConformanceReport | null {
	if (!isJSONObject(doc)) return null;
	const runId = readString(doc, "run_id");
	const generatedAt = readString(doc, "generated_at");
	if (runId === undefined || generatedAt === undefined) return null;

	const bySeverity = zeroSeverities();
	const rawSeverity = readObject(doc, "by_severity");
	if (rawSeverity !== undefined) {
		for (const severity of VIOLATION_SEVERITIES) {
			bySeverity[severity] = readNumber(rawSeverity, severity) ?? 0;
		}
	}
	const byContract = readNumberRecord(doc, "by_contract");
	const rawTrend = readObject(doc, "trend");
	const previousRunId = rawTrend === undefined ? undefined : readString(rawTrend, "previous_run_id");
	const trend: ConformanceTrend | undefined =
		rawTrend === undefined || previousRunId === undefined
			? undefined
			: {
					passedDelta: readNumber(rawTrend, "passed_delta") ?? 0,
					failedDelta: readNumber(rawTrend, "failed_delta") ?? 0,
					exemptedDelta: readNumber(rawTrend, "exempted_delta") ?? 0,
					previousRunId,
				};

	return {
		schemaVersion: "1.0",
		runId,
		runType: readString(doc, "run_type") === "incremental" ? "incremental" : "full",
		generatedAt,
		contractsChecked: readStringList(doc, "contracts_checked"),
		filesChecked: readNumber(doc, "files_checked") ?? 0,
		summary: summaryFromDocument(readObject(doc, "summary")),
		bySeverity,
		byContract,
		...(trend === undefined ? {} : { trend }),
	};
}
