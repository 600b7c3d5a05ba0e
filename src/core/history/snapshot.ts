// CHANGE: Daily conformance snapshots and their deltas
// WHY: Trend reporting compares one day's counts with an earlier day's
// PURITY: CORE
// INVARIANT: deltaFrom(a, a) = 0 for every field
// COMPLEXITY: O(1) per delta, O(n) per trend over n snapshots

import {
	type ConformanceReport,
	type ConformanceSummary,
	complianceRate,
	summaryFromDocument,
} from "../conformance/summary.js";
import {
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readNumberRecord,
	readObject,
	readString,
} from "../types/json.js";

export interface HistorySnapshot {
	/** YYYY-MM-DD */
	readonly date: string;
	readonly runId: string;
	readonly summary: ConformanceSummary;
	readonly bySeverity: Readonly<Record<string, number>>;
	readonly byContract: Readonly<Record<string, number>>;
}

export interface SnapshotDelta {
	readonly total: number;
	readonly passed: number;
	readonly failed: number;
	readonly exempted: number;
}

export const DEFAULT_RETENTION_DAYS = 90;
export const MIN_RETENTION_DAYS = 7;
export const MAX_RETENTION_DAYS = 365;

/**
 * @pure true
 * @postcondition MIN_RETENTION_DAYS ≤ result ≤ MAX_RETENTION_DAYS
 */
export function clampRetentionDays(days: number = DEFAULT_RETENTION_DAYS): number {
	return Math.min(MAX_RETENTION_DAYS, Math.max(MIN_RETENTION_DAYS, Math.floor(days)));
}

/**
 * The YYYY-MM-DD date `days` days before `date` (UTC).
 *
 * @pure true
 */
export function daysBefore(date: string, days: number): string {
	const shifted = new Date(`${date}T00:00:00.000Z`);
	shifted.setUTCDate(shifted.getUTCDate() - days);
	return shifted.toISOString().slice(0, 10);
}

/**
 * Per-field change from an older snapshot to this one.
 *
 * @pure true
 */
export function deltaFrom(current: HistorySnapshot, older: HistorySnapshot): SnapshotDelta {
	return {
		total: current.summary.total - older.summary.total,
		passed: current.summary.passed - older.summary.passed,
		failed: current.summary.failed - older.summary.failed,
		exempted: current.summary.exempted - older.summary.exempted,
	};
}

export function snapshotFromReport(report: ConformanceReport, date: string): HistorySnapshot {
	return {
		date,
		runId: report.runId,
		summary: report.summary,
		bySeverity: { ...report.bySeverity },
		byContract: { ...report.byContract },
	};
}

export interface TrendPoint {
	readonly date: string;
	readonly failed: number;
	readonly exempted: number;
	readonly complianceRate: number;
}

export interface Trend {
	readonly points: readonly TrendPoint[];
	/** Change from the first to the last snapshot, undefined with fewer than two. */
	readonly change?: SnapshotDelta;
}

/**
 * @pure true
 * @precondition snapshots sorted by date ascending
 */
export function computeHistoryTrend(snapshots: readonly HistorySnapshot[]): Trend {
	const points = snapshots.map((snapshot) => ({
		date: snapshot.date,
		failed: snapshot.summary.failed,
		exempted: snapshot.summary.exempted,
		complianceRate: complianceRate(snapshot.summary),
	}));
	const first = snapshots[0];
	const last = snapshots[snapshots.length - 1];
	if (first === undefined || last === undefined || snapshots.length < 2) return { points };
	return { points, change: deltaFrom(last, first) };
}

export function snapshotToDocument(snapshot: HistorySnapshot): JSONObject {
	return {
		date: snapshot.date,
		run_id: snapshot.runId,
		summary: {
			total: snapshot.summary.total,
			passed: snapshot.summary.passed,
			failed: snapshot.summary.failed,
			exempted: snapshot.summary.exempted,
			stale: snapshot.summary.stale,
		},
		by_severity: { ...snapshot.bySeverity },
		by_contract: { ...snapshot.byContract },
	};
}

export function snapshotFromDocument(doc: JSONValue): HistorySnapshot | null {
	if (!isJSONObject(doc)) return null;
	const date = readString(doc, "date");
	if (date === undefined) return null;
	return {
		date,
		runId: readString(doc, "run_id") ?? "",
		summary: summaryFromDocument(readObject(doc, "summary")),
		bySeverity: readNumberRecord(doc, "by_severity"),
		byContract: readNumberRecord(doc, "by_contract"),
	};
}
