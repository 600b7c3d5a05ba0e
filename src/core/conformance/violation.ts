// CHANGE: Persisted violation record and its state transitions
// WHY: Identity must survive repeated runs; transitions are pure record → record functions
// PURITY: CORE
// INVARIANT: every transition returns a new record; the id never changes
// COMPLEXITY: O(1) per transition

import { violationTrackingId } from "../fingerprint.js";
import type { CheckResult, CheckSeverity } from "../models.js";
import {
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readNumber,
	readObject,
	readString,
} from "../types/json.js";

export type ViolationSeverity = "blocker" | "critical" | "major" | "minor" | "info";

export const VIOLATION_SEVERITIES: readonly ViolationSeverity[] = [
	"blocker",
	"critical",
	"major",
	"minor",
	"info",
];

const SEVERITY_WEIGHT: Readonly<Record<ViolationSeverity, number>> = {
	blocker: 5,
	critical: 4,
	major: 3,
	minor: 2,
	info: 1,
};

export function severityWeight(severity: ViolationSeverity): number {
	return SEVERITY_WEIGHT[severity];
}

/**
 * Conformance severity of a check severity: error→blocker, warning→major, info→minor.
 *
 * @pure true
 */
export function fromCheckSeverity(severity: CheckSeverity): ViolationSeverity {
	switch (severity) {
		case "error":
			return "blocker";
		case "warning":
			return "major";
		case "info":
			return "minor";
	}
}

export function isViolationSeverity(value: string): value is ViolationSeverity {
	return Object.hasOwn(SEVERITY_WEIGHT, value);
}

export type ViolationStatus = "open" | "resolved" | "stale" | "exemption_expired";

export function isViolationStatus(value: string): value is ViolationStatus {
	return (
		value === "open" ||
		value === "resolved" ||
		value === "stale" ||
		value === "exemption_expired"
	);
}

export interface Resolution {
	readonly resolvedAt: string;
	readonly resolvedBy: string;
	readonly reason: string;
}

export interface Violation {
	readonly id: string;
	readonly contract: string;
	readonly checkId: string;
	readonly severity: ViolationSeverity;
	readonly file: string;
	readonly line?: number;
	readonly ruleId?: string;
	readonly message: string;
	readonly fixHint?: string;
	readonly status: ViolationStatus;
	readonly detectedAt: string;
	readonly lastSeenAt: string;
	readonly exemptionId?: string;
	readonly resolution?: Resolution;
}

/**
 * Tracking id of the violation a failing check result would produce.
 *
 * @pure true
 */
export function trackingIdOf(result: CheckResult): string {
	return violationTrackingId({
		contract: result.contract,
		checkId: result.checkId,
		file: result.file ?? "",
		line: result.line,
		ruleId: result.ruleId,
	});
}

/**
 * New open violation for a failing check result.
 *
 * @pure true
 * @postcondition status = open ∧ detectedAt = lastSeenAt = now
 */
export function createViolation(result: CheckResult, now: string): Violation {
	return {
		id: trackingIdOf(result),
		contract: result.contract,
		checkId: result.checkId,
		severity: fromCheckSeverity(result.severity),
		file: (result.file ?? "").replace(/\\/g, "/"),
		...(result.line === undefined ? {} : { line: result.line }),
		...(result.ruleId === undefined ? {} : { ruleId: result.ruleId }),
		message: result.message,
		...(result.fixHint === undefined ? {} : { fixHint: result.fixHint }),
		status: "open",
		detectedAt: now,
		lastSeenAt: now,
	};
}

function withoutResolution(violation: Violation): Violation {
	const { resolution: _dropped, ...rest } = violation;
	return rest;
}

function withoutExemption(violation: Violation): Violation {
	const { exemptionId: _dropped, ...rest } = violation;
	return rest;
}

/**
 * Re-detection: refresh lastSeenAt and the latest message; reopen anything not open.
 *
 * @pure true
 * @postcondition status = open ∧ resolution = undefined
 */
export function markSeen(violation: Violation, result: CheckResult, now: string): Violation {
	return {
		...withoutResolution(violation),
		message: result.message,
		severity: fromCheckSeverity(result.severity),
		status: "open",
		lastSeenAt: now,
	};
}

export function markResolved(
	violation: Violation,
	now: string,
	reason: string,
	resolvedBy: string,
): Violation {
	return {
		...violation,
		status: "resolved",
		resolution: { resolvedAt: now, resolvedBy, reason },
	};
}

export function markStale(violation: Violation): Violation {
	return { ...violation, status: "stale" };
}

export function linkExemption(violation: Violation, exemptionId: string | undefined): Violation {
	if (exemptionId === undefined) return withoutExemption(violation);
	return { ...violation, exemptionId };
}

/**
 * @pure true
 */
export function violationToDocument(violation: Violation): JSONObject {
	return {
		violation_id: violation.id,
		contract_id: violation.contract,
		check_id: violation.checkId,
		severity: violation.severity,
		file_path: violation.file,
		...(violation.line === undefined ? {} : { line_number: violation.line }),
		...(violation.ruleId === undefined ? {} : { rule_id: violation.ruleId }),
		message: violation.message,
		...(violation.fixHint === undefined ? {} : { fix_hint: violation.fixHint }),
		status: violation.status,
		detected_at: violation.detectedAt,
		last_seen_at: violation.lastSeenAt,
		...(violation.exemptionId === undefined ? {} : { exemption_id: violation.exemptionId }),
		...(violation.resolution === undefined
			? {}
			: {
					resolution: {
						resolved_at: violation.resolution.resolvedAt,
						resolved_by: violation.resolution.resolvedBy,
						reason: violation.resolution.reason,
					},
				}),
	};
}

/**
 * @pure true
 * @returns null when a required field is missing or malformed
 */
export function violationFromDocument(doc: JSONValue): Violation | null {
	if (!isJSONObject(doc)) return null;
	const id = readString(doc, "violation_id");
	const contract = readString(doc, "contract_id");
	const checkId = readString(doc, "check_id");
	const severity = readString(doc, "severity");
	const file = readString(doc, "file_path");
	const message = readString(doc, "message");
	const status = readString(doc, "status");
	const detectedAt = readString(doc, "detected_at");
	const lastSeenAt = readString(doc, "last_seen_at");
	if (
		id === undefined ||
		contract === undefined ||
		checkId === undefined ||
		severity === undefined ||
		!isViolationSeverity(severity) ||
		file === undefined ||
		message === undefined ||
		status === undefined ||
		!isViolationStatus(status) ||
		detectedAt === undefined ||
		lastSeenAt === undefined
	) {
		return null;
	}
	const line = readNumber(doc, "line_number");
	const ruleId = readString(doc, "rule_id");
	const fixHint = readString(doc, "fix_hint");
	const exemptionId = readString(doc, "exemption_id");
	const rawResolution = readObject(doc, "resolution");
	const resolvedAt = rawResolution === undefined ? undefined : readString(rawResolution, "resolved_at");
	const resolution: Resolution | undefined =
		rawResolution === undefined || resolvedAt === undefined
			? undefined
			: {
					resolvedAt,
					resolvedBy: readString(rawResolution, "resolved_by") ?? "unknown",
					reason: readString(rawResolution, "reason") ?? "",
				};
	return {
		id,
		contract,
		checkId,
		severity,
		file,
		...(line === undefined ? {} : { line }),
		...(ruleId === undefined ? {} : { ruleId }),
		message,
		...(fixHint === undefined ? {} : { fixHint }),
		status,
		detectedAt,
		lastSeenAt,
		...(exemptionId === undefined ? {} : { exemptionId }),
		...(resolution === undefined ? {} : { resolution }),
	};
}
