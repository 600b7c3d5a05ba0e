// CHANGE: Baseline model and the current-vs-baseline partition
// WHY: PR and ratchet gating distinguish new findings from pre-existing ones by fingerprint
// PURITY: CORE
// FORMAT THEOREM: new ∪ existing = current (disjoint); fixed = baseline − current (by hash);
//                 netChange = |new| − |fixed|
// COMPLEXITY: O(c + b) where c = current violations, b = baseline entries

import { type CIViolation, ciViolationHash } from "../ci/violation.js";
import {
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readNumber,
	readObject,
	readString,
} from "../types/json.js";

export interface BaselineEntry {
	readonly hash: string;
	readonly checkId: string;
	readonly filePath: string;
	readonly line?: number;
	/** First 100 characters of the message. */
	readonly messagePreview: string;
	readonly firstSeen: string;
	readonly lastSeen: string;
}

export interface Baseline {
	readonly schemaVersion: "1.0";
	readonly createdAt: string;
	readonly updatedAt: string;
	readonly commitSha?: string;
	readonly entries: Readonly<Record<string, BaselineEntry>>;
}

export interface BaselineComparison {
	readonly newViolations: readonly CIViolation[];
	readonly existingViolations: readonly CIViolation[];
	readonly fixedEntries: readonly BaselineEntry[];
}

/**
 * @pure true
 */
export function createEmptyBaseline(now: string, commitSha?: string): Baseline {
	return {
		schemaVersion: "1.0",
		createdAt: now,
		updatedAt: now,
		...(commitSha === undefined ? {} : { commitSha }),
		entries: {},
	};
}

/**
 * Entry for a violation; keeps firstSeen of an existing entry with the same hash.
 *
 * @pure true
 */
export function baselineEntryOf(
	violation: CIViolation,
	now: string,
	previous?: BaselineEntry,
): BaselineEntry {
	return {
		hash: ciViolationHash(violation),
		checkId: violation.checkId,
		filePath: violation.file,
		...(violation.line === undefined ? {} : { line: violation.line }),
		messagePreview: violation.message.slice(0, 100),
		firstSeen: previous?.firstSeen ?? now,
		lastSeen: now,
	};
}

export function addToBaseline(baseline: Baseline, violation: CIViolation, now: string): Baseline {
	const hash = ciViolationHash(violation);
	return {
		...baseline,
		updatedAt: now,
		entries: { ...baseline.entries, [hash]: baselineEntryOf(violation, now, baseline.entries[hash]) },
	};
}

export function removeFromBaseline(baseline: Baseline, hash: string, now: string): Baseline {
	if (!baselineContains(baseline, hash)) return baseline;
	const { [hash]: _removed, ...entries } = baseline.entries;
	return { ...baseline, updatedAt: now, entries };
}

export function baselineContains(baseline: Baseline, hash: string): boolean {
	return Object.hasOwn(baseline.entries, hash);
}

/**
 * Partition the current violations against a baseline.
 *
 * @pure true
 * @postcondition newViolations ∪ existingViolations = violations, disjoint
 * @postcondition fixedEntries = { e ∈ baseline | e.hash ∉ hashes(violations) }
 * @complexity O(c + b)
 */
export function compareWithBaseline(
	violations: readonly CIViolation[],
	baseline: Baseline,
): BaselineComparison {
	const currentHashes = new Set<string>();
	const newViolations: CIViolation[] = [];
	const existingViolations: CIViolation[] = [];
	for (const violation of violations) {
		const hash = ciViolationHash(violation);
		currentHashes.add(hash);
		if (baselineContains(baseline, hash)) existingViolations.push(violation);
		else newViolations.push(violation);
	}
	const fixedEntries = Object.values(baseline.entries).filter(
		(entry) => !currentHashes.has(entry.hash),
	);
	return { newViolations, existingViolations, fixedEntries };
}

/**
 * @pure true
 * @invariant netChange = |new| − |fixed|
 */
export function netChange(comparison: BaselineComparison): number {
	return comparison.newViolations.length - comparison.fixedEntries.length;
}

export function newErrors(comparison: BaselineComparison): readonly CIViolation[] {
	return comparison.newViolations.filter((v) => v.severity === "error");
}

export function newWarnings(comparison: BaselineComparison): readonly CIViolation[] {
	return comparison.newViolations.filter((v) => v.severity === "warning");
}

/**
 * True when new violations include a severity the policy gates on.
 *
 * @pure true
 */
export function shouldFail(
	comparison: BaselineComparison,
	failOnNewErrors = true,
	failOnNewWarnings = false,
): boolean {
	if (failOnNewErrors && newErrors(comparison).length > 0) return true;
	return failOnNewWarnings && newWarnings(comparison).length > 0;
}

/**
 * Ratchet: fail only when more violations were introduced than fixed.
 *
 * @pure true
 * @invariant shouldFailRatchet ⇔ netChange > 0
 */
export function shouldFailRatchet(comparison: BaselineComparison): boolean {
	return netChange(comparison) > 0;
}

export function baselineToDocument(baseline: Baseline): JSONObject {
	const entries: Record<string, JSONObject> = {};
	for (const [hash, entry] of Object.entries(baseline.entries)) {
		entries[hash] = {
			check_id: entry.checkId,
			file_path: entry.filePath,
			line: entry.line ?? null,
			message_preview: entry.messagePreview,
			first_seen: entry.firstSeen,
			last_seen: entry.lastSeen,
		};
	}
	return {
		schema_version: baseline.schemaVersion,
		created_at: baseline.createdAt,
		updated_at: baseline.updatedAt,
		commit_sha: baseline.commitSha ?? null,
		entries,
	};
}

/**
 * @pure true
 * @returns null when the document is not a baseline
 */
export function baselineFromDocument(doc: JSONValue): Baseline | null {
	if (!isJSONObject(doc)) return null;
	const rawEntries = readObject(doc, "entries");
	const createdAt = readString(doc, "created_at");
	if (rawEntries === undefined || createdAt === undefined) return null;

	const entries: Record<string, BaselineEntry> = {};
	for (const [hash, raw] of Object.entries(rawEntries)) {
		if (!isJSONObject(raw)) return null;
		const checkId = readString(raw, "check_id");
		const filePath = readString(raw, "file_path");
		if (checkId === undefined || filePath === undefined) return null;
		const line = readNumber(raw, "line");
		entries[hash] = {
			hash,
			checkId,
			filePath,
			...(line === undefined ? {} : { line }),
			messagePreview: readString(raw, "message_preview") ?? "",
			firstSeen: readString(raw, "first_seen") ?? createdAt,
			lastSeen: readString(raw, "last_seen") ?? createdAt,
		};
	}
	const commitSha = readString(doc, "commit_sha");
	return {
		schemaVersion: "1.0",
		createdAt,
		updatedAt: readString(doc, "updated_at") ?? createdAt,
		...(commitSha === undefined ? {} : { commitSha }),
		entries,
	};
}
