// CHANGE: The two location fingerprints used by the engine
// WHY: Conformance tracking must survive message rewording; CI baselining must notice it.
//      Each layer keeps its own definition (see DESIGN.md, "Fingerprints").
// PURITY: CORE
// INVARIANT: Both functions are deterministic over their inputs
// COMPLEXITY: O(n) where n = total input length

import { createHash } from "node:crypto";

import { normalizePath } from "./glob.js";

function sha256Hex(input: string): string {
	return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Location of a finding as seen by the conformance tracker.
 */
export interface TrackingKey {
	readonly contract: string;
	readonly checkId: string;
	readonly file: string;
	readonly line?: number | undefined;
	readonly ruleId?: string | undefined;
}

/**
 * Stable tracking id of a persisted violation.
 *
 * `V-` + first 12 hex chars of sha256("contract|check|path|line|rule"), where a
 * missing line is written as `file` and a missing rule as the empty string.
 * The message is not part of the key.
 *
 * @pure true
 * @invariant result matches /^V-[0-9a-f]{12}$/
 */
export function violationTrackingId(key: TrackingKey): string {
	const parts = [
		key.contract,
		key.checkId,
		normalizePath(key.file),
		key.line === undefined ? "file" : String(key.line),
		key.ruleId ?? "",
	];
	return `V-${sha256Hex(parts.join("|")).slice(0, 12)}`;
}

/**
 * Location plus message of a finding as seen by the CI baseline.
 */
export interface BaselineKey {
	readonly checkId: string;
	readonly file: string;
	readonly line?: number | undefined;
	readonly message: string;
}

/**
 * Baseline fingerprint: first 16 hex chars of sha256("check:file:line:message"),
 * with a missing line written as `0`.
 *
 * @pure true
 * @invariant result matches /^[0-9a-f]{16}$/
 */
export function baselineFingerprint(key: BaselineKey): string {
	const line = key.line === undefined ? "0" : String(key.line);
	return sha256Hex(`${key.checkId}:${key.file}:${line}:${key.message}`).slice(
		0,
		16,
	);
}

/**
 * Short content hash used in check-cache keys.
 *
 * @pure true
 */
export function contentHash(content: string | Buffer): string {
	return createHash("sha256").update(content).digest("hex");
}

/**
 * Cache key of a check over a set of files.
 *
 * `files === null` (full scan) gives `<check>_full`; otherwise the first 16 hex
 * chars of sha256 over the sorted `check:file:hash8` entries joined by `|`.
 *
 * @pure true
 * @invariant key is independent of the order of `files`
 */
export function checkCacheKey(
	checkId: string,
	files: ReadonlyArray<{ readonly file: string; readonly hash: string }> | null,
): string {
	if (files === null) return `${checkId}_full`;
	const entries = files
		.map(({ file, hash }) => `${checkId}:${normalizePath(file)}:${hash.slice(0, 8)}`)
		.sort();
	return sha256Hex(entries.join("|")).slice(0, 16);
}
