// CHANGE: Exemption model, lazy expiry and scope precedence matching
// WHY: Waivers must be evaluated at match time; a violation-id match outranks a file match, which outranks global
// PURITY: CORE
// INVARIANT: expiry is a function of (exemption, today) and is never swept eagerly here
// COMPLEXITY: O(e · p) per lookup where e = exemptions, p = patterns per exemption

import { Either } from "effect";
import { match } from "ts-pattern";

import { ConfigError } from "../errors.js";
import { matchesAnyGlob, normalizePath } from "../glob.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readBoolean,
	readNumber,
	readObject,
	readString,
	readStringList,
} from "../types/json.js";

export type ExemptionStatus = "active" | "expired" | "resolved" | "under_review";

export interface LineRange {
	readonly start: number;
	readonly end: number;
}

export type ExemptionScope =
	| { readonly kind: "global" }
	| {
			readonly kind: "file-pattern";
			readonly patterns: readonly string[];
			readonly lines?: LineRange;
	  }
	| { readonly kind: "violation-ids"; readonly ids: readonly string[] };

export interface Exemption {
	readonly id: string;
	readonly contract: string;
	/** Covered check ids; `*` covers every check of the contract. */
	readonly checks: readonly string[];
	readonly reason: string;
	readonly approvedBy: string;
	readonly approvedDate?: string;
	/** YYYY-MM-DD; the exemption is expired on the day after. */
	readonly expires?: string;
	readonly reviewDate?: string;
	readonly ticket?: string;
	readonly status: ExemptionStatus;
	readonly scope: ExemptionScope;
}

/**
 * Where a violation sits, for exemption lookup.
 */
export interface ExemptionQuery {
	readonly contract: string;
	readonly checkId: string;
	readonly file?: string | undefined;
	readonly line?: number | undefined;
	readonly violationId?: string | undefined;
}

/**
 * @pure true
 * @postcondition result matches YYYY-MM-DD (UTC)
 */
export function isoDate(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/**
 * @pure true
 * @invariant isExpired ⇔ expires is set ∧ today > expires
 */
export function isExpired(exemption: Exemption, today: string): boolean {
	return exemption.expires !== undefined && today > exemption.expires;
}

export function isActive(exemption: Exemption, today: string): boolean {
	return exemption.status === "active" && !isExpired(exemption, today);
}

export function needsReview(exemption: Exemption, today: string): boolean {
	return exemption.reviewDate !== undefined && today >= exemption.reviewDate;
}

export function coversCheck(exemption: Exemption, checkId: string): boolean {
	return exemption.checks.includes("*") || exemption.checks.includes(checkId);
}

type ScopeMatch = "violation-id" | "file-pattern" | "global" | null;

function lineWithin(lines: LineRange | undefined, line: number | undefined): boolean {
	// A violation without a line, or a scope without a range, is covered by the file match.
	if (lines === undefined || line === undefined) return true;
	return line >= lines.start && line <= lines.end;
}

/**
 * Which precedence class (if any) a scope matches a query with.
 *
 * @pure true
 */
export function scopeMatch(scope: ExemptionScope, query: ExemptionQuery): ScopeMatch {
	return match(scope)
		.returnType<ScopeMatch>()
		.with({ kind: "global" }, () => "global")
		.with({ kind: "violation-ids" }, (s) =>
			query.violationId !== undefined && s.ids.includes(query.violationId)
				? "violation-id"
				: null,
		)
		.with({ kind: "file-pattern" }, (s) =>
			query.file !== undefined &&
			matchesAnyGlob(s.patterns, normalizePath(query.file)) &&
			lineWithin(s.lines, query.line)
				? "file-pattern"
				: null,
		)
		.exhaustive();
}

const PRECEDENCE: readonly Exclude<ScopeMatch, null>[] = [
	"violation-id",
	"file-pattern",
	"global",
];

function candidates(
	exemptions: readonly Exemption[],
	query: ExemptionQuery,
): readonly Exemption[] {
	return exemptions.filter(
		(ex) => ex.contract === query.contract && coversCheck(ex, query.checkId),
	);
}

function firstByPrecedence(
	pool: readonly Exemption[],
	query: ExemptionQuery,
): Exemption | undefined {
	for (const kind of PRECEDENCE) {
		const hit = pool.find((ex) => scopeMatch(ex.scope, query) === kind);
		if (hit !== undefined) return hit;
	}
	return undefined;
}

/**
 * First active exemption covering the query: explicit violation-id matches,
 * then file-pattern matches, then global ones; load order breaks ties.
 *
 * @pure true
 * @complexity O(e · p)
 */
export function findExemption(
	exemptions: readonly Exemption[],
	query: ExemptionQuery,
	today: string,
): Exemption | undefined {
	const pool = candidates(exemptions, query).filter((ex) => isActive(ex, today));
	return firstByPrecedence(pool, query);
}

/**
 * An exemption still marked active whose expiry date has passed and which
 * would otherwise cover the query.
 *
 * @pure true
 */
export function findLapsedExemption(
	exemptions: readonly Exemption[],
	query: ExemptionQuery,
	today: string,
): Exemption | undefined {
	const pool = candidates(exemptions, query).filter(
		(ex) => ex.status === "active" && isExpired(ex, today),
	);
	return firstByPrecedence(pool, query);
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/u;

function readDate(
	raw: JSONObject,
	key: string,
	sourcePath: string,
): Either.Either<string | undefined, ConfigError> {
	const value = readString(raw, key);
	if (value === undefined) return Either.right(undefined);
	const day = value.slice(0, 10);
	return DATE_PATTERN.test(day)
		? Either.right(day)
		: Either.left(
				new ConfigError({ path: sourcePath, detail: `'${key}' is not a YYYY-MM-DD date: ${value}` }),
			);
}

function readLineRange(scope: JSONObject): LineRange | undefined {
	const lines = scope["lines"];
	if (isJSONObject(lines)) {
		const start = readNumber(lines, "start");
		const end = readNumber(lines, "end");
		if (start !== undefined && end !== undefined) return { start, end };
	}
	if (isJSONArray(lines) && lines.length === 2) {
		const [start, end] = lines;
		if (typeof start === "number" && typeof end === "number") return { start, end };
	}
	return undefined;
}

function parseScope(
	raw: JSONObject | undefined,
	sourcePath: string,
): Either.Either<ExemptionScope, ConfigError> {
	if (raw === undefined) {
		return Either.left(new ConfigError({ path: sourcePath, detail: "exemption requires a 'scope'" }));
	}
	if (readBoolean(raw, "global") === true || readString(raw, "type") === "global") {
		return Either.right({ kind: "global" });
	}
	const ids = readStringList(raw, "violation_ids");
	if (ids.length > 0) return Either.right({ kind: "violation-ids", ids });

	const patterns = [...readStringList(raw, "files"), ...readStringList(raw, "patterns")];
	if (patterns.length > 0) {
		const lines = readLineRange(raw);
		return Either.right({
			kind: "file-pattern",
			patterns,
			...(lines === undefined ? {} : { lines }),
		});
	}
	return Either.left(
		new ConfigError({ path: sourcePath, detail: "scope needs 'global', 'files' or 'violation_ids'" }),
	);
}

function toStatus(value: string | undefined): ExemptionStatus {
	return value === "expired" || value === "resolved" || value === "under_review"
		? value
		: "active";
}

/**
 * Parse one exemption entry.
 *
 * @pure true
 * @postcondition left(ConfigError) when id, contract, check, reason, approved_by or scope is missing
 */
export function parseExemptionEntry(
	raw: JSONValue,
	sourcePath: string,
): Either.Either<Exemption, ConfigError> {
	if (!isJSONObject(raw)) {
		return Either.left(new ConfigError({ path: sourcePath, detail: "exemption must be a mapping" }));
	}
	const id = readString(raw, "id");
	const contract = readString(raw, "contract");
	const reason = readString(raw, "reason");
	const approvedBy = readString(raw, "approved_by");
	const checks = readStringList(raw, "check");
	if (
		id === undefined ||
		contract === undefined ||
		reason === undefined ||
		approvedBy === undefined ||
		checks.length === 0
	) {
		return Either.left(
			new ConfigError({
				path: sourcePath,
				detail: `exemption ${id ?? "<no id>"} requires id, contract, check, reason and approved_by`,
			}),
		);
	}

	return Either.gen(function* () {
		const scope = yield* parseScope(readObject(raw, "scope"), sourcePath);
		const approvedDate = yield* readDate(raw, "approved_date", sourcePath);
		const expires = yield* readDate(raw, "expires", sourcePath);
		const reviewDate = yield* readDate(raw, "review_date", sourcePath);
		const ticket = readString(raw, "ticket");
		const exemption: Exemption = {
			id,
			contract,
			checks,
			reason,
			approvedBy,
			...(approvedDate === undefined ? {} : { approvedDate }),
			...(expires === undefined ? {} : { expires }),
			...(reviewDate === undefined ? {} : { reviewDate }),
			...(ticket === undefined ? {} : { ticket }),
			status: toStatus(readString(raw, "status")),
			scope,
		};
		return exemption;
	});
}

/**
 * Inverse of parseExemptionEntry, in the on-disk snake_case shape.
 *
 * @pure true
 */
export function exemptionToDocument(exemption: Exemption): JSONObject {
	const scope: JSONObject = match(exemption.scope)
		.returnType<JSONObject>()
		.with({ kind: "global" }, () => ({ global: true }))
		.with({ kind: "violation-ids" }, (s) => ({ violation_ids: [...s.ids] }))
		.with({ kind: "file-pattern" }, (s): JSONObject =>
			s.lines === undefined
				? { files: [...s.patterns] }
				: { files: [...s.patterns], lines: { start: s.lines.start, end: s.lines.end } },
		)
		.exhaustive();
	return {
		id: exemption.id,
		contract: exemption.contract,
		check: [...exemption.checks],
		reason: exemption.reason,
		approved_by: exemption.approvedBy,
		...(exemption.approvedDate === undefined ? {} : { approved_date: exemption.approvedDate }),
		...(exemption.expires === undefined ? {} : { expires: exemption.expires }),
		...(exemption.reviewDate === undefined ? {} : { review_date: exemption.reviewDate }),
		...(exemption.ticket === undefined ? {} : { ticket: exemption.ticket }),
		status: exemption.status,
		scope,
	};
}
