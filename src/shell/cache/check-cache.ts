// CHANGE: File-backed cache of check results keyed by file contents
// WHY: Incremental runs skip checks whose inputs did not change within the TTL
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: get(key) = null when the entry is missing, unreadable or older than ttlHours
// COMPLEXITY: O(r) per entry where r = cached results

import { Effect, Either } from "effect";

import type { StoreError } from "../../core/errors.js";
import { checkCacheKey, contentHash } from "../../core/fingerprint.js";
import { type CheckResult, toCheckSeverity } from "../../core/models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readBoolean,
	readNumber,
	readString,
	toJSONValue,
} from "../../core/types/json.js";
import { writeJsonAtomic } from "../fs/atomic.js";
import { listFiles, readText, readTextIfExists, removeFile } from "../fs/files.js";
import { debugLog } from "../utils/log.js";
import { path } from "../utils/node-mods.js";

const HOUR_MS = 60 * 60 * 1000;

export function resultToDocument(result: CheckResult): JSONObject {
	return {
		check_id: result.checkId,
		check_name: result.checkName,
		contract: result.contract,
		passed: result.passed,
		severity: result.severity,
		message: result.message,
		...(result.file === undefined ? {} : { file: result.file }),
		...(result.line === undefined ? {} : { line: result.line }),
		...(result.column === undefined ? {} : { column: result.column }),
		...(result.ruleId === undefined ? {} : { rule_id: result.ruleId }),
		...(result.fixHint === undefined ? {} : { fix_hint: result.fixHint }),
		...(result.error === undefined ? {} : { error: result.error }),
	};
}

/**
 * @pure true
 * @returns null when a required field is missing
 */
export function resultFromDocument(doc: JSONValue): CheckResult | null {
	if (!isJSONObject(doc)) return null;
	const checkId = readString(doc, "check_id");
	const contract = readString(doc, "contract");
	const message = readString(doc, "message");
	const passed = readBoolean(doc, "passed");
	if (
		checkId === undefined ||
		contract === undefined ||
		message === undefined ||
		passed === undefined
	) {
		return null;
	}
	const file = readString(doc, "file");
	const line = readNumber(doc, "line");
	const column = readNumber(doc, "column");
	const ruleId = readString(doc, "rule_id");
	const fixHint = readString(doc, "fix_hint");
	const error = readBoolean(doc, "error");
	return {
		checkId,
		checkName: readString(doc, "check_name") ?? checkId,
		contract,
		passed,
		severity: toCheckSeverity(readString(doc, "severity")),
		message,
		...(file === undefined ? {} : { file }),
		...(line === undefined ? {} : { line }),
		...(column === undefined ? {} : { column }),
		...(ruleId === undefined ? {} : { ruleId }),
		...(fixHint === undefined ? {} : { fixHint }),
		...(error === undefined ? {} : { error }),
	};
}

export class CheckCache {
	constructor(
		readonly dir: string,
		readonly ttlHours = 24,
		private readonly clock: () => Date = () => new Date(),
	) {}

	private fileOf(key: string): string {
		return path.join(this.dir, `${key}.json`);
	}

	private isFresh(cachedAt: string): boolean {
		const age = this.clock().getTime() - Date.parse(cachedAt);
		return Number.isFinite(age) && age <= this.ttlHours * HOUR_MS;
	}

	/**
	 * Cache key for a check over files under repoRoot; null files means a full scan.
	 */
	keyFor(
		repoRoot: string,
		checkId: string,
		files: readonly string[] | null,
	): Effect.Effect<string> {
		if (files === null) return Effect.succeed(checkCacheKey(checkId, null));
		return Effect.map(
			Effect.forEach(files, (file) =>
				readText(path.join(repoRoot, file)).pipe(
					Effect.map((content) => ({ file, hash: contentHash(content) })),
					Effect.orElseSucceed(() => ({ file, hash: "missing" })),
				),
			),
			(hashed) => checkCacheKey(checkId, hashed),
		);
	}

	private readEntry(key: string): Effect.Effect<JSONObject | null> {
		return readTextIfExists(this.fileOf(key)).pipe(
			Effect.map((content) => {
				if (content === null) return null;
				const parsed = Either.try(() => toJSONValue(JSON.parse(content)));
				return Either.isRight(parsed) && isJSONObject(parsed.right) ? parsed.right : null;
			}),
			Effect.catchAll((error) => {
				debugLog("cache", `unreadable entry ${key}: ${error.detail}`);
				return Effect.succeed(null);
			}),
		);
	}

	get(key: string): Effect.Effect<readonly CheckResult[] | null> {
		return Effect.map(this.readEntry(key), (entry) => {
			if (entry === null) return null;
			const cachedAt = readString(entry, "cachedAt");
			const results = entry["results"];
			if (cachedAt === undefined || !this.isFresh(cachedAt) || !isJSONArray(results)) return null;
			const parsed: CheckResult[] = [];
			for (const raw of results) {
				const result = resultFromDocument(raw);
				if (result === null) return null;
				parsed.push(result);
			}
			debugLog("cache", `hit ${key}`);
			return parsed;
		});
	}

	set(key: string, results: readonly CheckResult[]): Effect.Effect<void, StoreError> {
		return writeJsonAtomic(this.fileOf(key), {
			cachedAt: this.clock().toISOString(),
			results: results.map(resultToDocument),
		});
	}

	/** @returns number of removed entries */
	clear(): Effect.Effect<number, StoreError> {
		return Effect.gen(this, function* () {
			const files = (yield* listFiles(this.dir)).filter((file) => file.endsWith(".json"));
			yield* Effect.forEach(files, (file) => removeFile(path.join(this.dir, file)), { discard: true });
			return files.length;
		});
	}

	/** @returns number of removed entries */
	pruneExpired(): Effect.Effect<number, StoreError> {
		return Effect.gen(this, function* () {
			const files = (yield* listFiles(this.dir)).filter((file) => file.endsWith(".json"));
			let removed = 0;
			for (const file of files) {
				const entry = yield* this.readEntry(file.slice(0, -".json".length));
				const cachedAt = entry === null ? undefined : readString(entry, "cachedAt");
				if (cachedAt !== undefined && this.isFresh(cachedAt)) continue;
				yield* removeFile(path.join(this.dir, file));
				removed += 1;
			}
			return removed;
		});
	}
}
