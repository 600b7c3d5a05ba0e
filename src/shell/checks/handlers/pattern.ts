// CHANGE: Regex check in forbid or require mode
// PURITY: SHELL (reads files)
// INVARIANT: forbid reports every match; require reports each in-scope file without a match
// COMPLEXITY: O(f · n) where n = file length

import { Effect, Either } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { messageOf } from "../../../core/errors.js";
import type { CheckResult } from "../../../core/models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	readBoolean,
	readString,
} from "../../../core/types/json.js";
import { failure, faultResult, lineAt } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { readSources } from "./sources.js";

interface NamedPattern {
	readonly name?: string;
	readonly source: string;
}

type PatternMode = "forbid" | "require";

/**
 * `pattern: "..."` or `patterns: ["...", {name, pattern}]`.
 *
 * @pure true
 */
export function readPatterns(config: JSONObject): readonly NamedPattern[] {
	const single = readString(config, "pattern");
	const listed = config["patterns"];
	const patterns: NamedPattern[] = single === undefined ? [] : [{ source: single }];
	if (isJSONArray(listed)) {
		for (const item of listed) {
			if (typeof item === "string") patterns.push({ source: item });
			else if (isJSONObject(item)) {
				const source = readString(item, "pattern");
				const name = readString(item, "name");
				if (source !== undefined) patterns.push(name === undefined ? { source } : { name, source });
			}
		}
	}
	return patterns;
}

/**
 * `mode` wins; otherwise `negative_match: false` means require.
 *
 * @pure true
 */
export function patternMode(config: JSONObject): PatternMode {
	const mode = readString(config, "mode");
	if (mode === "require" || mode === "forbid") return mode;
	return readBoolean(config, "negative_match") === false ? "require" : "forbid";
}

function flagsOf(config: JSONObject): string {
	const multiline = readBoolean(config, "multiline") === true ? "m" : "";
	const ignoreCase = readBoolean(config, "case_insensitive") === true ? "i" : "";
	return `g${multiline}${ignoreCase}`;
}

function compile(pattern: NamedPattern, flags: string): Either.Either<RegExp, string> {
	return Either.try({
		try: () => new RegExp(pattern.source, flags),
		catch: (error) => `Invalid pattern '${pattern.source}': ${messageOf(error)}`,
	});
}

export const patternHandler: CheckHandler = {
	type: "pattern",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const patterns = readPatterns(check.config);
			if (patterns.length === 0) {
				return [faultResult(check, context, "Pattern check missing 'pattern' in config")];
			}
			const mode = patternMode(check.config);
			const flags = flagsOf(check.config);
			const compiled: Array<{ readonly pattern: NamedPattern; readonly regex: RegExp }> = [];
			for (const pattern of patterns) {
				const regex = compile(pattern, flags);
				if (Either.isLeft(regex)) return [faultResult(check, context, regex.left)];
				compiled.push({ pattern, regex: regex.right });
			}

			const sources = yield* readSources(context.repoRoot, context.files);
			const results: CheckResult[] = [];
			for (const { file, content } of sources) {
				for (const { pattern, regex } of compiled) {
					const ruleId = pattern.name;
					if (mode === "require") {
						if (!new RegExp(regex.source, regex.flags).test(content)) {
							results.push(
								failure(check, context, `Required pattern not found: '${pattern.source}'`, {
									file,
									...(ruleId === undefined ? {} : { ruleId }),
								}),
							);
						}
						continue;
					}
					for (const found of content.matchAll(regex)) {
						results.push(
							failure(check, context, `Forbidden pattern found: '${found[0].slice(0, 100)}'`, {
								file,
								line: lineAt(content, found.index ?? 0),
								...(ruleId === undefined ? {} : { ruleId }),
							}),
						);
					}
				}
			}
			return results;
		}),
};
