// CHANGE: Required and forbidden files, literal paths or globs over the repository listing
// PURITY: SHELL (stat calls)
// INVARIANT: Every forbidden match is reported once, sorted by path

import { Effect } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { isGlobPattern, matchesGlob, normalizePath } from "../../../core/glob.js";
import type { CheckResult } from "../../../core/models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	readString,
	readStringList,
} from "../../../core/types/json.js";
import { pathExists } from "../../fs/files.js";
import { path } from "../../utils/node-mods.js";
import { failure } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";

interface RequiredFile {
	readonly path: string;
	readonly message?: string;
}

/**
 * @pure true
 */
export function readRequiredFiles(config: JSONObject): readonly RequiredFile[] {
	const value = config["required_files"];
	if (typeof value === "string") return [{ path: value }];
	if (!isJSONArray(value)) return [];
	const required: RequiredFile[] = [];
	for (const item of value) {
		if (typeof item === "string") required.push({ path: item });
		else if (isJSONObject(item)) {
			const target = readString(item, "path");
			const message = readString(item, "message");
			if (target !== undefined) {
				required.push(message === undefined ? { path: target } : { path: target, message });
			}
		}
	}
	return required;
}

function matchesOf(pattern: string, context: CheckContext): Effect.Effect<readonly string[]> {
	const normalized = normalizePath(pattern);
	if (isGlobPattern(normalized)) {
		return Effect.succeed(context.repoFiles.filter((file) => matchesGlob(normalized, file)));
	}
	return Effect.map(pathExists(path.join(context.repoRoot, normalized)), (exists) =>
		exists ? [normalized] : [],
	);
}

export const fileExistsHandler: CheckHandler = {
	type: "file-exists",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const results: CheckResult[] = [];
			for (const required of readRequiredFiles(check.config)) {
				const found = yield* matchesOf(required.path, context);
				if (found.length === 0) {
					results.push(
						failure(check, context, required.message ?? `Required file not found: '${required.path}'`),
					);
				}
			}
			for (const pattern of readStringList(check.config, "forbidden_files")) {
				const found = yield* matchesOf(pattern, context);
				for (const file of [...found].sort()) {
					results.push(failure(check, context, `Forbidden file exists: '${file}'`, { file }));
				}
			}
			return results;
		}),
};
