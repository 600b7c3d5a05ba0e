// CHANGE: Read and outline the files a handler inspects
// PURITY: SHELL
// EFFECT: Effect<readonly SourceFile[], never>
// INVARIANT: Unreadable or unparseable files are skipped with a debug line, never fail the check

import { Effect, Either } from "effect";

import { describeError } from "../../../core/errors.js";
import type { SourceOutline } from "../../../core/metrics/outline.js";
import { parseOutline } from "../../../core/metrics/parse.js";
import { readText } from "../../fs/files.js";
import { debugLog } from "../../utils/log.js";
import { path } from "../../utils/node-mods.js";

export interface SourceFile {
	readonly file: string;
	readonly content: string;
}

export interface OutlinedFile {
	readonly file: string;
	readonly outline: SourceOutline;
}

export function readSources(
	repoRoot: string,
	files: readonly string[],
): Effect.Effect<readonly SourceFile[]> {
	return Effect.gen(function* () {
		const sources: SourceFile[] = [];
		for (const file of files) {
			const read = yield* Effect.either(readText(path.join(repoRoot, file)));
			if (Either.isLeft(read)) {
				debugLog("checks", `skipping unreadable ${describeError(read.left)}`);
				continue;
			}
			sources.push({ file, content: read.right });
		}
		return sources;
	});
}

/**
 * Outlines of the supported-language files among `files`; syntax errors are skipped.
 */
export function readOutlines(
	repoRoot: string,
	files: readonly string[],
): Effect.Effect<readonly OutlinedFile[]> {
	return Effect.map(readSources(repoRoot, files), (sources) => {
		const outlined: OutlinedFile[] = [];
		for (const { file, content } of sources) {
			const parsed = parseOutline(content, file);
			if (parsed === null) continue;
			if (Either.isLeft(parsed)) {
				debugLog("checks", `skipping ${file}: ${parsed.left}`);
				continue;
			}
			outlined.push({ file, outline: parsed.right });
		}
		return outlined;
	});
}
