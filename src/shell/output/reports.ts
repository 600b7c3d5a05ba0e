// CHANGE: Write the enabled SARIF, JUnit and Markdown outputs of a CI run
// PURITY: SHELL
// EFFECT: Effect<readonly string[], StoreError>
// INVARIANT: Disabled targets are never touched

import { Effect } from "effect";

import type { CIConfig, OutputTarget } from "../../core/ci/config.js";
import { renderJUnit } from "../../core/ci/junit.js";
import { renderMarkdown } from "../../core/ci/markdown.js";
import type { CIResult } from "../../core/ci/result.js";
import { buildSarifReport, type ToolInfo } from "../../core/ci/sarif.js";
import type { StoreError } from "../../core/errors.js";
import { writeFileAtomic } from "../fs/atomic.js";
import { debugLog } from "../utils/log.js";
import { path } from "../utils/node-mods.js";

export function writeSarif(
	result: CIResult,
	file: string,
	tool?: ToolInfo,
): Effect.Effect<void, StoreError> {
	return writeFileAtomic(file, `${JSON.stringify(buildSarifReport(result, tool), null, 2)}\n`);
}

export function writeJUnit(result: CIResult, file: string): Effect.Effect<void, StoreError> {
	return writeFileAtomic(file, renderJUnit(result));
}

export function writeMarkdown(
	result: CIResult,
	file: string,
	title?: string,
): Effect.Effect<void, StoreError> {
	return writeFileAtomic(file, renderMarkdown(result, title));
}

/**
 * @returns absolute paths of the written files
 */
export function writeOutputs(
	result: CIResult,
	config: CIConfig,
	repoRoot: string,
): Effect.Effect<readonly string[], StoreError> {
	const targets: ReadonlyArray<
		readonly [OutputTarget, (result: CIResult, file: string) => Effect.Effect<void, StoreError>]
	> = [
		[config.outputs.sarif, (r, f) => writeSarif(r, f)],
		[config.outputs.junit, writeJUnit],
		[config.outputs.markdown, (r, f) => writeMarkdown(r, f)],
	];
	return Effect.gen(function* () {
		const written: string[] = [];
		for (const [target, write] of targets) {
			if (!target.enabled) continue;
			const file = path.resolve(repoRoot, target.path);
			yield* write(result, file);
			debugLog("output", `wrote ${file}`);
			written.push(file);
		}
		return written;
	});
}
