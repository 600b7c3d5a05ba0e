// CHANGE: Import cycle detection between the checked files
// PURITY: SHELL (reads files); the search is CORE

import { Effect } from "effect";

import { DEFAULT_CYCLE_DEPTH, findImportCycles } from "../../../core/architecture/cycles.js";
import { resolveImport } from "../../../core/architecture/imports.js";
import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { readBoolean, readNumber } from "../../../core/types/json.js";
import { failure } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { type OutlinedFile, readOutlines } from "./sources.js";

/**
 * Edges between outlined files only; imports that leave the set are dropped.
 *
 * @pure true
 */
export function buildImportGraph(
	outlined: readonly OutlinedFile[],
	knownFiles: ReadonlySet<string>,
	ignoreTypeOnly: boolean,
): Map<string, readonly string[]> {
	const checked = new Set(outlined.map(({ file }) => file));
	const graph = new Map<string, readonly string[]>();
	for (const { file, outline } of outlined) {
		const targets: string[] = [];
		for (const entry of outline.imports) {
			if (ignoreTypeOnly && entry.typeOnly) continue;
			const target = resolveImport(file, entry, outline.language, knownFiles);
			if (target !== undefined && checked.has(target) && !targets.includes(target)) {
				targets.push(target);
			}
		}
		graph.set(file, targets);
	}
	return graph;
}

export const circularImportHandler: CheckHandler = {
	type: "circular-import",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.map(readOutlines(context.repoRoot, context.files), (outlined) => {
			const ignoreTypeOnly = readBoolean(check.config, "ignore_type_checking") ?? true;
			const maxDepth = readNumber(check.config, "max_depth") ?? DEFAULT_CYCLE_DEPTH;
			const graph = buildImportGraph(outlined, new Set(context.repoFiles), ignoreTypeOnly);
			return findImportCycles(graph, maxDepth).map((finding) =>
				failure(check, context, finding.message, {
					file: finding.file,
					line: finding.line,
					fixHint: finding.fixHint,
				}),
			);
		}),
};
