// CHANGE: File selection for a check from its applies_to scope
// PURITY: CORE
// FORMAT THEOREM: select(files, scope) = { f ∈ files | f ∈ paths ∧ f ∉ excludePaths ∧ f ∉ GLOBAL_EXCLUDES }
// COMPLEXITY: O(f · p) where p = number of globs

import { matchesAnyGlob, normalizePath } from "../glob.js";
import type { CheckDefinition, CheckScope } from "./contract.js";

export const GLOBAL_EXCLUDES: readonly string[] = [
	".conformance/**",
	".git/**",
	"node_modules/**",
	"dist/**",
	"coverage/**",
	"__pycache__/**",
	"**/__pycache__/**",
	".venv/**",
];

/** Directory names skipped while walking the repository. */
export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
	".conformance",
	".git",
	"node_modules",
	"dist",
	"coverage",
	"__pycache__",
	".venv",
]);

/**
 * @pure true
 */
export function isGloballyExcluded(file: string): boolean {
	return matchesAnyGlob(GLOBAL_EXCLUDES, file);
}

/**
 * @pure true
 */
export function inScope(scope: CheckScope, file: string): boolean {
	const normalized = normalizePath(file);
	return (
		matchesAnyGlob(scope.paths, normalized) &&
		!matchesAnyGlob(scope.excludePaths, normalized) &&
		!isGloballyExcluded(normalized)
	);
}

/**
 * Files a check runs on: the repository listing, or only the run's candidates when given.
 *
 * @pure true
 * @postcondition candidates ≠ null ⇒ result ⊆ candidates
 */
export function selectCheckFiles(
	check: CheckDefinition,
	repoFiles: readonly string[],
	candidates: readonly string[] | null,
): readonly string[] {
	const pool = candidates ?? repoFiles;
	return pool.map(normalizePath).filter((file) => inScope(check.appliesTo, file));
}
