// CHANGE: Resolve import specifiers of an outline to repository files
// WHY: Layer and cycle rules compare repo paths, not the specifier spelling of each language
// PURITY: CORE
// INVARIANT: Only relative TS specifiers and Python modules are local; packages resolve to nothing
// COMPLEXITY: O(c) per import where c = number of candidate paths

import { normalizePath } from "../glob.js";
import type { ImportOutline, OutlineLanguage } from "../metrics/outline.js";

const TS_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
const SOURCE_ROOTS = ["", "src/"];

function dirname(filePath: string): string {
	const slash = filePath.lastIndexOf("/");
	return slash < 0 ? "" : filePath.slice(0, slash);
}

/**
 * Join and collapse "." and ".." segments of a posix path.
 *
 * @pure true
 */
export function joinPosix(base: string, relative: string): string {
	const segments: string[] = [];
	for (const segment of `${base}/${relative}`.split("/")) {
		if (segment === "" || segment === ".") continue;
		if (segment === "..") segments.pop();
		else segments.push(segment);
	}
	return segments.join("/");
}

function stripScriptExtension(specifier: string): string {
	const match = /\.(?:[cm]?[jt]sx?)$/u.exec(specifier);
	return match === null ? specifier : specifier.slice(0, match.index);
}

function typeScriptCandidates(fromFile: string, specifier: string): readonly string[] {
	if (!specifier.startsWith("./") && !specifier.startsWith("../")) return [];
	const exact = joinPosix(dirname(fromFile), specifier);
	const base = joinPosix(dirname(fromFile), stripScriptExtension(specifier));
	return [
		exact,
		...TS_EXTENSIONS.map((ext) => `${base}${ext}`),
		...TS_EXTENSIONS.map((ext) => `${base}/index${ext}`),
	];
}

function pythonCandidates(fromFile: string, module: string): readonly string[] {
	const dots = /^\.*/u.exec(module)?.[0].length ?? 0;
	const rest = module.slice(dots).replace(/\./g, "/");
	const keys: string[] = [];
	if (dots > 0) {
		let base = dirname(fromFile);
		for (let level = 1; level < dots; level += 1) base = dirname(base);
		keys.push(rest.length === 0 ? base : joinPosix(base, rest));
	} else {
		keys.push(...SOURCE_ROOTS.map((root) => `${root}${rest}`));
	}
	return keys.flatMap((key) => [`${key}.py`, `${key}/__init__.py`]);
}

/**
 * Repository file an import refers to.
 *
 * @param knownFiles - Every repo-relative file the import may land on
 * @returns The first candidate present in knownFiles, or undefined for packages
 *
 * @pure true
 */
export function resolveImport(
	fromFile: string,
	entry: ImportOutline,
	language: OutlineLanguage,
	knownFiles: ReadonlySet<string>,
): string | undefined {
	const source = normalizePath(fromFile);
	const candidates =
		language === "python"
			? pythonCandidates(source, entry.module)
			: typeScriptCandidates(source, entry.module);
	return candidates.find((candidate) => knownFiles.has(candidate));
}
