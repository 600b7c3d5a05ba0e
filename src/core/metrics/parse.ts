// CHANGE: Dispatch a file to its outline adapter by extension
// PURITY: CORE
// INVARIANT: parseOutline(c, p) = null ⇔ languageOf(p) = undefined

import type { Either } from "effect";
import { match } from "ts-pattern";

import { languageOf, type SourceOutline } from "./outline.js";
import { outlinePython } from "./python-adapter.js";
import { outlineTypeScript } from "./typescript-adapter.js";

/**
 * @returns null for unsupported languages, left(syntax error) for unparseable sources
 *
 * @pure true
 */
export function parseOutline(
	content: string,
	filePath: string,
): Either.Either<SourceOutline, string> | null {
	const language = languageOf(filePath);
	if (language === undefined) return null;
	return match(language)
		.with("typescript", () => outlineTypeScript(content, filePath))
		.with("python", () => outlinePython(content))
		.exhaustive();
}
