// CHANGE: Pure glob matcher for contract paths, exemption scopes and layer detection
// WHY: Every file-scope rule is a glob over repo-relative posix paths
// PURITY: CORE
// INVARIANT: ∀ p, f: matchesGlob(p, f) depends only on (p, normalize(f))
// COMPLEXITY: O(|pattern|) to compile, O(|path|) to match

/**
 * Normalise a path for matching: forward slashes, no leading "./".
 *
 * @pure true
 */
export function normalizePath(filePath: string): string {
	return filePath.replace(/\\/g, "/").replace(/^\.\/+/u, "");
}

const compiled = new Map<string, RegExp>();

/**
 * Compile a glob into an anchored RegExp.
 *
 * - `**` matches any run of characters including `/`
 * - `**` followed by `/` also matches zero directories
 * - `*` matches within one path segment
 * - `?` matches one character other than `/`
 * - `{a,b}` matches either alternative
 *
 * @pure true (memoised)
 */
export function globToRegExp(glob: string): RegExp {
	const cached = compiled.get(glob);
	if (cached !== undefined) return cached;

	let source = "";
	let braceDepth = 0;
	for (let i = 0; i < glob.length; i += 1) {
		const ch = glob[i] ?? "";
		if (ch === "*") {
			if (glob[i + 1] === "*") {
				if (glob[i + 2] === "/") {
					source += "(?:.*/)?";
					i += 2;
				} else {
					source += ".*";
					i += 1;
				}
			} else {
				source += "[^/]*";
			}
		} else if (ch === "?") {
			source += "[^/]";
		} else if (ch === "{") {
			braceDepth += 1;
			source += "(?:";
		} else if (ch === "}" && braceDepth > 0) {
			braceDepth -= 1;
			source += ")";
		} else if (ch === "," && braceDepth > 0) {
			source += "|";
		} else {
			source += ch.replace(/[.+^$()|[\]\\{}]/g, "\\$&");
		}
	}

	const regex = new RegExp(`^${source}$`, "u");
	compiled.set(glob, regex);
	return regex;
}

/**
 * @pure true
 * @complexity O(|path|)
 */
export function matchesGlob(pattern: string, filePath: string): boolean {
	return globToRegExp(normalizePath(pattern)).test(normalizePath(filePath));
}

/**
 * @pure true
 * @postcondition result = ∃ p ∈ patterns: matchesGlob(p, filePath)
 */
export function matchesAnyGlob(
	patterns: readonly string[],
	filePath: string,
): boolean {
	return patterns.some((pattern) => matchesGlob(pattern, filePath));
}

/**
 * True when a glob contains wildcard syntax.
 *
 * @pure true
 */
export function isGlobPattern(pattern: string): boolean {
	return /[*?{]/u.test(pattern);
}
