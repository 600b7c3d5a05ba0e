// CHANGE: Language-neutral outline of a source file
// WHY: Structural metrics and architecture checks run on one shape; each language only supplies an adapter
// PURITY: CORE
// INVARIANT: Line numbers are 1-based; a function's constructs exclude nested functions

/**
 * Control-flow construct found inside a function body.
 *
 * - `boolean-chain` carries the operand count of an n-way `&&`/`||`/`and`/`or` chain
 * - `comprehension` carries the number of `for` clauses
 * - `guard` is a try block; it nests but adds no path
 */
export type ConstructKind =
	| "branch"
	| "loop"
	| "handler"
	| "context"
	| "guard"
	| "assert"
	| "conditional"
	| "boolean-chain"
	| "comprehension";

export interface Construct {
	readonly kind: ConstructKind;
	readonly line: number;
	readonly operands?: number;
	readonly clauses?: number;
	readonly children: readonly Construct[];
}

export interface FunctionOutline {
	readonly name: string;
	readonly line: number;
	readonly endLine: number;
	readonly params: readonly string[];
	readonly constructs: readonly Construct[];
}

export interface ConstructorParam {
	readonly name: string;
	readonly type?: string;
}

export interface Instantiation {
	readonly typeName: string;
	readonly line: number;
}

export interface ConstructorOutline {
	readonly line: number;
	readonly params: readonly ConstructorParam[];
	readonly instantiations: readonly Instantiation[];
}

export interface ClassOutline {
	readonly name: string;
	readonly line: number;
	readonly endLine: number;
	/** Methods declared directly on the class, constructor included. */
	readonly methodCount: number;
	readonly constructorInfo: ConstructorOutline | null;
}

export interface ImportOutline {
	/** Specifier as written: "./a.js", "node:fs", ".models", "os.path". */
	readonly module: string;
	readonly names: readonly string[];
	readonly line: number;
	/** Type-only import, or an import guarded by `if TYPE_CHECKING:`. */
	readonly typeOnly: boolean;
}

export interface CallOutline {
	/** Dotted callee: "fetch", "fs.readFileSync", "requests.get". */
	readonly callee: string;
	readonly line: number;
}

export type OutlineLanguage = "typescript" | "python";

export interface SourceOutline {
	readonly language: OutlineLanguage;
	readonly lines: readonly string[];
	readonly commentPrefixes: readonly string[];
	readonly functions: readonly FunctionOutline[];
	readonly classes: readonly ClassOutline[];
	readonly imports: readonly ImportOutline[];
	readonly calls: readonly CallOutline[];
}

const LANGUAGE_BY_EXTENSION: Readonly<Record<string, OutlineLanguage>> = {
	".ts": "typescript",
	".tsx": "typescript",
	".mts": "typescript",
	".cts": "typescript",
	".js": "typescript",
	".jsx": "typescript",
	".mjs": "typescript",
	".cjs": "typescript",
	".py": "python",
	".pyi": "python",
};

/**
 * Outline language for a path, or undefined when no adapter exists.
 *
 * @pure true
 */
export function languageOf(filePath: string): OutlineLanguage | undefined {
	const dot = filePath.lastIndexOf(".");
	if (dot < 0 || dot < filePath.lastIndexOf("/")) return undefined;
	const extension = filePath.slice(dot).toLowerCase();
	return Object.hasOwn(LANGUAGE_BY_EXTENSION, extension)
		? LANGUAGE_BY_EXTENSION[extension]
		: undefined;
}
