// CHANGE: Structural metrics over a source outline
// WHY: One implementation of each metric serves every language adapter
// PURITY: CORE
// FORMAT THEOREM: complexity(f) = 1 + Σ weight(c) for c ∈ constructs*(f)
// INVARIANT: A finding exists iff value > threshold
// COMPLEXITY: O(n) where n = constructs + lines of the file

import { match } from "ts-pattern";

import type { Construct, FunctionOutline, SourceOutline } from "./outline.js";

export const STRUCTURAL_METRICS = [
	"cyclomatic_complexity",
	"function_length",
	"nesting_depth",
	"parameter_count",
	"class_size",
	"import_count",
] as const;

export type StructuralMetric = (typeof STRUCTURAL_METRICS)[number];

export const DEFAULT_METRIC: StructuralMetric = "cyclomatic_complexity";
export const DEFAULT_THRESHOLD = 10;

export function isStructuralMetric(value: string): value is StructuralMetric {
	return STRUCTURAL_METRICS.some((metric) => metric === value);
}

export interface MetricFinding {
	readonly line: number;
	readonly value: number;
	readonly message: string;
}

const IMPLICIT_RECEIVERS = new Set(["self", "cls", "this"]);

function constructWeight(construct: Construct): number {
	return match(construct.kind)
		.with("boolean-chain", () => Math.max(0, (construct.operands ?? 2) - 1))
		.with("comprehension", () => construct.clauses ?? 1)
		.with("guard", () => 0)
		.otherwise(() => 1);
}

function sumWeights(constructs: readonly Construct[]): number {
	let total = 0;
	for (const construct of constructs) {
		total += constructWeight(construct) + sumWeights(construct.children);
	}
	return total;
}

/**
 * @pure true
 * @invariant result ≥ 1
 */
export function cyclomaticComplexity(fn: FunctionOutline): number {
	return 1 + sumWeights(fn.constructs);
}

const NESTING_KINDS = new Set(["branch", "loop", "guard", "handler", "context"]);

function depthOf(constructs: readonly Construct[]): number {
	let deepest = 0;
	for (const construct of constructs) {
		const own = NESTING_KINDS.has(construct.kind) ? 1 : 0;
		deepest = Math.max(deepest, own + depthOf(construct.children));
	}
	return deepest;
}

/**
 * @pure true
 */
export function nestingDepth(fn: FunctionOutline): number {
	return depthOf(fn.constructs);
}

function isCodeLine(line: string, commentPrefixes: readonly string[]): boolean {
	const trimmed = line.trim();
	if (trimmed.length === 0) return false;
	return !commentPrefixes.some((prefix) => trimmed.startsWith(prefix));
}

/**
 * Non-blank lines of the function span that are not comment-only.
 *
 * @pure true
 */
export function functionLength(fn: FunctionOutline, outline: SourceOutline): number {
	let count = 0;
	for (let lineNo = fn.line; lineNo <= fn.endLine; lineNo += 1) {
		const text = outline.lines[lineNo - 1];
		if (text !== undefined && isCodeLine(text, outline.commentPrefixes)) count += 1;
	}
	return count;
}

/**
 * @pure true
 */
export function parameterCount(fn: FunctionOutline): number {
	const [first, ...rest] = fn.params;
	if (first === undefined) return 0;
	return IMPLICIT_RECEIVERS.has(first) ? rest.length : fn.params.length;
}

/**
 * @pure true
 */
export function importCount(outline: SourceOutline): number {
	return outline.imports.reduce((sum, entry) => sum + entry.names.length, 0);
}

function functionFindings(
	outline: SourceOutline,
	threshold: number,
	measure: (fn: FunctionOutline) => number,
	describe: (fn: FunctionOutline, value: number) => string,
): readonly MetricFinding[] {
	const findings: MetricFinding[] = [];
	for (const fn of outline.functions) {
		const value = measure(fn);
		if (value > threshold) {
			findings.push({ line: fn.line, value, message: describe(fn, value) });
		}
	}
	return findings;
}

/**
 * Evaluate one metric against a threshold.
 *
 * @pure true
 * @postcondition ∀f ∈ result: f.value > threshold
 */
export function evaluateMetric(
	outline: SourceOutline,
	metric: StructuralMetric,
	threshold: number,
): readonly MetricFinding[] {
	return match(metric)
		.with("cyclomatic_complexity", () =>
			functionFindings(outline, threshold, cyclomaticComplexity, (fn, n) =>
				`Function '${fn.name}' has complexity ${n} (max: ${threshold})`,
			),
		)
		.with("function_length", () =>
			functionFindings(
				outline,
				threshold,
				(fn) => functionLength(fn, outline),
				(fn, n) => `Function '${fn.name}' has ${n} lines (max: ${threshold})`,
			),
		)
		.with("nesting_depth", () =>
			functionFindings(outline, threshold, nestingDepth, (fn, n) =>
				`Function '${fn.name}' has nesting depth ${n} (max: ${threshold})`,
			),
		)
		.with("parameter_count", () =>
			functionFindings(outline, threshold, parameterCount, (fn, n) =>
				`Function '${fn.name}' has ${n} parameters (max: ${threshold})`,
			),
		)
		.with("class_size", () =>
			outline.classes
				.filter((cls) => cls.methodCount > threshold)
				.map((cls) => ({
					line: cls.line,
					value: cls.methodCount,
					message: `Class '${cls.name}' has ${cls.methodCount} methods (max: ${threshold})`,
				})),
		)
		.with("import_count", () => {
			const value = importCount(outline);
			return value > threshold
				? [{ line: 1, value, message: `File has ${value} imports (max: ${threshold})` }]
				: [];
		})
		.exhaustive();
}
