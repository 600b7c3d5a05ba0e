// CHANGE: Bounded DFS for circular imports between repository files
// PURITY: CORE
// INVARIANT: Each cycle, as an unordered set of files, is reported once
// COMPLEXITY: O(V + E) with paths cut at maxDepth

import type { ArchitectureFinding } from "./rules.js";

/** File → files it imports, in import order. */
export type ImportGraph = ReadonlyMap<string, readonly string[]>;

export const DEFAULT_CYCLE_DEPTH = 5;

const CYCLE_HINT =
	"Break cycle by: 1) Moving shared types to separate module, 2) Using a type-only import, 3) Restructuring dependencies";

/**
 * Report every distinct import cycle reachable within maxDepth.
 *
 * @pure true
 * @postcondition ∀ f ∈ result: f.line = 1 ∧ f.file = first module of the cycle
 */
export function findImportCycles(
	graph: ImportGraph,
	maxDepth: number = DEFAULT_CYCLE_DEPTH,
): readonly ArchitectureFinding[] {
	const visited = new Set<string>();
	const onStack = new Set<string>();
	const seenCycles = new Set<string>();
	const findings: ArchitectureFinding[] = [];

	const record = (cycle: readonly string[], closing: string): void => {
		const key = [...new Set(cycle)].sort().join("\u0000");
		if (seenCycles.has(key)) return;
		seenCycles.add(key);
		const [first] = cycle;
		if (first === undefined) return;
		findings.push({
			file: first,
			line: 1,
			message: `Circular import detected: ${[...cycle, closing].join(" → ")}`,
			fixHint: CYCLE_HINT,
		});
	};

	const visit = (module: string, path: readonly string[]): void => {
		if (path.length > maxDepth) return;
		if (onStack.has(module)) {
			record(path.slice(path.indexOf(module)), module);
			return;
		}
		if (visited.has(module)) return;
		visited.add(module);
		onStack.add(module);
		for (const imported of graph.get(module) ?? []) {
			if (graph.has(imported)) visit(imported, [...path, module]);
		}
		onStack.delete(module);
	};

	for (const module of graph.keys()) {
		if (!visited.has(module)) visit(module, []);
	}
	return findings;
}
