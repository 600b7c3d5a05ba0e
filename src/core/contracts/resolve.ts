// CHANGE: Contract inheritance resolution as a DFS over the `extends` graph
// WHY: Contracts form a directed graph; cycles and unknown parents must degrade to warnings
// PURITY: CORE (warnings are reported through the injected callback)
// INVARIANT: resolving a contract never re-enters a name already on its own DFS path
// COMPLEXITY: O(V + E) over the extends graph, checks merged in O(c) with a Set

import type { CheckDefinition, Contract } from "./contract.js";
import { parentName } from "./contract.js";

/**
 * Merge own checks with inherited ones: own checks first, then inherited
 * checks whose id has not been seen yet.
 *
 * @pure true
 * @postcondition ids in the result are unique
 * @complexity O(|own| + |inherited|)
 */
export function mergeChecks(
	own: readonly CheckDefinition[],
	inherited: readonly CheckDefinition[],
): readonly CheckDefinition[] {
	const seen = new Set<string>();
	const merged: CheckDefinition[] = [];
	for (const check of [...own, ...inherited]) {
		if (seen.has(check.id)) continue;
		seen.add(check.id);
		merged.push(check);
	}
	return merged;
}

export interface ResolutionContext {
	readonly lookup: (name: string) => Contract | undefined;
	/** Fully resolved check lists keyed by contract name. */
	readonly cache: Map<string, readonly CheckDefinition[]>;
	readonly warn: (message: string) => void;
}

interface Resolution {
	readonly checks: readonly CheckDefinition[];
	/** false when some ancestor was skipped because it was already on the DFS path */
	readonly complete: boolean;
}

function resolveOnPath(
	contract: Contract,
	path: Set<string>,
	ctx: ResolutionContext,
): Resolution {
	const cached = ctx.cache.get(contract.name);
	if (cached !== undefined) return { checks: cached, complete: true };

	path.add(contract.name);
	const inherited: CheckDefinition[] = [];
	let complete = true;

	for (const reference of contract.extends) {
		const parent = ctx.lookup(parentName(reference));
		if (parent === undefined) {
			ctx.warn(`Contract '${contract.name}' extends unknown '${reference}'`);
			continue;
		}
		if (path.has(parent.name)) {
			ctx.warn(
				`Contract '${contract.name}' has a cyclic extends on '${parent.name}'; skipped`,
			);
			complete = false;
			continue;
		}
		const resolved = resolveOnPath(parent, path, ctx);
		complete = complete && resolved.complete;
		inherited.push(...resolved.checks);
	}

	path.delete(contract.name);
	const checks = mergeChecks(contract.checks, inherited);
	// Partial results depend on the entry point of the walk, so only complete ones are reused.
	if (complete) ctx.cache.set(contract.name, checks);
	return { checks, complete };
}

/**
 * Resolve the full check list of a contract.
 *
 * @pure false (calls ctx.warn, fills ctx.cache)
 * @invariant no contract name appears twice on the DFS path
 * @postcondition own checks precede inherited checks; ids are unique
 */
export function resolveContractChecks(
	contract: Contract,
	ctx: ResolutionContext,
): readonly CheckDefinition[] {
	return resolveOnPath(contract, new Set<string>(), ctx).checks;
}
