// CHANGE: Contract between the executor and check handlers
// PURITY: SHELL
// INVARIANT: A handler returns findings only; the executor adds the passing result

import type { Effect } from "effect";

import type { CheckDefinition } from "../../core/contracts/contract.js";
import type { CheckExecutionError } from "../../core/errors.js";
import type { CheckResult } from "../../core/models.js";

/**
 * Outcome of running another contract from inside a nested-contract check.
 */
export type NestedOutcome =
	| { readonly kind: "ok"; readonly results: readonly CheckResult[] }
	| { readonly kind: "unknown" }
	| { readonly kind: "cycle"; readonly path: readonly string[] };

export interface CheckContext {
	readonly repoRoot: string;
	readonly contract: string;
	/** Files in the check's scope for this run. */
	readonly files: readonly string[];
	/** Every file of the repository, for import resolution and file globs. */
	readonly repoFiles: readonly string[];
	readonly runNested: (contractName: string) => Effect.Effect<NestedOutcome, CheckExecutionError>;
}

export interface CheckHandler {
	readonly type: string;
	execute(
		check: CheckDefinition,
		context: CheckContext,
	): Effect.Effect<readonly CheckResult[], CheckExecutionError>;
}
