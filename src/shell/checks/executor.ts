// CHANGE: Build a check's context and run it, or every enabled check of a contract
// PURITY: SHELL
// EFFECT: Effect<readonly CheckResult[], never>
// INVARIANT: Nested contracts run with the same candidate files; a contract already on the path is a cycle
// COMPLEXITY: O(c) checks per contract

import { Effect } from "effect";

import type { CheckDefinition, ResolvedContract } from "../../core/contracts/contract.js";
import { selectCheckFiles } from "../../core/contracts/scope.js";
import { CheckExecutionError, describeError } from "../../core/errors.js";
import type { CheckResult } from "../../core/models.js";
import type { ContractRegistry } from "../contracts/registry.js";
import { type CheckHandlerRegistry, executeCheck } from "./registry.js";
import type { CheckContext, NestedOutcome } from "./types.js";

export interface ExecutionEnvironment {
	readonly registry: ContractRegistry;
	readonly handlers: CheckHandlerRegistry;
	readonly repoRoot: string;
	readonly repoFiles: readonly string[];
	/** null runs every check over the whole repository. */
	readonly candidates: readonly string[] | null;
}

function nestedRunner(
	check: CheckDefinition,
	env: ExecutionEnvironment,
	contractPath: readonly string[],
): CheckContext["runNested"] {
	return (name) => {
		if (contractPath.includes(name)) {
			return Effect.succeed<NestedOutcome>({ kind: "cycle", path: [...contractPath, name] });
		}
		return env.registry.get(name).pipe(
			Effect.mapError(
				(error) => new CheckExecutionError({ checkId: check.id, detail: describeError(error) }),
			),
			Effect.flatMap((nested): Effect.Effect<NestedOutcome> =>
				nested === undefined
					? Effect.succeed<NestedOutcome>({ kind: "unknown" })
					: Effect.map(
							runContract(nested, env, [...contractPath, name]),
							(results): NestedOutcome => ({ kind: "ok", results }),
						),
			),
		);
	};
}

/**
 * Context for one check: its scoped files plus a nested runner that remembers the contract path.
 *
 * @pure true
 */
export function createCheckContext(
	contract: ResolvedContract,
	check: CheckDefinition,
	env: ExecutionEnvironment,
	contractPath: readonly string[] = [contract.name],
): CheckContext {
	return {
		repoRoot: env.repoRoot,
		contract: contract.name,
		files: selectCheckFiles(check, env.repoFiles, env.candidates),
		repoFiles: env.repoFiles,
		runNested: nestedRunner(check, env, contractPath),
	};
}

export function runCheck(
	contract: ResolvedContract,
	check: CheckDefinition,
	env: ExecutionEnvironment,
	contractPath: readonly string[] = [contract.name],
): Effect.Effect<readonly CheckResult[]> {
	return executeCheck(env.handlers, check, createCheckContext(contract, check, env, contractPath));
}

/**
 * Every enabled check of a contract, in declaration order.
 */
export function runContract(
	contract: ResolvedContract,
	env: ExecutionEnvironment,
	contractPath: readonly string[] = [contract.name],
): Effect.Effect<readonly CheckResult[]> {
	return Effect.map(
		Effect.forEach(
			contract.allChecks.filter((check) => check.enabled),
			(check) => runCheck(contract, check, env, contractPath),
		),
		(batches) => batches.flat(),
	);
}
