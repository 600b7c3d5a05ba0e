// CHANGE: Handler lookup by check type and the fault boundary around every handler
// WHY: One failing handler must not abort the contract or the run
// PURITY: SHELL
// EFFECT: Effect<readonly CheckResult[], never>
// INVARIANT: executeCheck never fails; faults become one error-severity result
// COMPLEXITY: O(1) lookup

import { Effect } from "effect";

import { type CheckDefinition, normalizeCheckType } from "../../core/contracts/contract.js";
import { describeError, messageOf, UnknownCheckType } from "../../core/errors.js";
import type { CheckResult } from "../../core/models.js";
import { debugLog } from "../utils/log.js";
import { faultResult, passing } from "./results.js";
import type { CheckContext, CheckHandler } from "./types.js";

export class CheckHandlerRegistry {
	private readonly handlers = new Map<string, CheckHandler>();

	constructor(handlers: readonly CheckHandler[] = []) {
		for (const handler of handlers) this.register(handler);
	}

	/** A later registration for the same type replaces the earlier one. */
	register(handler: CheckHandler): this {
		this.handlers.set(normalizeCheckType(handler.type), handler);
		return this;
	}

	get(type: string): CheckHandler | undefined {
		return this.handlers.get(normalizeCheckType(type));
	}

	types(): readonly string[] {
		return [...this.handlers.keys()].sort();
	}
}

/**
 * Run one check through its handler.
 *
 * @postcondition no findings ⇒ exactly one passing result
 * @postcondition handler fault ⇒ exactly one result with error = true
 */
export function executeCheck(
	registry: CheckHandlerRegistry,
	check: CheckDefinition,
	context: CheckContext,
): Effect.Effect<readonly CheckResult[]> {
	const handler = registry.get(check.type);
	if (handler === undefined) {
		const error = new UnknownCheckType({ checkId: check.id, type: check.type });
		return Effect.succeed([faultResult(check, context, describeError(error))]);
	}
	debugLog("checks", `${context.contract}/${check.id} (${handler.type}) on ${context.files.length} files`);
	return handler.execute(check, context).pipe(
		Effect.map((results): readonly CheckResult[] =>
			results.length === 0 ? [passing(check, context)] : results,
		),
		Effect.catchAll((error) =>
			Effect.succeed([faultResult(check, context, `Check execution failed: ${error.detail}`)]),
		),
		Effect.catchAllDefect((defect) =>
			Effect.succeed([
				faultResult(check, context, `Check execution failed: ${messageOf(defect)}`),
			]),
		),
	);
}
