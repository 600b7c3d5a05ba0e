// CHANGE: Pure decision function mapping a CI outcome to its exit code
// WHY: Centralize gating policy in the Functional Core so the runner only reports
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: threshold breach → 1; else ratchet ∧ comparison → [netChange > 0];
//                 else comparison → shouldFail(comparison); else ∃v: rank(v) ≥ rank(minSeverity)
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping DecisionState → ExitCode ∈ {0,1}
// COMPLEXITY: O(v) time / O(1) space

import { Effect, pipe } from "effect";

import {
	type BaselineComparison,
	shouldFail,
	shouldFailRatchet,
} from "./baseline/baseline.js";
import type { CIViolation } from "./ci/violation.js";
import {
	type CheckSeverity,
	checkSeverityRank,
	EXIT_SUCCESS,
	EXIT_VIOLATIONS_FOUND,
	type ExitCode,
} from "./models.js";

/**
 * Everything the gate needs to know about a finished run.
 */
export interface DecisionState {
	readonly violations: readonly CIViolation[];
	readonly comparison?: BaselineComparison;
	readonly totalErrorsThreshold: number | null;
	readonly ratchetEnabled: boolean;
	readonly failOnNewErrors: boolean;
	readonly failOnNewWarnings: boolean;
	readonly minSeverity: CheckSeverity;
}

const errorCount = (violations: readonly CIViolation[]): number =>
	violations.filter((v) => v.severity === "error").length;

const toExitCode = (failed: boolean): ExitCode =>
	failed ? EXIT_VIOLATIONS_FOUND : EXIT_SUCCESS;

/**
 * Computes the process exit code of a CI run (pure function).
 *
 * @param state - Violations, optional baseline comparison and gating policy
 * @returns 1 when the policy fails the run; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition errors > totalErrorsThreshold → result = 1
 * @complexity O(v)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({
 *   violations: [],
 *   totalErrorsThreshold: null,
 *   ratchetEnabled: false,
 *   failOnNewErrors: true,
 *   failOnNewWarnings: false,
 *   minSeverity: "error",
 * });
 * // exitCode === 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode => {
	if (
		state.totalErrorsThreshold !== null &&
		errorCount(state.violations) > state.totalErrorsThreshold
	) {
		return EXIT_VIOLATIONS_FOUND;
	}
	const { comparison } = state;
	if (comparison !== undefined) {
		return pipe(
			comparison,
			(c) =>
				state.ratchetEnabled
					? shouldFailRatchet(c)
					: shouldFail(c, state.failOnNewErrors, state.failOnNewWarnings),
			toExitCode,
		);
	}
	const floor = checkSeverityRank(state.minSeverity);
	return pipe(
		state.violations.some((v) => checkSeverityRank(v.severity) >= floor),
		toExitCode,
	);
};

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(v)
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
