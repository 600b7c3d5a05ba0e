import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { addToBaseline, compareWithBaseline, createEmptyBaseline } from "../../src/core/baseline/baseline.js";
import { computeExitCode, computeExitCodeEffect, type DecisionState } from "../../src/core/decision.js";
import { ciViolation } from "../utils/builders.js";

const state = (over: Partial<DecisionState> = {}): DecisionState => ({
	violations: [],
	totalErrorsThreshold: null,
	ratchetEnabled: false,
	failOnNewErrors: true,
	failOnNewWarnings: false,
	minSeverity: "error",
	...over,
});

describe("computeExitCode", () => {
	it("passes a clean run", () => {
		expect(computeExitCode(state())).toBe(0);
	});

	it("fails when a violation reaches the minimum severity", () => {
		const warning = ciViolation({ severity: "warning" });
		expect(computeExitCode(state({ violations: [warning] }))).toBe(0);
		expect(computeExitCode(state({ violations: [warning], minSeverity: "warning" }))).toBe(1);
	});

	it("fails once errors exceed the threshold, even against a baseline", () => {
		const errors = [ciViolation(), ciViolation({ line: 4 })];
		const baseline = errors.reduce(
			(b, v) => addToBaseline(b, v, "2026-01-01T00:00:00.000Z"),
			createEmptyBaseline("2026-01-01T00:00:00.000Z"),
		);
		const comparison = compareWithBaseline(errors, baseline);
		expect(computeExitCode(state({ violations: errors, comparison, totalErrorsThreshold: 2 }))).toBe(0);
		expect(computeExitCode(state({ violations: errors, comparison, totalErrorsThreshold: 1 }))).toBe(1);
	});

	it("uses the comparison instead of the severity floor", () => {
		const existing = ciViolation();
		const baseline = addToBaseline(
			createEmptyBaseline("2026-01-01T00:00:00.000Z"),
			existing,
			"2026-01-01T00:00:00.000Z",
		);
		const comparison = compareWithBaseline([existing], baseline);
		expect(computeExitCode(state({ violations: [existing], comparison }))).toBe(0);
	});

	it("applies the ratchet when enabled", () => {
		const baseline = createEmptyBaseline("2026-01-01T00:00:00.000Z");
		const comparison = compareWithBaseline([ciViolation({ severity: "info" })], baseline);
		expect(computeExitCode(state({ comparison }))).toBe(0);
		expect(computeExitCode(state({ comparison, ratchetEnabled: true }))).toBe(1);
	});

	it("is available as an Effect", async () => {
		await expect(Effect.runPromise(computeExitCodeEffect(state()))).resolves.toBe(0);
	});
});
