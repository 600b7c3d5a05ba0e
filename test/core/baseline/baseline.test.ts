// CHANGE: Deterministic and property-based specs for the baseline partition
// FORMAT THEOREM: ∀ current, baseline: new ⊎ existing = current ∧ netChange = |new| − |fixed|
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	addToBaseline,
	baselineFromDocument,
	baselineToDocument,
	compareWithBaseline,
	createEmptyBaseline,
	netChange,
	removeFromBaseline,
	shouldFail,
	shouldFailRatchet,
} from "../../../src/core/baseline/baseline.js";
import type { CIViolation } from "../../../src/core/ci/violation.js";
import { ciViolation } from "../../utils/builders.js";

const t0 = "2026-01-01T00:00:00.000Z";
const t1 = "2026-02-01T00:00:00.000Z";

describe("baseline entries", () => {
	it("keeps firstSeen when a violation is added again", () => {
		const once = addToBaseline(createEmptyBaseline(t0), ciViolation(), t0);
		const twice = addToBaseline(once, ciViolation(), t1);
		expect(twice.entries["d45c5020f5a3f84a"]).toEqual({
			hash: "d45c5020f5a3f84a",
			checkId: "check-1",
			filePath: "src/app.ts",
			line: 3,
			messagePreview: "Forbidden pattern found",
			firstSeen: t0,
			lastSeen: t1,
		});
		expect(twice.updatedAt).toBe(t1);
	});

	it("truncates the message preview to 100 characters", () => {
		const baseline = addToBaseline(createEmptyBaseline(t0), ciViolation({ message: "x".repeat(150) }), t0);
		const [entry] = Object.values(baseline.entries);
		expect(entry?.messagePreview).toHaveLength(100);
	});

	it("removes by hash and ignores unknown hashes", () => {
		const baseline = addToBaseline(createEmptyBaseline(t0), ciViolation(), t0);
		expect(removeFromBaseline(baseline, "missing", t1)).toBe(baseline);
		expect(removeFromBaseline(baseline, "d45c5020f5a3f84a", t1).entries).toEqual({});
	});

	it("round-trips through the stored document", () => {
		const baseline = addToBaseline(
			addToBaseline(createEmptyBaseline(t0, "abc123"), ciViolation(), t0),
			ciViolation({ line: undefined, message: "No README" }),
			t1,
		);
		const doc = baselineToDocument(baseline);
		expect(doc["commit_sha"]).toBe("abc123");
		expect(baselineFromDocument(doc)).toEqual(baseline);
	});

	it("rejects documents without entries", () => {
		expect(baselineFromDocument({ created_at: t0 })).toBeNull();
	});
});

describe("compareWithBaseline", () => {
	const known = ciViolation();
	const fresh = ciViolation({ line: 9, severity: "warning" });
	const gone = ciViolation({ line: 20 });
	const baseline = [known, gone].reduce((b, v) => addToBaseline(b, v, t0), createEmptyBaseline(t0));

	it("splits new, existing and fixed", () => {
		const comparison = compareWithBaseline([known, fresh], baseline);
		expect(comparison.newViolations).toEqual([fresh]);
		expect(comparison.existingViolations).toEqual([known]);
		expect(comparison.fixedEntries.map((e) => e.line)).toEqual([20]);
		expect(netChange(comparison)).toBe(0);
	});

	it("gates on new errors, optionally on new warnings, and on net growth under ratchet", () => {
		const onlyWarning = compareWithBaseline([known, gone, fresh], baseline);
		expect(shouldFail(onlyWarning)).toBe(false);
		expect(shouldFail(onlyWarning, true, true)).toBe(true);
		expect(shouldFailRatchet(onlyWarning)).toBe(true);

		const newError = compareWithBaseline([ciViolation({ line: 30 })], baseline);
		expect(shouldFail(newError)).toBe(true);
		expect(shouldFailRatchet(newError)).toBe(false);
	});

	const violationArb: fc.Arbitrary<CIViolation> = fc.record({
		checkId: fc.constantFrom("a", "b"),
		contract: fc.constant("naming"),
		file: fc.constantFrom("src/x.ts", "src/y.ts", ""),
		line: fc.integer({ min: 1, max: 5 }),
		message: fc.constantFrom("m1", "m2"),
		severity: fc.constantFrom("error" as const, "warning" as const, "info" as const),
	});

	it("partitions the current violations and counts the net change", () => {
		fc.assert(
			fc.property(fc.array(violationArb), fc.array(violationArb), (current, previous) => {
				const base = previous.reduce((b, v) => addToBaseline(b, v, t0), createEmptyBaseline(t0));
				const comparison = compareWithBaseline(current, base);
				expect(comparison.newViolations.length + comparison.existingViolations.length).toBe(current.length);
				expect(netChange(comparison)).toBe(comparison.newViolations.length - comparison.fixedEntries.length);
				expect(shouldFailRatchet(comparison)).toBe(netChange(comparison) > 0);
			}),
		);
	});
});
