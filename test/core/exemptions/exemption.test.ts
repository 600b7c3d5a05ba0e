import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	exemptionToDocument,
	findExemption,
	findLapsedExemption,
	isActive,
	isExpired,
	isoDate,
	needsReview,
	parseExemptionEntry,
	scopeMatch,
} from "../../../src/core/exemptions/exemption.js";
import { exemptionOf } from "../../utils/builders.js";

const source = ".conformance/exemptions/EX-1.yaml";

describe("expiry and review", () => {
	const ex = exemptionOf({ expires: "2026-03-31", reviewDate: "2026-03-01" });

	it("is expired only after the expiry day", () => {
		expect(isExpired(ex, "2026-03-31")).toBe(false);
		expect(isExpired(ex, "2026-04-01")).toBe(true);
		expect(isExpired(exemptionOf(), "2999-01-01")).toBe(false);
	});

	it("is active while marked active and not expired", () => {
		expect(isActive(ex, "2026-03-31")).toBe(true);
		expect(isActive(ex, "2026-04-01")).toBe(false);
		expect(isActive(exemptionOf({ status: "under_review" }), "2026-01-01")).toBe(false);
	});

	it("needs review from the review date on", () => {
		expect(needsReview(ex, "2026-02-28")).toBe(false);
		expect(needsReview(ex, "2026-03-01")).toBe(true);
	});

	it("formats UTC dates", () => {
		expect(isoDate(new Date("2026-05-04T23:59:59.000Z"))).toBe("2026-05-04");
	});
});

describe("scopeMatch", () => {
	const query = { contract: "naming", checkId: "check-1", file: "src/legacy/a.ts", line: 12, violationId: "V-abc" };

	it("matches file patterns with an optional line range", () => {
		expect(scopeMatch({ kind: "file-pattern", patterns: ["src/legacy/**"] }, query)).toBe("file-pattern");
		expect(
			scopeMatch({ kind: "file-pattern", patterns: ["src/legacy/**"], lines: { start: 1, end: 10 } }, query),
		).toBe(null);
		expect(
			scopeMatch({ kind: "file-pattern", patterns: ["src/legacy/**"], lines: { start: 10, end: 20 } }, query),
		).toBe("file-pattern");
	});

	it("matches explicit violation ids and global scopes", () => {
		expect(scopeMatch({ kind: "violation-ids", ids: ["V-abc"] }, query)).toBe("violation-id");
		expect(scopeMatch({ kind: "violation-ids", ids: ["V-other"] }, query)).toBe(null);
		expect(scopeMatch({ kind: "global" }, query)).toBe("global");
	});
});

describe("findExemption", () => {
	const query = { contract: "naming", checkId: "check-1", file: "src/a.ts", line: 3, violationId: "V-1" };

	it("prefers violation ids over file patterns over global", () => {
		const global = exemptionOf({ id: "G", scope: { kind: "global" } });
		const files = exemptionOf({ id: "F", scope: { kind: "file-pattern", patterns: ["src/**"] } });
		const ids = exemptionOf({ id: "I", scope: { kind: "violation-ids", ids: ["V-1"] } });
		expect(findExemption([global, files, ids], query, "2026-01-01")?.id).toBe("I");
		expect(findExemption([global, files], query, "2026-01-01")?.id).toBe("F");
		expect(findExemption([global], query, "2026-01-01")?.id).toBe("G");
	});

	it("requires the same contract and a covered check", () => {
		const other = exemptionOf({ contract: "layers" });
		const narrow = exemptionOf({ checks: ["check-2"] });
		expect(findExemption([other, narrow], query, "2026-01-01")).toBeUndefined();
	});

	it("skips expired exemptions, which findLapsedExemption reports", () => {
		const lapsed = exemptionOf({ id: "OLD", expires: "2025-12-31" });
		expect(findExemption([lapsed], query, "2026-01-01")).toBeUndefined();
		expect(findLapsedExemption([lapsed], query, "2026-01-01")?.id).toBe("OLD");
		expect(findLapsedExemption([{ ...lapsed, status: "expired" }], query, "2026-01-01")).toBeUndefined();
	});
});

describe("parseExemptionEntry", () => {
	it("parses the file shape and round-trips through exemptionToDocument", () => {
		const raw = {
			id: "EX-7",
			contract: "naming",
			check: "check-1",
			reason: "Generated code",
			approved_by: "lead",
			expires: "2026-06-30",
			ticket: "OPS-1",
			scope: { files: ["src/gen/**"], lines: [1, 40] },
		};
		const parsed = parseExemptionEntry(raw, source);
		if (Either.isLeft(parsed)) throw new Error(parsed.left.detail);
		expect(parsed.right).toEqual({
			id: "EX-7",
			contract: "naming",
			checks: ["check-1"],
			reason: "Generated code",
			approvedBy: "lead",
			expires: "2026-06-30",
			ticket: "OPS-1",
			status: "active",
			scope: { kind: "file-pattern", patterns: ["src/gen/**"], lines: { start: 1, end: 40 } },
		});
		const again = parseExemptionEntry(exemptionToDocument(parsed.right), source);
		expect(Either.isRight(again) && again.right).toEqual(parsed.right);
	});

	it("rejects missing fields, a missing scope and bad dates", () => {
		const base = { id: "EX-8", contract: "c", check: ["*"], reason: "r", approved_by: "a" };
		const missing = parseExemptionEntry({ id: "EX-9" }, source);
		const noScope = parseExemptionEntry(base, source);
		const badDate = parseExemptionEntry({ ...base, scope: { global: true }, expires: "soon" }, source);
		expect(Either.isLeft(missing) && missing.left.detail).toBe(
			"exemption EX-9 requires id, contract, check, reason and approved_by",
		);
		expect(Either.isLeft(noScope) && noScope.left.detail).toBe("exemption requires a 'scope'");
		expect(Either.isLeft(badDate) && badDate.left.detail).toBe("'expires' is not a YYYY-MM-DD date: soon");
	});
});
