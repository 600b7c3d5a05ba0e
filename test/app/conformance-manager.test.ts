import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	ConformanceManager,
	compareForListing,
	mergeExemptions,
} from "../../src/app/conformance-manager.js";
import { trackingIdOf } from "../../src/core/conformance/violation.js";
import type { CheckResult } from "../../src/core/models.js";
import { exemptionOf, failing, passed, violationOf } from "../utils/builders.js";
import { createTempRepo, type TempRepo } from "../utils/tempProject.js";

let repo: TempRepo;
let now: Date;
let manager: ConformanceManager;

beforeEach(() => {
	repo = createTempRepo();
	now = new Date("2026-03-01T12:00:00.000Z");
	manager = new ConformanceManager({ repoRoot: repo.root, clock: () => now });
});

afterEach(() => {
	repo.cleanup();
});

const run = (results: readonly CheckResult[], isFullRun = true, filesChecked = 2) =>
	Effect.runPromise(
		manager.runConformanceCheck({ results, contractsChecked: ["naming"], filesChecked, isFullRun }),
	);

const appFinding = failing({ file: "src/app.ts", line: 3 });
const utilWarning = failing({ checkId: "check-2", file: "src/util.ts", line: 1, severity: "warning" });

describe("mergeExemptions and compareForListing", () => {
	it("lets stored exemptions replace declared ones with the same id", () => {
		const stored = exemptionOf({ reason: "stored" });
		const declared = [exemptionOf({ reason: "declared" }), exemptionOf({ id: "EX-2" })];
		expect(mergeExemptions([stored], declared)).toEqual([stored, exemptionOf({ id: "EX-2" })]);
	});

	it("orders by severity then file", () => {
		const sorted = [
			violationOf({ id: "V-1", severity: "major", file: "src/a.ts" }),
			violationOf({ id: "V-2", severity: "blocker", file: "src/z.ts" }),
			violationOf({ id: "V-3", severity: "blocker", file: "src/b.ts" }),
		].sort(compareForListing);
		expect(sorted.map((v) => v.id)).toEqual(["V-3", "V-2", "V-1"]);
	});
});

describe("ConformanceManager.initialize", () => {
	it("creates the state directory, an empty report and the ignore entry", async () => {
		expect(await Effect.runPromise(manager.isInitialized())).toBe(false);
		await Effect.runPromise(manager.initialize());

		expect(await Effect.runPromise(manager.isInitialized())).toBe(true);
		expect(repo.list(".conformance")).toEqual([
			"conformance_report.yaml",
			"exemptions",
			"history",
			"violations",
		]);
		expect(repo.list(".conformance/violations")).toEqual([".gitkeep"]);
		expect(repo.read(".gitignore")).toBe("# Conformance local config\n.conformance/local.yaml\n");

		const report = await Effect.runPromise(manager.getReport());
		expect(report?.summary).toEqual({ total: 0, passed: 0, failed: 0, exempted: 0, stale: 0 });
		expect(report?.generatedAt).toBe("2026-03-01T12:00:00.000Z");
	});

	it("refuses to reinitialize without force and keeps an existing ignore file", async () => {
		repo.write(".gitignore", "node_modules\n");
		await Effect.runPromise(manager.initialize());
		const again = await Effect.runPromise(Effect.either(manager.initialize()));
		expect(Either.isLeft(again) && again.left.detail).toBe(
			"conformance tracking is already initialized; pass force to reinitialize",
		);

		await Effect.runPromise(manager.initialize(true));
		expect(repo.read(".gitignore")).toBe(
			"node_modules\n\n# Conformance local config\n.conformance/local.yaml\n",
		);
	});
});

describe("ConformanceManager.runConformanceCheck", () => {
	it("records violations and reports the tally with a trend", async () => {
		await Effect.runPromise(manager.initialize());
		const initial = await Effect.runPromise(manager.getReport());

		const report = await run([appFinding, utilWarning, passed({ checkId: "check-3" })]);
		expect(report.runType).toBe("full");
		expect(report.summary).toEqual({ total: 3, passed: 1, failed: 2, exempted: 0, stale: 0 });
		expect(report.bySeverity).toEqual({ blocker: 1, critical: 0, major: 1, minor: 0, info: 0 });
		expect(report.byContract).toEqual({ naming: 2 });
		expect(report.trend).toEqual({
			passedDelta: 1,
			failedDelta: 2,
			exemptedDelta: 0,
			previousRunId: initial?.runId,
		});
		expect(await Effect.runPromise(manager.getReport())).toEqual(report);

		const stored = await Effect.runPromise(manager.getViolation(trackingIdOf(appFinding)));
		expect(stored).toMatchObject({
			status: "open",
			severity: "blocker",
			detectedAt: "2026-03-01T12:00:00.000Z",
		});
	});

	it("marks missing violations stale on incremental runs and resolved on full runs", async () => {
		await run([appFinding, utilWarning]);
		now = new Date("2026-03-02T12:00:00.000Z");

		const incremental = await run([appFinding], false);
		expect(incremental.runType).toBe("incremental");
		expect(incremental.summary).toEqual({ total: 2, passed: 0, failed: 1, exempted: 0, stale: 1 });
		const stale = await Effect.runPromise(manager.listViolations({ status: "stale" }));
		expect(stale.map((v) => v.checkId)).toEqual(["check-2"]);

		const full = await run([]);
		expect(full.summary).toEqual({ total: 0, passed: 0, failed: 0, exempted: 0, stale: 0 });
		const resolved = await Effect.runPromise(manager.getViolation(trackingIdOf(utilWarning)));
		expect(resolved?.resolution).toEqual({
			resolvedAt: "2026-03-02T12:00:00.000Z",
			resolvedBy: "system",
			reason: "Not detected in full run",
		});
	});

	it("links exemptions and drops the link once they expire", async () => {
		repo.write(
			".conformance/exemptions/EX-1.yaml",
			[
				"id: EX-1",
				"contract: naming",
				"check: check-1",
				"reason: Legacy module",
				"approved_by: lead",
				"expires: '2026-03-10'",
				"scope: { files: ['src/legacy/**'] }",
			].join("\n"),
		);
		const legacy = failing({ file: "src/legacy/a.ts", line: 4 });

		const covered = await run([legacy], true, 1);
		expect(covered.summary).toEqual({ total: 1, passed: 0, failed: 0, exempted: 1, stale: 0 });
		expect((await Effect.runPromise(manager.getViolation(trackingIdOf(legacy))))?.exemptionId).toBe(
			"EX-1",
		);

		const stats = await Effect.runPromise(manager.getSummaryStats());
		expect(stats).toEqual({
			initialized: true,
			lastRun: "2026-03-01T12:00:00.000Z",
			runType: "full",
			violations: {
				total: 1,
				open: 0,
				exempted: 1,
				resolved: 0,
				stale: 0,
				bySeverity: { blocker: 0, critical: 0, major: 0, minor: 0, info: 0 },
			},
			exemptions: { active: 1, expired: 0, needsReview: 0 },
			contractsChecked: ["naming"],
			filesChecked: 1,
			complianceRate: 0,
		});

		now = new Date("2026-03-11T12:00:00.000Z");
		const lapsed = await run([legacy], true, 1);
		expect(lapsed.summary).toEqual({ total: 1, passed: 0, failed: 1, exempted: 0, stale: 0 });
		expect(
			(await Effect.runPromise(manager.getViolation(trackingIdOf(legacy))))?.exemptionId,
		).toBeUndefined();
		const expired = await Effect.runPromise(manager.getExemptions({ status: "expired" }));
		expect(expired.map((e) => e.id)).toEqual(["EX-1"]);
		expect(await Effect.runPromise(manager.getExemptions({ status: "active" }))).toEqual([]);
	});

	it("leaves unmatched overdue exemptions alone until an explicit audit", async () => {
		repo.write(
			".conformance/exemptions/EX-2.yaml",
			[
				"id: EX-2",
				"contract: naming",
				"check: check-9",
				"reason: Migration window",
				"approved_by: lead",
				"expires: '2026-02-01'",
				"scope: { global: true }",
			].join("\n"),
		);
		await run([appFinding]);
		const ids = async (status: "active" | "expired") =>
			(await Effect.runPromise(manager.getExemptions({ status }))).map((e) => e.id);
		expect(await ids("active")).toEqual(["EX-2"]);

		const audited = await Effect.runPromise(manager.auditExemptions());
		expect(audited.map((e) => e.id)).toEqual(["EX-2"]);
		expect(await ids("expired")).toEqual(["EX-2"]);
		expect(await ids("active")).toEqual([]);
	});

	it("keeps one history snapshot per day", async () => {
		const first = await run([appFinding]);
		now = new Date("2026-03-01T18:00:00.000Z");
		const second = await run([]);
		now = new Date("2026-03-02T09:00:00.000Z");

		const history = await Effect.runPromise(manager.getHistory(7));
		expect(history.map((s) => [s.date, s.runId])).toEqual([["2026-03-01", second.runId]]);
		expect(first.runId).not.toBe(second.runId);
	});
});

describe("ConformanceManager queries", () => {
	beforeEach(async () => {
		await run([
			failing({ file: "src/z.ts", line: 1 }),
			failing({ checkId: "check-2", file: "src/a.ts", line: 2, severity: "warning" }),
			failing({ file: "src/b.ts", line: 3 }),
		]);
	});

	it("filters, sorts and limits violations", async () => {
		const files = async (filter: Parameters<ConformanceManager["listViolations"]>[0]) =>
			(await Effect.runPromise(manager.listViolations(filter))).map((v) => v.file);

		expect(await files({})).toEqual(["src/b.ts", "src/z.ts", "src/a.ts"]);
		expect(await files({ severity: "major" })).toEqual(["src/a.ts"]);
		expect(await files({ filePattern: "src/z.ts" })).toEqual(["src/z.ts"]);
		expect(await files({ contract: "other" })).toEqual([]);
		expect(await files({ limit: 1 })).toEqual(["src/b.ts"]);
	});

	it("resolves known violations and reports unknown ids", async () => {
		const id = trackingIdOf(failing({ file: "src/z.ts", line: 1 }));
		expect(await Effect.runPromise(manager.resolveViolation(id, "Fixed by hand"))).toBe(true);
		expect((await Effect.runPromise(manager.getViolation(id)))?.resolution).toEqual({
			resolvedAt: "2026-03-01T12:00:00.000Z",
			resolvedBy: "user",
			reason: "Fixed by hand",
		});
		expect(await Effect.runPromise(manager.resolveViolation("V-000000000000", "nothing"))).toBe(false);
	});

	it("prunes old resolved violations and keeps open ones", async () => {
		const id = trackingIdOf(failing({ file: "src/z.ts", line: 1 }));
		await Effect.runPromise(manager.resolveViolation(id, "Fixed by hand"));
		now = new Date("2026-04-15T12:00:00.000Z");

		expect(await Effect.runPromise(manager.pruneViolations(30, true))).toBe(1);
		expect(await Effect.runPromise(manager.getViolation(id))).toBeDefined();
		expect(await Effect.runPromise(manager.pruneViolations(60))).toBe(0);
		expect(await Effect.runPromise(manager.pruneViolations(30))).toBe(1);
		expect(await Effect.runPromise(manager.getViolation(id))).toBeUndefined();
		expect(await Effect.runPromise(manager.listViolations())).toHaveLength(2);
	});

	it("reports an uninitialized repository", async () => {
		const fresh = createTempRepo();
		const empty = new ConformanceManager({ repoRoot: fresh.root });
		expect(await Effect.runPromise(empty.getSummaryStats())).toEqual({ initialized: false });
		fresh.cleanup();
	});
});
