import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ciViolationHash } from "../../../src/core/ci/violation.js";
import { BaselineManager } from "../../../src/shell/baseline/manager.js";
import { ciViolation } from "../../utils/builders.js";
import { createTempRepo, type TempRepo } from "../../utils/tempProject.js";

let repo: TempRepo;
let now: Date;
let manager: BaselineManager;

const first = ciViolation({ file: "src/a.ts", line: 1 });
const second = ciViolation({ file: "src/b.ts", line: 2, checkId: "check-2" });
const third = ciViolation({ file: "src/c.ts", line: 3 });

beforeEach(() => {
	repo = createTempRepo();
	now = new Date("2026-03-01T00:00:00.000Z");
	manager = new BaselineManager(repo.root, ".conformance/baseline.json", () => now);
});

afterEach(() => {
	repo.cleanup();
});

describe("BaselineManager", () => {
	it("reports a missing baseline as null and refuses to compare against it", async () => {
		expect(manager.file).toBe(path.join(repo.root, ".conformance", "baseline.json"));
		expect(await Effect.runPromise(manager.exists())).toBe(false);
		expect(await Effect.runPromise(manager.load())).toBeNull();
		expect(await Effect.runPromise(manager.stats())).toBeNull();

		const compared = await Effect.runPromise(Effect.either(manager.compare([first])));
		expect(Either.isLeft(compared) && compared.left.detail).toBe(
			`Baseline not found at ${manager.file}. Create one with BaselineManager.createFromViolations`,
		);
	});

	it("creates a baseline from violations and reports its stats", async () => {
		const created = await Effect.runPromise(manager.createFromViolations([first, second, third], "abc123"));
		expect(await Effect.runPromise(manager.load())).toEqual(created);
		expect(await Effect.runPromise(manager.stats())).toEqual({
			totalEntries: 3,
			createdAt: "2026-03-01T00:00:00.000Z",
			updatedAt: "2026-03-01T00:00:00.000Z",
			commitSha: "abc123",
			byCheck: { "check-1": 2, "check-2": 1 },
		});
	});

	it("updates entries and keeps the first-seen time of known ones", async () => {
		await Effect.runPromise(manager.createFromViolations([first, second]));
		now = new Date("2026-03-05T00:00:00.000Z");
		const update = await Effect.runPromise(manager.update([second, third]));
		expect(update).toEqual({ added: 1, removed: 1 });

		const baseline = await Effect.runPromise(manager.load());
		expect(Object.keys(baseline?.entries ?? {}).sort()).toEqual(
			[ciViolationHash(second), ciViolationHash(third)].sort(),
		);
		expect(baseline?.entries[ciViolationHash(second)]?.firstSeen).toBe("2026-03-01T00:00:00.000Z");
		expect(baseline?.entries[ciViolationHash(third)]?.firstSeen).toBe("2026-03-05T00:00:00.000Z");
		expect(baseline?.updatedAt).toBe("2026-03-05T00:00:00.000Z");
	});

	it("partitions current violations against the stored baseline", async () => {
		await Effect.runPromise(manager.createFromViolations([first, second]));
		const comparison = await Effect.runPromise(manager.compare([second, third]));
		expect(comparison.newViolations).toEqual([third]);
		expect(comparison.existingViolations).toEqual([second]);
		expect(comparison.fixedEntries.map((entry) => entry.filePath)).toEqual(["src/a.ts"]);
	});

	it("fails on a corrupt baseline file", async () => {
		repo.write(".conformance/baseline.json", JSON.stringify({ entries: [] }));
		const loaded = await Effect.runPromise(Effect.either(manager.load()));
		expect(Either.isLeft(loaded) && loaded.left.detail).toBe(
			`Corrupt baseline ${manager.file}: unexpected structure`,
		);

		repo.write(".conformance/baseline.json", "{ nope");
		const broken = await Effect.runPromise(Effect.either(manager.load()));
		expect(Either.isLeft(broken) && broken.left.detail).toMatch(/^Corrupt baseline .*baseline\.json: /);
	});
});
