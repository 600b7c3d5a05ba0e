import { describe, expect, it } from "vitest";

import {
	baselineFingerprint,
	checkCacheKey,
	contentHash,
	violationTrackingId,
} from "../../src/core/fingerprint.js";

describe("violationTrackingId", () => {
	it("hashes contract|check|path|line|rule", () => {
		expect(
			violationTrackingId({ contract: "naming", checkId: "check-1", file: "src/app.ts", line: 3 }),
		).toBe("V-7106f5b3b401");
	});

	it("writes a missing line as 'file' and keeps the rule", () => {
		expect(
			violationTrackingId({
				contract: "naming",
				checkId: "check-1",
				file: "src/app.ts",
				ruleId: "rule-x",
			}),
		).toBe("V-3de3a5533c96");
	});

	it("treats backslash paths like forward-slash paths", () => {
		const posix = violationTrackingId({ contract: "c", checkId: "k", file: "src/a.ts", line: 1 });
		const windows = violationTrackingId({ contract: "c", checkId: "k", file: "src\\a.ts", line: 1 });
		expect(windows).toBe(posix);
	});
});

describe("baselineFingerprint", () => {
	it("hashes check:file:line:message", () => {
		expect(
			baselineFingerprint({
				checkId: "check-1",
				file: "src/app.ts",
				line: 3,
				message: "Forbidden pattern found",
			}),
		).toBe("d45c5020f5a3f84a");
	});

	it("writes a missing line as 0", () => {
		expect(
			baselineFingerprint({ checkId: "check-1", file: "src/app.ts", message: "Forbidden pattern found" }),
		).toBe("b841052b5aae2f4b");
	});

	it("changes when the message changes", () => {
		const a = baselineFingerprint({ checkId: "k", file: "f", line: 1, message: "one" });
		const b = baselineFingerprint({ checkId: "k", file: "f", line: 1, message: "two" });
		expect(a).not.toBe(b);
	});
});

describe("contentHash / checkCacheKey", () => {
	it("is the sha256 hex digest", () => {
		expect(contentHash("abc")).toBe(
			"ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
		);
	});

	it("uses <check>_full for a full scan", () => {
		expect(checkCacheKey("naming/check-1", null)).toBe("naming/check-1_full");
	});

	it("does not depend on file order", () => {
		const key = checkCacheKey("c", [
			{ file: "src/b.ts", hash: "2222222299" },
			{ file: "src/a.ts", hash: "1111111199" },
		]);
		expect(key).toBe("1392f5817189ea36");
		expect(
			checkCacheKey("c", [
				{ file: "src/a.ts", hash: "1111111199" },
				{ file: "src/b.ts", hash: "2222222299" },
			]),
		).toBe(key);
	});
});
