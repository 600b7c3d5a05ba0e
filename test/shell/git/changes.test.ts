import { describe, expect, it } from "vitest";

import { parseNameOnly } from "../../../src/shell/git/changes.js";

describe("parseNameOnly", () => {
	it("normalizes paths and drops blanks and duplicates", () => {
		expect(parseNameOnly("src/a.ts\r\n\n  src\\b.ts\nsrc/a.ts\n./docs/x.md\n")).toEqual([
			"src/a.ts",
			"src/b.ts",
			"docs/x.md",
		]);
	});

	it("returns nothing for empty output", () => {
		expect(parseNameOnly("")).toEqual([]);
	});
});
