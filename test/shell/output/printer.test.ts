// CHANGE: Console and file outputs of a CI run
// INVARIANT: Disabled output targets are never written

import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_CI_CONFIG } from "../../../src/core/ci/config.js";
import { renderJUnit } from "../../../src/core/ci/junit.js";
import { renderMarkdown } from "../../../src/core/ci/markdown.js";
import { formatCIResult, printCIResult } from "../../../src/shell/output/printer.js";
import { writeOutputs } from "../../../src/shell/output/reports.js";
import { ciResultOf, ciViolation } from "../../utils/builders.js";
import { createTempRepo, type TempRepo } from "../../utils/tempProject.js";

const located = ciViolation();
const repositoryLevel = ciViolation({ file: "", line: undefined, severity: "warning", message: "Missing README" });

const result = ciResultOf({
	violations: [located, repositoryLevel],
	comparison: { newViolations: [located], existingViolations: [repositoryLevel], fixedEntries: [] },
	exitCode: 1,
	errors: ["naming/check-2: handler crashed"],
});

describe("formatCIResult", () => {
	it("groups violations by file and ends with the summary and exit code", () => {
		expect(formatCIResult(result)).toEqual([
			"\n=== src/app.ts (1 issues) ===",
			"  error:3 [naming/check-1] Forbidden pattern found",
			"\n=== (repository) (1 issues) ===",
			"  warning [naming/check-1] Missing README",
			"",
			"Mode: full  Files: 2  Checks: 3  Duration: 1.50s",
			"Violations: 2 (1 errors, 1 warnings, 0 info)",
			"Baseline: 1 new, 0 fixed, net 1",
			"Error: naming/check-2: handler crashed",
			"Violations found (exit 1)",
		]);
	});

	it("prints a clean run without sections", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		await Effect.runPromise(printCIResult(ciResultOf()));
		expect(log.mock.calls.map(([line]) => line)).toEqual([
			"",
			"Mode: full  Files: 2  Checks: 3  Duration: 1.50s",
			"Violations: 0 (0 errors, 0 warnings, 0 info)",
			"All checks passed (exit 0)",
		]);
	});
});

describe("writeOutputs", () => {
	let repo: TempRepo | undefined;

	afterEach(() => {
		repo?.cleanup();
		repo = undefined;
	});

	it("writes only the enabled targets", async () => {
		repo = createTempRepo();
		const written = await Effect.runPromise(writeOutputs(result, DEFAULT_CI_CONFIG, repo.root));
		expect(written).toEqual([path.join(repo.root, "conformance.sarif")]);
		const sarif: unknown = JSON.parse(repo.read("conformance.sarif"));
		expect(sarif).toMatchObject({ version: "2.1.0" });
		expect(repo.exists("conformance-junit.xml")).toBe(false);
	});

	it("renders JUnit and Markdown files at their configured paths", async () => {
		repo = createTempRepo();
		const config = {
			...DEFAULT_CI_CONFIG,
			outputs: {
				sarif: { enabled: false, path: "conformance.sarif" },
				junit: { enabled: true, path: "reports/junit.xml" },
				markdown: { enabled: true, path: "reports/summary.md" },
			},
		};
		const written = await Effect.runPromise(writeOutputs(result, config, repo.root));
		expect(written).toEqual([
			path.join(repo.root, "reports", "junit.xml"),
			path.join(repo.root, "reports", "summary.md"),
		]);
		expect(repo.read("reports/junit.xml")).toBe(renderJUnit(result));
		expect(repo.read("reports/summary.md")).toBe(renderMarkdown(result));
		expect(repo.exists("conformance.sarif")).toBe(false);
	});
});
