import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import type { CheckResult } from "../../../src/core/models.js";
import type { JSONObject } from "../../../src/core/types/json.js";
import { executeCheck } from "../../../src/shell/checks/registry.js";
import { judgeOutcome, parseCommandErrors } from "../../../src/shell/checks/handlers/command.js";
import { findingsToResults } from "../../../src/shell/checks/handlers/custom.js";
import { createDefaultHandlers, CustomCheckRegistry } from "../../../src/shell/checks/handlers/index.js";
import type { CheckContext, NestedOutcome } from "../../../src/shell/checks/types.js";
import type { CommandOutcome } from "../../../src/shell/utils/exec.js";
import { checkDef } from "../../utils/builders.js";
import { createTempRepo, type TempRepo } from "../../utils/tempProject.js";

let repo: TempRepo | undefined;

afterEach(() => {
	repo?.cleanup();
	repo = undefined;
});

function contextFor(root: string, files: readonly string[], repoFiles = files): CheckContext {
	return {
		repoRoot: root,
		contract: "hygiene",
		files,
		repoFiles,
		runNested: () => Effect.succeed<NestedOutcome>({ kind: "unknown" }),
	};
}

function run(
	type: string,
	config: JSONObject,
	context: CheckContext,
	customChecks = new CustomCheckRegistry(),
): Promise<readonly CheckResult[]> {
	return Effect.runPromise(
		executeCheck(createDefaultHandlers(customChecks), checkDef({ type, config }), context),
	);
}

const base = { checkId: "check-1", checkName: "Check one", contract: "hygiene", passed: false };

describe("pattern handler", () => {
	const files = {
		"src/a.ts": "const x = 1;\nconsole.log(x);\nconsole.log('y');\n",
		"src/b.ts": "export {};\n",
	};

	it("reports every forbidden match with its line", async () => {
		repo = createTempRepo(files);
		const results = await run("pattern", { pattern: "console\\.log" }, contextFor(repo.root, ["src/a.ts", "src/b.ts"]));
		expect(results).toEqual([
			{ ...base, severity: "error", message: "Forbidden pattern found: 'console.log'", file: "src/a.ts", line: 2 },
			{ ...base, severity: "error", message: "Forbidden pattern found: 'console.log'", file: "src/a.ts", line: 3 },
		]);
	});

	it("reports files missing a required pattern", async () => {
		repo = createTempRepo(files);
		const results = await run(
			"regex",
			{ pattern: "EXPORT", mode: "require", case_insensitive: true },
			contextFor(repo.root, ["src/a.ts", "src/b.ts"]),
		);
		expect(results).toEqual([
			{ ...base, severity: "error", message: "Required pattern not found: 'EXPORT'", file: "src/a.ts" },
		]);
	});

	it("carries a named pattern as the rule id", async () => {
		repo = createTempRepo(files);
		const results = await run(
			"pattern",
			{ patterns: [{ name: "no-const", pattern: "^const" }], multiline: true },
			contextFor(repo.root, ["src/a.ts"]),
		);
		expect(results).toEqual([
			{ ...base, severity: "error", message: "Forbidden pattern found: 'const'", file: "src/a.ts", line: 1, ruleId: "no-const" },
		]);
	});

	it("passes when nothing matches and faults on a bad config", async () => {
		repo = createTempRepo(files);
		const context = contextFor(repo.root, ["src/b.ts"]);
		const clean = await run("pattern", { pattern: "console" }, context);
		expect(clean.map((r) => [r.passed, r.message])).toEqual([[true, "Check passed"]]);

		const missing = await run("pattern", {}, context);
		expect(missing.map((r) => [r.error, r.message])).toEqual([[true, "Pattern check missing 'pattern' in config"]]);

		const invalid = await run("pattern", { pattern: "(" }, context);
		expect(invalid[0]?.error).toBe(true);
		expect(invalid[0]?.message).toMatch(/^Invalid pattern '\(': /);
	});
});

describe("file-exists handler", () => {
	it("reports missing required files and existing forbidden ones", async () => {
		repo = createTempRepo({ "README.md": "# app\n", "src/a.ts": "", "src/secret.pem": "key" });
		const repoFiles = ["README.md", "src/a.ts", "src/secret.pem"];
		const results = await run(
			"file_exists",
			{
				required_files: ["README.md", { path: "LICENSE", message: "Add a license" }, "docs/**/*.md"],
				forbidden_files: ["**/*.pem"],
			},
			contextFor(repo.root, repoFiles),
		);
		expect(results).toEqual([
			{ ...base, severity: "error", message: "Add a license" },
			{ ...base, severity: "error", message: "Required file not found: 'docs/**/*.md'" },
			{ ...base, severity: "error", message: "Forbidden file exists: 'src/secret.pem'", file: "src/secret.pem" },
		]);
	});

	it("accepts a single required path", async () => {
		repo = createTempRepo({ "README.md": "" });
		const results = await run("file-exists", { required_files: "README.md" }, contextFor(repo.root, ["README.md"]));
		expect(results.map((r) => r.passed)).toEqual([true]);
	});
});

describe("command handler", () => {
	const outcome = (over: Partial<CommandOutcome> = {}): CommandOutcome => ({
		exitCode: 0,
		stdout: "",
		stderr: "",
		timedOut: false,
		notFound: false,
		...over,
	});

	it("judges exit codes and output indicators", () => {
		expect(judgeOutcome(outcome({ stdout: "ok" }), {})).toBe(true);
		expect(judgeOutcome(outcome({ stdout: "1 FAIL" }), { failure_indicators: ["FAIL"] })).toBe(false);
		expect(judgeOutcome(outcome({ exitCode: 1, stdout: "0 errors" }), { success_indicators: ["0 errors"] })).toBe(true);
		expect(judgeOutcome(outcome({ exitCode: 1 }), {})).toBe(false);
		expect(judgeOutcome(outcome({ exitCode: 2 }), { expected_exit_code: 2 })).toBe(true);
	});

	it("turns parsed error lines into located findings", () => {
		const parsed = parseCommandErrors(
			checkDef(),
			{ contract: "hygiene" },
			"src/a.ts:3:5: error E100 bad thing\nnoise\n",
			"^(?<file>[^:]+):(?<line>\\d+):(?<column>\\d+): error (?<rule>\\w+) (?<message>.+)$",
		);
		expect(Either.isRight(parsed) && parsed.right).toEqual([
			{ ...base, severity: "error", message: "bad thing", file: "src/a.ts", line: 3, column: 5, ruleId: "E100" },
		]);
		const broken = parseCommandErrors(checkDef(), { contract: "hygiene" }, "", "(");
		expect(Either.isLeft(broken) && broken.left).toMatch(/^Invalid error_parser pattern '\(': /);
	});

	it("reports a missing executable and a missing command", async () => {
		repo = createTempRepo();
		const context = contextFor(repo.root, []);
		const notFound = await run("command", { command: "conformance-no-such-binary" }, context);
		expect(notFound).toEqual([
			{ ...base, severity: "error", message: "Command not found: conformance-no-such-binary", error: true },
		]);

		const missing = await run("command", {}, context);
		expect(missing.map((r) => [r.error, r.message])).toEqual([[true, "Command check missing 'command' in config"]]);
	});

	it("reports a timed-out command as an error whatever the check severity", async () => {
		repo = createTempRepo();
		const results = await Effect.runPromise(
			executeCheck(
				createDefaultHandlers(),
				checkDef({ type: "command", severity: "warning", config: { command: "sleep", args: ["3"], timeout: 0.2 } }),
				contextFor(repo.root, []),
			),
		);
		expect(results).toEqual([{ ...base, severity: "error", message: "Command timed out after 0.2s", error: true }]);
	});
});

describe("structural-metric handler", () => {
	const source = [
		"export function f(a: number): number {",
		"\tif (a > 1) {",
		"\t\treturn 1;",
		"\t}",
		"\tif (a > 2) {",
		"\t\treturn 2;",
		"\t}",
		"\treturn 0;",
		"}",
		"",
	].join("\n");

	it("reports functions above the threshold and warns on syntax errors", async () => {
		repo = createTempRepo({ "src/m.ts": source, "src/bad.py": "def f(:\n", "README.md": "# x\n" });
		const results = await run(
			"structural_metric",
			{ metric: "cyclomatic_complexity", threshold: 2 },
			contextFor(repo.root, ["README.md", "src/bad.py", "src/m.ts"]),
		);
		expect(results).toEqual([
			{ ...base, severity: "warning", message: "Syntax error parsing src/bad.py: unexpected EOF while parsing", file: "src/bad.py" },
			{
				...base,
				severity: "error",
				message: "Function 'f' has complexity 3 (max: 2)",
				file: "src/m.ts",
				line: 1,
				ruleId: "cyclomatic_complexity",
			},
		]);
	});

	it("faults on an unknown metric", async () => {
		repo = createTempRepo();
		const results = await run("structural-metric", { metric: "loc" }, contextFor(repo.root, []));
		expect(results.map((r) => [r.error, r.message])).toEqual([[true, "Unknown metric: loc"]]);
	});
});

describe("custom handler", () => {
	it("runs a registered function with its params and keeps well-formed findings", async () => {
		repo = createTempRepo();
		const seen: string[] = [];
		const checks = new CustomCheckRegistry().register("countFiles", (root, files, params) => {
			seen.push(root, ...files, String(params["limit"]));
			return [
				{ message: "too many files", file: "src/a.ts", line: 2, severity: "warning", fix_hint: "Split it" },
				{ message: "not a severity", severity: "blocker" },
			];
		});
		const results = await run(
			"custom",
			{ function: "countFiles", params: { limit: 1 } },
			contextFor(repo.root, ["src/a.ts"]),
			checks,
		);
		expect(seen).toEqual([repo.root, "src/a.ts", "1"]);
		expect(results).toEqual([
			{ ...base, severity: "warning", message: "too many files", file: "src/a.ts", line: 2, fixHint: "Split it" },
			{ ...base, severity: "error", message: "not a severity" },
		]);
	});

	it("reports a throwing function as a fault", async () => {
		repo = createTempRepo();
		const checks = new CustomCheckRegistry().register("boom", () => {
			throw new Error("kaboom");
		});
		const results = await run("custom", { function: "boom" }, contextFor(repo.root, []), checks);
		expect(results.map((r) => [r.error, r.message])).toEqual([[true, "Check execution failed: kaboom"]]);
	});

	it("faults on missing config and unknown modules", async () => {
		repo = createTempRepo();
		const context = contextFor(repo.root, []);
		const missing = await run("custom", { module: "only-module" }, context);
		expect(missing[0]?.message).toBe("Custom check missing 'module' or 'function' in config");
		const unknown = await run("custom", { module: "mycheck", function: "run" }, context);
		expect(unknown[0]?.message).toBe("Custom check module not found: mycheck");
	});

	it("drops entries without a string message", () => {
		const results = findingsToResults(checkDef(), { contract: "hygiene" }, [{ file: "a.ts" }, "text", { message: "kept" }]);
		expect(results.map((r) => r.message)).toEqual(["kept"]);
		expect(findingsToResults(checkDef(), { contract: "hygiene" }, { message: "not a list" })).toEqual([]);
	});
});
