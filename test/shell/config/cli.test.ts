// CHANGE: Unit tests for conformance-ci argument parsing
// WHY: Flags and the positional repository root are parsed deterministically, bad input is a Left

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { CI_USAGE, parseCIArgs } from "../../../src/shell/config/cli.js";

describe("parseCIArgs: defaults and positional", () => {
	it("returns defaults when no args are provided", () => {
		const parsed = parseCIArgs([]);
		expect(Either.getOrNull(parsed)).toEqual({
			repoRoot: ".",
			configPath: ".conformance/ci.yaml",
			updateBaseline: false,
			writeOutputs: true,
			help: false,
		});
	});

	it("reads every flag and the repository root", () => {
		const parsed = parseCIArgs([
			"repo",
			"--mode",
			"pr",
			"--base",
			"origin/main",
			"--head",
			"feature",
			"--preset",
			"github",
			"--config",
			"ci.yml",
			"--update-baseline",
			"--no-outputs",
			"--help",
		]);
		expect(Either.getOrNull(parsed)).toEqual({
			repoRoot: "repo",
			configPath: "ci.yml",
			mode: "pr",
			baseRef: "origin/main",
			headRef: "feature",
			preset: "github",
			updateBaseline: true,
			writeOutputs: false,
			help: true,
		});
	});

	it("skips empty arguments", () => {
		expect(Either.isRight(parseCIArgs(["", "repo"]))).toBe(true);
	});
});

describe("parseCIArgs: errors", () => {
	it.each([
		[["--mode", "nightly"], "unknown mode 'nightly'"],
		[["--preset", "gitlab"], "unknown preset 'gitlab'"],
		[["--base"], "--base needs a value"],
		[["--base", "--mode"], "--base needs a value"],
		[["a", "b"], "unexpected argument 'b'"],
		[["--verbose"], "unexpected argument '--verbose'"],
	])("rejects %j", (argv, message) => {
		const parsed = parseCIArgs(argv);
		expect(Either.isLeft(parsed) && parsed.left).toBe(message);
	});

	it("documents every flag in the usage text", () => {
		for (const flag of ["--config", "--mode", "--base", "--head", "--preset", "--update-baseline", "--no-outputs", "--help"]) {
			expect(CI_USAGE).toContain(flag);
		}
	});
});
