import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	contractApplies,
	isAbstractContract,
	normalizeCheckType,
	parentName,
	parseContractDocument,
} from "../../../src/core/contracts/contract.js";

const source = "contracts/naming.contract.yaml";

describe("parseContractDocument", () => {
	it("returns null for documents without a contract section", () => {
		const other = parseContractDocument({ other: 1 }, "repo", source);
		const text = parseContractDocument("text", "repo", source);
		expect(Either.isRight(other) && other.right).toBeNull();
		expect(Either.isRight(text) && text.right).toBeNull();
	});

	it("applies defaults and merges type fields with config", () => {
		const parsed = parseContractDocument(
			{
				contract: { name: "naming", type: "patterns", extends: ["workspace:_base"] },
				checks: [
					{
						id: "no-print",
						type: "regex",
						pattern: "print\\(",
						config: { pattern: "console\\.log", mode: "forbid" },
						fix_hint: "Use the logger",
					},
				],
			},
			"repo",
			source,
		);
		expect(Either.isRight(parsed)).toBe(true);
		if (Either.isLeft(parsed) || parsed.right === null) return;
		const contract = parsed.right;
		expect(contract.version).toBe("1.0.0");
		expect(contract.enabled).toBe(true);
		expect(contract.extends).toEqual(["workspace:_base"]);
		expect(contract.appliesTo).toEqual({});
		expect(contract.checks).toEqual([
			{
				id: "no-print",
				name: "no-print",
				type: "pattern",
				severity: "error",
				appliesTo: { paths: ["**/*"], excludePaths: [] },
				enabled: true,
				config: { pattern: "console\\.log", mode: "forbid" },
				fixHint: "Use the logger",
			},
		]);
	});

	it("reads scope, severity and filters", () => {
		const parsed = parseContractDocument(
			{
				contract: {
					name: "py",
					type: "architecture",
					applies_to: { languages: ["python"] },
				},
				checks: [
					{
						id: "c",
						type: "command",
						severity: "warning",
						enabled: false,
						applies_to: { paths: ["src/**"], exclude_paths: ["src/gen/**"] },
					},
				],
			},
			"global",
			source,
		);
		if (Either.isLeft(parsed) || parsed.right === null) throw new Error("expected a contract");
		expect(parsed.right.tier).toBe("global");
		expect(parsed.right.appliesTo).toEqual({ languages: ["python"] });
		const [check] = parsed.right.checks;
		expect(check?.severity).toBe("warning");
		expect(check?.enabled).toBe(false);
		expect(check?.appliesTo).toEqual({ paths: ["src/**"], excludePaths: ["src/gen/**"] });
	});

	it("rejects a contract without name or type", () => {
		const parsed = parseContractDocument({ contract: { name: "x" } }, "repo", source);
		expect(Either.isLeft(parsed)).toBe(true);
		if (Either.isRight(parsed)) return;
		expect(parsed.left.detail).toBe("contract requires 'name' and 'type'");
	});

	it("rejects a check without id or type", () => {
		const parsed = parseContractDocument(
			{ contract: { name: "x", type: "t" }, checks: [{ id: "a", type: "pattern" }, { id: "b" }] },
			"repo",
			source,
		);
		if (Either.isRight(parsed)) throw new Error("expected a failure");
		expect(parsed.left.detail).toBe("checks[1] requires 'id' and 'type'");
	});
});

describe("contract helpers", () => {
	it("normalises legacy check types and keeps unknown ones", () => {
		expect(normalizeCheckType("file_exists")).toBe("file-exists");
		expect(normalizeCheckType("ast_check")).toBe("structural-metric");
		expect(normalizeCheckType("contracts")).toBe("nested-contract");
		expect(normalizeCheckType("lint-magic")).toBe("lint-magic");
		expect(normalizeCheckType("constructor")).toBe("constructor");
		expect(normalizeCheckType("toString")).toBe("toString");
	});

	it("treats underscore names as abstract and strips workspace:", () => {
		expect(isAbstractContract("_base")).toBe(true);
		expect(isAbstractContract("base")).toBe(false);
		expect(parentName("workspace:_base")).toBe("_base");
		expect(parentName("_base")).toBe("_base");
	});

	it("filters by language and repo type", () => {
		const parsed = parseContractDocument(
			{ contract: { name: "x", type: "t", applies_to: { languages: ["python"], repo_types: ["service"] } } },
			"repo",
			source,
		);
		if (Either.isLeft(parsed) || parsed.right === null) throw new Error("expected a contract");
		expect(contractApplies(parsed.right, "python", "service")).toBe(true);
		expect(contractApplies(parsed.right, "typescript")).toBe(false);
		expect(contractApplies(parsed.right, undefined, "library")).toBe(false);
		expect(contractApplies(parsed.right)).toBe(true);
	});
});
