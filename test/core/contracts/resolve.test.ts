import { describe, expect, it } from "vitest";

import type { CheckDefinition, Contract } from "../../../src/core/contracts/contract.js";
import { mergeChecks, resolveContractChecks } from "../../../src/core/contracts/resolve.js";
import { checkDef, contractOf } from "../../utils/builders.js";

const contract = (name: string, checks: readonly CheckDefinition[], parents: readonly string[] = []): Contract =>
	contractOf(name, checks, { extends: parents });

function resolver(contracts: readonly Contract[]) {
	const byName = new Map(contracts.map((c) => [c.name, c]));
	const warnings: string[] = [];
	const cache = new Map<string, readonly CheckDefinition[]>();
	return {
		warnings,
		cache,
		resolve: (name: string): readonly string[] => {
			const target = byName.get(name);
			if (target === undefined) throw new Error(`no contract ${name}`);
			return resolveContractChecks(target, {
				lookup: (n) => byName.get(n),
				cache,
				warn: (message) => warnings.push(message),
			}).map((check) => check.id);
		},
	};
}

describe("mergeChecks", () => {
	it("keeps own checks first and drops inherited duplicates", () => {
		const own = [checkDef({ id: "a", name: "own a" })];
		const inherited = [checkDef({ id: "a", name: "parent a" }), checkDef({ id: "b" })];
		const merged = mergeChecks(own, inherited);
		expect(merged.map((c) => c.id)).toEqual(["a", "b"]);
		expect(merged[0]?.name).toBe("own a");
	});
});

describe("resolveContractChecks", () => {
	it("collects checks through several levels", () => {
		const r = resolver([
			contract("_base", [checkDef({ id: "base" })]),
			contract("mid", [checkDef({ id: "mid" })], ["workspace:_base"]),
			contract("leaf", [checkDef({ id: "leaf" })], ["mid"]),
		]);
		expect(r.resolve("leaf")).toEqual(["leaf", "mid", "base"]);
		expect(r.warnings).toEqual([]);
	});

	it("warns about an unknown parent and keeps going", () => {
		const r = resolver([contract("leaf", [checkDef({ id: "leaf" })], ["ghost"])]);
		expect(r.resolve("leaf")).toEqual(["leaf"]);
		expect(r.warnings).toEqual(["Contract 'leaf' extends unknown 'ghost'"]);
	});

	it("stops at a cycle with a warning", () => {
		const r = resolver([
			contract("a", [checkDef({ id: "a1" })], ["b"]),
			contract("b", [checkDef({ id: "b1" })], ["a"]),
		]);
		expect(r.resolve("a")).toEqual(["a1", "b1"]);
		expect(r.warnings).toEqual(["Contract 'b' has a cyclic extends on 'a'; skipped"]);
		expect(r.cache.has("a")).toBe(false);
	});

	it("caches complete resolutions", () => {
		const r = resolver([
			contract("_base", [checkDef({ id: "base" })]),
			contract("leaf", [checkDef({ id: "leaf" })], ["_base"]),
		]);
		r.resolve("leaf");
		expect(r.cache.get("_base")?.map((c) => c.id)).toEqual(["base"]);
		expect(r.cache.get("leaf")?.map((c) => c.id)).toEqual(["leaf", "base"]);
	});
});
