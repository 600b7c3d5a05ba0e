import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ContractRegistry } from "../../../src/shell/contracts/registry.js";
import { createTempRepo, type TempRepo } from "../../utils/tempProject.js";

let repo: TempRepo;
let registry: ContractRegistry;

beforeEach(() => {
	vi.spyOn(console, "warn").mockImplementation(() => undefined);
	repo = createTempRepo({
		"builtin/_base.contract.yaml": [
			"contract: { name: _base, type: base }",
			"checks:",
			"  - { id: readme, type: file_exists, paths: [README.md] }",
		].join("\n"),
		"global/naming.contract.yaml": ["contract: { name: naming, type: patterns }", "checks: [{ id: old, type: pattern }]"].join(
			"\n",
		),
		"contracts/naming.contract.yaml": [
			"contract:",
			"  name: naming",
			"  type: patterns",
			"  extends: ['workspace:_base']",
			"checks:",
			"  - { id: no-print, type: pattern, pattern: 'print\\(' }",
		].join("\n"),
		"contracts/py.contract.yaml": "contract: { name: py, type: t, applies_to: { languages: [python] } }\n",
		"contracts/off.contract.yaml": "contract: { name: off, type: t, enabled: false }\n",
		"contracts/bad.contract.yaml": "contract: { name: x }\n",
		"contracts/exemptions/legacy.exemptions.yaml": [
			"exemptions:",
			"  - id: EX-L",
			"    contract: naming",
			"    check: no-print",
			"    reason: Legacy code",
			"    approved_by: lead",
			"    scope: { files: ['src/legacy/**'] }",
			"  - { id: EX-BAD }",
		].join("\n"),
	});
	registry = new ContractRegistry({
		repoRoot: repo.root,
		builtinRoot: path.join(repo.root, "builtin"),
		globalRoot: path.join(repo.root, "global"),
	});
});

afterEach(() => {
	repo.cleanup();
});

describe("ContractRegistry", () => {
	it("discovers every tier and lets the repo tier replace earlier ones", async () => {
		const contracts = await Effect.runPromise(registry.discover());
		expect([...contracts.keys()]).toEqual(["_base", "naming", "off", "py"]);
		expect(contracts.get("naming")?.tier).toBe("repo");
		expect(registry.warnings()).toEqual([
			`Skipping contract ${path.join(repo.root, "contracts", "bad.contract.yaml")}: contract requires 'name' and 'type'`,
		]);
	});

	it("resolves inherited checks", async () => {
		const naming = await Effect.runPromise(registry.get("naming"));
		expect(naming?.allChecks.map((check) => check.id)).toEqual(["no-print", "readme"]);
		expect(await Effect.runPromise(registry.get("ghost"))).toBeUndefined();
	});

	it("lists applicable contracts without abstract or disabled ones", async () => {
		const all = await Effect.runPromise(registry.getApplicable());
		expect(all.map((c) => c.name)).toEqual(["naming", "py"]);
		const ts = await Effect.runPromise(registry.getApplicable("typescript"));
		expect(ts.map((c) => c.name)).toEqual(["naming"]);
	});

	it("loads exemption files and finds matching exemptions", async () => {
		const exemptions = await Effect.runPromise(registry.loadExemptions());
		expect(exemptions.map((e) => e.id)).toEqual(["EX-L"]);
		const hit = await Effect.runPromise(
			registry.findExemption("naming", "no-print", "2026-01-01", { file: "src/legacy/a.ts" }),
		);
		expect(hit?.id).toBe("EX-L");
		const miss = await Effect.runPromise(
			registry.findExemption("naming", "no-print", "2026-01-01", { file: "src/app.ts" }),
		);
		expect(miss).toBeUndefined();
		expect(registry.warnings()).toHaveLength(1);
	});
});
