import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import type { CheckResult } from "../../../src/core/models.js";
import type { JSONObject } from "../../../src/core/types/json.js";
import { readInjectionPolicy } from "../../../src/shell/checks/handlers/constructor-injection.js";
import { readPurityPolicy } from "../../../src/shell/checks/handlers/domain-purity.js";
import { createDefaultHandlers } from "../../../src/shell/checks/handlers/index.js";
import { readLayerPolicy } from "../../../src/shell/checks/handlers/layer-import.js";
import { executeCheck } from "../../../src/shell/checks/registry.js";
import type { CheckContext, NestedOutcome } from "../../../src/shell/checks/types.js";
import { checkDef } from "../../utils/builders.js";
import { createTempRepo, type TempRepo } from "../../utils/tempProject.js";

let repo: TempRepo | undefined;

afterEach(() => {
	repo?.cleanup();
	repo = undefined;
});

function runOn(
	files: Readonly<Record<string, string>>,
	type: string,
	config: JSONObject,
	checked: readonly string[] = Object.keys(files).sort(),
): Promise<readonly CheckResult[]> {
	const created = createTempRepo(files);
	repo = created;
	const context: CheckContext = {
		repoRoot: created.root,
		contract: "architecture",
		files: checked,
		repoFiles: Object.keys(files).sort(),
		runNested: () => Effect.succeed<NestedOutcome>({ kind: "unknown" }),
	};
	return Effect.runPromise(executeCheck(createDefaultHandlers(), checkDef({ type, config }), context));
}

const base = { checkId: "check-1", checkName: "Check one", contract: "architecture", passed: false, severity: "error" };

describe("layer-import handler", () => {
	const layerConfig: JSONObject = {
		layer_detection: { "src/domain/**": "domain", "src/infra/**": "infra" },
		layer_rules: { domain: { forbidden: ["infra"], message: "Go through a port" } },
	};

	it("reads detection order and rule messages", () => {
		expect(readLayerPolicy(layerConfig)).toEqual({
			detection: [
				["src/domain/**", "domain"],
				["src/infra/**", "infra"],
			],
			rules: { domain: { forbidden: ["infra"], message: "Go through a port" } },
		});
	});

	it("resolves imports against every repository file", async () => {
		const results = await runOn(
			{
				"src/domain/order.ts": 'import { db } from "../infra/db.js";\nexport const order = db;\n',
				"src/infra/db.ts": "export const db = 1;\n",
			},
			"layer_imports",
			layerConfig,
			["src/domain/order.ts"],
		);
		expect(results).toEqual([
			{
				...base,
				message: "domain layer imports from infra: ../infra/db.js",
				file: "src/domain/order.ts",
				line: 1,
				fixHint: "Go through a port",
			},
		]);
	});
});

describe("constructor-injection handler", () => {
	it("defaults to *Service classes and checks constructor parameters", () => {
		expect(readInjectionPolicy({})).toEqual({
			classPatterns: ["*Service"],
			forbiddenInstantiations: [],
			checkForInitParams: true,
		});
	});

	it("reports missing injection and forbidden instantiations", async () => {
		const source = [
			"export class OrderService {",
			"\tprivate readonly client: HttpClient;",
			"\tconstructor() {",
			"\t\tthis.client = new HttpClient();",
			"\t}",
			"}",
			"export class Helper {}",
			"",
		].join("\n");
		const results = await runOn({ "src/order-service.ts": source }, "constructor_injection", {
			forbidden_instantiations: ["HttpClient("],
		});
		expect(results).toEqual([
			{
				...base,
				message: "Class 'OrderService' has no injected dependencies",
				file: "src/order-service.ts",
				line: 1,
				fixHint: "Add dependencies as constructor parameters",
			},
			{
				...base,
				message: "Direct instantiation of 'HttpClient' in OrderService.constructor",
				file: "src/order-service.ts",
				line: 4,
				fixHint: "Inject this dependency through constructor parameters",
			},
		]);
	});
});

describe("domain-purity handler", () => {
	const files = {
		"src/domain/price.ts": 'import * as fs from "node:fs";\nexport const load = () => fs.readFileSync("x");\n',
		"src/app/main.ts": 'import * as fs from "node:fs";\n',
	};
	const hint = "Move I/O operations to infrastructure layer; domain should be pure";

	it("lets explicit lists replace the defaults", () => {
		const fallback = { forbiddenImports: ["fs"], forbiddenCalls: ["open("] };
		expect(readPurityPolicy({ forbidden_imports: [] }, fallback)).toEqual({
			forbiddenImports: [],
			forbiddenCalls: ["open("],
		});
	});

	it("checks only domain files against the default I/O lists", async () => {
		const results = await runOn(files, "domain_purity", {});
		expect(results).toEqual([
			{
				...base,
				message: "Domain layer imports I/O library: node:fs",
				file: "src/domain/price.ts",
				line: 1,
				fixHint: hint,
			},
			{
				...base,
				message: "Domain layer calls I/O function: fs.readFileSync",
				file: "src/domain/price.ts",
				line: 2,
				fixHint: hint,
			},
		]);
	});

	it("honours configured domain paths and lists", async () => {
		const results = await runOn(files, "domain-purity", {
			domain_paths: ["src/app/**"],
			forbidden_calls: [],
		});
		expect(results.map((r) => [r.file, r.message])).toEqual([
			["src/app/main.ts", "Domain layer imports I/O library: node:fs"],
		]);
	});
});

describe("circular-import handler", () => {
	const files = {
		"src/a.ts": 'import { b } from "./b.js";\nexport const a = b;\n',
		"src/b.ts": 'import { a } from "./a.js";\nexport const b = a;\n',
		"src/c.ts": 'import type { A } from "./a.js";\nexport type C = A;\n',
	};

	it("reports each cycle once at its first module", async () => {
		const results = await runOn(files, "circular_imports", {});
		expect(results).toEqual([
			{
				...base,
				message: "Circular import detected: src/a.ts → src/b.ts → src/a.ts",
				file: "src/a.ts",
				line: 1,
				fixHint:
					"Break cycle by: 1) Moving shared types to separate module, 2) Using a type-only import, 3) Restructuring dependencies",
			},
		]);
	});

	it("ignores cycles leaving the checked files", async () => {
		const results = await runOn(files, "circular-import", {}, ["src/a.ts", "src/c.ts"]);
		expect(results.map((r) => r.message)).toEqual(["Check passed"]);
	});
});
