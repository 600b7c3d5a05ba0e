// CHANGE: User-defined checks, registered in-process or loaded from contracts/checks
// WHY: Contract authors extend the engine without touching the dispatcher
// PURITY: SHELL (dynamic import)
// EFFECT: Effect<readonly CheckResult[], CheckExecutionError>
// INVARIANT: Entries returned by a custom function are validated before they become results

import { Effect } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { CheckExecutionError, messageOf } from "../../../core/errors.js";
import type { CheckResult } from "../../../core/models.js";
import { toCheckSeverity } from "../../../core/models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readNumber,
	readObject,
	readString,
	toJSONValue,
} from "../../../core/types/json.js";
import { pathExists } from "../../fs/files.js";
import { path, pathToFileURL } from "../../utils/node-mods.js";
import { failure, faultResult } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";

export interface CustomFinding {
	readonly message: string;
	readonly file?: string;
	readonly line?: number;
	readonly severity?: string;
	readonly fix_hint?: string;
}

export type CustomCheckFunction = (
	repoRoot: string,
	files: readonly string[],
	params: JSONObject,
) => readonly CustomFinding[] | Promise<readonly CustomFinding[]>;

export class CustomCheckRegistry {
	private readonly functions = new Map<string, CustomCheckFunction>();

	register(name: string, fn: CustomCheckFunction): this {
		this.functions.set(name, fn);
		return this;
	}

	get(name: string): CustomCheckFunction | undefined {
		return this.functions.get(name);
	}
}

const MODULE_DIRS = [["contracts", "checks"], [".conformance", "checks"]] as const;
const MODULE_EXTENSIONS = ["", ".js", ".mjs"] as const;

/**
 * First existing module file for a module name.
 */
export function locateCustomModule(
	repoRoot: string,
	moduleName: string,
): Effect.Effect<string | undefined> {
	return Effect.gen(function* () {
		for (const dir of MODULE_DIRS) {
			for (const extension of MODULE_EXTENSIONS) {
				const candidate = path.join(repoRoot, ...dir, `${moduleName}${extension}`);
				if (!/\.m?js$/u.test(candidate)) continue;
				if (yield* pathExists(candidate)) return candidate;
			}
		}
		return undefined;
	});
}

/**
 * Entries that carry a string message become results; anything else is dropped.
 *
 * @pure true
 */
export function findingsToResults(
	check: CheckDefinition,
	context: Pick<CheckContext, "contract">,
	output: JSONValue,
): readonly CheckResult[] {
	if (!isJSONArray(output)) return [];
	const results: CheckResult[] = [];
	for (const entry of output) {
		if (!isJSONObject(entry)) continue;
		const message = readString(entry, "message");
		if (message === undefined) continue;
		const file = readString(entry, "file");
		const line = readNumber(entry, "line");
		const fixHint = readString(entry, "fix_hint");
		results.push(
			failure(check, context, message, {
				severity: toCheckSeverity(readString(entry, "severity"), check.severity),
				...(file === undefined ? {} : { file }),
				...(line === undefined ? {} : { line }),
				...(fixHint === undefined ? {} : { fixHint }),
			}),
		);
	}
	return results;
}

function callExport(
	check: CheckDefinition,
	file: string,
	exportName: string,
	args: readonly [string, readonly string[], JSONObject],
): Effect.Effect<unknown, CheckExecutionError> {
	return Effect.tryPromise({
		try: async () => {
			const loaded: unknown = await import(pathToFileURL(file).href);
			const exported: unknown =
				typeof loaded === "object" && loaded !== null ? Reflect.get(loaded, exportName) : undefined;
			if (typeof exported !== "function") {
				throw new Error(`Function '${exportName}' not found in module '${path.basename(file)}'`);
			}
			const output: unknown = await Reflect.apply(exported, undefined, [...args]);
			return output;
		},
		catch: (error) => new CheckExecutionError({ checkId: check.id, detail: messageOf(error) }),
	});
}

export function createCustomHandler(registry: CustomCheckRegistry): CheckHandler {
	return {
		type: "custom",
		execute: (check: CheckDefinition, context: CheckContext) =>
			Effect.gen(function* () {
				const moduleName = readString(check.config, "module");
				const functionName = readString(check.config, "function");
				const params = readObject(check.config, "params") ?? {};
				const args = [context.repoRoot, context.files, params] as const;

				const registered = functionName === undefined ? undefined : registry.get(functionName);
				if (registered !== undefined) {
					const output = yield* Effect.tryPromise({
						try: async () => registered(...args),
						catch: (error) =>
							new CheckExecutionError({ checkId: check.id, detail: messageOf(error) }),
					});
					return findingsToResults(check, context, toJSONValue(output));
				}

				if (moduleName === undefined || functionName === undefined) {
					return [faultResult(check, context, "Custom check missing 'module' or 'function' in config")];
				}
				const file = yield* locateCustomModule(context.repoRoot, moduleName);
				if (file === undefined) {
					return [faultResult(check, context, `Custom check module not found: ${moduleName}`)];
				}
				const output = yield* callExport(check, file, functionName, args);
				return findingsToResults(check, context, toJSONValue(output));
			}),
	};
}
