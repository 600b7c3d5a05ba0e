// CHANGE: Domain purity check with default I/O lists read from data/domain-purity.json
// PURITY: SHELL (reads files)
// EFFECT: Effect<readonly CheckResult[], CheckExecutionError>
// INVARIANT: Explicit config lists replace the defaults, they do not extend them

import { Effect, Either } from "effect";

import { findPurityViolations, type PurityPolicy } from "../../../core/architecture/rules.js";
import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { CheckExecutionError, describeError } from "../../../core/errors.js";
import { matchesAnyGlob } from "../../../core/glob.js";
import {
	isJSONObject,
	type JSONObject,
	readStringList,
	toJSONValue,
} from "../../../core/types/json.js";
import { readText } from "../../fs/files.js";
import { fileURLToPath } from "../../utils/node-mods.js";
import { failure } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { readOutlines } from "./sources.js";

const DEFAULTS_URL = new URL("../../../../data/domain-purity.json", import.meta.url);
const DEFAULT_DOMAIN_PATHS = ["**/domain/**"];

let defaults: PurityPolicy | null = null;

/**
 * Default forbidden imports and calls, read once per process.
 */
export function loadPurityDefaults(): Effect.Effect<PurityPolicy, string> {
	const cached = defaults;
	if (cached !== null) return Effect.succeed(cached);
	return readText(fileURLToPath(DEFAULTS_URL)).pipe(
		Effect.mapError(describeError),
		Effect.flatMap((content) =>
			Either.try({
				try: () => toJSONValue(JSON.parse(content)),
				catch: () => `${fileURLToPath(DEFAULTS_URL)}: invalid JSON`,
			}),
		),
		Effect.map((doc) => {
			const object = isJSONObject(doc) ? doc : {};
			const loaded: PurityPolicy = {
				forbiddenImports: readStringList(object, "forbidden_imports"),
				forbiddenCalls: readStringList(object, "forbidden_calls"),
			};
			defaults = loaded;
			return loaded;
		}),
	);
}

/**
 * @pure true
 */
export function readPurityPolicy(config: JSONObject, fallback: PurityPolicy): PurityPolicy {
	return {
		forbiddenImports: Object.hasOwn(config, "forbidden_imports")
			? readStringList(config, "forbidden_imports")
			: fallback.forbiddenImports,
		forbiddenCalls: Object.hasOwn(config, "forbidden_calls")
			? readStringList(config, "forbidden_calls")
			: fallback.forbiddenCalls,
	};
}

export const domainPurityHandler: CheckHandler = {
	type: "domain-purity",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const fallback = yield* loadPurityDefaults().pipe(
				Effect.mapError((detail) => new CheckExecutionError({ checkId: check.id, detail })),
			);
			const policy = readPurityPolicy(check.config, fallback);
			const configured = readStringList(check.config, "domain_paths");
			const domainPaths = configured.length === 0 ? DEFAULT_DOMAIN_PATHS : configured;
			const files = context.files.filter((file) => matchesAnyGlob(domainPaths, file));
			const outlined = yield* readOutlines(context.repoRoot, files);
			return outlined.flatMap(({ file, outline }) =>
				findPurityViolations(file, outline, policy).map((finding) =>
					failure(check, context, finding.message, {
						file: finding.file,
						line: finding.line,
						fixHint: finding.fixHint,
					}),
				),
			);
		}),
};
