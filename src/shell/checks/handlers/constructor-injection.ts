// CHANGE: Dependency injection check on service-like classes
// PURITY: SHELL (reads files); rules are CORE

import { Effect } from "effect";

import { findInjectionViolations, type InjectionPolicy } from "../../../core/architecture/rules.js";
import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { type JSONObject, readBoolean, readStringList } from "../../../core/types/json.js";
import { failure } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { readOutlines } from "./sources.js";

const DEFAULT_CLASS_PATTERNS = ["*Service"];

/**
 * @pure true
 */
export function readInjectionPolicy(config: JSONObject): InjectionPolicy {
	const classPatterns = readStringList(config, "class_patterns");
	return {
		classPatterns: classPatterns.length === 0 ? DEFAULT_CLASS_PATTERNS : classPatterns,
		forbiddenInstantiations: readStringList(config, "forbidden_instantiations"),
		checkForInitParams: readBoolean(config, "check_for_init_params") ?? true,
	};
}

export const constructorInjectionHandler: CheckHandler = {
	type: "constructor-injection",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.map(readOutlines(context.repoRoot, context.files), (outlined) => {
			const policy = readInjectionPolicy(check.config);
			return outlined.flatMap(({ file, outline }) =>
				findInjectionViolations(file, outline, policy).map((finding) =>
					failure(check, context, finding.message, {
						file: finding.file,
						line: finding.line,
						fixHint: finding.fixHint,
					}),
				),
			);
		}),
};
