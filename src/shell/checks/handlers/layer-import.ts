// CHANGE: Layer boundary check over resolved local imports
// PURITY: SHELL (reads files); rules are CORE
// INVARIANT: Imports resolve against the whole repository, so incremental runs see every target layer

import { Effect } from "effect";

import {
	findLayerViolations,
	type LayerPolicy,
	type LayerRule,
} from "../../../core/architecture/rules.js";
import type { CheckDefinition } from "../../../core/contracts/contract.js";
import {
	isJSONObject,
	type JSONObject,
	readObject,
	readString,
	readStringList,
	readStringRecord,
} from "../../../core/types/json.js";
import { failure } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { readOutlines } from "./sources.js";

/**
 * @pure true
 */
export function readLayerPolicy(config: JSONObject): LayerPolicy {
	const rules: Record<string, LayerRule> = {};
	for (const [layer, raw] of Object.entries(readObject(config, "layer_rules") ?? {})) {
		if (!isJSONObject(raw)) continue;
		const message = readString(raw, "message");
		const forbidden = readStringList(raw, "forbidden");
		rules[layer] = message === undefined ? { forbidden } : { forbidden, message };
	}
	return {
		detection: Object.entries(readStringRecord(config, "layer_detection")),
		rules,
	};
}

export const layerImportHandler: CheckHandler = {
	type: "layer-import",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.map(readOutlines(context.repoRoot, context.files), (outlined) => {
			const policy = readLayerPolicy(check.config);
			const knownFiles = new Set(context.repoFiles);
			return outlined.flatMap(({ file, outline }) =>
				findLayerViolations(file, outline, policy, knownFiles).map((finding) =>
					failure(check, context, finding.message, {
						file: finding.file,
						line: finding.line,
						fixHint: finding.fixHint,
					}),
				),
			);
		}),
};
