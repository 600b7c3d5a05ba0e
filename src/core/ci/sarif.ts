// CHANGE: SARIF 2.1.0 log for one CI run
// PURITY: CORE
// FORMAT THEOREM: |runs| = 1 ∧ |rules| = |distinct check ids| ∧ |results| = |violations|
// COMPLEXITY: O(v)

import type { SarifReport, SarifRule } from "../types/sarif.js";
import type { CIResult } from "./result.js";
import { sarifLevel, toSarifResult } from "./violation.js";

export const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";

export interface ToolInfo {
	readonly name: string;
	readonly version: string;
	readonly informationUri?: string;
	/** Repository URI for versionControlProvenance. */
	readonly repositoryUri?: string;
}

export const DEFAULT_TOOL: ToolInfo = { name: "conformance-engine", version: "0.1.0" };

/**
 * One rule per check id, at the level of its first violation.
 *
 * @pure true
 */
export function sarifRules(result: CIResult): readonly SarifRule[] {
	const rules = new Map<string, SarifRule>();
	for (const violation of result.violations) {
		if (rules.has(violation.checkId)) continue;
		rules.set(violation.checkId, {
			id: violation.checkId,
			shortDescription: { text: `Check: ${violation.checkId}` },
			defaultConfiguration: { level: sarifLevel(violation.severity) },
			...(violation.fixHint === undefined ? {} : { help: { text: violation.fixHint } }),
		});
	}
	return [...rules.values()];
}

/**
 * @pure true
 */
export function buildSarifReport(result: CIResult, tool: ToolInfo = DEFAULT_TOOL): SarifReport {
	return {
		$schema: SARIF_SCHEMA,
		version: "2.1.0",
		runs: [
			{
				tool: {
					driver: {
						name: tool.name,
						version: tool.version,
						...(tool.informationUri === undefined ? {} : { informationUri: tool.informationUri }),
						rules: sarifRules(result),
					},
				},
				results: result.violations.map(toSarifResult),
				invocations: [
					{
						executionSuccessful: result.errors.length === 0,
						startTimeUtc: result.startedAt,
						endTimeUtc: result.finishedAt,
					},
				],
				...(result.commitSha === undefined
					? {}
					: {
							versionControlProvenance: [
								{ repositoryUri: tool.repositoryUri ?? "", revisionId: result.commitSha },
							],
						}),
			},
		],
	};
}
