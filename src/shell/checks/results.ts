// CHANGE: Result constructors shared by every handler
// PURITY: CORE helpers living beside the handlers
// INVARIANT: failure(...).passed = false ∧ passing(...).passed = true

import type { CheckDefinition } from "../../core/contracts/contract.js";
import type { CheckResult, CheckSeverity } from "../../core/models.js";
import type { CheckContext } from "./types.js";

export interface FindingLocation {
	readonly file?: string;
	readonly line?: number;
	readonly column?: number;
	readonly ruleId?: string;
	readonly severity?: CheckSeverity;
	readonly fixHint?: string;
}

/**
 * @pure true
 */
export function failure(
	check: CheckDefinition,
	context: Pick<CheckContext, "contract">,
	message: string,
	at: FindingLocation = {},
): CheckResult {
	const fixHint = at.fixHint ?? check.fixHint;
	return {
		checkId: check.id,
		checkName: check.name,
		contract: context.contract,
		passed: false,
		severity: at.severity ?? check.severity,
		message,
		...(at.file === undefined ? {} : { file: at.file }),
		...(at.line === undefined ? {} : { line: at.line }),
		...(at.column === undefined ? {} : { column: at.column }),
		...(at.ruleId === undefined ? {} : { ruleId: at.ruleId }),
		...(fixHint === undefined ? {} : { fixHint }),
	};
}

/**
 * A handler fault reported in place of findings; always error severity.
 *
 * @pure true
 */
export function faultResult(
	check: CheckDefinition,
	context: Pick<CheckContext, "contract">,
	message: string,
): CheckResult {
	return { ...failure(check, context, message, { severity: "error" }), error: true };
}

/**
 * @pure true
 */
export function passing(check: CheckDefinition, context: Pick<CheckContext, "contract">): CheckResult {
	return {
		checkId: check.id,
		checkName: check.name,
		contract: context.contract,
		passed: true,
		severity: check.severity,
		message: "Check passed",
	};
}

/**
 * 1-based line of a character offset.
 *
 * @pure true
 * @complexity O(offset)
 */
export function lineAt(content: string, offset: number): number {
	let line = 1;
	for (let i = 0; i < offset && i < content.length; i++) {
		if (content.charCodeAt(i) === 10) line++;
	}
	return line;
}
