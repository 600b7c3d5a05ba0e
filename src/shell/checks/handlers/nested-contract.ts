// CHANGE: Run other contracts as one check and re-emit their failures
// PURITY: SHELL
// INVARIANT: Info findings are never re-emitted; warnings only with fail_on_warning

import { Effect } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import type { CheckResult } from "../../../core/models.js";
import { readBoolean, readStringList } from "../../../core/types/json.js";
import { failure, faultResult } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";

/**
 * @pure true
 */
export function isReportable(result: CheckResult, failOnWarning: boolean): boolean {
	if (result.passed) return false;
	return result.severity === "error" || (failOnWarning && result.severity === "warning");
}

export const nestedContractHandler: CheckHandler = {
	type: "nested-contract",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const failOnWarning = readBoolean(check.config, "fail_on_warning") ?? false;
			const results: CheckResult[] = [];
			for (const name of readStringList(check.config, "contracts")) {
				const outcome = yield* context.runNested(name);
				if (outcome.kind === "unknown") {
					results.push(faultResult(check, context, `Unknown contract: ${name}`));
					continue;
				}
				if (outcome.kind === "cycle") {
					results.push(
						faultResult(check, context, `Nested contract cycle: ${outcome.path.join(" → ")}`),
					);
					continue;
				}
				for (const nested of outcome.results.filter((r) => isReportable(r, failOnWarning))) {
					results.push(
						failure(check, context, `[${nested.contract}/${nested.checkId}] ${nested.message}`, {
							severity: nested.severity,
							...(nested.file === undefined ? {} : { file: nested.file }),
							...(nested.line === undefined ? {} : { line: nested.line }),
							...(nested.fixHint === undefined ? {} : { fixHint: nested.fixHint }),
						}),
					);
				}
			}
			return results;
		}),
};
