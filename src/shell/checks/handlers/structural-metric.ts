// CHANGE: Structural metrics over language outlines
// PURITY: SHELL (reads files); metric evaluation is CORE
// INVARIANT: An unparseable file yields one warning, never a handler fault

import { Effect, Either } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import {
	DEFAULT_METRIC,
	DEFAULT_THRESHOLD,
	evaluateMetric,
	isStructuralMetric,
} from "../../../core/metrics/metrics.js";
import { parseOutline } from "../../../core/metrics/parse.js";
import type { CheckResult } from "../../../core/models.js";
import { readNumber, readString } from "../../../core/types/json.js";
import { failure, faultResult } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";
import { readSources } from "./sources.js";

export const structuralMetricHandler: CheckHandler = {
	type: "structural-metric",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const metric = readString(check.config, "metric") ?? DEFAULT_METRIC;
			if (!isStructuralMetric(metric)) return [faultResult(check, context, `Unknown metric: ${metric}`)];
			const threshold = readNumber(check.config, "threshold") ?? DEFAULT_THRESHOLD;

			const results: CheckResult[] = [];
			for (const { file, content } of yield* readSources(context.repoRoot, context.files)) {
				const parsed = parseOutline(content, file);
				if (parsed === null) continue;
				if (Either.isLeft(parsed)) {
					results.push(
						failure(check, context, `Syntax error parsing ${file}: ${parsed.left}`, {
							file,
							severity: "warning",
						}),
					);
					continue;
				}
				for (const finding of evaluateMetric(parsed.right, metric, threshold)) {
					results.push(
						failure(check, context, finding.message, { file, line: finding.line, ruleId: metric }),
					);
				}
			}
			return results;
		}),
};
