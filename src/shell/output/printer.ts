// CHANGE: Console rendering of a CI run
// WHY: The terminal gets the same grouping as the Markdown summary, as plain lines
// PURITY: SHELL (printCIResult); formatCIResult is pure
// INVARIANT: Sections appear by file in violation order; runtime errors come last

import { Effect } from "effect";

import { netChange } from "../../core/baseline/baseline.js";
import {
	type CIResult,
	groupViolations,
	summarizeCIResult,
} from "../../core/ci/result.js";
import type { CIViolation } from "../../core/ci/violation.js";
import { describeExitCode } from "../../core/models.js";

function formatViolation(violation: CIViolation): string {
	const line = violation.line === undefined ? "" : `:${violation.line}`;
	return `  ${violation.severity}${line} [${violation.contract}/${violation.checkId}] ${violation.message}`;
}

/**
 * @pure true
 */
export function formatCIResult(result: CIResult): readonly string[] {
	const summary = summarizeCIResult(result);
	const lines: string[] = [];
	const byFile = groupViolations(result.violations, (v) => (v.file.length === 0 ? "(repository)" : v.file));
	for (const [file, violations] of byFile) {
		lines.push(`\n=== ${file} (${violations.length} issues) ===`);
		for (const violation of violations) lines.push(formatViolation(violation));
	}
	lines.push(
		"",
		`Mode: ${summary.mode}  Files: ${summary.filesChecked}  Checks: ${summary.checksRun}  Duration: ${summary.durationSeconds.toFixed(2)}s`,
		`Violations: ${summary.totalViolations} (${summary.errors} errors, ${summary.warnings} warnings, ${summary.info} info)`,
	);
	const { comparison } = result;
	if (comparison !== undefined) {
		lines.push(
			`Baseline: ${comparison.newViolations.length} new, ${comparison.fixedEntries.length} fixed, net ${netChange(comparison)}`,
		);
	}
	for (const error of result.errors) lines.push(`Error: ${error}`);
	lines.push(`${describeExitCode(result.exitCode)} (exit ${result.exitCode})`);
	return lines;
}

export function printCIResult(result: CIResult): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const line of formatCIResult(result)) console.log(line);
	});
}
