// CHANGE: Markdown summary for PR comments and job summaries
// PURITY: CORE
// FORMAT THEOREM: sections = summary table, comparison?, violations by file?, footer (in this order)
// COMPLEXITY: O(v log v)

import { type BaselineComparison, type BaselineEntry, netChange } from "../baseline/baseline.js";
import type { CheckSeverity } from "../models.js";
import { type CIResult, countBySeverity, durationSeconds, groupViolations } from "./result.js";
import type { CIViolation } from "./violation.js";

export const DEFAULT_MARKDOWN_TITLE = "Conformance Report";

const FIXED_LIMIT = 5;
const EXISTING_LIMIT = 20;
const COLLAPSE_FILES_ABOVE = 3;

const SEVERITY_ICON: Readonly<Record<CheckSeverity, string>> = {
	error: "🔴",
	warning: "🟡",
	info: "🔵",
};

function locationOf(violation: CIViolation): string {
	return violation.line === undefined ? "file" : `L${violation.line}`;
}

/**
 * @pure true
 */
export function formatViolationItem(violation: CIViolation, compact = false): string {
	const icon = SEVERITY_ICON[violation.severity];
	if (compact) {
		return `- ${icon} \`${violation.checkId}\` at \`${violation.file}:${locationOf(violation)}\``;
	}
	const lines = [
		`- ${icon} **${violation.checkId}** at \`${locationOf(violation)}\``,
		`  - ${violation.message}`,
	];
	if (violation.fixHint !== undefined) lines.push(`  - 💡 *${violation.fixHint}*`);
	return lines.join("\n");
}

function summaryTable(result: CIResult): readonly string[] {
	return [
		"### Summary",
		"",
		"| Metric | Value |",
		"|--------|-------|",
		`| Mode | ${result.mode} |`,
		`| Files Checked | ${result.filesChecked} |`,
		`| Checks Run | ${result.checksRun} |`,
		`| Total Violations | ${result.violations.length} |`,
		`| Errors | ${countBySeverity(result.violations, "error")} |`,
		`| Warnings | ${countBySeverity(result.violations, "warning")} |`,
		`| Duration | ${durationSeconds(result).toFixed(2)}s |`,
		"",
	];
}

/**
 * @pure true
 */
export function formatNetChange(change: number): string {
	if (change < 0) return `📉 **Net improvement:** ${-change} fewer violations`;
	if (change > 0) return `📈 **Net regression:** ${change} more violations`;
	return "➡️ **No net change** in violation count";
}

function fixedLines(fixed: readonly BaselineEntry[]): readonly string[] {
	if (fixed.length === 0) return [];
	const shown = fixed
		.slice(0, FIXED_LIMIT)
		.map((entry) => `- ~~\`${entry.checkId}\` in \`${entry.filePath}\`~~`);
	const more = fixed.length > FIXED_LIMIT ? [`- *...and ${fixed.length - FIXED_LIMIT} more*`] : [];
	return [`#### 🎉 Fixed Violations (${fixed.length})`, "", ...shown, ...more, ""];
}

function comparisonSection(comparison: BaselineComparison): readonly string[] {
	const { newViolations, existingViolations, fixedEntries } = comparison;
	const lines = ["### Baseline Comparison", "", formatNetChange(netChange(comparison)), ""];
	if (newViolations.length > 0) {
		lines.push(
			`#### ⚠️ New Violations (${newViolations.length})`,
			"",
			...newViolations.map((violation) => formatViolationItem(violation)),
			"",
		);
	}
	lines.push(...fixedLines(fixedEntries));
	if (existingViolations.length > 0) {
		lines.push(
			"<details>",
			`<summary>Existing Violations (${existingViolations.length})</summary>`,
			"",
			...existingViolations
				.slice(0, EXISTING_LIMIT)
				.map((violation) => formatViolationItem(violation, true)),
			...(existingViolations.length > EXISTING_LIMIT
				? ["", `*...and ${existingViolations.length - EXISTING_LIMIT} more*`]
				: []),
			"",
			"</details>",
			"",
		);
	}
	return lines;
}

function violationsSection(violations: readonly CIViolation[]): readonly string[] {
	const byFile = groupViolations(violations, (violation) => violation.file);
	const collapse = byFile.size > COLLAPSE_FILES_ABOVE;
	const lines = ["### All Violations", ""];
	if (collapse) {
		lines.push(
			"<details>",
			`<summary>View all ${violations.length} violations in ${byFile.size} files</summary>`,
			"",
		);
	}
	for (const file of [...byFile.keys()].sort()) {
		const inFile = byFile.get(file) ?? [];
		lines.push(`**\`${file}\`** (${inFile.length} violations)`, "");
		lines.push(...inFile.map((violation) => formatViolationItem(violation)), "");
	}
	if (collapse) lines.push("</details>", "");
	return lines;
}

function footer(result: CIResult): readonly string[] {
	const lines = ["---", `*Generated at ${result.finishedAt.slice(0, 19).replace("T", " ")} UTC*`];
	if (result.commitSha !== undefined) lines.push(`*Commit: \`${result.commitSha.slice(0, 8)}\`*`);
	if (result.errors.length > 0) {
		lines.push("", "⚠️ **Runtime Errors:**", ...result.errors.map((error) => `- ${error}`));
	}
	return lines;
}

/**
 * @pure true
 */
export function renderMarkdown(result: CIResult, title: string = DEFAULT_MARKDOWN_TITLE): string {
	const status = result.exitCode === 0 ? "✅" : "❌";
	return [
		`## ${status} ${title}`,
		"",
		...summaryTable(result),
		...(result.comparison === undefined ? [] : comparisonSection(result.comparison)),
		...(result.violations.length === 0 ? [] : violationsSection(result.violations)),
		...footer(result),
		"",
	].join("\n");
}
