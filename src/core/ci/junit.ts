// CHANGE: JUnit XML for CI systems that render test reports
// PURITY: CORE
// FORMAT THEOREM: tests = max(1, |violations|) ∧ failures = |violations|
// COMPLEXITY: O(v)

import type { CIResult } from "./result.js";
import { durationSeconds } from "./result.js";
import { toJUnitTestcase } from "./violation.js";

/**
 * @pure true
 */
export function escapeXml(text: string): string {
	return text
		.replace(/&/gu, "&amp;")
		.replace(/</gu, "&lt;")
		.replace(/>/gu, "&gt;")
		.replace(/"/gu, "&quot;")
		.replace(/'/gu, "&apos;");
}

/**
 * @pure true
 */
export function renderJUnit(result: CIResult): string {
	const time = durationSeconds(result).toFixed(3);
	const cases =
		result.violations.length === 0
			? [`    <testcase name="conformance@all" classname="conformance" time="0"/>`]
			: result.violations.map((violation) => {
					const testcase = toJUnitTestcase(violation);
					return [
						`    <testcase name="${escapeXml(testcase.name)}" classname="${escapeXml(testcase.classname)}" time="0">`,
						`      <failure message="${escapeXml(testcase.failure.message)}" type="${testcase.failure.type}">${escapeXml(testcase.failure.text)}</failure>`,
						"    </testcase>",
					].join("\n");
				});
	const tests = Math.max(1, result.violations.length);
	return [
		`<?xml version="1.0" encoding="UTF-8"?>`,
		`<testsuites name="conformance" tests="${tests}" failures="${result.violations.length}" errors="${result.errors.length}" time="${time}">`,
		`  <testsuite name="conformance" tests="${tests}" failures="${result.violations.length}" errors="${result.errors.length}" time="${time}">`,
		...cases,
		"  </testsuite>",
		"</testsuites>",
		"",
	].join("\n");
}
