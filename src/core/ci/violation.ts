// CHANGE: CI-facing violation with its baseline fingerprint and report projections
// WHY: SARIF results and JUnit test cases are pure projections of one violation
// PURITY: CORE
// INVARIANT: hash(v) = baselineFingerprint(check, file, line, message)
// COMPLEXITY: O(|message|) per projection

import { baselineFingerprint } from "../fingerprint.js";
import type { CheckResult, CheckSeverity } from "../models.js";
import type { SarifLevel, SarifResult } from "../types/sarif.js";

export interface CIViolation {
	readonly checkId: string;
	readonly contract: string;
	/** Repo-relative path; empty for repository-level findings. */
	readonly file: string;
	readonly line?: number;
	readonly column?: number;
	readonly endLine?: number;
	readonly endColumn?: number;
	readonly message: string;
	readonly severity: CheckSeverity;
	readonly ruleId?: string;
	readonly fixHint?: string;
}

/**
 * @pure true
 */
export function ciViolationHash(violation: CIViolation): string {
	return baselineFingerprint({
		checkId: violation.checkId,
		file: violation.file,
		line: violation.line,
		message: violation.message,
	});
}

/**
 * @pure true
 */
export function toCIViolation(result: CheckResult): CIViolation {
	return {
		checkId: result.checkId,
		contract: result.contract,
		file: (result.file ?? "").replace(/\\/g, "/"),
		...(result.line === undefined ? {} : { line: result.line }),
		...(result.column === undefined ? {} : { column: result.column }),
		message: result.message,
		severity: result.severity,
		...(result.ruleId === undefined ? {} : { ruleId: result.ruleId }),
		...(result.fixHint === undefined ? {} : { fixHint: result.fixHint }),
	};
}

const SARIF_LEVEL: Readonly<Record<CheckSeverity, SarifLevel>> = {
	error: "error",
	warning: "warning",
	info: "note",
};

export function sarifLevel(severity: CheckSeverity): SarifLevel {
	return SARIF_LEVEL[severity];
}

/**
 * SARIF 2.1.0 result object; the region is present only when a line is known.
 *
 * @pure true
 */
export function toSarifResult(violation: CIViolation): SarifResult {
	const region =
		violation.line === undefined
			? undefined
			: {
					startLine: violation.line,
					...(violation.column === undefined ? {} : { startColumn: violation.column }),
					...(violation.endLine === undefined ? {} : { endLine: violation.endLine }),
					...(violation.endColumn === undefined ? {} : { endColumn: violation.endColumn }),
				};
	return {
		ruleId: violation.ruleId ?? violation.checkId,
		level: sarifLevel(violation.severity),
		message: { text: violation.message },
		locations:
			violation.file.length === 0
				? []
				: [
						{
							physicalLocation: {
								artifactLocation: { uri: violation.file, uriBaseId: "%SRCROOT%" },
								...(region === undefined ? {} : { region }),
							},
						},
					],
		partialFingerprints: { primaryLocationLineHash: ciViolationHash(violation) },
		...(violation.fixHint === undefined
			? {}
			: { fixes: [{ description: { text: violation.fixHint } }] }),
	};
}

export interface JUnitTestcase {
	readonly name: string;
	readonly classname: string;
	readonly failure: {
		readonly message: string;
		readonly type: CheckSeverity;
		readonly text: string;
	};
}

/**
 * JUnit test case: name `check@file[:line]`, classname = contract.
 *
 * @pure true
 */
export function toJUnitTestcase(violation: CIViolation): JUnitTestcase {
	const location = violation.file.length === 0 ? "repository" : violation.file;
	const name =
		violation.line === undefined
			? `${violation.checkId}@${location}`
			: `${violation.checkId}@${location}:${violation.line}`;
	const lineText = violation.line === undefined ? "" : `\nLine: ${violation.line}`;
	return {
		name,
		classname: violation.contract,
		failure: {
			message: violation.message,
			type: violation.severity,
			text: `File: ${location}${lineText}\n\n${violation.message}`,
		},
	};
}
