// CHANGE: SARIF 2.1.0 type definitions for the emitted CI report
// WHY: The report writer and the result projection share one shape
// SOURCE: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html

export type SarifLevel = "error" | "warning" | "note" | "none";

export interface SarifRegion {
	readonly startLine: number;
	readonly startColumn?: number;
	readonly endLine?: number;
	readonly endColumn?: number;
}

/**
 * Location in SARIF form.
 *
 * @property physicalLocation Physical location inside the repository
 */
export interface SarifLocation {
	readonly physicalLocation: {
		readonly artifactLocation: {
			readonly uri: string;
			readonly uriBaseId?: string;
		};
		readonly region?: SarifRegion;
	};
}

export interface SarifResult {
	readonly ruleId: string;
	readonly level: SarifLevel;
	readonly message: { readonly text: string };
	readonly locations: ReadonlyArray<SarifLocation>;
	readonly partialFingerprints: { readonly primaryLocationLineHash: string };
	readonly fixes?: ReadonlyArray<{ readonly description: { readonly text: string } }>;
}

export interface SarifRule {
	readonly id: string;
	readonly shortDescription: { readonly text: string };
	readonly defaultConfiguration: { readonly level: SarifLevel };
	readonly help?: { readonly text: string };
}

export interface SarifRun {
	readonly tool: {
		readonly driver: {
			readonly name: string;
			readonly version: string;
			readonly informationUri?: string;
			readonly rules: ReadonlyArray<SarifRule>;
		};
	};
	readonly results: ReadonlyArray<SarifResult>;
	readonly invocations: ReadonlyArray<{
		readonly executionSuccessful: boolean;
		readonly startTimeUtc: string;
		readonly endTimeUtc: string;
	}>;
	readonly versionControlProvenance?: ReadonlyArray<{
		readonly repositoryUri: string;
		readonly revisionId: string;
	}>;
}

/**
 * SARIF log.
 *
 * @property runs One run per CI invocation
 */
export interface SarifReport {
	readonly $schema: string;
	readonly version: "2.1.0";
	readonly runs: ReadonlyArray<SarifRun>;
}
