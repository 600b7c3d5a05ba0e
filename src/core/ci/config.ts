// CHANGE: CI runner configuration model, defaults, presets and file-shape conversion
// WHY: Gating policy knobs must be plain data so exit-code decisions stay pure
// PURITY: CORE
// INVARIANT: ciConfigFromRecord(ciConfigToRecord(c)) = right(c)
// COMPLEXITY: O(k) where k = number of configured keys

import { Either } from "effect";

import { ConfigError } from "../errors.js";
import { type CheckSeverity, type CIMode, isCIMode, toCheckSeverity } from "../models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readBoolean,
	readNumber,
	readObject,
	readString,
	readStringList,
} from "../types/json.js";

export interface OutputTarget {
	readonly enabled: boolean;
	readonly path: string;
}

export interface CIConfig {
	readonly mode: CIMode;
	readonly parallel: { readonly enabled: boolean; readonly maxWorkers: number };
	readonly failOnNewErrors: boolean;
	readonly failOnNewWarnings: boolean;
	readonly totalErrorsThreshold: number | null;
	readonly ratchetEnabled: boolean;
	readonly minSeverity: CheckSeverity;
	readonly baselinePath: string;
	readonly outputs: {
		readonly sarif: OutputTarget;
		readonly junit: OutputTarget;
		readonly markdown: OutputTarget;
	};
	readonly cache: { readonly enabled: boolean; readonly dir: string; readonly ttlHours: number };
	readonly incrementalPaths: readonly string[] | null;
	readonly baseRef: string | null;
	readonly headRef: string | null;
	readonly language: string | null;
	readonly repoType: string | null;
}

export const DEFAULT_CI_CONFIG: CIConfig = {
	mode: "full",
	parallel: { enabled: true, maxWorkers: 4 },
	failOnNewErrors: true,
	failOnNewWarnings: false,
	totalErrorsThreshold: null,
	ratchetEnabled: false,
	minSeverity: "error",
	baselinePath: ".conformance/baseline.json",
	outputs: {
		sarif: { enabled: true, path: "conformance.sarif" },
		junit: { enabled: false, path: "conformance-junit.xml" },
		markdown: { enabled: false, path: "conformance-summary.md" },
	},
	cache: { enabled: true, dir: ".conformance/cache", ttlHours: 24 },
	incrementalPaths: null,
	baseRef: null,
	headRef: null,
	language: null,
	repoType: null,
};

function readOutput(raw: JSONObject | undefined, key: string, fallback: OutputTarget): OutputTarget {
	const target = raw === undefined ? undefined : readObject(raw, key);
	if (target === undefined) return fallback;
	return {
		enabled: readBoolean(target, "enabled") ?? fallback.enabled,
		path: readString(target, "path") ?? fallback.path,
	};
}

function readNullableString(raw: JSONObject, key: string, fallback: string | null): string | null {
	if (raw[key] === null) return null;
	return readString(raw, key) ?? fallback;
}

/**
 * Build a CIConfig from the snake_case file shape, starting from `base`.
 *
 * @pure true
 * @postcondition left(ConfigError) for an unknown mode or maxWorkers < 1
 */
export function ciConfigFromRecord(
	doc: JSONValue,
	sourcePath: string,
	base: CIConfig = DEFAULT_CI_CONFIG,
): Either.Either<CIConfig, ConfigError> {
	if (doc === null) return Either.right(base);
	if (!isJSONObject(doc)) {
		return Either.left(new ConfigError({ path: sourcePath, detail: "CI config must be a mapping" }));
	}

	const mode = readString(doc, "mode") ?? base.mode;
	if (!isCIMode(mode)) {
		return Either.left(new ConfigError({ path: sourcePath, detail: `unknown mode '${mode}'` }));
	}

	const parallel = readObject(doc, "parallel");
	const maxWorkers =
		(parallel === undefined ? undefined : readNumber(parallel, "max_workers")) ??
		base.parallel.maxWorkers;
	if (maxWorkers < 1) {
		return Either.left(new ConfigError({ path: sourcePath, detail: "parallel.max_workers must be ≥ 1" }));
	}

	const outputs = readObject(doc, "outputs");
	const cache = readObject(doc, "cache");
	const threshold = doc["total_errors_threshold"];

	return Either.right({
		mode,
		parallel: {
			enabled: (parallel === undefined ? undefined : readBoolean(parallel, "enabled")) ?? base.parallel.enabled,
			maxWorkers: Math.floor(maxWorkers),
		},
		failOnNewErrors: readBoolean(doc, "fail_on_new_errors") ?? base.failOnNewErrors,
		failOnNewWarnings: readBoolean(doc, "fail_on_new_warnings") ?? base.failOnNewWarnings,
		totalErrorsThreshold:
			threshold === null ? null : (readNumber(doc, "total_errors_threshold") ?? base.totalErrorsThreshold),
		ratchetEnabled: readBoolean(doc, "ratchet") ?? readBoolean(doc, "ratchet_enabled") ?? base.ratchetEnabled,
		minSeverity: toCheckSeverity(readString(doc, "min_severity"), base.minSeverity),
		baselinePath: readString(doc, "baseline_path") ?? base.baselinePath,
		outputs: {
			sarif: readOutput(outputs, "sarif", base.outputs.sarif),
			junit: readOutput(outputs, "junit", base.outputs.junit),
			markdown: readOutput(outputs, "markdown", base.outputs.markdown),
		},
		cache: {
			enabled: (cache === undefined ? undefined : readBoolean(cache, "enabled")) ?? base.cache.enabled,
			dir: (cache === undefined ? undefined : readString(cache, "dir")) ?? base.cache.dir,
			ttlHours: (cache === undefined ? undefined : readNumber(cache, "ttl_hours")) ?? base.cache.ttlHours,
		},
		incrementalPaths: isJSONArray(doc["incremental_paths"])
			? readStringList(doc, "incremental_paths")
			: base.incrementalPaths,
		baseRef: readNullableString(doc, "base_ref", base.baseRef),
		headRef: readNullableString(doc, "head_ref", base.headRef),
		language: readNullableString(doc, "language", base.language),
		repoType: readNullableString(doc, "repo_type", base.repoType),
	});
}

/**
 * @pure true
 */
export function ciConfigToRecord(config: CIConfig): JSONObject {
	const output = (target: OutputTarget): JSONObject => ({ enabled: target.enabled, path: target.path });
	return {
		mode: config.mode,
		parallel: { enabled: config.parallel.enabled, max_workers: config.parallel.maxWorkers },
		fail_on_new_errors: config.failOnNewErrors,
		fail_on_new_warnings: config.failOnNewWarnings,
		total_errors_threshold: config.totalErrorsThreshold,
		ratchet: config.ratchetEnabled,
		min_severity: config.minSeverity,
		baseline_path: config.baselinePath,
		outputs: {
			sarif: output(config.outputs.sarif),
			junit: output(config.outputs.junit),
			markdown: output(config.outputs.markdown),
		},
		cache: { enabled: config.cache.enabled, dir: config.cache.dir, ttl_hours: config.cache.ttlHours },
		incremental_paths: config.incrementalPaths === null ? null : [...config.incrementalPaths],
		base_ref: config.baseRef,
		head_ref: config.headRef,
		language: config.language,
		repo_type: config.repoType,
	};
}

/**
 * Pull-request gating with SARIF for code scanning and a Markdown job summary.
 *
 * @pure true
 */
export function forGitHubActions(base: CIConfig = DEFAULT_CI_CONFIG): CIConfig {
	return {
		...base,
		mode: "pr",
		outputs: {
			...base.outputs,
			sarif: { ...base.outputs.sarif, enabled: true },
			markdown: { ...base.outputs.markdown, enabled: true },
		},
	};
}

/**
 * Pull-request gating with a JUnit report for the test results tab.
 *
 * @pure true
 */
export function forAzureDevOps(base: CIConfig = DEFAULT_CI_CONFIG): CIConfig {
	return {
		...base,
		mode: "pr",
		outputs: { ...base.outputs, junit: { ...base.outputs.junit, enabled: true } },
	};
}

/**
 * Overlay CONFORMANCE_MODE, CONFORMANCE_BASE_REF and CONFORMANCE_HEAD_REF.
 * An unknown mode value is ignored.
 *
 * @pure true
 */
export function applyEnvironment(
	config: CIConfig,
	env: Readonly<Record<string, string | undefined>>,
): CIConfig {
	const mode = env["CONFORMANCE_MODE"];
	const baseRef = env["CONFORMANCE_BASE_REF"];
	const headRef = env["CONFORMANCE_HEAD_REF"];
	return {
		...config,
		...(mode !== undefined && isCIMode(mode) ? { mode } : {}),
		...(baseRef === undefined || baseRef.length === 0 ? {} : { baseRef }),
		...(headRef === undefined || headRef.length === 0 ? {} : { headRef }),
	};
}
