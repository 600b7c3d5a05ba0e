// CHANGE: Pure architecture rules over source outlines
// WHY: Layer boundaries, constructor injection and domain purity are decidable from imports, calls and constructors
// PURITY: CORE
// INVARIANT: Findings depend only on (file, outline, policy, knownFiles)
// COMPLEXITY: O(i + c) per file where i = imports, c = calls

import { matchesAnyGlob, matchesGlob } from "../glob.js";
import type { SourceOutline } from "../metrics/outline.js";
import { resolveImport } from "./imports.js";

export interface ArchitectureFinding {
	readonly file: string;
	readonly line: number;
	readonly message: string;
	readonly fixHint: string;
}

// ─── layers ──────────────────────────────────────────────────────────────────

export interface LayerRule {
	readonly forbidden: readonly string[];
	readonly message?: string;
}

export interface LayerPolicy {
	/** Glob → layer, first match wins. */
	readonly detection: ReadonlyArray<readonly [string, string]>;
	readonly rules: Readonly<Record<string, LayerRule>>;
}

const LAYER_HINT = "Fix layer dependency violation by using dependency injection";

/**
 * @pure true
 */
export function detectLayer(
	file: string,
	detection: LayerPolicy["detection"],
): string | undefined {
	return detection.find(([glob]) => matchesGlob(glob, file))?.[1];
}

/**
 * Imports of `file` that land in a layer its own layer may not depend on.
 *
 * @pure true
 */
export function findLayerViolations(
	file: string,
	outline: SourceOutline,
	policy: LayerPolicy,
	knownFiles: ReadonlySet<string>,
): readonly ArchitectureFinding[] {
	const source = detectLayer(file, policy.detection);
	if (source === undefined || !Object.hasOwn(policy.rules, source)) return [];
	const rule = policy.rules[source];
	if (rule === undefined) return [];

	const findings: ArchitectureFinding[] = [];
	for (const entry of outline.imports) {
		const target = resolveImport(file, entry, outline.language, knownFiles);
		if (target === undefined) continue;
		const targetLayer = detectLayer(target, policy.detection);
		if (targetLayer !== undefined && rule.forbidden.includes(targetLayer)) {
			findings.push({
				file,
				line: entry.line,
				message: `${source} layer imports from ${targetLayer}: ${entry.module}`,
				fixHint: rule.message ?? LAYER_HINT,
			});
		}
	}
	return findings;
}

// ─── constructor injection ───────────────────────────────────────────────────

export interface InjectionPolicy {
	readonly classPatterns: readonly string[];
	readonly forbiddenInstantiations: readonly string[];
	readonly checkForInitParams: boolean;
}

/**
 * Classes matching the policy must receive dependencies through their constructor.
 *
 * @pure true
 */
export function findInjectionViolations(
	file: string,
	outline: SourceOutline,
	policy: InjectionPolicy,
): readonly ArchitectureFinding[] {
	const ctorName = outline.language === "python" ? "__init__" : "constructor";
	const forbidden = policy.forbiddenInstantiations.map((pattern) => pattern.replace(/\($/u, ""));
	const findings: ArchitectureFinding[] = [];

	for (const cls of outline.classes) {
		if (!matchesAnyGlob(policy.classPatterns, cls.name)) continue;
		const ctor = cls.constructorInfo;
		if (policy.checkForInitParams) {
			if (ctor === null) {
				findings.push({
					file,
					line: cls.line,
					message: `Class '${cls.name}' has no constructor`,
					fixHint: `Add a ${ctorName} that takes its dependencies as parameters`,
				});
			} else if (ctor.params.length === 0) {
				findings.push({
					file,
					line: cls.line,
					message: `Class '${cls.name}' has no injected dependencies`,
					fixHint: `Add dependencies as ${ctorName} parameters`,
				});
			}
		}
		for (const created of ctor?.instantiations ?? []) {
			const shortName = created.typeName.split(".").pop() ?? created.typeName;
			const hit = forbidden.some(
				(pattern) => matchesGlob(pattern, created.typeName) || matchesGlob(pattern, shortName),
			);
			if (hit) {
				findings.push({
					file,
					line: created.line,
					message: `Direct instantiation of '${created.typeName}' in ${cls.name}.${ctorName}`,
					fixHint: "Inject this dependency through constructor parameters",
				});
			}
		}
	}
	return findings;
}

// ─── domain purity ───────────────────────────────────────────────────────────

export interface PurityPolicy {
	readonly forbiddenImports: readonly string[];
	readonly forbiddenCalls: readonly string[];
}

const PURITY_HINT = "Move I/O operations to infrastructure layer; domain should be pure";

/**
 * Exact module, or a submodule through "/" or ".".
 *
 * @pure true
 */
export function isForbiddenImport(module: string, forbidden: readonly string[]): boolean {
	return forbidden.some(
		(name) => module === name || module.startsWith(`${name}/`) || module.startsWith(`${name}.`),
	);
}

/**
 * Call patterns:
 * - "open(" matches the callee `open` or any `x.open`
 * - "shutil." matches callees under that owner
 * - "Path.read" matches callees starting with it
 *
 * @pure true
 */
export function matchesForbiddenCall(callee: string, pattern: string): boolean {
	if (pattern.endsWith("(")) {
		const name = pattern.slice(0, -1);
		return callee === name || callee.endsWith(`.${name}`);
	}
	return callee.startsWith(pattern);
}

/**
 * @pure true
 */
export function findPurityViolations(
	file: string,
	outline: SourceOutline,
	policy: PurityPolicy,
): readonly ArchitectureFinding[] {
	const findings: ArchitectureFinding[] = [];
	for (const entry of outline.imports) {
		if (entry.typeOnly || !isForbiddenImport(entry.module, policy.forbiddenImports)) continue;
		findings.push({
			file,
			line: entry.line,
			message: `Domain layer imports I/O library: ${entry.module}`,
			fixHint: PURITY_HINT,
		});
	}
	for (const call of outline.calls) {
		if (!policy.forbiddenCalls.some((pattern) => matchesForbiddenCall(call.callee, pattern))) continue;
		findings.push({
			file,
			line: call.line,
			message: `Domain layer calls I/O function: ${call.callee}`,
			fixHint: PURITY_HINT,
		});
	}
	return findings;
}
