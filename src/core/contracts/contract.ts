// CHANGE: Contract and check-definition model with pure document parsing
// WHY: Registry IO stays in SHELL; turning a YAML document into a Contract is deterministic data work
// PURITY: CORE
// INVARIANT: parseContractDocument never throws; malformed input becomes Either.left(ConfigError)
// COMPLEXITY: O(c) where c = number of checks in the document

import { Either } from "effect";

import { ConfigError } from "../errors.js";
import { type CheckSeverity, toCheckSeverity } from "../models.js";
import {
	isJSONArray,
	isJSONObject,
	type JSONObject,
	type JSONValue,
	readBoolean,
	readObject,
	readString,
	readStringList,
} from "../types/json.js";

/**
 * Check types with a built-in handler.
 */
export const BUILTIN_CHECK_TYPES = [
	"pattern",
	"command",
	"file-exists",
	"structural-metric",
	"custom",
	"nested-contract",
	"layer-import",
	"constructor-injection",
	"domain-purity",
	"circular-import",
] as const;

export type BuiltinCheckType = (typeof BUILTIN_CHECK_TYPES)[number];

const CHECK_TYPE_ALIASES: Readonly<Record<string, BuiltinCheckType>> = {
	regex: "pattern",
	file_exists: "file-exists",
	ast_check: "structural-metric",
	structural_metric: "structural-metric",
	contracts: "nested-contract",
	nested_contract: "nested-contract",
	layer_import: "layer-import",
	layer_imports: "layer-import",
	constructor_injection: "constructor-injection",
	domain_purity: "domain-purity",
	circular_import: "circular-import",
	circular_imports: "circular-import",
};

/**
 * Map legacy spellings onto the canonical type name; unknown names pass through.
 *
 * @pure true
 */
export function normalizeCheckType(type: string): string {
	return Object.hasOwn(CHECK_TYPE_ALIASES, type) ? (CHECK_TYPE_ALIASES[type] ?? type) : type;
}

export interface CheckScope {
	readonly paths: readonly string[];
	readonly excludePaths: readonly string[];
}

/**
 * A single rule definition belonging to a contract.
 */
export interface CheckDefinition {
	readonly id: string;
	readonly name: string;
	readonly type: string;
	readonly severity: CheckSeverity;
	readonly appliesTo: CheckScope;
	readonly enabled: boolean;
	readonly config: JSONObject;
	readonly fixHint?: string;
}

export type ContractTier = "builtin" | "global" | "workspace" | "repo";

export interface ContractFilters {
	/** undefined means "any language" */
	readonly languages?: readonly string[];
	readonly repoTypes?: readonly string[];
}

export interface Contract {
	readonly name: string;
	readonly type: string;
	readonly description?: string;
	readonly version: string;
	readonly enabled: boolean;
	readonly extends: readonly string[];
	readonly appliesTo: ContractFilters;
	readonly tags: readonly string[];
	readonly checks: readonly CheckDefinition[];
	readonly tier: ContractTier;
	readonly sourcePath: string;
}

/**
 * A contract together with its own and inherited checks.
 *
 * @invariant check ids in allChecks are unique
 */
export interface ResolvedContract extends Contract {
	readonly allChecks: readonly CheckDefinition[];
}

const CHECK_KEYS = new Set([
	"id",
	"name",
	"type",
	"severity",
	"enabled",
	"applies_to",
	"fix_hint",
	"config",
	"description",
]);

/**
 * Abstract contracts are a naming convention: the name starts with `_`.
 *
 * @pure true
 */
export function isAbstractContract(name: string): boolean {
	return name.startsWith("_");
}

/**
 * Strip the optional `workspace:` prefix of an `extends` reference.
 *
 * @pure true
 */
export function parentName(reference: string): string {
	return reference.startsWith("workspace:")
		? reference.slice("workspace:".length)
		: reference;
}

/**
 * Type-specific fields may sit directly on the check or under `config`;
 * `config` wins on conflicts.
 */
function collectCheckConfig(raw: JSONObject): JSONObject {
	const merged: Record<string, JSONValue> = {};
	for (const [key, value] of Object.entries(raw)) {
		if (!CHECK_KEYS.has(key)) merged[key] = value;
	}
	const nested = readObject(raw, "config");
	if (nested !== undefined) {
		for (const [key, value] of Object.entries(nested)) merged[key] = value;
	}
	return merged;
}

function parseCheck(
	raw: JSONValue,
	index: number,
	sourcePath: string,
): Either.Either<CheckDefinition, ConfigError> {
	if (!isJSONObject(raw)) {
		return Either.left(
			new ConfigError({
				path: sourcePath,
				detail: `checks[${index}] must be a mapping`,
			}),
		);
	}
	const id = readString(raw, "id");
	const type = readString(raw, "type");
	if (id === undefined || type === undefined) {
		return Either.left(
			new ConfigError({
				path: sourcePath,
				detail: `checks[${index}] requires 'id' and 'type'`,
			}),
		);
	}
	const scope = readObject(raw, "applies_to") ?? {};
	const paths = readStringList(scope, "paths");
	const fixHint = readString(raw, "fix_hint");
	return Either.right({
		id,
		name: readString(raw, "name") ?? id,
		type: normalizeCheckType(type),
		severity: toCheckSeverity(readString(raw, "severity")),
		appliesTo: {
			paths: paths.length > 0 ? paths : ["**/*"],
			excludePaths: readStringList(scope, "exclude_paths"),
		},
		enabled: readBoolean(raw, "enabled") ?? true,
		config: collectCheckConfig(raw),
		...(fixHint === undefined ? {} : { fixHint }),
	});
}

function parseFilters(raw: JSONObject | undefined): ContractFilters {
	if (raw === undefined) return {};
	const languages = raw["languages"];
	const repoTypes = raw["repo_types"];
	return {
		...(languages === undefined ? {} : { languages: readStringList(raw, "languages") }),
		...(repoTypes === undefined ? {} : { repoTypes: readStringList(raw, "repo_types") }),
	};
}

/**
 * Parse a `*.contract.yaml` document.
 *
 * @returns right(null) when the document has no `contract` section,
 *          right(contract) when valid, left(ConfigError) otherwise
 * @pure true
 * @complexity O(c)
 */
export function parseContractDocument(
	doc: JSONValue,
	tier: ContractTier,
	sourcePath: string,
): Either.Either<Contract | null, ConfigError> {
	if (!isJSONObject(doc)) return Either.right(null);
	const header = readObject(doc, "contract");
	if (header === undefined) return Either.right(null);

	const name = readString(header, "name");
	const type = readString(header, "type");
	if (name === undefined || type === undefined) {
		return Either.left(
			new ConfigError({
				path: sourcePath,
				detail: "contract requires 'name' and 'type'",
			}),
		);
	}

	const rawChecks = doc["checks"];
	const checkList = isJSONArray(rawChecks) ? rawChecks : [];
	const checks: CheckDefinition[] = [];
	for (const [index, rawCheck] of checkList.entries()) {
		const parsed = parseCheck(rawCheck, index, sourcePath);
		if (Either.isLeft(parsed)) return Either.left(parsed.left);
		checks.push(parsed.right);
	}

	const description = readString(header, "description");
	return Either.right({
		name,
		type,
		...(description === undefined ? {} : { description }),
		version: readString(header, "version") ?? "1.0.0",
		enabled: readBoolean(header, "enabled") ?? true,
		extends: readStringList(header, "extends"),
		appliesTo: parseFilters(readObject(header, "applies_to")),
		tags: readStringList(header, "tags"),
		checks,
		tier,
		sourcePath,
	});
}

/**
 * Whether a contract's language/repo-type filters admit the given values.
 * An absent filter list or an absent query value admits everything.
 *
 * @pure true
 */
export function contractApplies(
	contract: Contract,
	language?: string,
	repoType?: string,
): boolean {
	const { languages, repoTypes } = contract.appliesTo;
	if (language !== undefined && languages !== undefined && !languages.includes(language)) {
		return false;
	}
	if (repoType !== undefined && repoTypes !== undefined && !repoTypes.includes(repoType)) {
		return false;
	}
	return true;
}
