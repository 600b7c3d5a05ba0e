// CHANGE: JSON value model and type guards for YAML/JSON documents read from disk
// WHY: Contract, exemption, store and config files arrive as untyped data; guards narrow them without casts
// PURITY: CORE
// INVARIANT: ∀ v: toJSONValue(v) is structurally JSON-serialisable
// COMPLEXITY: O(n) where n = number of nodes in the document

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| JSONObject;

export interface JSONObject {
	readonly [key: string]: JSONValue;
}

/**
 * Type guard to check if value is a JSON object.
 */
export function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== null &&
		value !== undefined &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

export function isJSONArray(
	value: JSONValue | undefined,
): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * Convert a parsed document of unknown shape into a JSONValue.
 *
 * Dates become ISO strings (YYYY-MM-DD when they carry no time), functions
 * and symbols become null.
 *
 * @pure true
 * @complexity O(n)
 */
export function toJSONValue(raw: unknown): JSONValue {
	if (raw === null || raw === undefined) return null;
	if (
		typeof raw === "string" ||
		typeof raw === "number" ||
		typeof raw === "boolean"
	) {
		return raw;
	}
	if (raw instanceof Date) {
		const iso = raw.toISOString();
		return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
	}
	if (Array.isArray(raw)) {
		return raw.map((item: unknown) => toJSONValue(item));
	}
	if (typeof raw === "object") {
		return Object.fromEntries(
			Object.entries(raw).map(([key, value]): [string, JSONValue] => [key, toJSONValue(value)]),
		);
	}
	return null;
}

export function readString(obj: JSONObject, key: string): string | undefined {
	const value = obj[key];
	return typeof value === "string" ? value : undefined;
}

export function readNumber(obj: JSONObject, key: string): number | undefined {
	const value = obj[key];
	return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(obj: JSONObject, key: string): boolean | undefined {
	const value = obj[key];
	return typeof value === "boolean" ? value : undefined;
}

export function readObject(obj: JSONObject, key: string): JSONObject | undefined {
	const value = obj[key];
	return isJSONObject(value) ? value : undefined;
}

/**
 * Read a field that may be a single string or a list of strings.
 *
 * @postcondition non-string list items are dropped
 */
export function readStringList(obj: JSONObject, key: string): readonly string[] {
	const value = obj[key];
	if (typeof value === "string") return [value];
	if (isJSONArray(value)) {
		return value.filter((item): item is string => typeof item === "string");
	}
	return [];
}

/**
 * Read a string-to-string map, dropping non-string values.
 */
export function readStringRecord(
	obj: JSONObject,
	key: string,
): Readonly<Record<string, string>> {
	const value = readObject(obj, key);
	if (value === undefined) return {};
	return Object.fromEntries(
		Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === "string"),
	);
}

/**
 * Read a string-to-number map, dropping non-numeric values.
 * Keys stay own properties, `__proto__` included.
 */
export function readNumberRecord(
	obj: JSONObject,
	key: string,
): Readonly<Record<string, number>> {
	const value = readObject(obj, key);
	if (value === undefined) return {};
	return Object.fromEntries(
		Object.entries(value).filter((entry): entry is [string, number] => typeof entry[1] === "number"),
	);
}

/**
 * Occurrences of each key.
 *
 * @pure true
 */
export function countKeys(keys: Iterable<string>): Record<string, number> {
	const counts = new Map<string, number>();
	for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
	return Object.fromEntries(counts);
}
