// CHANGE: YAML document loading for contracts, exemptions and records
// PURITY: SHELL
// EFFECT: Effect<JSONValue | null, StoreError | ConfigError>
// INVARIANT: Parsed documents are converted to JSONValue before any field is read

import { Effect, Either } from "effect";
import { parse } from "yaml";

import { ConfigError, messageOf, type StoreError } from "../../core/errors.js";
import { type JSONValue, toJSONValue } from "../../core/types/json.js";
import { readTextIfExists } from "./files.js";

/**
 * @pure true
 */
export function parseYamlDocument(
	content: string,
	source: string,
): Either.Either<JSONValue, ConfigError> {
	return Either.try({
		try: () => toJSONValue(parse(content)),
		catch: (error) => new ConfigError({ path: source, detail: `invalid YAML: ${messageOf(error)}` }),
	});
}

/**
 * @postcondition missing file ⇒ null
 */
export function readYamlFile(
	file: string,
): Effect.Effect<JSONValue | null, StoreError | ConfigError> {
	return Effect.flatMap(
		readTextIfExists(file),
		(content): Effect.Effect<JSONValue | null, ConfigError> =>
			content === null ? Effect.succeed(null) : parseYamlDocument(content, file),
	);
}
