// CHANGE: Typed error ADT for the conformance engine using Effect.Data
// WHY: Failures travel as values in Effect signatures and are downgraded at the narrowest scope
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Malformed contract, exemption or CI configuration file.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Fault raised inside a single check handler.
 *
 * @pure true (Data class)
 * @invariant checkId.length > 0
 */
export class CheckExecutionError extends Data.TaggedError(
	"CheckExecutionError",
)<{
	readonly checkId: string;
	readonly detail: string;
}> {}

/**
 * Check definition whose type has no registered handler.
 *
 * @pure true (Data class)
 */
export class UnknownCheckType extends Data.TaggedError("UnknownCheckType")<{
	readonly checkId: string;
	readonly type: string;
}> {}

/**
 * Baseline required but missing or unreadable.
 *
 * @pure true (Data class)
 */
export class BaselineError extends Data.TaggedError("BaselineError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Any other fault reaching the CI runner boundary.
 *
 * @pure true (Data class)
 */
export class RuntimeError extends Data.TaggedError("RuntimeError")<{
	readonly detail: string;
}> {}

/**
 * Filesystem fault inside the violation/exemption/history stores.
 *
 * @pure true (Data class)
 */
export class StoreError extends Data.TaggedError("StoreError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Subprocess execution error.
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * git invocation failed or returned unusable output.
 *
 * @pure true (Data class)
 */
export class GitError extends Data.TaggedError("GitError")<{
	readonly detail: string;
}> {}

/**
 * Union of all application errors for Effect signatures.
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ConfigError
	| CheckExecutionError
	| UnknownCheckType
	| BaselineError
	| RuntimeError
	| StoreError
	| ExecError
	| GitError;

/**
 * Render any error value as a single line of text.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeError(error: AppError): string {
	switch (error._tag) {
		case "ConfigError":
		case "StoreError":
			return `${error.path}: ${error.detail}`;
		case "UnknownCheckType":
			return `Unknown check type: ${error.type}`;
		case "Exec":
			return `${error.command}: ${error.detail}`;
		case "CheckExecutionError":
		case "BaselineError":
		case "RuntimeError":
		case "GitError":
			return error.detail;
	}
}

/**
 * Text of a thrown value of unknown shape.
 *
 * @pure true
 */
export function messageOf(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
