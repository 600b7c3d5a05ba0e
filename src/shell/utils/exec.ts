// CHANGE: Subprocess helpers for git queries and command checks
// WHY: One execAsync + Effect pattern for every external command
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError> | Effect<CommandOutcome, ExecError>
// INVARIANT: ∀ command: execCommand(command) → stdout ∨ ExecError
// COMPLEXITY: O(1) time, O(n) space where n = output length

import { Effect } from "effect";

import { ExecError, messageOf } from "../../core/errors.js";
import { exec, execFile, promisify } from "./node-mods.js";

const execAsync = promisify(exec);

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Extract stdout from error object if available.
 *
 * @pure true
 * @complexity O(1)
 */
function extractStdoutFromError(error: unknown): string {
	if (
		typeof error === "object" &&
		error !== null &&
		"stdout" in error &&
		typeof error.stdout === "string"
	) {
		return error.stdout;
	}
	return "";
}

/**
 * Execute a shell command; a non-zero exit with stdout still yields the stdout.
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 * @invariant command.length > 0 → (stdout ∨ ExecError)
 */
export function execCommand(
	command: string,
	options?: { readonly cwd?: string; readonly maxBuffer?: number },
): Effect.Effect<string, ExecError> {
	return Effect.tryPromise({
		try: () => execAsync(command, { maxBuffer: MAX_BUFFER, ...options }),
		catch: (error) => error,
	}).pipe(
		Effect.map(({ stdout }) => String(stdout)),
		Effect.catchAll((error) => {
			const out = extractStdoutFromError(error);
			if (out) {
				return Effect.succeed(out);
			}
			return Effect.fail(new ExecError({ command, detail: messageOf(error) }));
		}),
	);
}

/**
 * Outcome of a command run without a shell.
 */
export interface CommandOutcome {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
	readonly timedOut: boolean;
	readonly notFound: boolean;
}

export interface RunCommandOptions {
	readonly cwd: string;
	readonly timeoutMs: number;
}

/**
 * Run `file args…` and report its exit code instead of failing on non-zero.
 * A missing executable reports exit 127; a timeout kills the child and sets timedOut.
 *
 * @pure false (spawns a process)
 * @effect Effect<CommandOutcome, ExecError, never>
 * @postcondition notFound ⇒ exitCode = 127
 */
export function runCommand(
	file: string,
	args: readonly string[],
	options: RunCommandOptions,
): Effect.Effect<CommandOutcome, ExecError> {
	return Effect.async<CommandOutcome, ExecError>((resume) => {
		execFile(
			file,
			[...args],
			{ cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: "utf8" },
			(error, stdout, stderr) => {
				if (error === null) {
					resume(Effect.succeed({ exitCode: 0, stdout, stderr, timedOut: false, notFound: false }));
					return;
				}
				const code: unknown = error.code;
				if (code === "ENOENT") {
					resume(Effect.succeed({ exitCode: 127, stdout, stderr, timedOut: false, notFound: true }));
					return;
				}
				if (error.killed === true && typeof error.signal === "string") {
					resume(Effect.succeed({ exitCode: -1, stdout, stderr, timedOut: true, notFound: false }));
					return;
				}
				if (typeof code === "number") {
					resume(Effect.succeed({ exitCode: code, stdout, stderr, timedOut: false, notFound: false }));
					return;
				}
				resume(Effect.fail(new ExecError({ command: file, detail: messageOf(error) })));
			},
		);
	});
}
