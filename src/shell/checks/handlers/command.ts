// CHANGE: Run an external command and judge it by exit code and output indicators
// PURITY: SHELL (spawns a process)
// EFFECT: Effect<readonly CheckResult[], CheckExecutionError>
// INVARIANT: A timeout or a missing executable affects only this check
// COMPLEXITY: O(n) over the command output

import { Effect, Either } from "effect";

import type { CheckDefinition } from "../../../core/contracts/contract.js";
import { CheckExecutionError, messageOf } from "../../../core/errors.js";
import type { CheckResult } from "../../../core/models.js";
import {
	type JSONObject,
	readNumber,
	readObject,
	readString,
	readStringList,
} from "../../../core/types/json.js";
import { type CommandOutcome, runCommand } from "../../utils/exec.js";
import { path } from "../../utils/node-mods.js";
import { failure, faultResult } from "../results.js";
import type { CheckContext, CheckHandler } from "../types.js";

const DEFAULT_TIMEOUT_SECONDS = 60;
const OUTPUT_LIMIT = 500;

/**
 * Exit code match, flipped by failure indicators on success and by success indicators on failure.
 *
 * @pure true
 */
export function judgeOutcome(outcome: CommandOutcome, config: JSONObject): boolean {
	const output = `${outcome.stdout}\n${outcome.stderr}`;
	const expected = readNumber(config, "expected_exit_code") ?? 0;
	const passed = outcome.exitCode === expected;
	if (passed) {
		return !readStringList(config, "failure_indicators").some((marker) => output.includes(marker));
	}
	return readStringList(config, "success_indicators").some((marker) => output.includes(marker));
}

/**
 * One finding per `error_parser.pattern` match; named groups supply the location.
 *
 * @pure true
 */
export function parseCommandErrors(
	check: CheckDefinition,
	context: Pick<CheckContext, "contract">,
	output: string,
	source: string,
): Either.Either<readonly CheckResult[], string> {
	return Either.map(
		Either.try({
			try: () => new RegExp(source, "gm"),
			catch: (error) => `Invalid error_parser pattern '${source}': ${messageOf(error)}`,
		}),
		(regex) =>
			[...output.matchAll(regex)].map((found) => {
				const groups = found.groups ?? {};
				const line = groups["line"] === undefined ? undefined : Number.parseInt(groups["line"], 10);
				const column =
					groups["column"] === undefined ? undefined : Number.parseInt(groups["column"], 10);
				const file = groups["file"];
				const rule = groups["rule"];
				return failure(check, context, (groups["message"] ?? found[0]).trim(), {
					...(file === undefined ? {} : { file }),
					...(line === undefined || Number.isNaN(line) ? {} : { line }),
					...(column === undefined || Number.isNaN(column) ? {} : { column }),
					...(rule === undefined ? {} : { ruleId: rule }),
				});
			}),
	);
}

export const commandHandler: CheckHandler = {
	type: "command",
	execute: (check: CheckDefinition, context: CheckContext) =>
		Effect.gen(function* () {
			const { config } = check;
			const command = readString(config, "command");
			if (command === undefined || command.length === 0) {
				return [faultResult(check, context, "Command check missing 'command' in config")];
			}
			const timeout = readNumber(config, "timeout") ?? DEFAULT_TIMEOUT_SECONDS;
			const workingDir = readString(config, "working_dir");
			const outcome = yield* runCommand(command, readStringList(config, "args"), {
				cwd: workingDir === undefined ? context.repoRoot : path.join(context.repoRoot, workingDir),
				timeoutMs: timeout * 1000,
			}).pipe(
				Effect.mapError(
					(error) => new CheckExecutionError({ checkId: check.id, detail: error.detail }),
				),
			);

			if (outcome.timedOut) return [faultResult(check, context, `Command timed out after ${timeout}s`)];
			if (outcome.notFound) return [faultResult(check, context, `Command not found: ${command}`)];
			if (judgeOutcome(outcome, config)) return [];

			const output = (outcome.stderr.trim() || outcome.stdout.trim()).slice(0, OUTPUT_LIMIT);
			const parser = readObject(config, "error_parser");
			const parserPattern = parser === undefined ? undefined : readString(parser, "pattern");
			if (parserPattern !== undefined) {
				const parsed = parseCommandErrors(
					check,
					context,
					`${outcome.stdout}\n${outcome.stderr}`,
					parserPattern,
				);
				if (Either.isLeft(parsed)) return [faultResult(check, context, parsed.left)];
				if (parsed.right.length > 0) return parsed.right;
			}
			return [
				failure(check, context, `Command failed with exit code ${outcome.exitCode}: ${output}`),
			];
		}),
};
