// CHANGE: Changed files and the current commit from git
// WHY: Incremental and PR runs only check what the branch touched
// PURITY: SHELL
// EFFECT: Effect<readonly string[], GitError>
// INVARIANT: Paths are repo-relative posix paths without duplicates

import { Effect } from "effect";

import { GitError } from "../../core/errors.js";
import { normalizePath } from "../../core/glob.js";
import { runCommand } from "../utils/exec.js";

const GIT_TIMEOUT_MS = 30_000;

export interface GitChanges {
	/** Files changed between base and head (`git diff --name-only base...head`). */
	readonly changedFiles: (
		baseRef: string,
		headRef: string,
	) => Effect.Effect<readonly string[], GitError>;
	/** Current HEAD commit, or null outside a repository. */
	readonly headSha: () => Effect.Effect<string | null>;
}

function git(repoRoot: string, args: readonly string[]): Effect.Effect<string, GitError> {
	return runCommand("git", args, { cwd: repoRoot, timeoutMs: GIT_TIMEOUT_MS }).pipe(
		Effect.mapError((error) => new GitError({ detail: error.detail })),
		Effect.flatMap((outcome): Effect.Effect<string, GitError> =>
			outcome.exitCode === 0
				? Effect.succeed(outcome.stdout)
				: Effect.fail(
						new GitError({
							detail: `git ${args.join(" ")} exited with ${outcome.exitCode}: ${outcome.stderr.trim()}`,
						}),
					),
		),
	);
}

/**
 * @pure true
 */
export function parseNameOnly(stdout: string): readonly string[] {
	const files = stdout
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0)
		.map(normalizePath);
	return [...new Set(files)];
}

export function createGitChanges(repoRoot: string): GitChanges {
	return {
		changedFiles: (baseRef, headRef) =>
			Effect.map(git(repoRoot, ["diff", "--name-only", `${baseRef}...${headRef}`]), parseNameOnly),
		headSha: () =>
			git(repoRoot, ["rev-parse", "HEAD"]).pipe(
				Effect.map((stdout): string | null => stdout.trim() || null),
				Effect.orElseSucceed(() => null),
			),
	};
}
