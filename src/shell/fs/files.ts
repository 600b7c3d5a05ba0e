// CHANGE: Repository file access for checks and stores
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: Listed paths are repo-relative posix paths in sorted order
// COMPLEXITY: O(n) where n = files below the root

import { Effect } from "effect";

import { SKIPPED_DIRECTORIES } from "../../core/contracts/scope.js";
import { messageOf, StoreError } from "../../core/errors.js";
import { fsp, path } from "../utils/node-mods.js";

async function walk(root: string, relative: string, out: string[]): Promise<void> {
	const entries = await fsp.readdir(path.join(root, relative), { withFileTypes: true });
	for (const entry of entries) {
		const child = relative.length === 0 ? entry.name : `${relative}/${entry.name}`;
		if (entry.isDirectory()) {
			if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(root, child, out);
		} else if (entry.isFile()) {
			out.push(child);
		}
	}
}

/**
 * Every file below `dir` as a path relative to `dir`, skipping tool and VCS directories.
 *
 * @effect Effect<readonly string[], StoreError>
 * @postcondition missing dir ⇒ []
 */
export function listFiles(dir: string): Effect.Effect<readonly string[], StoreError> {
	return Effect.tryPromise({
		try: async () => {
			const out: string[] = [];
			try {
				await walk(dir, "", out);
			} catch (error) {
				if (isMissing(error)) return [];
				throw error;
			}
			return out.sort();
		},
		catch: (error) => new StoreError({ path: dir, detail: messageOf(error) }),
	});
}

export function isMissing(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}

export function readText(file: string): Effect.Effect<string, StoreError> {
	return Effect.tryPromise({
		try: () => fsp.readFile(file, "utf8"),
		catch: (error) => new StoreError({ path: file, detail: messageOf(error) }),
	});
}

/**
 * @postcondition missing file ⇒ null
 */
export function readTextIfExists(file: string): Effect.Effect<string | null, StoreError> {
	return Effect.tryPromise({
		try: async () => {
			try {
				return await fsp.readFile(file, "utf8");
			} catch (error) {
				if (isMissing(error)) return null;
				throw error;
			}
		},
		catch: (error) => new StoreError({ path: file, detail: messageOf(error) }),
	});
}

export function pathExists(file: string): Effect.Effect<boolean> {
	return Effect.promise(() =>
		fsp.access(file).then(
			() => true,
			() => false,
		),
	);
}

export function ensureDir(dir: string): Effect.Effect<void, StoreError> {
	return Effect.tryPromise({
		try: () => fsp.mkdir(dir, { recursive: true }).then(() => undefined),
		catch: (error) => new StoreError({ path: dir, detail: messageOf(error) }),
	});
}

export function removeFile(file: string): Effect.Effect<void, StoreError> {
	return Effect.tryPromise({
		try: () => fsp.rm(file, { force: true }),
		catch: (error) => new StoreError({ path: file, detail: messageOf(error) }),
	});
}
