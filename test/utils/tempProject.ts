// CHANGE: Throwaway repositories for file-system tests
// WHY: Stores, handlers and runners are exercised against real files, not mocked fs calls
// INVARIANT: Every repository lives under os.tmpdir() and cleanup() removes it

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface TempRepo {
	readonly root: string;
	/** Write a repo-relative file, creating parent directories. */
	readonly write: (relative: string, content: string) => string;
	readonly read: (relative: string) => string;
	readonly exists: (relative: string) => boolean;
	/** Sorted entries of a repo-relative directory; [] when missing. */
	readonly list: (relative: string) => readonly string[];
	readonly cleanup: () => void;
}

/**
 * Create a temporary repository holding the given files.
 *
 * @example
 * const repo = createTempRepo({ "src/app.ts": "export const a = 1;\n" });
 * // ... run tests against repo.root ...
 * repo.cleanup();
 */
export function createTempRepo(files: Readonly<Record<string, string>> = {}): TempRepo {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "conformance-test-"));
	const write = (relative: string, content: string): string => {
		const file = path.join(root, relative);
		fs.mkdirSync(path.dirname(file), { recursive: true });
		fs.writeFileSync(file, content, "utf8");
		return file;
	};
	for (const [relative, content] of Object.entries(files)) write(relative, content);

	return {
		root,
		write,
		read: (relative) => fs.readFileSync(path.join(root, relative), "utf8"),
		exists: (relative) => fs.existsSync(path.join(root, relative)),
		list: (relative) => {
			const dir = path.join(root, relative);
			return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
		},
		cleanup: () => {
			fs.rmSync(root, { recursive: true, force: true });
		},
	};
}
