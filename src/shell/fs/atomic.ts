// CHANGE: Atomic file writes for the stores
// WHY: A reader never observes a half-written record
// PURITY: SHELL
// INVARIANT: write = temp file in the target directory, then rename over the target
// COMPLEXITY: O(n) where n = |content|

import { randomUUID } from "node:crypto";

import { Effect } from "effect";
import { stringify } from "yaml";

import { messageOf, StoreError } from "../../core/errors.js";
import type { JSONValue } from "../../core/types/json.js";
import { fsp, path } from "../utils/node-mods.js";

/**
 * @effect Effect<void, StoreError>
 * @postcondition file content = content ∨ file unchanged
 */
export function writeFileAtomic(file: string, content: string): Effect.Effect<void, StoreError> {
	return Effect.tryPromise({
		try: async () => {
			const dir = path.dirname(file);
			await fsp.mkdir(dir, { recursive: true });
			const temp = path.join(dir, `.${path.basename(file)}.${randomUUID()}.tmp`);
			try {
				await fsp.writeFile(temp, content, "utf8");
				await fsp.rename(temp, file);
			} catch (error) {
				await fsp.rm(temp, { force: true });
				throw error;
			}
		},
		catch: (error) => new StoreError({ path: file, detail: messageOf(error) }),
	});
}

export function writeYamlAtomic(file: string, doc: JSONValue): Effect.Effect<void, StoreError> {
	return writeFileAtomic(file, stringify(doc, { lineWidth: 0 }));
}

export function writeJsonAtomic(file: string, doc: JSONValue): Effect.Effect<void, StoreError> {
	return writeFileAtomic(file, `${JSON.stringify(doc, null, 2)}\n`);
}
