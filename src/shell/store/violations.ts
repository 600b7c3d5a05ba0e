// CHANGE: One YAML file per tracked violation
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: File name = `<violation id>.yaml`; unreadable records are skipped with a warning
// COMPLEXITY: O(v) reads per load

import { Effect } from "effect";

import {
	type Violation,
	violationFromDocument,
	violationToDocument,
} from "../../core/conformance/violation.js";
import { describeError, type StoreError } from "../../core/errors.js";
import { writeYamlAtomic } from "../fs/atomic.js";
import { listFiles, removeFile } from "../fs/files.js";
import { readYamlFile } from "../fs/yaml.js";
import { logWarning } from "../utils/log.js";
import { path } from "../utils/node-mods.js";

const VIOLATION_FILE = /^V-[^/]+\.yaml$/u;

export class ViolationStore {
	constructor(readonly dir: string) {}

	fileOf(id: string): string {
		return path.join(this.dir, `${id}.yaml`);
	}

	private read(file: string): Effect.Effect<Violation | undefined, StoreError> {
		return readYamlFile(file).pipe(
			Effect.map((doc) => {
				if (doc === null) return undefined;
				const violation = violationFromDocument(doc);
				if (violation === null) logWarning("store", `Skipping malformed violation ${file}`);
				return violation ?? undefined;
			}),
			Effect.catchTag("ConfigError", (error) => {
				logWarning("store", `Skipping violation ${describeError(error)}`);
				return Effect.succeed(undefined);
			}),
		);
	}

	/** Every stored violation, ordered by id. */
	loadAll(): Effect.Effect<readonly Violation[], StoreError> {
		return Effect.gen(this, function* () {
			const files = (yield* listFiles(this.dir)).filter((file) => VIOLATION_FILE.test(file));
			const loaded: Violation[] = [];
			for (const file of files) {
				const violation = yield* this.read(path.join(this.dir, file));
				if (violation !== undefined) loaded.push(violation);
			}
			return loaded.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
		});
	}

	get(id: string): Effect.Effect<Violation | undefined, StoreError> {
		return this.read(this.fileOf(id));
	}

	save(violation: Violation): Effect.Effect<void, StoreError> {
		return writeYamlAtomic(this.fileOf(violation.id), violationToDocument(violation));
	}

	saveAll(violations: readonly Violation[]): Effect.Effect<void, StoreError> {
		return Effect.forEach(violations, (violation) => this.save(violation), { discard: true });
	}

	remove(id: string): Effect.Effect<void, StoreError> {
		return removeFile(this.fileOf(id));
	}
}
