// CHANGE: Exemption files under .conformance/exemptions
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: A file holds one exemption mapping or an `exemptions:` list; `<id>.yaml` wins over list entries
// COMPLEXITY: O(e) per load

import { Effect, Either } from "effect";

import { describeError, type StoreError } from "../../core/errors.js";
import {
	type Exemption,
	exemptionToDocument,
	isExpired,
	parseExemptionEntry,
} from "../../core/exemptions/exemption.js";
import { isJSONArray, isJSONObject, type JSONValue } from "../../core/types/json.js";
import { writeYamlAtomic } from "../fs/atomic.js";
import { listFiles } from "../fs/files.js";
import { readYamlFile } from "../fs/yaml.js";
import { logWarning } from "../utils/log.js";
import { path } from "../utils/node-mods.js";

function entriesOf(doc: JSONValue): readonly JSONValue[] {
	if (isJSONObject(doc) && isJSONArray(doc["exemptions"])) return doc["exemptions"];
	if (isJSONArray(doc)) return doc;
	return doc === null ? [] : [doc];
}

export class ExemptionStore {
	constructor(readonly dir: string) {}

	fileOf(id: string): string {
		return path.join(this.dir, `${id}.yaml`);
	}

	loadAll(): Effect.Effect<readonly Exemption[], StoreError> {
		return Effect.gen(this, function* () {
			const byId = new Map<string, { readonly exemption: Exemption; readonly own: boolean }>();
			const files = (yield* listFiles(this.dir)).filter((file) => file.endsWith(".yaml"));
			for (const relative of files) {
				const file = path.join(this.dir, relative);
				const doc = yield* Effect.either(readYamlFile(file));
				if (Either.isLeft(doc)) {
					if (doc.left._tag === "StoreError") return yield* Effect.fail(doc.left);
					logWarning("store", `Skipping exemptions ${describeError(doc.left)}`);
					continue;
				}
				if (doc.right === null) continue;
				for (const entry of entriesOf(doc.right)) {
					const parsed = parseExemptionEntry(entry, file);
					if (Either.isLeft(parsed)) {
						logWarning("store", `Skipping exemption ${describeError(parsed.left)}`);
						continue;
					}
					const own = path.basename(relative) === `${parsed.right.id}.yaml`;
					if (byId.get(parsed.right.id)?.own === true && !own) continue;
					byId.set(parsed.right.id, { exemption: parsed.right, own });
				}
			}
			return [...byId.values()].map(({ exemption }) => exemption);
		});
	}

	save(exemption: Exemption): Effect.Effect<void, StoreError> {
		return writeYamlAtomic(this.fileOf(exemption.id), exemptionToDocument(exemption));
	}

	/**
	 * Move active exemptions past their date to expired and persist them.
	 *
	 * @returns the exemptions that changed
	 */
	expireOverdue(today: string): Effect.Effect<readonly Exemption[], StoreError> {
		return Effect.gen(this, function* () {
			const overdue = (yield* this.loadAll())
				.filter((exemption) => exemption.status === "active" && isExpired(exemption, today))
				.map((exemption): Exemption => ({ ...exemption, status: "expired" }));
			yield* Effect.forEach(overdue, (exemption) => this.save(exemption), { discard: true });
			return overdue;
		});
	}
}
