// CHANGE: Daily history snapshots with clamped retention
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>
// INVARIANT: At most one snapshot per day; a later save on the same day replaces it
// COMPLEXITY: O(d) over stored days

import { Effect } from "effect";

import type { StoreError } from "../../core/errors.js";
import { isoDate } from "../../core/exemptions/exemption.js";
import {
	clampRetentionDays,
	computeHistoryTrend,
	DEFAULT_RETENTION_DAYS,
	daysBefore,
	type HistorySnapshot,
	snapshotFromDocument,
	snapshotToDocument,
	type Trend,
} from "../../core/history/snapshot.js";
import { writeYamlAtomic } from "../fs/atomic.js";
import { listFiles, removeFile } from "../fs/files.js";
import { readYamlFile } from "../fs/yaml.js";
import { path } from "../utils/node-mods.js";

const SNAPSHOT_FILE = /^(\d{4}-\d{2}-\d{2})\.yaml$/u;

export class HistoryStore {
	readonly retentionDays: number;

	constructor(
		readonly dir: string,
		retentionDays: number = DEFAULT_RETENTION_DAYS,
		private readonly clock: () => Date = () => new Date(),
	) {
		this.retentionDays = clampRetentionDays(retentionDays);
	}

	private today(): string {
		return isoDate(this.clock());
	}

	/** Stored days, ascending. */
	dates(): Effect.Effect<readonly string[], StoreError> {
		return Effect.map(listFiles(this.dir), (files) =>
			files.flatMap((file) => {
				const found = SNAPSHOT_FILE.exec(file);
				return found?.[1] === undefined ? [] : [found[1]];
			}),
		);
	}

	save(snapshot: HistorySnapshot): Effect.Effect<void, StoreError> {
		return writeYamlAtomic(path.join(this.dir, `${snapshot.date}.yaml`), snapshotToDocument(snapshot));
	}

	get(date: string): Effect.Effect<HistorySnapshot | null, StoreError> {
		return readYamlFile(path.join(this.dir, `${date}.yaml`)).pipe(
			Effect.map((doc) => (doc === null ? null : snapshotFromDocument(doc))),
			Effect.catchTag("ConfigError", () => Effect.succeed(null)),
		);
	}

	/** Snapshots with start ≤ date ≤ end, ascending. */
	getRange(start: string, end: string): Effect.Effect<readonly HistorySnapshot[], StoreError> {
		return Effect.gen(this, function* () {
			const snapshots: HistorySnapshot[] = [];
			for (const date of yield* this.dates()) {
				if (date < start || date > end) continue;
				const snapshot = yield* this.get(date);
				if (snapshot !== null) snapshots.push(snapshot);
			}
			return snapshots;
		});
	}

	/** The `count` most recent snapshots, ascending. */
	getLatest(count = 1): Effect.Effect<readonly HistorySnapshot[], StoreError> {
		return Effect.gen(this, function* () {
			const dates = yield* this.dates();
			const snapshots: HistorySnapshot[] = [];
			for (const date of dates.slice(Math.max(0, dates.length - count))) {
				const snapshot = yield* this.get(date);
				if (snapshot !== null) snapshots.push(snapshot);
			}
			return snapshots;
		});
	}

	/**
	 * Delete snapshots older than the retention window.
	 *
	 * @returns number of deleted snapshots
	 */
	prune(): Effect.Effect<number, StoreError> {
		return Effect.gen(this, function* () {
			const cutoff = daysBefore(this.today(), this.retentionDays);
			const expired = (yield* this.dates()).filter((date) => date < cutoff);
			yield* Effect.forEach(expired, (date) => removeFile(path.join(this.dir, `${date}.yaml`)), {
				discard: true,
			});
			return expired.length;
		});
	}

	/** Trend over the last `days` days, today included. */
	getTrend(days = 30): Effect.Effect<Trend, StoreError> {
		const today = this.today();
		return Effect.map(this.getRange(daysBefore(today, days - 1), today), computeHistoryTrend);
	}
}
