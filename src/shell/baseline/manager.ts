// CHANGE: Baseline file persistence and comparison
// WHY: PR and ratchet runs need the stored fingerprints of pre-existing violations
// PURITY: SHELL
// EFFECT: Effect<A, BaselineError>
// INVARIANT: load() = null ⇔ file missing; corrupt file ⇒ BaselineError
// COMPLEXITY: O(b + v)

import { Effect, Either } from "effect";

import {
	addToBaseline,
	type Baseline,
	type BaselineComparison,
	baselineFromDocument,
	baselineToDocument,
	compareWithBaseline,
	createEmptyBaseline,
	removeFromBaseline,
} from "../../core/baseline/baseline.js";
import { DEFAULT_CI_CONFIG } from "../../core/ci/config.js";
import { type CIViolation, ciViolationHash } from "../../core/ci/violation.js";
import { BaselineError, messageOf } from "../../core/errors.js";
import { countKeys, toJSONValue } from "../../core/types/json.js";
import { writeJsonAtomic } from "../fs/atomic.js";
import { pathExists, readTextIfExists } from "../fs/files.js";
import { path } from "../utils/node-mods.js";

export interface BaselineStats {
	readonly totalEntries: number;
	readonly createdAt: string;
	readonly updatedAt: string;
	readonly commitSha?: string;
	readonly byCheck: Readonly<Record<string, number>>;
}

export interface BaselineUpdate {
	readonly added: number;
	readonly removed: number;
}

export class BaselineManager {
	readonly file: string;

	constructor(
		readonly repoRoot: string,
		baselinePath: string = DEFAULT_CI_CONFIG.baselinePath,
		private readonly clock: () => Date = () => new Date(),
	) {
		this.file = path.resolve(repoRoot, baselinePath);
	}

	private now(): string {
		return this.clock().toISOString();
	}

	exists(): Effect.Effect<boolean> {
		return pathExists(this.file);
	}

	load(): Effect.Effect<Baseline | null, BaselineError> {
		return readTextIfExists(this.file).pipe(
			Effect.mapError((error) => new BaselineError({ path: this.file, detail: error.detail })),
			Effect.flatMap((content): Effect.Effect<Baseline | null, BaselineError> => {
				if (content === null) return Effect.succeed(null);
				const parsed = Either.try({
					try: () => toJSONValue(JSON.parse(content)),
					catch: (error) => messageOf(error),
				});
				const baseline = Either.isRight(parsed) ? baselineFromDocument(parsed.right) : null;
				if (baseline === null) {
					const reason = Either.isLeft(parsed) ? parsed.left : "unexpected structure";
					return Effect.fail(
						new BaselineError({ path: this.file, detail: `Corrupt baseline ${this.file}: ${reason}` }),
					);
				}
				return Effect.succeed(baseline);
			}),
		);
	}

	save(baseline: Baseline): Effect.Effect<void, BaselineError> {
		return writeJsonAtomic(this.file, baselineToDocument(baseline)).pipe(
			Effect.mapError((error) => new BaselineError({ path: this.file, detail: error.detail })),
		);
	}

	/**
	 * Replace the baseline with exactly the given violations.
	 */
	createFromViolations(
		violations: readonly CIViolation[],
		commitSha?: string,
	): Effect.Effect<Baseline, BaselineError> {
		const now = this.now();
		const baseline = violations.reduce(
			(acc, violation) => addToBaseline(acc, violation, now),
			createEmptyBaseline(now, commitSha),
		);
		return Effect.as(this.save(baseline), baseline);
	}

	/**
	 * Add current violations and drop entries that are no longer reproduced.
	 * A missing baseline starts empty.
	 */
	update(violations: readonly CIViolation[]): Effect.Effect<BaselineUpdate, BaselineError> {
		return Effect.gen(this, function* () {
			const now = this.now();
			let baseline = (yield* this.load()) ?? createEmptyBaseline(now);
			const current = new Set(violations.map(ciViolationHash));
			let added = 0;
			for (const violation of violations) {
				if (!Object.hasOwn(baseline.entries, ciViolationHash(violation))) added += 1;
				baseline = addToBaseline(baseline, violation, now);
			}
			let removed = 0;
			for (const hash of Object.keys(baseline.entries)) {
				if (current.has(hash)) continue;
				baseline = removeFromBaseline(baseline, hash, now);
				removed += 1;
			}
			yield* this.save({ ...baseline, updatedAt: now });
			return { added, removed };
		});
	}

	compare(violations: readonly CIViolation[]): Effect.Effect<BaselineComparison, BaselineError> {
		return Effect.flatMap(
			this.load(),
			(baseline): Effect.Effect<BaselineComparison, BaselineError> =>
				baseline === null
					? Effect.fail(
							new BaselineError({
								path: this.file,
								detail: `Baseline not found at ${this.file}. Create one with BaselineManager.createFromViolations`,
							}),
						)
					: Effect.succeed(compareWithBaseline(violations, baseline)),
		);
	}

	stats(): Effect.Effect<BaselineStats | null, BaselineError> {
		return Effect.map(this.load(), (baseline) => {
			if (baseline === null) return null;
			const byCheck = countKeys(Object.values(baseline.entries).map((entry) => entry.checkId));
			return {
				totalEntries: Object.keys(baseline.entries).length,
				createdAt: baseline.createdAt,
				updatedAt: baseline.updatedAt,
				...(baseline.commitSha === undefined ? {} : { commitSha: baseline.commitSha }),
				byCheck,
			};
		});
	}
}
