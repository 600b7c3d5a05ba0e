// CHANGE: Application layer for violation tracking across runs
// WHY: APP composes the pure lifecycle with the violation, exemption, report and history stores
// PURITY: APP
// EFFECT: Effect<A, StoreError | ConfigError>
// INVARIANT: One run = reconcile → link exemptions → report → persist → history
// INVARIANT: Exemption expiry is evaluated when a violation is matched; only auditExemptions sweeps the store
// COMPLEXITY: O(r + v + e) per run

import { randomUUID } from "node:crypto";

import { Effect } from "effect";

import {
	type ExemptionLookup,
	linkExemptions,
	reconcileViolations,
} from "../core/conformance/lifecycle.js";
import {
	type ConformanceReport,
	complianceRate,
	computeTrend,
	type RunType,
	tallyViolations,
} from "../core/conformance/summary.js";
import {
	markResolved,
	severityWeight,
	type Violation,
	type ViolationSeverity,
	type ViolationStatus,
} from "../core/conformance/violation.js";
import { ConfigError, type StoreError } from "../core/errors.js";
import {
	type Exemption,
	type ExemptionStatus,
	findExemption,
	findLapsedExemption,
	isActive,
	isExpired,
	isoDate,
	needsReview,
} from "../core/exemptions/exemption.js";
import { matchesGlob } from "../core/glob.js";
import {
	daysBefore,
	type HistorySnapshot,
	snapshotFromReport,
	type Trend,
} from "../core/history/snapshot.js";
import type { CheckResult } from "../core/models.js";
import type { ContractRegistry } from "../shell/contracts/registry.js";
import { writeFileAtomic } from "../shell/fs/atomic.js";
import { ensureDir, pathExists, readTextIfExists } from "../shell/fs/files.js";
import { ExemptionStore } from "../shell/store/exemptions.js";
import { HistoryStore } from "../shell/store/history.js";
import {
	type ConformanceLayout,
	conformanceLayout,
	LOCAL_CONFIG_ENTRY,
} from "../shell/store/layout.js";
import { readReport, writeReport } from "../shell/store/report.js";
import { ViolationStore } from "../shell/store/violations.js";
import { debugLog } from "../shell/utils/log.js";
import { path } from "../shell/utils/node-mods.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const GITIGNORE_COMMENT = "# Conformance local config";

export interface ConformanceManagerOptions {
	readonly repoRoot: string;
	/** Source of exemptions declared next to contracts. */
	readonly registry?: ContractRegistry;
	readonly clock?: () => Date;
	readonly historyRetentionDays?: number;
}

export interface ConformanceRunInput {
	readonly results: readonly CheckResult[];
	readonly contractsChecked: readonly string[];
	readonly filesChecked: number;
	readonly isFullRun: boolean;
}

export interface ViolationFilter {
	readonly status?: ViolationStatus;
	readonly severity?: ViolationSeverity;
	readonly contract?: string;
	/** Glob over the violation's file path. */
	readonly filePattern?: string;
	readonly limit?: number;
}

export interface ExemptionFilter {
	readonly status?: ExemptionStatus;
	readonly contract?: string;
}

export type SummaryStats =
	| { readonly initialized: false }
	| {
			readonly initialized: true;
			readonly lastRun: string;
			readonly runType: RunType;
			readonly violations: {
				readonly total: number;
				readonly open: number;
				readonly exempted: number;
				readonly resolved: number;
				readonly stale: number;
				readonly bySeverity: Readonly<Record<ViolationSeverity, number>>;
			};
			readonly exemptions: {
				readonly active: number;
				readonly expired: number;
				readonly needsReview: number;
			};
			readonly contractsChecked: readonly string[];
			readonly filesChecked: number;
			readonly complianceRate: number;
	  };

/**
 * Store entries replace registry entries with the same id.
 *
 * @pure true
 */
export function mergeExemptions(
	stored: readonly Exemption[],
	declared: readonly Exemption[],
): readonly Exemption[] {
	const storedIds = new Set(stored.map((exemption) => exemption.id));
	return [...stored, ...declared.filter((exemption) => !storedIds.has(exemption.id))];
}

/**
 * Most severe first, then by file path.
 *
 * @pure true
 */
export function compareForListing(a: Violation, b: Violation): number {
	const bySeverity = severityWeight(b.severity) - severityWeight(a.severity);
	if (bySeverity !== 0) return bySeverity;
	return a.file < b.file ? -1 : a.file > b.file ? 1 : 0;
}

export class ConformanceManager {
	readonly layout: ConformanceLayout;
	private readonly violations: ViolationStore;
	private readonly exemptions: ExemptionStore;
	private readonly history: HistoryStore;
	private readonly clock: () => Date;

	constructor(readonly options: ConformanceManagerOptions) {
		this.layout = conformanceLayout(options.repoRoot);
		this.clock = options.clock ?? (() => new Date());
		this.violations = new ViolationStore(this.layout.violations);
		this.exemptions = new ExemptionStore(this.layout.exemptions);
		this.history = new HistoryStore(this.layout.history, options.historyRetentionDays, this.clock);
	}

	private today(): string {
		return isoDate(this.clock());
	}

	isInitialized(): Effect.Effect<boolean> {
		return pathExists(this.layout.report);
	}

	/**
	 * Create the state directory, an empty report and the .gitignore entry for local config.
	 *
	 * @postcondition report exists ∧ ¬force ⇒ ConfigError
	 */
	initialize(force = false): Effect.Effect<void, ConfigError | StoreError> {
		return Effect.gen(this, function* () {
			if (!force && (yield* this.isInitialized())) {
				return yield* Effect.fail(
					new ConfigError({
						path: this.layout.root,
						detail: "conformance tracking is already initialized; pass force to reinitialize",
					}),
				);
			}
			for (const dir of [this.layout.violations, this.layout.exemptions, this.layout.history]) {
				yield* ensureDir(dir);
				yield* writeFileAtomic(path.join(dir, ".gitkeep"), "");
			}
			const empty = tallyViolations([], 0);
			yield* writeReport(this.layout.report, {
				schemaVersion: "1.0",
				runId: randomUUID(),
				runType: "full",
				generatedAt: this.clock().toISOString(),
				contractsChecked: [],
				filesChecked: 0,
				...empty,
			});
			yield* this.ensureGitignoreEntry();
		});
	}

	private ensureGitignoreEntry(): Effect.Effect<void, StoreError> {
		return Effect.gen(this, function* () {
			const current = yield* readTextIfExists(this.layout.gitignore);
			const block = `${GITIGNORE_COMMENT}\n${LOCAL_CONFIG_ENTRY}\n`;
			if (current === null) {
				yield* writeFileAtomic(this.layout.gitignore, block);
				return;
			}
			if (current.split(/\r?\n/u).some((line) => line.trim() === LOCAL_CONFIG_ENTRY)) return;
			yield* writeFileAtomic(this.layout.gitignore, `${current}\n${block}`);
		});
	}

	private allExemptions(): Effect.Effect<readonly Exemption[], StoreError> {
		const { registry } = this.options;
		return Effect.gen(this, function* () {
			const stored = yield* this.exemptions.loadAll();
			const declared = registry === undefined ? [] : yield* registry.loadExemptions();
			return mergeExemptions(stored, declared);
		});
	}

	/**
	 * Apply one run's results to the stored state and write the new report.
	 */
	runConformanceCheck(input: ConformanceRunInput): Effect.Effect<ConformanceReport, StoreError> {
		return Effect.gen(this, function* () {
			const now = this.clock().toISOString();
			const today = this.today();

			const reconciled = reconcileViolations({
				previous: yield* this.violations.loadAll(),
				results: input.results,
				contractsChecked: input.contractsChecked,
				isFullRun: input.isFullRun,
				now,
			});

			const exemptions = yield* this.allExemptions();
			const lookup: ExemptionLookup = {
				active: (query) => findExemption(exemptions, query, today),
				lapsed: (query) => findLapsedExemption(exemptions, query, today),
			};
			const linked = linkExemptions(reconciled.violations, lookup);
			for (const id of linked.lapsedExemptionIds) {
				const lapsed = exemptions.find((exemption) => exemption.id === id);
				if (lapsed !== undefined) yield* this.exemptions.save({ ...lapsed, status: "expired" });
			}

			const changedIds = new Set([
				...reconciled.changed.map((violation) => violation.id),
				...linked.changed.map((violation) => violation.id),
			]);
			const changed = linked.violations.filter((violation) => changedIds.has(violation.id));

			const previousReport = yield* readReport(this.layout.report);
			const tally = tallyViolations(
				linked.violations,
				input.results.filter((result) => result.passed).length,
			);
			const trend = computeTrend(tally.summary, previousReport);
			const report: ConformanceReport = {
				schemaVersion: "1.0",
				runId: randomUUID(),
				runType: input.isFullRun ? "full" : "incremental",
				generatedAt: now,
				contractsChecked: [...input.contractsChecked],
				filesChecked: input.filesChecked,
				...tally,
				...(trend === undefined ? {} : { trend }),
			};

			yield* this.violations.saveAll(changed);
			yield* writeReport(this.layout.report, report);
			yield* this.history.save(snapshotFromReport(report, today));
			const pruned = yield* this.history.prune();
			debugLog(
				"conformance",
				`run ${report.runId}: ${reconciled.created} new, ${reconciled.resolved} resolved, ${reconciled.staled} stale, ${pruned} snapshots pruned`,
			);
			return report;
		});
	}

	listViolations(filter: ViolationFilter = {}): Effect.Effect<readonly Violation[], StoreError> {
		const { status, severity, contract, filePattern, limit = 50 } = filter;
		return Effect.map(this.violations.loadAll(), (all) =>
			all
				.filter(
					(violation) =>
						(status === undefined || violation.status === status) &&
						(severity === undefined || violation.severity === severity) &&
						(contract === undefined || violation.contract === contract) &&
						(filePattern === undefined || matchesGlob(filePattern, violation.file)),
				)
				.sort(compareForListing)
				.slice(0, limit),
		);
	}

	getViolation(id: string): Effect.Effect<Violation | undefined, StoreError> {
		return this.violations.get(id);
	}

	/**
	 * @returns false for an unknown id
	 */
	resolveViolation(
		id: string,
		reason: string,
		resolvedBy = "user",
	): Effect.Effect<boolean, StoreError> {
		return Effect.gen(this, function* () {
			const violation = yield* this.violations.get(id);
			if (violation === undefined) return false;
			yield* this.violations.save(
				markResolved(violation, this.clock().toISOString(), reason, resolvedBy),
			);
			return true;
		});
	}

	/**
	 * Delete resolved or stale violations last seen before the cutoff; open ones are kept.
	 *
	 * @returns number of matching violations (deleted unless dryRun)
	 */
	pruneViolations(olderThanDays = 30, dryRun = false): Effect.Effect<number, StoreError> {
		return Effect.gen(this, function* () {
			const cutoff = new Date(this.clock().getTime() - olderThanDays * DAY_MS).toISOString();
			const prunable = (yield* this.violations.loadAll()).filter(
				(violation) =>
					(violation.status === "resolved" || violation.status === "stale") &&
					violation.lastSeenAt < cutoff,
			);
			if (!dryRun) {
				yield* Effect.forEach(prunable, (violation) => this.violations.remove(violation.id), {
					discard: true,
				});
			}
			return prunable.length;
		});
	}

	getReport(): Effect.Effect<ConformanceReport | null, StoreError> {
		return readReport(this.layout.report);
	}

	getSummaryStats(): Effect.Effect<SummaryStats, StoreError> {
		return Effect.gen(this, function* () {
			const report = yield* this.getReport();
			if (report === null) return { initialized: false } as const;
			const violations = yield* this.violations.loadAll();
			const exemptions = yield* this.allExemptions();
			const today = this.today();
			const count = (predicate: (violation: Violation) => boolean): number =>
				violations.filter(predicate).length;
			const bySeverity: Record<ViolationSeverity, number> = {
				blocker: 0,
				critical: 0,
				major: 0,
				minor: 0,
				info: 0,
			};
			for (const violation of violations) {
				if (violation.status === "open" && violation.exemptionId === undefined) {
					bySeverity[violation.severity] += 1;
				}
			}
			const stats: SummaryStats = {
				initialized: true,
				lastRun: report.generatedAt,
				runType: report.runType,
				violations: {
					total: violations.length,
					open: count((v) => v.status === "open" && v.exemptionId === undefined),
					exempted: count((v) => v.status === "open" && v.exemptionId !== undefined),
					resolved: count((v) => v.status === "resolved"),
					stale: count((v) => v.status === "stale"),
					bySeverity,
				},
				exemptions: {
					active: exemptions.filter((e) => isActive(e, today)).length,
					expired: exemptions.filter((e) => e.status === "expired" || isExpired(e, today)).length,
					needsReview: exemptions.filter((e) => needsReview(e, today)).length,
				},
				contractsChecked: report.contractsChecked,
				filesChecked: report.filesChecked,
				complianceRate: complianceRate(report.summary),
			};
			return stats;
		});
	}

	/** Snapshots of the last `days` days, today included, ascending. */
	getHistory(days = 30): Effect.Effect<readonly HistorySnapshot[], StoreError> {
		const today = this.today();
		return this.history.getRange(daysBefore(today, days - 1), today);
	}

	getTrend(days = 30): Effect.Effect<Trend, StoreError> {
		return this.history.getTrend(days);
	}

	/**
	 * Explicit audit: move every stored exemption past its date to expired.
	 *
	 * @returns the exemptions that changed
	 */
	auditExemptions(): Effect.Effect<readonly Exemption[], StoreError> {
		return Effect.map(this.exemptions.expireOverdue(this.today()), (expired) => {
			debugLog("conformance", `expired ${expired.length} exemptions`);
			return expired;
		});
	}

	getExemptions(filter: ExemptionFilter = {}): Effect.Effect<readonly Exemption[], StoreError> {
		return Effect.map(this.allExemptions(), (exemptions) =>
			exemptions.filter(
				(exemption) =>
					(filter.status === undefined || exemption.status === filter.status) &&
					(filter.contract === undefined || exemption.contract === filter.contract),
			),
		);
	}
}
