// CHANGE: Pure reconciliation of stored violations against one run's check results
// WHY: The lifecycle state machine (open → resolved/stale → open) must be testable without a store
// PURITY: CORE
// INVARIANT: ∀ v detected in run N and absent in run N+1 (same contract checked):
//            full(N+1) ⇒ v.status = resolved; incremental(N+1) ⇒ v.status = stale
// COMPLEXITY: O(r + v) where r = results, v = stored violations

import type { CheckResult } from "../models.js";
import type { Exemption, ExemptionQuery } from "../exemptions/exemption.js";
import {
	createViolation,
	linkExemption,
	markResolved,
	markSeen,
	markStale,
	trackingIdOf,
	type Violation,
} from "./violation.js";

export interface ReconcileInput {
	readonly previous: readonly Violation[];
	readonly results: readonly CheckResult[];
	readonly contractsChecked: readonly string[];
	readonly isFullRun: boolean;
	readonly now: string;
}

export interface ReconcileOutcome {
	/** Every violation after the run, keyed order = previous order then new ones. */
	readonly violations: readonly Violation[];
	/** Records whose content changed and must be persisted. */
	readonly changed: readonly Violation[];
	readonly created: number;
	readonly refreshed: number;
	readonly reopened: number;
	readonly resolved: number;
	readonly staled: number;
}

const TRACKED_STATUSES = new Set(["open", "stale", "exemption_expired"]);

/**
 * Apply one run to the stored violation set.
 *
 * 1. failing results create or refresh (and reopen) their violation;
 * 2. tracked violations of checked contracts that were not reproduced become
 *    resolved on a full run and stale otherwise.
 *
 * @pure true
 * @postcondition ids are unique in violations
 */
export function reconcileViolations(input: ReconcileInput): ReconcileOutcome {
	const byId = new Map<string, Violation>();
	for (const violation of input.previous) byId.set(violation.id, violation);

	const changed = new Map<string, Violation>();
	const seen = new Set<string>();
	let created = 0;
	let refreshed = 0;
	let reopened = 0;
	let resolved = 0;
	let staled = 0;

	for (const result of input.results) {
		if (result.passed) continue;
		const id = trackingIdOf(result);
		const existing = byId.get(id);
		let next: Violation;
		if (existing === undefined) {
			next = createViolation(result, input.now);
			created += 1;
		} else {
			if (!seen.has(id)) {
				if (existing.status === "open") refreshed += 1;
				else reopened += 1;
			}
			next = markSeen(existing, result, input.now);
		}
		seen.add(id);
		byId.set(id, next);
		changed.set(id, next);
	}

	const checked = new Set(input.contractsChecked);
	for (const violation of byId.values()) {
		if (seen.has(violation.id)) continue;
		if (!checked.has(violation.contract)) continue;
		if (!TRACKED_STATUSES.has(violation.status)) continue;
		if (input.isFullRun) {
			const next = markResolved(violation, input.now, "Not detected in full run", "system");
			byId.set(violation.id, next);
			changed.set(violation.id, next);
			resolved += 1;
		} else if (violation.status !== "stale") {
			const next = markStale(violation);
			byId.set(violation.id, next);
			changed.set(violation.id, next);
			staled += 1;
		}
	}

	return {
		violations: [...byId.values()],
		changed: [...changed.values()],
		created,
		refreshed,
		reopened,
		resolved,
		staled,
	};
}

export interface ExemptionLookup {
	readonly active: (query: ExemptionQuery) => Exemption | undefined;
	readonly lapsed: (query: ExemptionQuery) => Exemption | undefined;
}

export interface ExemptionLinkOutcome {
	readonly violations: readonly Violation[];
	readonly changed: readonly Violation[];
	/** Ids of exemptions still marked active whose expiry passed while covering a violation. */
	readonly lapsedExemptionIds: readonly string[];
}

/**
 * Link open violations to their covering exemption.
 *
 * A violation covered only by a lapsed exemption loses its link and stays
 * open; the exemption id is reported so its own status can be moved to expired.
 *
 * @pure true
 */
export function linkExemptions(
	violations: readonly Violation[],
	lookup: ExemptionLookup,
): ExemptionLinkOutcome {
	const lapsed = new Set<string>();
	const changed: Violation[] = [];
	const next = violations.map((violation) => {
		if (violation.status !== "open") return violation;
		const query: ExemptionQuery = {
			contract: violation.contract,
			checkId: violation.checkId,
			file: violation.file,
			line: violation.line,
			violationId: violation.id,
		};
		const active = lookup.active(query);
		if (active === undefined) {
			const expired = lookup.lapsed(query);
			if (expired !== undefined) lapsed.add(expired.id);
		}
		const exemptionId = active?.id;
		if (exemptionId === violation.exemptionId) return violation;
		const linked = linkExemption(violation, exemptionId);
		changed.push(linked);
		return linked;
	});
	return { violations: next, changed, lapsedExemptionIds: [...lapsed] };
}
