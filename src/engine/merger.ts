import { randomUUID } from "node:crypto";
import type { ConfidenceThresholds } from "../config/types.js";
import { confidenceFor, DEFAULT_THRESHOLDS, factKey } from "./confidence.js";
import type { CandidateFact, FactMap, FactUpsert, LearnedFact } from "./types.js";

export interface FactMergerOptions {
  readonly thresholds?: ConfidenceThresholds;
  readonly clock?: () => number;
  readonly idFactory?: () => string;
}

/**
 * Reconciles candidate facts with a user's stored facts.
 *
 * Evidence is counted per distinct supporting interaction: an interaction
 * already recorded against a fact never counts twice, so replaying a merge
 * against its own output adds nothing. A fact the user rejected takes no
 * further evidence and keeps its value.
 */
export class FactMerger {
  private readonly thresholds: ConfidenceThresholds;
  private readonly clock: () => number;
  private readonly idFactory: () => string;

  constructor(options: FactMergerOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.clock = options.clock ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  merge(existing: FactMap, candidates: readonly CandidateFact[], userId: string): FactUpsert[] {
    const groups = new Map<string, CandidateFact[]>();
    for (const candidate of candidates) {
      const id = factKey(candidate.category, candidate.key);
      const group = groups.get(id);
      if (group) group.push(candidate);
      else groups.set(id, [candidate]);
    }

    const now = this.clock();
    const upserts: FactUpsert[] = [];

    for (const [id, group] of groups) {
      const latest = group[group.length - 1];
      const supporting = [...new Set(group.map((c) => c.supportingInteractionId))];
      const current = existing.get(id);

      if (!current) {
        upserts.push({
          kind: "insert",
          fact: {
            id: this.idFactory(),
            userId,
            category: latest.category,
            key: latest.key,
            value: latest.value,
            confidence: confidenceFor(supporting.length, this.thresholds),
            evidenceCount: supporting.length,
            supportingInteractionIds: supporting,
            firstSeen: now,
            lastUpdated: now,
            review: "pending",
          },
        });
        continue;
      }

      if (current.review === "rejected") continue;

      const known = new Set(current.supportingInteractionIds);
      const fresh = supporting.filter((interactionId) => !known.has(interactionId));
      if (fresh.length === 0 && latest.value === current.value) continue;

      const evidenceCount = current.evidenceCount + fresh.length;
      upserts.push({
        kind: "update",
        factId: current.id,
        category: current.category,
        key: current.key,
        evidenceCount,
        value: latest.value,
        confidence: confidenceFor(evidenceCount, this.thresholds),
        supportingInteractionIds: [...current.supportingInteractionIds, ...fresh],
        lastUpdated: now,
      });
    }

    return upserts;
  }
}

/** Folds upserts into a fact map, as a store applying them would. */
export function applyUpserts(existing: FactMap, upserts: readonly FactUpsert[]): Map<string, LearnedFact> {
  const next = new Map(existing);
  for (const upsert of upserts) {
    if (upsert.kind === "insert") {
      next.set(factKey(upsert.fact.category, upsert.fact.key), upsert.fact);
      continue;
    }
    const id = factKey(upsert.category, upsert.key);
    const current = next.get(id);
    if (!current) continue;
    next.set(id, {
      ...current,
      value: upsert.value,
      evidenceCount: upsert.evidenceCount,
      confidence: upsert.confidence,
      supportingInteractionIds: upsert.supportingInteractionIds,
      lastUpdated: upsert.lastUpdated,
    });
  }
  return next;
}
