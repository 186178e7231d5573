import type { LearningDB } from "./db.js";
import { factKey } from "../engine/confidence.js";
import type { ConfidenceTier, FactCategory, FactReview, FactUpsert, LearnedFact } from "../engine/types.js";
import { parseStringList, toConfidence, toFactCategory, toFactReview } from "./rows.js";

interface FactRow {
  id: string;
  user_id: string;
  category: string;
  fact_key: string;
  value: string;
  confidence: string;
  evidence_count: number;
  supporting_ids: string;
  first_seen: number;
  last_updated: number;
  review: string;
}

export interface ApplyResult {
  readonly inserted: number;
  readonly updated: number;
}

export interface FactStats {
  readonly total: number;
  readonly byCategory: Record<FactCategory, number>;
  readonly byConfidence: Record<ConfidenceTier, number>;
}

export class FactStore {
  private readonly db;

  constructor(learningDb: LearningDB) {
    this.db = learningDb.raw();
  }

  getFacts(userId: string, category?: FactCategory): LearnedFact[] {
    const rows = category
      ? this.db
          .prepare<[string, string], FactRow>(
            `SELECT * FROM learned_facts WHERE user_id = ? AND category = ?
             ORDER BY evidence_count DESC, last_updated DESC, fact_key ASC`,
          )
          .all(userId, category)
      : this.db
          .prepare<[string], FactRow>(
            `SELECT * FROM learned_facts WHERE user_id = ?
             ORDER BY category ASC, evidence_count DESC, fact_key ASC`,
          )
          .all(userId);
    return rows.map((r) => this.toFact(r));
  }

  getFactById(userId: string, factId: string): LearnedFact | null {
    const row = this.db
      .prepare<[string, string], FactRow>("SELECT * FROM learned_facts WHERE user_id = ? AND id = ?")
      .get(userId, factId);
    return row ? this.toFact(row) : null;
  }

  getFact(userId: string, category: FactCategory, key: string): LearnedFact | null {
    const row = this.db
      .prepare<[string, string, string], FactRow>(
        "SELECT * FROM learned_facts WHERE user_id = ? AND category = ? AND fact_key = ?",
      )
      .get(userId, category, key);
    return row ? this.toFact(row) : null;
  }

  /** Current facts keyed by `category:key`, as the merger expects them. */
  getFactMap(userId: string): Map<string, LearnedFact> {
    const map = new Map<string, LearnedFact>();
    for (const fact of this.getFacts(userId)) {
      map.set(factKey(fact.category, fact.key), fact);
    }
    return map;
  }

  /**
   * Applies merger output. Callers wrap this in a transaction together with
   * whatever else belongs to the same learning cycle.
   */
  applyUpserts(upserts: readonly FactUpsert[]): ApplyResult {
    const insert = this.db.prepare(
      `INSERT INTO learned_facts
       (id, user_id, category, fact_key, value, confidence, evidence_count, supporting_ids, first_seen, last_updated, review)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const update = this.db.prepare(
      `UPDATE learned_facts
       SET value = ?, confidence = ?, evidence_count = ?, supporting_ids = ?, last_updated = ?
       WHERE id = ?`,
    );

    let inserted = 0;
    let updated = 0;
    for (const upsert of upserts) {
      if (upsert.kind === "insert") {
        const f = upsert.fact;
        insert.run(
          f.id,
          f.userId,
          f.category,
          f.key,
          f.value,
          f.confidence,
          f.evidenceCount,
          JSON.stringify(f.supportingInteractionIds),
          f.firstSeen,
          f.lastUpdated,
          f.review,
        );
        inserted++;
      } else {
        const result = update.run(
          upsert.value,
          upsert.confidence,
          upsert.evidenceCount,
          JSON.stringify(upsert.supportingInteractionIds),
          upsert.lastUpdated,
          upsert.factId,
        );
        if (result.changes === 0) {
          throw new Error(`Cannot update fact ${upsert.factId}: not found`);
        }
        updated++;
      }
    }
    return { inserted, updated };
  }

  /** Records the user's verdict on one of their facts. Returns null for an unknown id. */
  setReview(userId: string, factId: string, review: FactReview, now = Date.now()): LearnedFact | null {
    this.db
      .prepare("UPDATE learned_facts SET review = ?, reviewed_at = ? WHERE user_id = ? AND id = ?")
      .run(review, now, userId, factId);
    return this.getFactById(userId, factId);
  }

  /** Fact counts per category and per confidence tier; rejected facts are left out. */
  stats(userId: string): FactStats {
    const byCategory: Record<FactCategory, number> = { preference: 0, interest: 0, behavior: 0, temporal: 0 };
    const byConfidence: Record<ConfidenceTier, number> = { low: 0, medium: 0, high: 0 };
    let total = 0;

    const rows = this.db
      .prepare<[string], { category: string; confidence: string; n: number }>(
        `SELECT category, confidence, COUNT(*) AS n FROM learned_facts
         WHERE user_id = ? AND review != 'rejected'
         GROUP BY category, confidence`,
      )
      .all(userId);
    for (const row of rows) {
      byCategory[toFactCategory(row.category)] += row.n;
      byConfidence[toConfidence(row.confidence)] += row.n;
      total += row.n;
    }
    return { total, byCategory, byConfidence };
  }

  deleteUser(userId: string): number {
    return this.db.prepare("DELETE FROM learned_facts WHERE user_id = ?").run(userId).changes;
  }

  private toFact(row: FactRow): LearnedFact {
    return {
      id: row.id,
      userId: row.user_id,
      category: toFactCategory(row.category),
      key: row.fact_key,
      value: row.value,
      confidence: toConfidence(row.confidence),
      evidenceCount: row.evidence_count,
      supportingInteractionIds: parseStringList(row.supporting_ids),
      firstSeen: row.first_seen,
      lastUpdated: row.last_updated,
      review: toFactReview(row.review),
    };
  }
}
