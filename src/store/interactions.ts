import type { LearningDB } from "./db.js";
import type { AnalysisResult, HistoryEntry, Interaction, InteractionType } from "../engine/types.js";
import { parseStringList, toIntent, toInteractionType } from "./rows.js";

interface InteractionRow {
  id: string;
  user_id: string;
  text: string;
  interaction_type: string;
  occurred_at: number;
  sentiment: number | null;
  topics: string | null;
  domains: string | null;
  intent: string | null;
  recorded_at: number;
}

export interface RecordInteractionParams {
  readonly id: string;
  readonly userId: string;
  readonly text: string;
  readonly occurredAt: number;
  readonly interactionType?: InteractionType;
}

export interface ListOptions {
  /** Defaults to 50. */
  readonly limit?: number;
  readonly offset?: number;
}

export class InteractionStore {
  private readonly db;

  constructor(learningDb: LearningDB) {
    this.db = learningDb.raw();
  }

  /** Interactions are immutable: recording an existing id is a no-op. */
  record(params: RecordInteractionParams): Interaction {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO interactions
         (id, user_id, text, interaction_type, occurred_at, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(params.id, params.userId, params.text, params.interactionType ?? "message", params.occurredAt, Date.now());

    const stored = this.get(params.id);
    if (!stored) throw new Error(`Interaction ${params.id} was not stored`);
    return stored.interaction;
  }

  get(id: string): HistoryEntry | null {
    const row = this.db.prepare<[string], InteractionRow>("SELECT * FROM interactions WHERE id = ?").get(id);
    return row ? this.toEntry(row) : null;
  }

  /** Oldest first; ties keep recording order. */
  getHistory(userId: string): HistoryEntry[] {
    const rows = this.db
      .prepare<[string], InteractionRow>(
        `SELECT * FROM interactions
         WHERE user_id = ?
         ORDER BY occurred_at ASC, rowid ASC`,
      )
      .all(userId);
    return rows.map((r) => this.toEntry(r));
  }

  /** One page of a user's interactions, newest first. */
  list(userId: string, options: ListOptions = {}): HistoryEntry[] {
    const rows = this.db
      .prepare<[string, number, number], InteractionRow>(
        `SELECT * FROM interactions
         WHERE user_id = ?
         ORDER BY occurred_at DESC, rowid DESC
         LIMIT ? OFFSET ?`,
      )
      .all(userId, options.limit ?? 50, options.offset ?? 0);
    return rows.map((r) => this.toEntry(r));
  }

  saveAnalysis(id: string, analysis: AnalysisResult): void {
    this.db
      .prepare("UPDATE interactions SET sentiment = ?, topics = ?, domains = ?, intent = ? WHERE id = ?")
      .run(analysis.sentiment, JSON.stringify(analysis.topics), JSON.stringify(analysis.domains), analysis.intent, id);
  }

  count(userId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM interactions WHERE user_id = ?")
      .get(userId);
    return row?.n ?? 0;
  }

  listUsers(): string[] {
    return this.db
      .prepare<[], { user_id: string }>("SELECT DISTINCT user_id FROM interactions ORDER BY user_id")
      .all()
      .map((r) => r.user_id);
  }

  purgeOlderThan(retentionMs: number, now = Date.now()): number {
    const result = this.db.prepare("DELETE FROM interactions WHERE occurred_at <= ?").run(now - retentionMs);
    return result.changes;
  }

  deleteUser(userId: string): number {
    return this.db.prepare("DELETE FROM interactions WHERE user_id = ?").run(userId).changes;
  }

  private toEntry(row: InteractionRow): HistoryEntry {
    const interaction: Interaction = {
      id: row.id,
      userId: row.user_id,
      text: row.text,
      occurredAt: row.occurred_at,
      interactionType: toInteractionType(row.interaction_type),
    };

    if (row.sentiment === null || row.intent === null) {
      return { interaction, analysis: null };
    }

    return {
      interaction,
      analysis: {
        sentiment: row.sentiment,
        topics: parseStringList(row.topics),
        domains: parseStringList(row.domains),
        intent: toIntent(row.intent),
      },
    };
  }
}
