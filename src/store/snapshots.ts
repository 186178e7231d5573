import { z } from "zod";
import type { LearningDB } from "./db.js";
import type { PatternSummary, UserInsight } from "../engine/types.js";

const histogramSchema = z.record(z.string(), z.number()).transform((h) => {
  const out: Record<number, number> = {};
  for (const [key, count] of Object.entries(h)) out[Number(key)] = count;
  return out;
});

const summarySchema = z.object({
  interactionCount: z.number(),
  avgSentiment: z.number(),
  activeHourHistogram: histogramSchema,
  activeDayHistogram: histogramSchema,
  peakHour: z.number(),
  peakDay: z.number(),
  avgTokenCount: z.number(),
  dominantStyle: z.enum(["brief", "detailed"]),
  sentimentTrend: z.enum(["improving", "declining", "stable"]),
  topTopics: z.array(z.object({ topic: z.string(), count: z.number() })),
  styleScores: z.object({
    formal: z.number(),
    casual: z.number(),
    technical: z.number(),
    friendly: z.number(),
  }),
  dominantTone: z.enum(["formal", "casual", "technical", "friendly"]).nullable(),
  avgHoursBetween: z.number().nullable(),
  activeSpanDays: z.number(),
});

const insightsSchema = z.array(
  z.object({
    category: z.enum(["engagement", "communication", "learning", "frequency"]),
    insight: z.string(),
    confidence: z.number(),
    evidence: z.array(z.string()),
  }),
);

interface SnapshotRow {
  user_id: string;
  summary: string;
  insights: string;
  computed_at: number;
}

export interface PatternSnapshot {
  readonly userId: string;
  readonly summary: PatternSummary;
  readonly insights: UserInsight[];
  readonly computedAt: number;
}

/** Latest pattern summary per user, for analytics display. */
export class SnapshotStore {
  private readonly db;

  constructor(learningDb: LearningDB) {
    this.db = learningDb.raw();
  }

  save(userId: string, summary: PatternSummary, insights: readonly UserInsight[], computedAt = Date.now()): void {
    this.db
      .prepare(
        `INSERT INTO pattern_snapshots (user_id, summary, insights, computed_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           summary = excluded.summary,
           insights = excluded.insights,
           computed_at = excluded.computed_at`,
      )
      .run(userId, JSON.stringify(summary), JSON.stringify(insights), computedAt);
  }

  get(userId: string): PatternSnapshot | null {
    const row = this.db
      .prepare<[string], SnapshotRow>("SELECT * FROM pattern_snapshots WHERE user_id = ?")
      .get(userId);
    if (!row) return null;

    return {
      userId: row.user_id,
      summary: summarySchema.parse(JSON.parse(row.summary)),
      insights: insightsSchema.parse(JSON.parse(row.insights)),
      computedAt: row.computed_at,
    };
  }

  delete(userId: string): boolean {
    return this.db.prepare("DELETE FROM pattern_snapshots WHERE user_id = ?").run(userId).changes > 0;
  }
}
