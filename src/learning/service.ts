import { randomUUID } from "node:crypto";
import type { LearningEngine } from "../engine/engine.js";
import { InvalidInputError } from "../engine/errors.js";
import { factKey } from "../engine/confidence.js";
import type { FactCategory, LearnedFact } from "../engine/types.js";
import type { Logger } from "../logging/logger.js";
import type { LearningDB } from "../store/db.js";
import { FactStore } from "../store/facts.js";
import { InteractionStore } from "../store/interactions.js";
import { SnapshotStore } from "../store/snapshots.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import type { LearningBus } from "./bus.js";
import type {
  ForgetResult,
  HistoryPage,
  IngestParams,
  LearningOutcome,
  ReviewVerdict,
  UserProfile,
} from "./types.js";

const DAY_MS = 86_400_000;
const MAX_PAGE_SIZE = 500;

/**
 * Glue between the engine and the store. One learning cycle per user runs
 * at a time; each cycle's writes land in a single transaction.
 */
export class LearningService {
  private readonly interactions: InteractionStore;
  private readonly facts: FactStore;
  private readonly snapshots: SnapshotStore;
  private readonly locks = new KeyedLock();

  constructor(
    private readonly db: LearningDB,
    private readonly engine: LearningEngine,
    private readonly bus: LearningBus,
    private readonly logger: Logger,
  ) {
    this.interactions = new InteractionStore(db);
    this.facts = new FactStore(db);
    this.snapshots = new SnapshotStore(db);
  }

  async ingest(params: IngestParams): Promise<LearningOutcome> {
    if (!params.text.trim()) {
      throw new InvalidInputError("Interaction text must not be blank");
    }

    return this.locks.run(params.userId, () => {
      try {
        return this.runCycle(params);
      } catch (err) {
        this.logger.error({ err, userId: params.userId }, "Learning cycle failed");
        throw err;
      }
    });
  }

  getProfile(userId: string, category?: FactCategory): UserProfile {
    const snapshot = this.snapshots.get(userId);
    return {
      userId,
      interactionCount: this.interactions.count(userId),
      facts: this.facts.getFacts(userId, category),
      factStats: this.facts.stats(userId),
      summary: snapshot?.summary ?? null,
      insights: snapshot?.insights ?? [],
      computedAt: snapshot?.computedAt ?? null,
    };
  }

  /** A page of the user's interactions, newest first. */
  listInteractions(userId: string, limit = 50, offset = 0): HistoryPage {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
      throw new InvalidInputError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidInputError("offset must be a non-negative integer");
    }
    return {
      userId,
      total: this.interactions.count(userId),
      limit,
      offset,
      entries: this.interactions.list(userId, { limit, offset }),
    };
  }

  /**
   * Records the user's verdict on a fact. A rejected fact stays visible but
   * takes no further evidence; confirming it again lifts that.
   */
  async reviewFact(userId: string, factId: string, verdict: ReviewVerdict): Promise<LearnedFact> {
    return this.locks.run(userId, () => {
      const fact = this.facts.setReview(userId, factId, verdict);
      if (!fact) {
        throw new InvalidInputError(`No fact ${factId} for user ${userId}`);
      }
      this.bus.emit({ type: "fact_reviewed", userId, fact });
      this.logger.info({ userId, factId, verdict }, "Fact reviewed");
      return fact;
    });
  }

  /** Erases everything held about a user. */
  async forget(userId: string): Promise<ForgetResult> {
    return this.locks.run(userId, () => {
      const result = this.db.transaction(() => {
        const facts = this.facts.deleteUser(userId);
        const interactions = this.interactions.deleteUser(userId);
        this.snapshots.delete(userId);
        return { interactions, facts };
      });
      this.bus.emit({ type: "user_forgotten", userId, result });
      this.logger.info({ userId, ...result }, "User data erased");
      return result;
    });
  }

  /**
   * Drops interactions older than the retention window. Facts stay: they
   * keep the ids of their evidence, not the text.
   */
  purgeExpired(retentionDays: number, now = Date.now()): number {
    const removed = this.interactions.purgeOlderThan(retentionDays * DAY_MS, now);
    if (removed > 0) {
      this.logger.info({ removed, retentionDays }, "Purged expired interactions");
    }
    return removed;
  }

  private runCycle(params: IngestParams): LearningOutcome {
    const occurredAt = params.occurredAt ?? Date.now();
    const id = params.id ?? randomUUID();

    const { outcome, learned, reinforced } = this.db.transaction(() => {
      const interaction = this.interactions.record({
        id,
        userId: params.userId,
        text: params.text,
        occurredAt,
        interactionType: params.interactionType,
      });
      if (interaction.userId !== params.userId) {
        throw new InvalidInputError(`Interaction id ${id} already belongs to another user`);
      }
      const history = this.interactions.getHistory(params.userId);
      const existing = this.facts.getFactMap(params.userId);

      const result = this.engine.learn({ interaction, history, existingFacts: existing });

      for (const [interactionId, analysis] of result.analyzed) {
        this.interactions.saveAnalysis(interactionId, analysis);
      }
      this.facts.applyUpserts(result.upserts);
      this.snapshots.save(params.userId, result.summary, result.insights);

      const learned: LearnedFact[] = [];
      const reinforced: { fact: LearnedFact; previousEvidence: number }[] = [];
      for (const upsert of result.upserts) {
        if (upsert.kind === "insert") {
          learned.push(upsert.fact);
          continue;
        }
        const fact = this.facts.getFact(params.userId, upsert.category, upsert.key);
        const before = existing.get(factKey(upsert.category, upsert.key));
        if (fact && before && fact.evidenceCount > before.evidenceCount) {
          reinforced.push({ fact, previousEvidence: before.evidenceCount });
        }
      }

      return {
        outcome: {
          userId: params.userId,
          interactionId: interaction.id,
          analysis: result.analysis,
          summary: result.summary,
          insights: result.insights,
          learned,
          reinforced: reinforced.map((r) => r.fact),
          rejected: result.rejected,
          skipped: result.skipped,
        },
        learned,
        reinforced,
      };
    });

    for (const fact of learned) {
      this.bus.emit({ type: "fact_learned", userId: params.userId, fact });
    }
    for (const { fact, previousEvidence } of reinforced) {
      this.bus.emit({ type: "fact_reinforced", userId: params.userId, fact, previousEvidence });
    }
    this.bus.emit({ type: "patterns_refreshed", userId: params.userId, summary: outcome.summary });

    this.logger.info(
      {
        userId: params.userId,
        interactionId: outcome.interactionId,
        learned: learned.length,
        reinforced: reinforced.length,
        rejected: outcome.rejected.length,
        skipped: outcome.skipped,
      },
      "Learning cycle committed",
    );

    return outcome;
  }
}
