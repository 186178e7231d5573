import type {
  AnalysisResult,
  CandidateFact,
  FactReview,
  HistoryEntry,
  InteractionType,
  LearnedFact,
  PatternSummary,
  UserInsight,
} from "../engine/types.js";
import type { FactStats } from "../store/facts.js";

export interface IngestParams {
  readonly userId: string;
  readonly text: string;
  readonly interactionType?: InteractionType;
  /** Defaults to now. */
  readonly occurredAt?: number;
  /** Defaults to a random UUID. Re-ingesting a known id adds no evidence. */
  readonly id?: string;
}

export interface LearningOutcome {
  readonly userId: string;
  readonly interactionId: string;
  readonly analysis: AnalysisResult;
  readonly summary: PatternSummary;
  readonly insights: UserInsight[];
  readonly learned: LearnedFact[];
  readonly reinforced: LearnedFact[];
  /** Candidates that would have reinforced a fact the user rejected. */
  readonly rejected: CandidateFact[];
  readonly skipped: boolean;
}

export interface UserProfile {
  readonly userId: string;
  readonly interactionCount: number;
  readonly facts: LearnedFact[];
  readonly factStats: FactStats;
  readonly summary: PatternSummary | null;
  readonly insights: UserInsight[];
  readonly computedAt: number | null;
}

export interface HistoryPage {
  readonly userId: string;
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
  readonly entries: HistoryEntry[];
}

export type ReviewVerdict = Exclude<FactReview, "pending">;

export interface ForgetResult {
  readonly interactions: number;
  readonly facts: number;
}

// ── Learning Bus Events ──

export type LearningEvent =
  | { type: "fact_learned"; userId: string; fact: LearnedFact }
  | { type: "fact_reinforced"; userId: string; fact: LearnedFact; previousEvidence: number }
  | { type: "patterns_refreshed"; userId: string; summary: PatternSummary }
  | { type: "fact_reviewed"; userId: string; fact: LearnedFact }
  | { type: "user_forgotten"; userId: string; result: ForgetResult };
