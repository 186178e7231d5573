// ── Interactions ──

export type InteractionType = "message" | "preference" | "feedback" | "behavior" | "explicit" | "implicit";

export const INTERACTION_TYPES: readonly InteractionType[] = [
  "message",
  "preference",
  "feedback",
  "behavior",
  "explicit",
  "implicit",
];

export interface Interaction {
  readonly id: string;
  readonly userId: string;
  readonly text: string;
  readonly occurredAt: number;
  readonly interactionType: InteractionType;
}

// ── Analysis ──

export type Intent = "statement" | "question" | "preference" | "other";

/** What a first-person marker says about its object: "I love", "I can't stand", "I need help with". */
export type PreferenceFamily = "likes" | "dislikes" | "needs" | "skills";

export const PREFERENCE_FAMILIES: readonly PreferenceFamily[] = ["likes", "dislikes", "needs", "skills"];

export interface AnalysisResult {
  readonly sentiment: number;
  /** Sorted, de-duplicated. */
  readonly topics: string[];
  readonly intent: Intent;
  /** Topic dictionary labels matched by the text, e.g. "music" for "guitar". */
  readonly domains: string[];
}

export interface AnalyzedInteraction {
  readonly interaction: Interaction;
  readonly analysis: AnalysisResult;
}

/** History entry as a store hands it over; analysis may not be cached yet. */
export interface HistoryEntry {
  readonly interaction: Interaction;
  readonly analysis?: AnalysisResult | null;
}

// ── Patterns ──

export type CommunicationStyle = "brief" | "detailed";
export type SentimentTrend = "improving" | "declining" | "stable";
export type CommunicationTone = "formal" | "casual" | "technical" | "friendly";

export const COMMUNICATION_TONES: readonly CommunicationTone[] = ["formal", "casual", "technical", "friendly"];

/** Mean share of tokens per interaction that hit each tone's indicators. */
export type StyleScores = Readonly<Record<CommunicationTone, number>>;

export interface TopicCount {
  readonly topic: string;
  readonly count: number;
}

export interface PatternSummary {
  readonly interactionCount: number;
  readonly avgSentiment: number;
  /** hour (0-23) -> interactions */
  readonly activeHourHistogram: Record<number, number>;
  /** weekday (0 = Sunday) -> interactions */
  readonly activeDayHistogram: Record<number, number>;
  readonly peakHour: number;
  readonly peakDay: number;
  readonly avgTokenCount: number;
  readonly dominantStyle: CommunicationStyle;
  readonly sentimentTrend: SentimentTrend;
  readonly topTopics: TopicCount[];
  readonly styleScores: StyleScores;
  /** Highest non-zero style score; the first tone in COMMUNICATION_TONES wins a tie. */
  readonly dominantTone: CommunicationTone | null;
  /** Mean gap between consecutive interactions; null below two interactions. */
  readonly avgHoursBetween: number | null;
  /** Whole days between the first and the last interaction. */
  readonly activeSpanDays: number;
}

// ── Facts ──

export type FactCategory = "preference" | "interest" | "behavior" | "temporal";
export type ConfidenceTier = "low" | "medium" | "high";

export const FACT_CATEGORIES: readonly FactCategory[] = ["preference", "interest", "behavior", "temporal"];
export const CONFIDENCE_TIERS: readonly ConfidenceTier[] = ["low", "medium", "high"];

/** A user's verdict on a fact. Rejected facts no longer take evidence. */
export type FactReview = "pending" | "confirmed" | "rejected";

export const FACT_REVIEWS: readonly FactReview[] = ["pending", "confirmed", "rejected"];

export interface LearnedFact {
  readonly id: string;
  readonly userId: string;
  readonly category: FactCategory;
  readonly key: string;
  readonly value: string;
  readonly confidence: ConfidenceTier;
  readonly evidenceCount: number;
  readonly supportingInteractionIds: string[];
  readonly firstSeen: number;
  readonly lastUpdated: number;
  readonly review: FactReview;
}

export interface CandidateFact {
  readonly category: FactCategory;
  readonly key: string;
  readonly value: string;
  readonly supportingInteractionId: string;
}

export type FactUpsert =
  | { readonly kind: "insert"; readonly fact: LearnedFact }
  | {
      readonly kind: "update";
      readonly factId: string;
      readonly category: FactCategory;
      readonly key: string;
      readonly evidenceCount: number;
      readonly value: string;
      readonly confidence: ConfidenceTier;
      readonly supportingInteractionIds: string[];
      readonly lastUpdated: number;
    };

/** Existing facts keyed by `category:key` (see factKey). */
export type FactMap = ReadonlyMap<string, LearnedFact>;

// ── Insights ──

export type InsightCategory = "engagement" | "communication" | "learning" | "frequency";

export interface UserInsight {
  readonly category: InsightCategory;
  readonly insight: string;
  readonly confidence: number;
  readonly evidence: string[];
}

// ── Learning cycle ──

export interface LearnInput {
  readonly interaction: Interaction;
  readonly history: readonly HistoryEntry[];
  readonly existingFacts: FactMap;
}

export interface LearningResult {
  readonly userId: string;
  readonly analysis: AnalysisResult;
  /** Analyses computed during this cycle, keyed by interaction id, for the store to cache. */
  readonly analyzed: ReadonlyMap<string, AnalysisResult>;
  readonly summary: PatternSummary;
  readonly candidates: CandidateFact[];
  readonly upserts: FactUpsert[];
  /** Candidates held back because the user rejected the fact they would reinforce. */
  readonly rejected: CandidateFact[];
  readonly insights: UserInsight[];
  /** True when history was below minInteractionsForLearning. */
  readonly skipped: boolean;
}
