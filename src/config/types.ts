import type { CommunicationTone, PreferenceFamily } from "../engine/types.js";

export interface LearnloopConfig {
  readonly learning: LearningConfig;
  readonly storage: StorageConfig;
  readonly privacy: PrivacyConfig;
  readonly logging: LoggingConfig;
}

export interface ConfidenceThresholds {
  /** Highest evidence count that is still "low". */
  readonly lowMax: number;
  /** Highest evidence count that is still "medium"; anything above is "high". */
  readonly mediumMax: number;
}

export interface LearningConfig {
  readonly minInteractionsForLearning: number;
  readonly confidenceThresholds: ConfidenceThresholds;
  readonly briefTokenThreshold: number;
  readonly trendEpsilon: number;
  readonly negationWindow: number;
  /** IANA zone used to read the local hour and weekday of an interaction. */
  readonly timezone: string;
  readonly lexicon: LexiconOverrides;
}

/**
 * Per-deployment replacements for the bundled lexicon (data/lexicon.json).
 * A field that is set replaces the bundled list wholesale.
 */
export interface LexiconOverrides {
  readonly stopwords?: string[];
  readonly positiveWords?: string[];
  readonly negativeWords?: string[];
  readonly negationWords?: string[];
  readonly interrogatives?: string[];
  readonly intensifiers?: string[];
  readonly genericTopics?: string[];
  readonly preferenceMarkers?: PreferenceMarkerEntry[];
  /** Words or two-word phrases per tone; a tone left out keeps the bundled list. */
  readonly styleIndicators?: Partial<Record<CommunicationTone, string[]>>;
  /** topic label -> keywords (single words or two-word phrases) */
  readonly topicDictionary?: Record<string, string[]>;
}

/** A first-person marker phrase, e.g. "can't stand" -> dislikes, "Can't stand". */
export interface PreferenceMarkerEntry {
  /** Words after the subject: "i'm" reads as "i am", "i'd" as "i would", "i've" as "i have". */
  readonly phrase: string;
  readonly family: PreferenceFamily;
  /** Sentence prefix for the fact value. */
  readonly prefix: string;
}

export interface StorageConfig {
  /** Absolute, or relative to the state dir. */
  readonly dbFile: string;
}

export interface PrivacyConfig {
  readonly retentionDays: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
