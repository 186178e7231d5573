import { parseLearningConfig } from "../config/schema.js";
import type { LearningConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { TextAnalyzer } from "./analyzer.js";
import { factKey } from "./confidence.js";
import type { IntentRule } from "./intent-rules.js";
import { generateInsights } from "./insights.js";
import { buildLexicon, type Lexicon } from "./lexicon.js";
import { FactMerger } from "./merger.js";
import { PatternTracker } from "./patterns.js";
import { FactSynthesizer } from "./synthesizer.js";
import type {
  AnalysisResult,
  AnalyzedInteraction,
  HistoryEntry,
  LearnInput,
  LearningResult,
  PatternSummary,
} from "./types.js";

export interface EngineDeps {
  readonly clock?: () => number;
  readonly idFactory?: () => string;
  readonly intentRules?: readonly IntentRule[];
  readonly logger?: Logger;
}

/**
 * Runs one learning cycle: analyze the new interaction, summarize the
 * user's history, synthesize candidate facts and merge them into the
 * existing fact set. Performs no I/O; the caller persists the result.
 *
 * Construction validates the configuration and throws ConfigurationError.
 */
export class LearningEngine {
  readonly config: LearningConfig;
  readonly lexicon: Lexicon;
  private readonly analyzer: TextAnalyzer;
  private readonly tracker: PatternTracker;
  private readonly synthesizer: FactSynthesizer;
  private readonly merger: FactMerger;
  private readonly logger: Logger | undefined;

  constructor(config: unknown = {}, deps: EngineDeps = {}) {
    this.config = parseLearningConfig(config);
    this.lexicon = buildLexicon(this.config.lexicon);
    this.analyzer = new TextAnalyzer(this.lexicon, {
      negationWindow: this.config.negationWindow,
      intentRules: deps.intentRules,
    });
    this.tracker = new PatternTracker({
      briefTokenThreshold: this.config.briefTokenThreshold,
      trendEpsilon: this.config.trendEpsilon,
      timezone: this.config.timezone,
      styleIndicators: this.lexicon.styleIndicators,
    });
    this.synthesizer = new FactSynthesizer(this.lexicon);
    this.merger = new FactMerger({
      thresholds: this.config.confidenceThresholds,
      clock: deps.clock,
      idFactory: deps.idFactory,
    });
    this.logger = deps.logger;
  }

  analyze(text: string): AnalysisResult {
    return this.analyzer.analyze(text);
  }

  summarize(history: readonly AnalyzedInteraction[]): PatternSummary {
    return this.tracker.summarize(history);
  }

  learn(input: LearnInput): LearningResult {
    const { interaction, existingFacts } = input;
    const analysis = this.analyzer.analyze(interaction.text);
    const analyzed = new Map<string, AnalysisResult>([[interaction.id, analysis]]);

    const timeline: AnalyzedInteraction[] = [];
    for (const entry of this.orderedHistory(input)) {
      if (entry.interaction.id === interaction.id) {
        timeline.push({ interaction: entry.interaction, analysis });
        continue;
      }
      if (entry.analysis) {
        timeline.push({ interaction: entry.interaction, analysis: entry.analysis });
        continue;
      }
      if (!entry.interaction.text.trim()) continue;
      const result = this.analyzer.analyze(entry.interaction.text);
      analyzed.set(entry.interaction.id, result);
      timeline.push({ interaction: entry.interaction, analysis: result });
    }

    const summary = this.tracker.summarize(timeline);
    const insights = generateInsights(timeline, summary);

    if (timeline.length < this.config.minInteractionsForLearning) {
      this.logger?.debug(
        { userId: interaction.userId, count: timeline.length, required: this.config.minInteractionsForLearning },
        "Not enough interactions to learn from yet",
      );
      return {
        userId: interaction.userId,
        analysis,
        analyzed,
        summary,
        candidates: [],
        upserts: [],
        rejected: [],
        insights,
        skipped: true,
      };
    }

    const candidates = this.synthesizer.synthesize(analysis, summary, interaction);
    const upserts = this.merger.merge(existingFacts, candidates, interaction.userId);
    const rejected = candidates.filter(
      (c) => existingFacts.get(factKey(c.category, c.key))?.review === "rejected",
    );

    this.logger?.debug(
      {
        userId: interaction.userId,
        interactionId: interaction.id,
        candidates: candidates.length,
        upserts: upserts.length,
        rejected: rejected.length,
      },
      "Learning cycle complete",
    );

    return {
      userId: interaction.userId,
      analysis,
      analyzed,
      summary,
      candidates,
      upserts,
      rejected,
      insights,
      skipped: false,
    };
  }

  /** The user's history plus the new interaction, oldest first. */
  private orderedHistory({ interaction, history }: LearnInput): HistoryEntry[] {
    const entries = history.filter((h) => h.interaction.userId === interaction.userId);
    if (!entries.some((h) => h.interaction.id === interaction.id)) {
      entries.push({ interaction });
    }
    // Array#sort is stable, so equal timestamps keep insertion order.
    return entries.sort((a, b) => a.interaction.occurredAt - b.interaction.occurredAt);
  }
}
