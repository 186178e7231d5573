import { InvalidInputError } from "./errors.js";
import { builtinIntentRules, classifyIntent, type IntentRule } from "./intent-rules.js";
import type { Lexicon } from "./lexicon.js";
import { tokenize } from "./tokenize.js";
import type { AnalysisResult } from "./types.js";

export interface AnalyzerOptions {
  /** How many tokens before a sentiment word a negation may sit. */
  readonly negationWindow: number;
  readonly intentRules?: readonly IntentRule[];
}

export interface TopicExtraction {
  readonly topics: string[];
  readonly domains: string[];
}

/**
 * Lexicon-driven text analysis for a single interaction.
 * Stateless: the same text always yields the same result.
 */
export class TextAnalyzer {
  private readonly intentRules: readonly IntentRule[];

  constructor(
    private readonly lexicon: Lexicon,
    private readonly options: AnalyzerOptions,
  ) {
    this.intentRules = options.intentRules ?? builtinIntentRules;
  }

  analyze(text: string): AnalysisResult {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new InvalidInputError("Cannot analyze empty or whitespace-only text");
    }

    const tokens = tokenize(trimmed);
    const { topics, domains } = this.extractTopics(tokens);

    return {
      sentiment: this.scoreSentiment(tokens),
      topics,
      domains,
      intent: classifyIntent({ text: trimmed, tokens, lexicon: this.lexicon }, this.intentRules),
    };
  }

  scoreSentiment(tokens: readonly string[]): number {
    let positive = 0;
    let negative = 0;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      let polarity = this.lexicon.positiveWords.has(token) ? 1 : this.lexicon.negativeWords.has(token) ? -1 : 0;
      if (polarity === 0) continue;

      for (let j = Math.max(0, i - this.options.negationWindow); j < i; j++) {
        if (this.lexicon.negationWords.has(tokens[j])) {
          polarity = -polarity;
          break;
        }
      }

      if (polarity > 0) positive++;
      else negative++;
    }

    const score = (positive - negative) / Math.max(1, positive + negative);
    return Math.max(-1, Math.min(1, score));
  }

  extractTopics(tokens: readonly string[]): TopicExtraction {
    const { stopwords, topicKeywords, topicLabels } = this.lexicon;
    const consumed = new Set<number>();
    const topics = new Set<string>();
    const domains = new Set<string>();

    // Two-word keywords take precedence over their parts.
    for (let i = 0; i + 1 < tokens.length; i++) {
      const a = tokens[i];
      const b = tokens[i + 1];
      if (consumed.has(i) || stopwords.has(a) || stopwords.has(b)) continue;
      const phrase = `${a} ${b}`;
      const label = topicKeywords.get(phrase);
      if (label !== undefined) {
        topics.add(phrase);
        domains.add(label);
        consumed.add(i);
        consumed.add(i + 1);
      }
    }

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (consumed.has(i) || stopwords.has(token)) continue;
      const label = topicKeywords.get(token);
      if (label !== undefined) {
        topics.add(token);
        domains.add(label);
        consumed.add(i);
      }
    }

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (consumed.has(i) || !this.isInformative(token)) continue;
      // "jazz music": the specific keyword already says it
      if (topicLabels.has(token) && domains.has(token)) continue;
      topics.add(token);
    }

    return { topics: [...topics].sort(), domains: [...domains].sort() };
  }

  /** Rough noun filter for tokens outside the topic dictionary. */
  isInformative(token: string): boolean {
    const lx = this.lexicon;
    if (token.length <= 2 || /^\d+$/.test(token) || token.includes("'")) return false;
    if (lx.stopwords.has(token) || lx.negationWords.has(token)) return false;
    if (lx.positiveWords.has(token) || lx.negativeWords.has(token)) return false;
    if (lx.markerWords.has(token) || lx.intensifiers.has(token)) return false;
    if (token.length >= 6 && token.endsWith("ing")) return false;
    if (token.length >= 5 && token.endsWith("ly")) return false;
    return true;
  }
}
