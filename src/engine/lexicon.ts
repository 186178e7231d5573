import { readFileSync } from "node:fs";
import { z } from "zod";
import { preferenceMarkerSchema, styleIndicatorsSchema } from "../config/schema.js";
import type { LexiconOverrides, PreferenceMarkerEntry } from "../config/types.js";
import { ConfigurationError } from "./errors.js";
import { tokenize } from "./tokenize.js";
import { COMMUNICATION_TONES, type CommunicationTone, type PreferenceFamily } from "./types.js";

const DEFAULT_LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

const lexiconFileSchema = z.object({
  stopwords: z.array(z.string()),
  positiveWords: z.array(z.string()),
  negativeWords: z.array(z.string()),
  negationWords: z.array(z.string()),
  interrogatives: z.array(z.string()),
  intensifiers: z.array(z.string()),
  genericTopics: z.array(z.string()),
  preferenceMarkers: z.array(preferenceMarkerSchema),
  styleIndicators: styleIndicatorsSchema,
  topicDictionary: z.record(z.string(), z.array(z.string())),
});

export type LexiconData = z.infer<typeof lexiconFileSchema>;

/**
 * Immutable word lists the analyzer and synthesizer work from.
 * Built once per engine; never mutated after construction.
 */
export interface Lexicon {
  readonly stopwords: ReadonlySet<string>;
  readonly positiveWords: ReadonlySet<string>;
  readonly negativeWords: ReadonlySet<string>;
  readonly negationWords: ReadonlySet<string>;
  readonly interrogatives: ReadonlySet<string>;
  readonly intensifiers: ReadonlySet<string>;
  readonly genericTopics: ReadonlySet<string>;
  readonly preferenceMarkers: readonly PreferenceMarkerDef[];
  /** Every word of every marker phrase; none of them is a topic. */
  readonly markerWords: ReadonlySet<string>;
  /** Tokenized indicator words and phrases per tone. */
  readonly styleIndicators: ReadonlyMap<CommunicationTone, readonly (readonly string[])[]>;
  /** keyword (one or two words) -> topic label */
  readonly topicKeywords: ReadonlyMap<string, string>;
  readonly topicLabels: ReadonlySet<string>;
}

export interface PreferenceMarkerDef {
  readonly phrase: readonly string[];
  readonly family: PreferenceFamily;
  readonly prefix: string;
}

let cachedDefault: LexiconData | null = null;

export function loadDefaultLexicon(): LexiconData {
  if (!cachedDefault) {
    const raw = JSON.parse(readFileSync(DEFAULT_LEXICON_URL, "utf-8")) as unknown;
    cachedDefault = lexiconFileSchema.parse(raw);
  }
  return cachedDefault;
}

function normalizeList(words: readonly string[]): Set<string> {
  return new Set(words.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0));
}

export function buildLexicon(overrides: LexiconOverrides = {}, base: LexiconData = loadDefaultLexicon()): Lexicon {
  const positiveWords = normalizeList(overrides.positiveWords ?? base.positiveWords);
  const negativeWords = normalizeList(overrides.negativeWords ?? base.negativeWords);

  const overlap = [...positiveWords].filter((w) => negativeWords.has(w));
  if (overlap.length > 0) {
    throw new ConfigurationError(
      `Sentiment lexicon is not disjoint: ${overlap.join(", ")}`,
      overlap.map((w) => `lexicon: "${w}" is both positive and negative`),
    );
  }

  const preferenceMarkers = buildMarkers(overrides.preferenceMarkers ?? base.preferenceMarkers);
  const markerWords = new Set(preferenceMarkers.flatMap((m) => m.phrase));

  const styleIndicators = new Map<CommunicationTone, string[][]>();
  for (const tone of COMMUNICATION_TONES) {
    const words = overrides.styleIndicators?.[tone] ?? base.styleIndicators[tone];
    styleIndicators.set(
      tone,
      words.map((w) => tokenize(w)).filter((phrase) => phrase.length > 0),
    );
  }

  const topicKeywords = new Map<string, string>();
  const topicLabels = new Set<string>();
  for (const [label, keywords] of Object.entries(overrides.topicDictionary ?? base.topicDictionary)) {
    const normalizedLabel = label.trim().toLowerCase();
    topicLabels.add(normalizedLabel);
    for (const keyword of keywords) {
      const normalized = keyword.trim().toLowerCase().split(/\s+/).join(" ");
      if (normalized.split(" ").length > 2) {
        throw new ConfigurationError(`Topic keyword "${keyword}" has more than two words`, [
          `lexicon.topicDictionary.${label}: keywords may have at most two words`,
        ]);
      }
      // First label wins for keywords listed twice.
      if (!topicKeywords.has(normalized)) topicKeywords.set(normalized, normalizedLabel);
    }
  }

  return {
    stopwords: normalizeList(overrides.stopwords ?? base.stopwords),
    positiveWords,
    negativeWords,
    negationWords: normalizeList(overrides.negationWords ?? base.negationWords),
    interrogatives: normalizeList(overrides.interrogatives ?? base.interrogatives),
    intensifiers: normalizeList(overrides.intensifiers ?? base.intensifiers),
    genericTopics: normalizeList(overrides.genericTopics ?? base.genericTopics),
    preferenceMarkers,
    markerWords,
    styleIndicators,
    topicKeywords,
    topicLabels,
  };
}

function buildMarkers(entries: readonly PreferenceMarkerEntry[]): PreferenceMarkerDef[] {
  return entries.map((entry) => {
    const phrase = tokenize(entry.phrase);
    if (phrase.length === 0) {
      throw new ConfigurationError(`Preference marker "${entry.phrase}" has no words`, [
        "lexicon.preferenceMarkers: every phrase needs at least one word",
      ]);
    }
    return { phrase, family: entry.family, prefix: entry.prefix.trim() };
  });
}
