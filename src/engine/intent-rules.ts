import type { Lexicon, PreferenceMarkerDef } from "./lexicon.js";
import type { Intent, PreferenceFamily } from "./types.js";

export interface IntentContext {
  /** Original text, trimmed. */
  readonly text: string;
  readonly tokens: readonly string[];
  readonly lexicon: Lexicon;
}

export interface IntentRule {
  readonly id: string;
  readonly intent: Intent;
  matches(ctx: IntentContext): boolean;
}

export interface PreferenceMarker {
  /** The marker phrase as listed in the lexicon, e.g. "can't stand". */
  readonly phrase: string;
  readonly family: PreferenceFamily;
  /** Sentence prefix for the fact value, e.g. "Loves". */
  readonly prefix: string;
  readonly negated: boolean;
  /** Index of the first token after the marker phrase. */
  readonly objectStart: number;
}

/** What a marker ends up asserting once negation is applied. */
export interface PreferenceStance {
  readonly family: PreferenceFamily;
  readonly prefix: string;
}

const MAX_MARKER_GAP = 3;

/** First-person subjects and the words their contraction stands for. */
const SUBJECTS = new Map<string, readonly string[]>([
  ["i", []],
  ["i'm", ["am"]],
  ["i'd", ["would"]],
  ["i've", ["have"]],
]);

function matchMarker(
  tokens: readonly string[],
  start: number,
  implied: readonly string[],
  marker: PreferenceMarkerDef,
  lexicon: Lexicon,
): { negated: boolean; objectStart: number } | null {
  let matched = 0;
  let gaps = 0;
  let negated = false;
  let pos = start;

  for (const word of implied) {
    if (marker.phrase[matched] === word) matched++;
  }

  while (matched < marker.phrase.length) {
    const token = tokens[pos];
    if (token === undefined) return null;
    if (token === marker.phrase[matched]) {
      matched++;
    } else if (gaps < MAX_MARKER_GAP && (lexicon.intensifiers.has(token) || lexicon.negationWords.has(token))) {
      gaps++;
      if (lexicon.negationWords.has(token)) negated = !negated;
    } else {
      return null;
    }
    pos++;
  }

  return pos > start ? { negated, objectStart: pos } : null;
}

/**
 * Finds the first first-person preference marker ("I love", "I'm a fan of",
 * "I can't stand", "I need help with"). Up to three intensifier or negation
 * tokens may sit inside the marker ("I really like", "I don't like"); the
 * longest phrase matching at a subject wins, the earlier-listed one on a tie.
 */
export function findPreferenceMarker(tokens: readonly string[], lexicon: Lexicon): PreferenceMarker | null {
  for (let i = 0; i < tokens.length; i++) {
    const implied = SUBJECTS.get(tokens[i]);
    if (implied === undefined) continue;

    let best: PreferenceMarker | null = null;
    let bestLength = 0;
    for (const marker of lexicon.preferenceMarkers) {
      if (marker.phrase.length <= bestLength) continue;
      const match = matchMarker(tokens, i + 1, implied, marker, lexicon);
      if (!match) continue;
      bestLength = marker.phrase.length;
      best = {
        phrase: marker.phrase.join(" "),
        family: marker.family,
        prefix: marker.prefix,
        negated: match.negated,
        objectStart: match.objectStart,
      };
    }
    if (best) return best;
  }
  return null;
}

/**
 * A negated like reads as a dislike. A negated dislike, need or skill
 * asserts nothing ("I don't hate jazz" is not "Dislikes jazz").
 */
export function preferenceStance(marker: PreferenceMarker): PreferenceStance | null {
  if (!marker.negated) return { family: marker.family, prefix: marker.prefix };
  if (marker.family === "likes") return { family: "dislikes", prefix: "Dislikes" };
  return null;
}

export const questionRule: IntentRule = {
  id: "question",
  intent: "question",
  matches({ text, tokens, lexicon }) {
    if (text.endsWith("?")) return true;
    const first = tokens[0];
    return first !== undefined && lexicon.interrogatives.has(first);
  },
};

export const preferenceRule: IntentRule = {
  id: "preference",
  intent: "preference",
  matches({ tokens, lexicon }) {
    return findPreferenceMarker(tokens, lexicon) !== null;
  },
};

export const statementRule: IntentRule = {
  id: "statement",
  intent: "statement",
  matches({ tokens }) {
    return tokens.length > 0;
  },
};

/** Evaluated in order; the first match wins. */
export const builtinIntentRules: readonly IntentRule[] = [questionRule, preferenceRule, statementRule];

export function classifyIntent(ctx: IntentContext, rules: readonly IntentRule[] = builtinIntentRules): Intent {
  for (const rule of rules) {
    if (rule.matches(ctx)) return rule.intent;
  }
  return "other";
}
