import { findPreferenceMarker, preferenceStance } from "./intent-rules.js";
import type { Lexicon } from "./lexicon.js";
import { tokenize } from "./tokenize.js";
import type { AnalysisResult, CandidateFact, Interaction, PatternSummary, PreferenceFamily } from "./types.js";

/** Likes and dislikes of the same thing share a key so one replaces the other. */
const FAMILY_KEY_PREFIX: Record<PreferenceFamily, string> = {
  likes: "preference",
  dislikes: "preference",
  needs: "need",
  skills: "skill",
};

export const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export function slugify(phrase: string): string {
  return phrase.trim().toLowerCase().split(/\s+/).join("_");
}

export function interestValue(topic: string, sentiment: number): string {
  if (sentiment > 0) return `Shows interest in ${topic}`;
  if (sentiment < 0) return `Expresses frustration with ${topic}`;
  return `Mentions ${topic}`;
}

export function periodOfDay(hour: number): "morning" | "afternoon" | "evening" | "night" {
  if (hour >= 5 && hour <= 11) return "morning";
  if (hour >= 12 && hour <= 16) return "afternoon";
  if (hour >= 17 && hour <= 21) return "evening";
  return "night";
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

/**
 * Turns one interaction's analysis plus the latest pattern summary into
 * candidate facts. Every rule is independent; an interaction may yield none.
 */
export class FactSynthesizer {
  constructor(private readonly lexicon: Lexicon) {}

  synthesize(analysis: AnalysisResult, summary: PatternSummary, interaction: Interaction): CandidateFact[] {
    return [
      ...this.interestCandidates(analysis, interaction.id),
      ...this.preferenceCandidates(analysis, interaction),
      ...this.patternCandidates(summary, interaction.id),
    ];
  }

  interestCandidates(analysis: AnalysisResult, interactionId: string): CandidateFact[] {
    return analysis.topics
      .filter((topic) => !this.lexicon.genericTopics.has(topic))
      .map((topic): CandidateFact => ({
        category: "interest",
        key: `interest_${slugify(topic)}`,
        value: interestValue(topic, analysis.sentiment),
        supportingInteractionId: interactionId,
      }));
  }

  preferenceCandidates(analysis: AnalysisResult, interaction: Interaction): CandidateFact[] {
    if (analysis.intent !== "preference") return [];

    const tokens = tokenize(interaction.text);
    const marker = findPreferenceMarker(tokens, this.lexicon);
    if (!marker) return [];
    const stance = preferenceStance(marker);
    if (!stance) return [];

    const object = this.preferenceObject(tokens.slice(marker.objectStart));
    if (!object) return [];

    return [
      {
        category: "preference",
        key: `${FAMILY_KEY_PREFIX[stance.family]}_${slugify(object)}`,
        value: `${stance.prefix} ${object}`,
        supportingInteractionId: interaction.id,
      },
    ];
  }

  /** Longest run of non-stopword tokens; the earliest run wins a tie. */
  preferenceObject(tokens: readonly string[]): string | null {
    let best: string[] = [];
    let run: string[] = [];

    for (const token of [...tokens, ""]) {
      if (token && !this.lexicon.stopwords.has(token)) {
        run.push(token);
        continue;
      }
      if (run.length > best.length) best = run;
      run = [];
    }

    return best.length > 0 ? best.join(" ") : null;
  }

  patternCandidates(summary: PatternSummary, interactionId: string): CandidateFact[] {
    const candidates: CandidateFact[] = [];
    const push = (category: CandidateFact["category"], key: string, value: string): void => {
      candidates.push({ category, key, value, supportingInteractionId: interactionId });
    };

    if (summary.peakHour >= 0) {
      push("behavior", "active_hour", formatHour(summary.peakHour));
      push("temporal", "active_period", periodOfDay(summary.peakHour));
    }
    push("behavior", "communication_style", summary.dominantStyle);
    if (summary.dominantTone !== null) {
      push("behavior", "communication_tone", summary.dominantTone);
    }
    if (summary.interactionCount >= 3) {
      push("behavior", "sentiment_trend", summary.sentimentTrend);
    }
    const day = WEEKDAY_NAMES[summary.peakDay];
    if (day !== undefined) {
      push("temporal", "active_day", day);
    }

    return candidates;
  }
}
