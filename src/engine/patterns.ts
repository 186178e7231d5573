import { InsufficientDataError } from "./errors.js";
import { tokenize } from "./tokenize.js";
import {
  COMMUNICATION_TONES,
  type AnalyzedInteraction,
  type CommunicationTone,
  type PatternSummary,
  type SentimentTrend,
  type StyleScores,
  type TopicCount,
} from "./types.js";

export interface PatternTrackerOptions {
  readonly briefTokenThreshold: number;
  readonly trendEpsilon: number;
  readonly timezone: string;
  readonly styleIndicators: ReadonlyMap<CommunicationTone, readonly (readonly string[])[]>;
}

export interface LocalTime {
  readonly hour: number;
  /** 0 = Sunday */
  readonly weekday: number;
}

const WEEKDAY_ABBREVIATIONS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const TOP_TOPIC_LIMIT = 10;
const HOUR_MS = 3_600_000;
const DAY_MS = 86_400_000;

const formatters = new Map<string, Intl.DateTimeFormat>();

export function localTime(timestamp: number, timezone: string): LocalTime {
  let fmt = formatters.get(timezone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hour: "numeric",
      hourCycle: "h23",
      weekday: "short",
    });
    formatters.set(timezone, fmt);
  }

  const parts = fmt.formatToParts(new Date(timestamp));
  const hour = Number(parts.find((p) => p.type === "hour")?.value ?? "0") % 24;
  const weekday = WEEKDAY_ABBREVIATIONS.indexOf(parts.find((p) => p.type === "weekday")?.value ?? "");
  return { hour, weekday: weekday === -1 ? new Date(timestamp).getUTCDay() : weekday };
}

/** Key with the highest count; ties go to the smallest key. */
export function modeOf(histogram: Record<number, number>): number {
  let best = -1;
  let bestCount = 0;
  for (const [rawKey, count] of Object.entries(histogram)) {
    const key = Number(rawKey);
    if (count > bestCount || (count === bestCount && key < best)) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sentimentTrend(sentiments: readonly number[], epsilon: number): SentimentTrend {
  if (sentiments.length < 3) return "stable";

  const third = Math.floor(sentiments.length / 3);
  const earliest = mean(sentiments.slice(0, third));
  const recent = mean(sentiments.slice(sentiments.length - third));
  const delta = recent - earliest;

  if (delta > epsilon) return "improving";
  if (delta < -epsilon) return "declining";
  return "stable";
}

function countPhrase(tokens: readonly string[], phrase: readonly string[]): number {
  let hits = 0;
  for (let i = 0; i + phrase.length <= tokens.length; i++) {
    if (phrase.every((word, j) => tokens[i + j] === word)) hits++;
  }
  return hits;
}

/** Indicator hits per tone, as a share of the message's tokens. */
export function styleScoresOf(
  tokens: readonly string[],
  indicators: PatternTrackerOptions["styleIndicators"],
): StyleScores {
  const score = (tone: CommunicationTone): number => {
    if (tokens.length === 0) return 0;
    const hits = (indicators.get(tone) ?? []).reduce((sum, phrase) => sum + countPhrase(tokens, phrase), 0);
    return hits / tokens.length;
  };
  return {
    formal: score("formal"),
    casual: score("casual"),
    technical: score("technical"),
    friendly: score("friendly"),
  };
}

export function dominantToneOf(scores: StyleScores): CommunicationTone | null {
  let best: CommunicationTone | null = null;
  for (const tone of COMMUNICATION_TONES) {
    if (scores[tone] > (best === null ? 0 : scores[best])) best = tone;
  }
  return best;
}

/**
 * Aggregates a user's analyzed history into a PatternSummary.
 * Always recomputed from the full history, oldest first.
 */
export class PatternTracker {
  constructor(private readonly options: PatternTrackerOptions) {}

  summarize(history: readonly AnalyzedInteraction[]): PatternSummary {
    if (history.length === 0) {
      throw new InsufficientDataError("No interactions to summarize yet", 0, 1);
    }

    const hours: Record<number, number> = {};
    const days: Record<number, number> = {};
    const topicCounts = new Map<string, number>();
    const sentiments: number[] = [];
    let first = Infinity;
    let last = -Infinity;
    const toneTotals = { formal: 0, casual: 0, technical: 0, friendly: 0 };
    let tokenTotal = 0;

    for (const { interaction, analysis } of history) {
      const { hour, weekday } = localTime(interaction.occurredAt, this.options.timezone);
      hours[hour] = (hours[hour] ?? 0) + 1;
      days[weekday] = (days[weekday] ?? 0) + 1;

      sentiments.push(analysis.sentiment);
      first = Math.min(first, interaction.occurredAt);
      last = Math.max(last, interaction.occurredAt);
      const tokens = tokenize(interaction.text);
      tokenTotal += tokens.length;

      const scores = styleScoresOf(tokens, this.options.styleIndicators);
      for (const tone of COMMUNICATION_TONES) toneTotals[tone] += scores[tone];

      for (const topic of analysis.topics) {
        topicCounts.set(topic, (topicCounts.get(topic) ?? 0) + 1);
      }
    }

    const avgTokenCount = tokenTotal / history.length;
    const topTopics: TopicCount[] = [...topicCounts.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, TOP_TOPIC_LIMIT)
      .map(([topic, count]) => ({ topic, count }));

    const styleScores: StyleScores = {
      formal: toneTotals.formal / history.length,
      casual: toneTotals.casual / history.length,
      technical: toneTotals.technical / history.length,
      friendly: toneTotals.friendly / history.length,
    };

    return {
      interactionCount: history.length,
      avgSentiment: mean(sentiments),
      activeHourHistogram: hours,
      activeDayHistogram: days,
      peakHour: modeOf(hours),
      peakDay: modeOf(days),
      avgTokenCount,
      dominantStyle: avgTokenCount < this.options.briefTokenThreshold ? "brief" : "detailed",
      sentimentTrend: sentimentTrend(sentiments, this.options.trendEpsilon),
      topTopics,
      styleScores,
      dominantTone: dominantToneOf(styleScores),
      avgHoursBetween: history.length < 2 ? null : (last - first) / (history.length - 1) / HOUR_MS,
      activeSpanDays: Math.floor((last - first) / DAY_MS),
    };
  }
}
