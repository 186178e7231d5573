import {
  COMMUNICATION_TONES,
  CONFIDENCE_TIERS,
  FACT_CATEGORIES,
  type AnalysisResult,
  type HistoryEntry,
  type LearnedFact,
  type PatternSummary,
  type UserInsight,
} from "../engine/types.js";
import type { FactStats } from "../store/facts.js";

export function formatAnalysis(analysis: AnalysisResult): string {
  return (
    `Sentiment: ${analysis.sentiment.toFixed(2)}\n` +
    `Intent:    ${analysis.intent}\n` +
    `Topics:    ${analysis.topics.length > 0 ? analysis.topics.join(", ") : "(none)"}\n` +
    `Domains:   ${analysis.domains.length > 0 ? analysis.domains.join(", ") : "(none)"}\n`
  );
}

export function formatFact(fact: LearnedFact, withId = false): string {
  const id = withId ? `${fact.id}  ` : "";
  const review = fact.review === "pending" ? "" : ` [${fact.review}]`;
  return `${id}${fact.category}/${fact.key} = ${fact.value} (${fact.confidence}, ${fact.evidenceCount})${review}`;
}

export function formatFactStats(stats: FactStats): string {
  const categories = FACT_CATEGORIES.map((c) => `${c}=${stats.byCategory[c]}`).join(" ");
  const tiers = CONFIDENCE_TIERS.map((t) => `${t}=${stats.byConfidence[t]}`).join(" ");
  return `Facts:           ${stats.total} (${categories})
` + `Confidence:      ${tiers}
`;
}

export function formatHistoryEntry({ interaction, analysis }: HistoryEntry): string {
  const when = new Date(interaction.occurredAt).toISOString();
  const scored = analysis ? `  (${analysis.sentiment.toFixed(2)}, ${analysis.intent})` : "";
  return `${when}  ${interaction.interactionType}  ${interaction.text}${scored}`;
}

function formatHistogram(histogram: Record<number, number>, label: (key: number) => string): string {
  const entries = Object.entries(histogram).map(([key, count]) => `${label(Number(key))}=${count}`);
  return entries.length > 0 ? entries.join(" ") : "(none)";
}

const DAY_LABELS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

export function formatSummary(summary: PatternSummary): string {
  const topics = summary.topTopics.map((t) => `${t.topic} (${t.count})`).join(", ");
  return (
    `Interactions:    ${summary.interactionCount}\n` +
    `Avg sentiment:   ${summary.avgSentiment.toFixed(2)}\n` +
    `Sentiment trend: ${summary.sentimentTrend}\n` +
    `Style:           ${summary.dominantStyle} (${summary.avgTokenCount.toFixed(1)} tokens/message)\n` +
    `Active hours:    ${formatHistogram(summary.activeHourHistogram, (h) => String(h).padStart(2, "0"))}\n` +
    `Active days:     ${formatHistogram(summary.activeDayHistogram, (d) => DAY_LABELS[d] ?? String(d))}\n` +
    `Top topics:      ${topics || "(none)"}\n` +
    `Tone:            ${summary.dominantTone ?? "(none)"}\n` +
    `Tone scores:     ${COMMUNICATION_TONES.map((t) => `${t}=${summary.styleScores[t].toFixed(2)}`).join(" ")}\n` +
    `Cadence:         ${formatCadence(summary)}\n`
  );
}

function formatCadence(summary: PatternSummary): string {
  if (summary.avgHoursBetween === null) return "(needs two interactions)";
  return `every ${summary.avgHoursBetween.toFixed(1)} hours over ${summary.activeSpanDays} days`;
}

export function formatInsights(insights: readonly UserInsight[]): string {
  return insights.map((i) => `  - [${i.category}] ${i.insight} (${i.evidence.join("; ")})\n`).join("");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
