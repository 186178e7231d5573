import type { AnalyzedInteraction, PatternSummary, UserInsight } from "./types.js";

const ENGAGED_AFTER = 10;
const RECENT_WINDOW = 10;
const TONE_THRESHOLD = 0.1;
const QUESTIONS_FOR_LEARNER = 3;
const DAILY_HOURS = 24;
const WEEKLY_HOURS = 168;

function cadence(avgHours: number): string {
  if (avgHours <= DAILY_HOURS) return "User checks in at least daily";
  if (avgHours <= WEEKLY_HOURS) return "User checks in about weekly";
  return "User checks in occasionally";
}

/**
 * Coarse observations about a user. Not persisted as facts; they ride
 * along with the pattern snapshot for display.
 */
export function generateInsights(history: readonly AnalyzedInteraction[], summary: PatternSummary): UserInsight[] {
  const insights: UserInsight[] = [];

  if (summary.interactionCount > ENGAGED_AFTER) {
    insights.push({
      category: "engagement",
      insight: "User is highly engaged with frequent interactions",
      confidence: 0.8,
      evidence: [`Had ${summary.interactionCount} interactions`],
    });
  }

  const recent = history.slice(-RECENT_WINDOW);
  if (recent.length > 0) {
    const avg = recent.reduce((sum, h) => sum + h.analysis.sentiment, 0) / recent.length;
    if (avg > TONE_THRESHOLD) {
      insights.push({
        category: "communication",
        insight: "User generally communicates with positive sentiment",
        confidence: 0.7,
        evidence: [`Average sentiment: ${avg.toFixed(2)}`],
      });
    } else if (avg < -TONE_THRESHOLD) {
      insights.push({
        category: "communication",
        insight: "User often communicates with negative sentiment",
        confidence: 0.6,
        evidence: [`Average sentiment: ${avg.toFixed(2)}`],
      });
    }
  }

  const questions = history.filter((h) => h.analysis.intent === "question").length;
  if (questions > QUESTIONS_FOR_LEARNER) {
    insights.push({
      category: "learning",
      insight: "User prefers learning through asking questions",
      confidence: 0.6,
      evidence: [`Asked ${questions} questions`],
    });
  }

  if (summary.avgHoursBetween !== null) {
    insights.push({
      category: "frequency",
      insight: cadence(summary.avgHoursBetween),
      confidence: 0.5,
      evidence: [`Average gap: ${summary.avgHoursBetween.toFixed(1)} hours over ${summary.activeSpanDays} days`],
    });
  }

  return insights;
}
