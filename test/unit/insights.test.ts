import { describe, it, expect } from "vitest";
import { generateInsights } from "../../src/engine/insights.js";
import { buildLexicon } from "../../src/engine/lexicon.js";
import { PatternTracker } from "../../src/engine/patterns.js";
import type { AnalyzedInteraction, Intent } from "../../src/engine/types.js";

const tracker = new PatternTracker({
  briefTokenThreshold: 15,
  trendEpsilon: 0.15,
  timezone: "UTC",
  styleIndicators: buildLexicon().styleIndicators,
});

const DAY = 86_400_000;

function history(sentiments: number[], intent: Intent = "statement", gapMs = 1_000): AnalyzedInteraction[] {
  return sentiments.map((sentiment, i) => ({
    interaction: { id: `m${i}`, userId: "u1", text: "x", occurredAt: i * gapMs, interactionType: "message" },
    analysis: { sentiment, topics: [], domains: [], intent },
  }));
}

function insightsFor(entries: AnalyzedInteraction[]) {
  return generateInsights(entries, tracker.summarize(entries));
}

describe("generateInsights", () => {
  it("says nothing about a neutral first interaction", () => {
    expect(insightsFor(history([0]))).toEqual([]);
  });

  it("flags engagement past ten interactions", () => {
    const insights = insightsFor(history(Array.from({ length: 11 }, () => 0)));
    expect(insights.filter((i) => i.category === "engagement")).toEqual([
      {
        category: "engagement",
        insight: "User is highly engaged with frequent interactions",
        confidence: 0.8,
        evidence: ["Had 11 interactions"],
      },
    ]);
  });

  it("reads tone from the last ten interactions only", () => {
    const entries = history([-1, -1, -1, 0, 0, 0, 0, 0, 0, 0, 0.5, 0.5, 0.5]);
    const [tone] = insightsFor(entries).filter((i) => i.category === "communication");
    expect(tone?.insight).toBe("User generally communicates with positive sentiment");
    expect(tone?.evidence).toEqual(["Average sentiment: 0.15"]);
  });

  it("notices a negative tone", () => {
    const [tone] = insightsFor(history([-0.5, -0.5]));
    expect(tone).toMatchObject({ category: "communication", confidence: 0.6 });
  });

  it("spots a user who learns by asking", () => {
    const insights = insightsFor(history([0, 0, 0, 0], "question"));
    expect(insights.filter((i) => i.category === "learning").map((i) => i.evidence[0])).toEqual([
      "Asked 4 questions",
    ]);
  });

  it("describes how often the user checks in", () => {
    const cadence = (entries: AnalyzedInteraction[]) =>
      insightsFor(entries)
        .filter((i) => i.category === "frequency")
        .map((i) => [i.insight, i.evidence[0]]);

    expect(cadence(history([0, 0, 0]))).toEqual([
      ["User checks in at least daily", "Average gap: 0.0 hours over 0 days"],
    ]);
    expect(cadence(history([0, 0, 0], "statement", 3 * DAY))).toEqual([
      ["User checks in about weekly", "Average gap: 72.0 hours over 6 days"],
    ]);
    expect(cadence(history([0, 0], "statement", 10 * DAY))).toEqual([
      ["User checks in occasionally", "Average gap: 240.0 hours over 10 days"],
    ]);
  });
});
