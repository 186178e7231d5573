import { describe, it, expect } from "vitest";
import { buildLexicon } from "../../src/engine/lexicon.js";
import {
  FactSynthesizer,
  formatHour,
  interestValue,
  periodOfDay,
  slugify,
} from "../../src/engine/synthesizer.js";
import type { AnalysisResult, Interaction, PatternSummary } from "../../src/engine/types.js";

const synthesizer = new FactSynthesizer(buildLexicon());

function interaction(text: string, id = "m1"): Interaction {
  return { id, userId: "u1", text, occurredAt: Date.UTC(2024, 0, 1, 9), interactionType: "message" };
}

function summary(overrides: Partial<PatternSummary> = {}): PatternSummary {
  return {
    interactionCount: 1,
    avgSentiment: 0,
    activeHourHistogram: { 9: 1 },
    activeDayHistogram: { 1: 1 },
    peakHour: 9,
    peakDay: 1,
    avgTokenCount: 5,
    dominantStyle: "brief",
    sentimentTrend: "stable",
    topTopics: [],
    styleScores: { formal: 0, casual: 0, technical: 0, friendly: 0 },
    dominantTone: null,
    avgHoursBetween: null,
    activeSpanDays: 0,
    ...overrides,
  };
}

function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return { sentiment: 0, topics: [], domains: [], intent: "statement", ...overrides };
}

describe("helpers", () => {
  it("slugifies phrases", () => {
    expect(slugify("  Machine   Learning ")).toBe("machine_learning");
  });

  it("phrases interest values by sentiment sign", () => {
    expect(interestValue("guitar", 0.5)).toBe("Shows interest in guitar");
    expect(interestValue("taxes", -1)).toBe("Expresses frustration with taxes");
    expect(interestValue("weather", 0)).toBe("Mentions weather");
  });

  it("maps hours to periods of day", () => {
    expect([5, 11, 12, 16, 17, 21, 22, 0, 4].map(periodOfDay)).toEqual([
      "morning",
      "morning",
      "afternoon",
      "afternoon",
      "evening",
      "evening",
      "night",
      "night",
      "night",
    ]);
  });

  it("formats hours with two digits", () => {
    expect(formatHour(9)).toBe("09:00");
    expect(formatHour(23)).toBe("23:00");
  });
});

describe("FactSynthesizer", () => {
  it("emits one interest per non-generic topic", () => {
    const candidates = synthesizer.interestCandidates(
      analysis({ sentiment: 1, topics: ["guitar", "stuff"] }),
      "m1",
    );
    expect(candidates).toEqual([
      { category: "interest", key: "interest_guitar", value: "Shows interest in guitar", supportingInteractionId: "m1" },
    ]);
  });

  it("slugifies multi-word topics in interest keys", () => {
    const [candidate] = synthesizer.interestCandidates(analysis({ topics: ["machine learning"] }), "m1");
    expect(candidate?.key).toBe("interest_machine_learning");
    expect(candidate?.value).toBe("Mentions machine learning");
  });

  it("extracts the preference object after the marker", () => {
    const text = "I love playing guitar and listening to jazz music!";
    const candidates = synthesizer.preferenceCandidates(analysis({ intent: "preference" }), interaction(text));
    expect(candidates).toEqual([
      {
        category: "preference",
        key: "preference_playing_guitar",
        value: "Loves playing guitar",
        supportingInteractionId: "m1",
      },
    ]);
  });

  it("turns a negated marker into a dislike", () => {
    const candidates = synthesizer.preferenceCandidates(
      analysis({ intent: "preference" }),
      interaction("I really don't like horror movies"),
    );
    expect(candidates.map((c) => [c.key, c.value])).toEqual([["preference_horror_movies", "Dislikes horror movies"]]);
  });

  it("does not read a negated dislike as a dislike", () => {
    expect(
      synthesizer.preferenceCandidates(analysis({ intent: "preference" }), interaction("I don't hate jazz")),
    ).toEqual([]);
  });

  it("still records a plain dislike", () => {
    const candidates = synthesizer.preferenceCandidates(analysis({ intent: "preference" }), interaction("I hate jazz"));
    expect(candidates.map((c) => [c.key, c.value])).toEqual([["preference_jazz", "Dislikes jazz"]]);
  });

  it("keys needs and skills by their family", () => {
    const facts = (text: string) =>
      synthesizer
        .preferenceCandidates(analysis({ intent: "preference" }), interaction(text))
        .map((c) => [c.category, c.key, c.value]);

    expect(facts("I need help with my resume")).toEqual([["preference", "need_resume", "Needs help with resume"]]);
    expect(facts("I have experience with Kubernetes")).toEqual([
      ["preference", "skill_kubernetes", "Has experience with kubernetes"],
    ]);
    expect(facts("I'm a fan of film noir")).toEqual([["preference", "preference_film_noir", "Is a fan of film noir"]]);
    expect(facts("I can't stand traffic")).toEqual([["preference", "preference_traffic", "Can't stand traffic"]]);
  });

  it("skips preferences for other intents", () => {
    expect(synthesizer.preferenceCandidates(analysis({ intent: "question" }), interaction("I love tea"))).toEqual([]);
  });

  it("skips a marker with nothing after it", () => {
    expect(
      synthesizer.preferenceCandidates(analysis({ intent: "preference" }), interaction("That is what I love")),
    ).toEqual([]);
  });

  it("picks the longest non-stopword run as the object", () => {
    expect(synthesizer.preferenceObject(["jazz", "and", "blues", "music"])).toBe("blues music");
    expect(synthesizer.preferenceObject(["tea", "and", "coffee"])).toBe("tea");
    expect(synthesizer.preferenceObject(["it", "and", "the"])).toBeNull();
  });

  it("derives pattern facts from the summary", () => {
    expect(synthesizer.patternCandidates(summary({ peakHour: 19, peakDay: 6 }), "m1")).toEqual([
      { category: "behavior", key: "active_hour", value: "19:00", supportingInteractionId: "m1" },
      { category: "temporal", key: "active_period", value: "evening", supportingInteractionId: "m1" },
      { category: "behavior", key: "communication_style", value: "brief", supportingInteractionId: "m1" },
      { category: "temporal", key: "active_day", value: "Saturday", supportingInteractionId: "m1" },
    ]);
  });

  it("adds the dominant tone when one stands out", () => {
    const tones = synthesizer
      .patternCandidates(summary({ dominantTone: "casual" }), "m1")
      .filter((c) => c.key === "communication_tone")
      .map((c) => [c.category, c.value]);
    expect(tones).toEqual([["behavior", "casual"]]);
  });

  it("adds the sentiment trend from three interactions on", () => {
    const keys = synthesizer
      .patternCandidates(summary({ interactionCount: 3, sentimentTrend: "declining" }), "m1")
      .filter((c) => c.key === "sentiment_trend")
      .map((c) => c.value);
    expect(keys).toEqual(["declining"]);
  });

  it("combines all rules for one interaction", () => {
    const text = "I love playing guitar and listening to jazz music!";
    const candidates = synthesizer.synthesize(
      analysis({ sentiment: 1, topics: ["guitar", "jazz"], domains: ["music"], intent: "preference" }),
      summary(),
      interaction(text),
    );
    expect(candidates.map((c) => `${c.category}:${c.key}`)).toEqual([
      "interest:interest_guitar",
      "interest:interest_jazz",
      "preference:preference_playing_guitar",
      "behavior:active_hour",
      "temporal:active_period",
      "behavior:communication_style",
      "temporal:active_day",
    ]);
  });
});
