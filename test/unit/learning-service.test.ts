import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LearningEngine } from "../../src/engine/engine.js";
import { InvalidInputError } from "../../src/engine/errors.js";
import { LearningBus } from "../../src/learning/bus.js";
import { LearningService } from "../../src/learning/service.js";
import type { LearningEvent } from "../../src/learning/types.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { LearningDB } from "../../src/store/db.js";
import { InteractionStore } from "../../src/store/interactions.js";

const GUITAR = "I love playing guitar and listening to jazz music!";
const DAY_MS = 86_400_000;
const MONDAY_9AM = Date.UTC(2024, 0, 1, 9);

describe("LearningService", () => {
  let dir: string;
  let db: LearningDB;
  let bus: LearningBus;
  let service: LearningService;
  let events: LearningEvent[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "learnloop-service-"));
    db = new LearningDB(join(dir, "learn.db"));
    bus = new LearningBus();
    service = new LearningService(db, new LearningEngine(), bus, createSilentLogger());
    events = [];
    bus.on("fact_learned", (e) => events.push(e));
    bus.on("fact_reinforced", (e) => events.push(e));
    bus.on("patterns_refreshed", (e) => events.push(e));
    bus.on("user_forgotten", (e) => events.push(e));
    bus.on("fact_reviewed", (e) => events.push(e));
  });

  afterEach(() => {
    bus.dispose();
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("learns and persists facts from one interaction", async () => {
    const outcome = await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });

    expect(outcome.skipped).toBe(false);
    expect(outcome.learned).toHaveLength(7);
    expect(outcome.reinforced).toEqual([]);

    const profile = service.getProfile("alice", "interest");
    expect(profile.interactionCount).toBe(1);
    expect(profile.facts.map((f) => [f.key, f.confidence, f.evidenceCount])).toEqual([
      ["interest_guitar", "low", 1],
      ["interest_jazz", "low", 1],
    ]);
    expect(profile.summary?.activeHourHistogram).toEqual({ 9: 1 });
  });

  it("caches the analysis of the stored interaction", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    expect(new InteractionStore(db).get("m1")?.analysis).toEqual({
      sentiment: 1,
      topics: ["guitar", "jazz"],
      domains: ["music"],
      intent: "preference",
    });
  });

  it("emits learned, then reinforced events", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    expect(events.filter((e) => e.type === "fact_learned")).toHaveLength(7);
    expect(events[events.length - 1]?.type).toBe("patterns_refreshed");

    events = [];
    const outcome = await service.ingest({ userId: "alice", text: GUITAR, id: "m2", occurredAt: MONDAY_9AM + DAY_MS });
    expect(outcome.learned).toEqual([]);
    expect(outcome.reinforced).toHaveLength(7);

    const guitar = events.find((e) => e.type === "fact_reinforced" && e.fact.key === "interest_guitar");
    expect(guitar).toMatchObject({ previousEvidence: 1, fact: { evidenceCount: 2, confidence: "low" } });
  });

  it("serializes concurrent ingests for the same user", async () => {
    await Promise.all(
      [1, 2, 3, 4, 5].map((i) =>
        service.ingest({ userId: "alice", text: GUITAR, id: `m${i}`, occurredAt: MONDAY_9AM + i * DAY_MS }),
      ),
    );

    const [guitar] = service.getProfile("alice", "interest").facts.filter((f) => f.key === "interest_guitar");
    expect(guitar?.evidenceCount).toBe(5);
    expect(guitar?.confidence).toBe("high");
    expect(guitar?.supportingInteractionIds).toEqual(["m1", "m2", "m3", "m4", "m5"]);
  });

  it("adds no evidence when an interaction is replayed", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    const replay = await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });

    expect(replay.learned).toEqual([]);
    expect(replay.reinforced).toEqual([]);
    expect(service.getProfile("alice").interactionCount).toBe(1);
  });

  it("rejects blank text without recording it", async () => {
    await expect(service.ingest({ userId: "alice", text: "  " })).rejects.toThrow(InvalidInputError);
    expect(service.getProfile("alice").interactionCount).toBe(0);
  });

  it("keeps users apart", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    await service.ingest({ userId: "bob", text: "Where is the nearest golf course?", id: "b1", occurredAt: MONDAY_9AM });

    const bob = service.getProfile("bob", "interest");
    expect(bob.facts.map((f) => f.key)).toEqual(["interest_course", "interest_golf", "interest_nearest"]);
    expect(service.getProfile("alice", "interest").facts).toHaveLength(2);
  });

  it("refuses an interaction id that belongs to another user", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    events = [];

    await expect(
      service.ingest({ userId: "bob", text: "I hate golf", id: "m1", occurredAt: MONDAY_9AM + DAY_MS }),
    ).rejects.toThrow("Interaction id m1 already belongs to another user");
    await expect(
      service.ingest({ userId: "bob", text: "I hate golf", id: "m1", occurredAt: MONDAY_9AM + DAY_MS }),
    ).rejects.toThrow(InvalidInputError);

    expect(events).toEqual([]);
    expect(service.getProfile("bob").interactionCount).toBe(0);
    expect(service.getProfile("bob").facts).toEqual([]);
    const alice = service.getProfile("alice");
    expect(alice.interactionCount).toBe(1);
    expect(alice.facts).toHaveLength(7);
    expect(alice.summary?.interactionCount).toBe(1);
  });

  it("counts facts per category and confidence tier", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    expect(service.getProfile("alice", "interest").factStats).toEqual({
      total: 7,
      byCategory: { preference: 1, interest: 2, behavior: 2, temporal: 2 },
      byConfidence: { low: 7, medium: 0, high: 0 },
    });
  });

  it("confirms a fact and announces it", async () => {
    const { learned } = await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    const guitar = learned.find((f) => f.key === "interest_guitar");
    if (!guitar) throw new Error("guitar interest was not learned");
    events = [];

    const confirmed = await service.reviewFact("alice", guitar.id, "confirmed");

    expect(confirmed).toEqual({ ...guitar, review: "confirmed" });
    expect(events).toEqual([{ type: "fact_reviewed", userId: "alice", fact: confirmed }]);
  });

  it("stops reinforcing a rejected fact and reports it", async () => {
    const { learned } = await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    const guitar = learned.find((f) => f.key === "interest_guitar");
    if (!guitar) throw new Error("guitar interest was not learned");
    await service.reviewFact("alice", guitar.id, "rejected");

    const outcome = await service.ingest({ userId: "alice", text: GUITAR, id: "m2", occurredAt: MONDAY_9AM + DAY_MS });

    expect(outcome.reinforced.map((f) => f.key)).not.toContain("interest_guitar");
    expect(outcome.reinforced).toHaveLength(6);
    expect(outcome.rejected.map((c) => c.key)).toEqual(["interest_guitar"]);
    const [stored] = service.getProfile("alice", "interest").facts.filter((f) => f.key === "interest_guitar");
    expect(stored).toMatchObject({ evidenceCount: 1, supportingInteractionIds: ["m1"], review: "rejected" });
    expect(service.getProfile("alice").factStats.total).toBe(6);
  });

  it("refuses to review someone else's fact", async () => {
    const { learned } = await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    const [first] = learned;
    if (!first) throw new Error("nothing was learned");
    await expect(service.reviewFact("bob", first.id, "rejected")).rejects.toThrow(InvalidInputError);
    await expect(service.reviewFact("alice", "no-such-fact", "confirmed")).rejects.toThrow(
      "No fact no-such-fact for user alice",
    );
  });

  it("pages through the interaction history", async () => {
    for (const i of [1, 2, 3]) {
      await service.ingest({ userId: "alice", text: `note ${i}`, id: `m${i}`, occurredAt: MONDAY_9AM + i * DAY_MS });
    }

    const page = service.listInteractions("alice", 2, 1);
    expect(page).toMatchObject({ userId: "alice", total: 3, limit: 2, offset: 1 });
    expect(page.entries.map((e) => e.interaction.id)).toEqual(["m2", "m1"]);
    expect(page.entries[0]?.analysis).toEqual({ sentiment: 0, topics: ["note"], domains: [], intent: "statement" });
    expect(service.listInteractions("alice").entries).toHaveLength(3);
  });

  it("rejects a bad page request", () => {
    expect(() => service.listInteractions("alice", 0)).toThrow(InvalidInputError);
    expect(() => service.listInteractions("alice", 10, -1)).toThrow("offset must be a non-negative integer");
    expect(() => service.listInteractions("alice", Number.NaN)).toThrow("limit must be an integer between 1 and 500");
  });

  it("forgets a user", async () => {
    await service.ingest({ userId: "alice", text: GUITAR, id: "m1", occurredAt: MONDAY_9AM });
    events = [];

    expect(await service.forget("alice")).toEqual({ interactions: 1, facts: 7 });

    const profile = service.getProfile("alice");
    expect(profile).toEqual({
      userId: "alice",
      interactionCount: 0,
      facts: [],
      factStats: {
        total: 0,
        byCategory: { preference: 0, interest: 0, behavior: 0, temporal: 0 },
        byConfidence: { low: 0, medium: 0, high: 0 },
      },
      summary: null,
      insights: [],
      computedAt: null,
    });
    expect(events).toEqual([{ type: "user_forgotten", userId: "alice", result: { interactions: 1, facts: 7 } }]);
  });

  it("purges interactions past the retention window", async () => {
    const now = Date.UTC(2025, 0, 1);
    await service.ingest({ userId: "alice", text: "old news", id: "old", occurredAt: now - 400 * DAY_MS });
    await service.ingest({ userId: "alice", text: "fresh news", id: "new", occurredAt: now - DAY_MS });

    expect(service.purgeExpired(365, now)).toBe(1);
    expect(service.getProfile("alice").interactionCount).toBe(1);
  });
});
