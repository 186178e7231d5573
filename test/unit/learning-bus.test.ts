import { describe, it, expect, vi } from "vitest";
import { LearningBus } from "../../src/learning/bus.js";

describe("LearningBus", () => {
  it("delivers events to handlers of their type only", () => {
    const bus = new LearningBus();
    const forgotten = vi.fn();
    const learned = vi.fn();
    bus.on("user_forgotten", forgotten);
    bus.on("fact_learned", learned);

    bus.emit({ type: "user_forgotten", userId: "alice", result: { interactions: 2, facts: 3 } });

    expect(forgotten).toHaveBeenCalledWith({
      type: "user_forgotten",
      userId: "alice",
      result: { interactions: 2, facts: 3 },
    });
    expect(learned).not.toHaveBeenCalled();
  });

  it("unsubscribes with off and dispose", () => {
    const bus = new LearningBus();
    const first = vi.fn();
    const second = vi.fn();
    bus.on("user_forgotten", first);
    bus.on("user_forgotten", second);

    bus.off("user_forgotten", first);
    bus.emit({ type: "user_forgotten", userId: "alice", result: { interactions: 0, facts: 0 } });
    bus.dispose();
    bus.emit({ type: "user_forgotten", userId: "alice", result: { interactions: 0, facts: 0 } });

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });
});
