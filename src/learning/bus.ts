import { EventEmitter } from "node:events";
import type { LearningEvent } from "./types.js";

type EventType = LearningEvent["type"];
type EventOfType<T extends EventType> = Extract<LearningEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOfType<T>) => void;

/**
 * Typed, synchronous, in-process event bus for learning results.
 * Events are delivered within the same tick, after the cycle is committed.
 */
export class LearningBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<T extends EventType>(event: EventOfType<T>): void {
    this.emitter.emit(event.type, event);
  }

  on<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.on(type, handler as (...args: unknown[]) => void);
  }

  off<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.off(type, handler as (...args: unknown[]) => void);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
