export * from "./engine/index.js";

export { loadConfig, substituteEnv } from "./config/loader.js";
export { parseConfig, parseLearningConfig, learnloopConfigSchema, learningSchema } from "./config/schema.js";
export { getConfigPath, getStateDir, resolveDbPath } from "./config/paths.js";
export type * from "./config/types.js";

export { createLogger, createSilentLogger, type Logger } from "./logging/logger.js";

export { LearningDB } from "./store/db.js";
export { InteractionStore, type ListOptions, type RecordInteractionParams } from "./store/interactions.js";
export { FactStore, type ApplyResult, type FactStats } from "./store/facts.js";
export { SnapshotStore, type PatternSnapshot } from "./store/snapshots.js";

export { LearningBus } from "./learning/bus.js";
export { LearningService } from "./learning/service.js";
export { openLearning, type LearningContext, type OpenOptions } from "./learning/lifecycle.js";
export type * from "./learning/types.js";

export { KeyedLock } from "./utils/keyed-lock.js";
