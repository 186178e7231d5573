import { dirname } from "node:path";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir, resolveDbPath } from "../config/paths.js";
import type { LearnloopConfig } from "../config/types.js";
import { LearningEngine } from "../engine/engine.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { LearningDB } from "../store/db.js";
import { LearningBus } from "./bus.js";
import { LearningService } from "./service.js";

export interface LearningContext {
  config: LearnloopConfig;
  logger: Logger;
  db: LearningDB;
  engine: LearningEngine;
  bus: LearningBus;
  service: LearningService;
  close(): void;
}

export interface OpenOptions {
  readonly configPath?: string;
  readonly config?: LearnloopConfig;
  readonly stateDir?: string;
  readonly logger?: Logger;
}

export function openLearning(options: OpenOptions = {}): LearningContext {
  // 1. Load config
  const config = options.config ?? loadConfig(options.configPath);

  // 2. Create logger
  const logger = options.logger ?? createLogger(config.logging);

  // 3. Build the engine first: a bad lexicon or threshold fails here
  const engine = new LearningEngine(config.learning, { logger: logger.child({ component: "engine" }) });

  // 4. Open the store
  const dbPath = resolveDbPath(config.storage.dbFile, options.stateDir ?? getStateDir());
  ensureDir(dirname(dbPath));
  const db = new LearningDB(dbPath);

  // 5. Wire the service
  const bus = new LearningBus();
  const service = new LearningService(db, engine, bus, logger);

  logger.debug({ dbPath }, "Learning store opened");

  return {
    config,
    logger,
    db,
    engine,
    bus,
    service,
    close() {
      bus.dispose();
      db.close();
    },
  };
}
