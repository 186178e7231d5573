import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";

export function getStateDir(): string {
  return process.env["LEARNLOOP_STATE_DIR"] ?? join(homedir(), ".learnloop");
}

export function getConfigPath(): string {
  return process.env["LEARNLOOP_CONFIG_PATH"] ?? "learnloop.config.json";
}

export function resolveDbPath(dbFile: string, stateDir = getStateDir()): string {
  return isAbsolute(dbFile) ? dbFile : join(stateDir, dbFile);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
