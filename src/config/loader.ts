import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigurationError } from "../engine/errors.js";
import type { LearnloopConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      const message = `Missing environment variable: ${varName} (referenced as ${match})`;
      throw new ConfigurationError(message, [message]);
    }
    return value;
  });
}

export function loadConfig(path?: string): LearnloopConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    const message = `Config file is not valid JSON: ${configPath} (${err instanceof Error ? err.message : String(err)})`;
    throw new ConfigurationError(message, [message]);
  }
  return parseConfig(raw);
}
