import { z } from "zod";
import { ConfigurationError } from "../engine/errors.js";
import type { LearnloopConfig, LearningConfig } from "./types.js";

function isKnownTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const wordListSchema = z.array(z.string().min(1));

export const preferenceMarkerSchema = z.object({
  phrase: z.string().min(1),
  family: z.enum(["likes", "dislikes", "needs", "skills"]),
  prefix: z.string().min(1),
});

export const styleIndicatorsSchema = z.object({
  formal: wordListSchema,
  casual: wordListSchema,
  technical: wordListSchema,
  friendly: wordListSchema,
});

const lexiconSchema = z.object({
  stopwords: wordListSchema.optional(),
  positiveWords: wordListSchema.optional(),
  negativeWords: wordListSchema.optional(),
  negationWords: wordListSchema.optional(),
  interrogatives: wordListSchema.optional(),
  intensifiers: wordListSchema.optional(),
  genericTopics: wordListSchema.optional(),
  preferenceMarkers: z.array(preferenceMarkerSchema).min(1).optional(),
  styleIndicators: styleIndicatorsSchema.partial().optional(),
  topicDictionary: z.record(z.string().min(1), wordListSchema).optional(),
});

const thresholdsSchema = z
  .object({
    lowMax: z.number().int().min(1).default(2),
    mediumMax: z.number().int().min(1).default(4),
  })
  .refine((t) => t.mediumMax >= t.lowMax, {
    message: "mediumMax must not be below lowMax",
    path: ["mediumMax"],
  });

export const learningSchema = z.object({
  minInteractionsForLearning: z.number().int().min(1).default(1),
  confidenceThresholds: thresholdsSchema.default({}),
  briefTokenThreshold: z.number().positive().default(15),
  trendEpsilon: z.number().min(0).default(0.15),
  negationWindow: z.number().int().min(0).max(10).default(3),
  timezone: z.string().refine(isKnownTimezone, { message: "unknown IANA timezone" }).default("UTC"),
  lexicon: lexiconSchema.default({}),
});

const storageSchema = z.object({
  dbFile: z.string().min(1).default("learnloop.db"),
});

const privacySchema = z.object({
  retentionDays: z.number().int().positive().default(365),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const learnloopConfigSchema = z.object({
  learning: learningSchema.default({}),
  storage: storageSchema.default({}),
  privacy: privacySchema.default({}),
  logging: loggingSchema.default({}),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseConfig(raw: unknown): LearnloopConfig {
  const result = learnloopConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function parseLearningConfig(raw: unknown = {}): LearningConfig {
  const result = learningSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid learning configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
