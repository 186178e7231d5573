import type { ConfidenceThresholds } from "../config/types.js";
import type { ConfidenceTier, FactCategory } from "./types.js";

export const DEFAULT_THRESHOLDS: ConfidenceThresholds = { lowMax: 2, mediumMax: 4 };

export function confidenceFor(
  evidenceCount: number,
  thresholds: ConfidenceThresholds = DEFAULT_THRESHOLDS,
): ConfidenceTier {
  if (evidenceCount <= thresholds.lowMax) return "low";
  if (evidenceCount <= thresholds.mediumMax) return "medium";
  return "high";
}

/** Identity of a fact within one user's profile. */
export function factKey(category: FactCategory, key: string): string {
  return `${category}:${key}`;
}
