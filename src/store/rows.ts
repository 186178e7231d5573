import { z } from "zod";
import {
  FACT_CATEGORIES,
  FACT_REVIEWS,
  INTERACTION_TYPES,
  type ConfidenceTier,
  type FactCategory,
  type FactReview,
  type Intent,
  type InteractionType,
} from "../engine/types.js";

const stringList = z.array(z.string());

export function parseStringList(raw: string | null): string[] {
  if (raw === null) return [];
  return stringList.parse(JSON.parse(raw));
}

export function isFactCategory(value: string): value is FactCategory {
  return FACT_CATEGORIES.some((c) => c === value);
}

export function isInteractionType(value: string): value is InteractionType {
  return INTERACTION_TYPES.some((t) => t === value);
}

export function toFactCategory(value: string): FactCategory {
  if (!isFactCategory(value)) throw new Error(`Unknown fact category in store: ${value}`);
  return value;
}

export function toInteractionType(value: string): InteractionType {
  if (!isInteractionType(value)) throw new Error(`Unknown interaction type in store: ${value}`);
  return value;
}

export function toConfidence(value: string): ConfidenceTier {
  if (value === "low" || value === "medium" || value === "high") return value;
  throw new Error(`Unknown confidence tier in store: ${value}`);
}

export function toIntent(value: string): Intent {
  if (value === "statement" || value === "question" || value === "preference" || value === "other") return value;
  throw new Error(`Unknown intent in store: ${value}`);
}

export function toFactReview(value: string): FactReview {
  const review = FACT_REVIEWS.find((r) => r === value);
  if (!review) throw new Error(`Unknown fact review in store: ${value}`);
  return review;
}
