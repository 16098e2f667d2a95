import type { TagCategory } from "@shared/types/journal";

import { UnknownCategoryError } from "../errors";
import canonical from "./vocabulary.json";

export const TAG_CATEGORIES: readonly TagCategory[] = Object.freeze([
  "emotional_states",
  "triggers",
  "mistakes",
  "actions",
]);

export const CATEGORY_LABELS: Readonly<Record<TagCategory, string>> = {
  emotional_states: "Emotional States",
  triggers: "Triggers",
  mistakes: "Psychological Mistakes",
  actions: "Corrective Actions",
};

const CANONICAL: Readonly<Record<TagCategory, readonly string[]>> = {
  emotional_states: Object.freeze([...canonical.emotional_states]),
  triggers: Object.freeze([...canonical.triggers]),
  mistakes: Object.freeze([...canonical.mistakes]),
  actions: Object.freeze([...canonical.actions]),
};

export function isTagCategory(value: string): value is TagCategory {
  return (TAG_CATEGORIES as readonly string[]).includes(value);
}

export function assertTagCategory(value: string): TagCategory {
  if (!isTagCategory(value)) {
    throw new UnknownCategoryError(value);
  }
  return value;
}

/**
 * Fixed option list for a category, in display order.
 * Throws `UnknownCategoryError` for anything but the four categories.
 */
export function canonicalOptions(category: string): readonly string[] {
  return CANONICAL[assertTagCategory(category)];
}

export function isCustom(category: TagCategory, value: string): boolean {
  return !canonicalOptions(category).includes(value);
}

export const TAG_SEPARATOR = ", ";

/** Split a stored tag string into distinct, trimmed, non-empty values. */
export function parseTagString(stored: string | undefined | null): string[] {
  if (!stored) return [];

  const seen = new Set<string>();
  for (const part of stored.split(TAG_SEPARATOR)) {
    const value = part.trim();
    if (value) seen.add(value);
  }
  return [...seen];
}
