import { TAG_FIELD_BY_CATEGORY } from "@shared/types/journal";
import type { TagCategory, TagFields } from "@shared/types/journal";

import { TAG_CATEGORIES, TAG_SEPARATOR, assertTagCategory, parseTagString } from "./vocabulary";

/** Context id used while composing a trade that is not in the journal yet. */
export const NEW_TRADE_CONTEXT = "new-trade";

/**
 * Selected values of one tag category for one selection context.
 *
 * The selection is seeded at most once from the stored tag string; after the
 * first seed or user edit, further `seed` calls are ignored until `reset`.
 */
export class TagSelection {
  private selected = new Set<string>();
  private touched = false;

  constructor(readonly category: TagCategory) {}

  get isTouched(): boolean {
    return this.touched;
  }

  get size(): number {
    return this.selected.size;
  }

  seed(initial: string | readonly string[]): void {
    if (this.touched) return;

    const values = typeof initial === "string" ? parseTagString(initial) : initial;
    for (const raw of values) {
      const value = raw.trim();
      if (value) this.selected.add(value);
    }
    this.touched = true;
  }

  toggle(value: string): void {
    const trimmed = value.trim();
    if (!trimmed) return;
    this.touched = true;
    if (this.selected.has(trimmed)) {
      this.selected.delete(trimmed);
    } else {
      this.selected.add(trimmed);
    }
  }

  addCustom(value: string): void {
    const trimmed = value.trim();
    if (!trimmed) return;
    this.touched = true;
    this.selected.add(trimmed);
  }

  clear(): void {
    this.touched = true;
    this.selected.clear();
  }

  /** Drops all state, including the seeded flag. */
  reset(): void {
    this.touched = false;
    this.selected.clear();
  }

  has(value: string): boolean {
    return this.selected.has(value);
  }

  snapshot(): string[] {
    return [...this.selected].sort();
  }

  serialize(): string {
    return this.snapshot().join(TAG_SEPARATOR);
  }
}

/** The four category selections that belong to one trade or draft. */
export class TagContext {
  private readonly selections: Record<TagCategory, TagSelection> = {
    emotional_states: new TagSelection("emotional_states"),
    triggers: new TagSelection("triggers"),
    mistakes: new TagSelection("mistakes"),
    actions: new TagSelection("actions"),
  };

  constructor(readonly id: string) {}

  selection(category: TagCategory): TagSelection {
    return this.selections[assertTagCategory(category)];
  }

  seedFromRecord(record: Partial<TagFields>): void {
    for (const category of TAG_CATEGORIES) {
      this.selections[category].seed(record[TAG_FIELD_BY_CATEGORY[category]] ?? "");
    }
  }

  toTagFields(): TagFields {
    return {
      emotional_state: this.selections.emotional_states.serialize(),
      triggers: this.selections.triggers.serialize(),
      mistakes: this.selections.mistakes.serialize(),
      corrective_action: this.selections.actions.serialize(),
    };
  }

  /** Categories with at least one selected value, paired with their snapshot. */
  nonEmpty(): Array<[TagCategory, string[]]> {
    return TAG_CATEGORIES.filter((category) => this.selections[category].size > 0).map(
      (category): [TagCategory, string[]] => [category, this.selections[category].snapshot()],
    );
  }
}

export class TagContextRegistry {
  private contexts = new Map<string, TagContext>();

  /**
   * Returns the context for `id`, creating it on first use. When `record` is
   * given the context is seeded from it; an already edited context keeps its
   * in-memory state.
   */
  open(id: string, record?: Partial<TagFields>): TagContext {
    let context = this.contexts.get(id);
    if (!context) {
      context = new TagContext(id);
      this.contexts.set(id, context);
    }
    if (record) context.seedFromRecord(record);
    return context;
  }

  get(id: string): TagContext | undefined {
    return this.contexts.get(id);
  }

  has(id: string): boolean {
    return this.contexts.has(id);
  }

  discard(id: string): boolean {
    return this.contexts.delete(id);
  }

  clear(): void {
    this.contexts.clear();
  }
}
