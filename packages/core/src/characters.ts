import type { Character, ElementType } from "./types.js";

export const CHARACTER_NAME_RE = /^[A-Za-z0-9]+$/;

export interface Introduction {
  displayName?: string;
  description?: string;
  line: number;
}

/**
 * Every character referenced in one document, keyed by exact name. Entries are
 * created on first reference and never removed.
 */
export class CharacterRegistry {
  private readonly byName = new Map<string, Character>();

  get(name: string): Character | null {
    return this.byName.get(name) ?? null;
  }

  isIntroduced(name: string): boolean {
    return this.byName.get(name)?.introduced_at !== undefined;
  }

  lookupOrCreate(name: string, line: number, element: ElementType): string {
    if (!this.byName.has(name)) {
      this.byName.set(name, { name, first_use: { line, element } });
    }
    return name;
  }

  introduce(name: string, intro: Introduction): Character {
    const firstUse = this.byName.get(name)?.first_use ?? { line: intro.line, element: "cue" };
    const next: Character = { name, first_use: firstUse };
    if (intro.displayName) next.display_name = intro.displayName;
    if (intro.description) next.description = intro.description;
    next.introduced_at = intro.line;
    this.byName.set(name, next);
    return next;
  }

  // First-use order.
  list(): Character[] {
    return Array.from(this.byName.values()).map((c) => ({ ...c, first_use: { ...c.first_use } }));
  }
}
