import type { ITreeCatalog, TreeDefinition } from './types.js';

/**
 * Merges several catalogs. Sources are ordered by precedence, lowest first:
 * a later source's definition replaces an earlier one with the same id.
 */
export class CompositeTreeCatalog implements ITreeCatalog {
  constructor(private readonly sources: readonly ITreeCatalog[]) {}

  async list(): Promise<readonly TreeDefinition[]> {
    const merged = new Map<string, TreeDefinition>();
    for (const source of this.sources) {
      for (const definition of await source.list()) {
        merged.set(definition.id, definition);
      }
    }
    return [...merged.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  async get(id: string): Promise<TreeDefinition | null> {
    for (const source of [...this.sources].reverse()) {
      const found = await source.get(id);
      if (found) return found;
    }
    return null;
  }
}
