import type { ITreeCatalog, TreeDefinition } from './types.js';

function byId(a: TreeDefinition, b: TreeDefinition): number {
  return a.id.localeCompare(b.id);
}

/**
 * Fixed set of definitions. Later duplicates replace earlier ones.
 */
export class InMemoryTreeCatalog implements ITreeCatalog {
  private readonly definitions = new Map<string, TreeDefinition>();

  constructor(definitions: readonly TreeDefinition[] = []) {
    for (const definition of definitions) {
      this.definitions.set(definition.id, definition);
    }
  }

  async list(): Promise<readonly TreeDefinition[]> {
    return [...this.definitions.values()].sort(byId);
  }

  async get(id: string): Promise<TreeDefinition | null> {
    return this.definitions.get(id) ?? null;
  }
}
