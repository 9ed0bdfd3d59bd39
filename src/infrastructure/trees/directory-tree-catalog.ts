import type { FileTreeLoader, LoadOptions } from './file-tree-loader.js';
import { InMemoryTreeCatalog } from './in-memory-tree-catalog.js';
import type { ITreeCatalog, TreeDefinition } from './types.js';

/**
 * Catalog over a directory of JSON trees. The directory is read once, on
 * first use; concurrent first calls share the same load.
 */
export class DirectoryTreeCatalog implements ITreeCatalog {
  private loaded: Promise<InMemoryTreeCatalog> | null = null;

  constructor(
    private readonly loader: FileTreeLoader,
    private readonly directory: string,
    private readonly options: LoadOptions = {}
  ) {}

  async list(): Promise<readonly TreeDefinition[]> {
    return (await this.load()).list();
  }

  async get(id: string): Promise<TreeDefinition | null> {
    return (await this.load()).get(id);
  }

  private load(): Promise<InMemoryTreeCatalog> {
    this.loaded ??= this.loader
      .loadDirectory(this.directory, this.options)
      .then(({ definitions }) => new InMemoryTreeCatalog(definitions));
    return this.loaded;
  }
}
