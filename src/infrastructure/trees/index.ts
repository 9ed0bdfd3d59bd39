export type {
  TreeInputType,
  TreeInputSpec,
  TreeInputSchema,
  PrepareInputs,
  TreeOrigin,
  TreeDefinition,
  TreeSummary,
  ITreeCatalog,
} from './types.js';
export { toTreeSummary } from './types.js';
export { defineTree, buildInputSchema } from './define-tree.js';
export type { TreeDefinitionInput } from './define-tree.js';
export { parseTreeDocument, toTreeNodeInput, TREE_ID_PATTERN } from './tree-document.js';
export type { JsonValue, JsonBranch, JsonTreeNode, TreeDocument } from './tree-document.js';
export { FileTreeLoader } from './file-tree-loader.js';
export type { DirectoryLoad, LoadOptions } from './file-tree-loader.js';
export { InMemoryTreeCatalog } from './in-memory-tree-catalog.js';
export { DirectoryTreeCatalog } from './directory-tree-catalog.js';
export { CompositeTreeCatalog } from './composite-tree-catalog.js';
