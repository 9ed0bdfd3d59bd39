import { fileURLToPath } from 'url';
import type { FileTreeLoader } from '../infrastructure/trees/file-tree-loader.js';
import { CompositeTreeCatalog } from '../infrastructure/trees/composite-tree-catalog.js';
import { DirectoryTreeCatalog } from '../infrastructure/trees/directory-tree-catalog.js';
import { InMemoryTreeCatalog } from '../infrastructure/trees/in-memory-tree-catalog.js';
import type { ITreeCatalog, TreeDefinition } from '../infrastructure/trees/types.js';
import { loanDecisionDefinition } from './loan.js';
import { loanPurposeDefinition } from './loan-purpose.js';
import { bloodPressureDefinition } from './cardiology/blood-pressure.js';
import { atrialFibrillationDefinition } from './cardiology/atrial-fibrillation.js';

/** JSON trees shipped with the package (resolves the same from src/ and dist/) */
export const BUNDLED_TREES_DIR = fileURLToPath(new URL('../../trees/', import.meta.url));

export const BUNDLED_DEFINITIONS: readonly TreeDefinition[] = [
  loanDecisionDefinition,
  loanPurposeDefinition,
  bloodPressureDefinition,
  atrialFibrillationDefinition,
];

export function createBundledCatalog(loader: FileTreeLoader): ITreeCatalog {
  return new CompositeTreeCatalog([
    new InMemoryTreeCatalog(BUNDLED_DEFINITIONS),
    new DirectoryTreeCatalog(loader, BUNDLED_TREES_DIR, { origin: { kind: 'bundled' } }),
  ]);
}
