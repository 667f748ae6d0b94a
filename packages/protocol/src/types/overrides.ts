// Runtime override layer types

import type { DefinitionTable, TableKind } from './tables.js';

/**
 * Deployment-specific overrides, one definition table per table kind.
 * This is the highest priority tier.
 */
export type RuntimeOverrides = Partial<Record<TableKind, DefinitionTable>>;

