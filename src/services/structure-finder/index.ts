/**
 * @fileoverview Barrel export for the structure finder domain.
 * @module src/services/structure-finder/index
 */

// Core
export type { IStructureDataProvider } from './core/IStructureDataProvider.js';
export { StructureFinderService } from './core/StructureFinderService.js';
export { DEFAULT_FILTERS, filterRecords, sortByResolution } from './core/filter.js';
export { rankTopStructures } from './core/ranking.js';

// Providers
export { RcsbStructureProvider } from './providers/rcsb.provider.js';

// Types
export * from './types.js';
