/**
 * @fileoverview RCSB PDB endpoint paths and search attribute names.
 * Base URLs and timeouts come from the application config.
 * @module src/services/structure-finder/providers/rcsb/config
 */

/**
 * REST path for entry-level metadata
 */
export const ENTRY_PATH = '/rest/v1/core/entry';

/**
 * REST path for polymer-entity metadata
 */
export const POLYMER_ENTITY_PATH = '/rest/v1/core/polymer_entity';

/**
 * Text-search attributes used by the precise query
 */
export const SEARCH_ATTRIBUTES = {
  title: 'struct.title',
  description: 'rcsb_polymer_entity.pdbx_description',
  geneName: 'rcsb_entity_source_organism.gene.rcsb_gene_name.value',
} as const;
