/**
 * @fileoverview RCSB PDB API request types and response schemas. Responses are
 * validated with zod so that a malformed payload fails the entry it belongs to.
 * @module src/services/structure-finder/providers/rcsb/types
 */
import { z } from 'zod';

/**
 * RCSB search query structure (recursive)
 */
export interface RcsbSearchQuery {
  type: 'terminal' | 'group';
  service?: 'text' | 'full_text';
  parameters?: Record<string, unknown>;
  logical_operator?: 'and' | 'or';
  nodes?: RcsbSearchQuery[];
}

/**
 * Full request document posted to the search endpoint
 */
export interface RcsbSearchRequest {
  query: RcsbSearchQuery;
  return_type: 'entry';
  request_options: {
    return_all_hits: boolean;
  };
}

export const RcsbSearchResponseSchema = z.object({
  query_id: z.string().optional(),
  result_type: z.string().optional(),
  total_count: z.number().optional(),
  result_set: z
    .array(
      z.object({
        identifier: z.string(),
        score: z.number().optional(),
      }),
    )
    .optional(),
});

export type RcsbSearchResponse = z.infer<typeof RcsbSearchResponseSchema>;

/**
 * `GET /rest/v1/core/entry/{id}`; only the fields the pipeline reads.
 */
export const RcsbEntrySchema = z.object({
  rcsb_id: z.string().optional(),
  struct: z
    .object({
      title: z.string().nullish(),
    })
    .optional(),
  exptl: z
    .array(
      z.object({
        method: z.string().optional(),
      }),
    )
    .optional(),
  rcsb_entry_info: z
    .object({
      resolution_combined: z.array(z.number().nullable()).optional(),
    })
    .optional(),
  rcsb_entry_container_identifiers: z
    .object({
      polymer_entity_ids: z.array(z.string()).optional(),
    })
    .optional(),
});

export type RcsbEntry = z.infer<typeof RcsbEntrySchema>;

/**
 * `GET /rest/v1/core/polymer_entity/{id}/{entity}`
 */
export const RcsbPolymerEntitySchema = z.object({
  rcsb_entity_source_organism: z
    .array(
      z.object({
        scientific_name: z.string().optional(),
      }),
    )
    .optional(),
  rcsb_polymer_entity_container_identifiers: z
    .object({
      auth_asym_ids: z.array(z.string()).optional(),
    })
    .optional(),
});

export type RcsbPolymerEntity = z.infer<typeof RcsbPolymerEntitySchema>;
