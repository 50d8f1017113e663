/**
 * @fileoverview Zod schemas shared by the structure finder tools.
 * @module src/mcp-server/tools/definitions/shared-schemas
 */
import { z } from 'zod';

import { config } from '@/config/index.js';
import {
  DEFAULT_FILTERS,
  MethodFilter,
  type StructureFilters,
  type StructureSearchRequest,
} from '@/services/structure-finder/index.js';

export const SearchInputShape = {
  query: z
    .string()
    .trim()
    .min(1, 'Please enter a protein or gene name.')
    .max(500, 'Query cannot exceed 500 characters.')
    .describe('Protein or gene name (e.g., "EGFR", "BRCA1", "TP53").'),
  onlyHuman: z
    .boolean()
    .default(DEFAULT_FILTERS.organismFilterOn)
    .describe('Keep only structures whose source organism includes Homo sapiens.'),
  monomerOnly: z
    .boolean()
    .default(DEFAULT_FILTERS.monomerOnly)
    .describe('Keep only monomeric structures (exactly one distinct chain).'),
  maxResolution: z
    .number()
    .min(1.0)
    .max(5.0)
    .default(DEFAULT_FILTERS.maxResolution)
    .describe('Maximum resolution in Angstroms (1.0-5.0). Entries without a resolution are excluded.'),
  method: z
    .nativeEnum(MethodFilter)
    .default(DEFAULT_FILTERS.methodFilter)
    .describe('Experimental method filter: Any, X-RAY, ELECTRON MICROSCOPY or NMR.'),
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(20)
    .default(config.structureFinder.defaultConcurrency)
    .describe('Number of parallel metadata fetches (1-20).'),
};

export const EntryRecordSchema = z.object({
  pdbId: z.string().describe('PDB identifier.'),
  title: z.string().describe('Structure title.'),
  method: z.string().describe('Experimental method.'),
  resolution: z.number().nullable().describe('Resolution in Angstroms.'),
  organism: z.string().describe('Comma-joined source organism names.'),
  chainCount: z.number().int().describe('Number of distinct chains.'),
});

export const ItemFailureSchema = z.object({
  pdbId: z.string(),
  kind: z.enum([
    'timeout',
    'not_found',
    'http_error',
    'malformed_response',
    'network_error',
  ]),
  message: z.string(),
});

type SearchInputFields = z.infer<z.ZodObject<typeof SearchInputShape>>;

export function toSearchRequest(input: SearchInputFields): StructureSearchRequest {
  const filters: StructureFilters = {
    organismFilterOn: input.onlyHuman,
    monomerOnly: input.monomerOnly,
    maxResolution: input.maxResolution,
    methodFilter: input.method,
  };
  return { query: input.query, filters, concurrency: input.concurrency };
}

export function formatResolution(resolution: number | null): string {
  return resolution === null ? 'n/a' : `${resolution.toFixed(2)}Å`;
}
