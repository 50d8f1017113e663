/**
 * @fileoverview Tool definition for searching, filtering and ranking protein
 * structures by protein or gene name.
 * @module src/mcp-server/tools/definitions/structure-finder-search.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StructureFinderService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StructureFinderService as StructureFinderServiceClass } from '@/services/structure-finder/core/StructureFinderService.js';
import type { EntryRecord } from '@/services/structure-finder/index.js';
import { type RequestContext, logger } from '@/utils/index.js';
import {
  EntryRecordSchema,
  formatResolution,
  ItemFailureSchema,
  SearchInputShape,
  toSearchRequest,
} from './shared-schemas.js';

const TOOL_NAME = 'structure_finder_search';
const TOOL_TITLE = 'Find Protein Structures';
const TOOL_DESCRIPTION =
  'Search the RCSB Protein Data Bank by protein or gene name, enrich every hit with method, resolution, organism and chain count, then filter by organism (Homo sapiens), monomeric state, resolution ceiling and experimental method. Returns the filtered structures sorted by resolution and the top 3 X-ray structures.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object(SearchInputShape)
  .describe('Search query and filters for protein structures.');

const OutputSchema = z
  .object({
    query: z.string().describe('Normalized query.'),
    status: z
      .enum(['ok', 'no_entries', 'no_matches'])
      .describe('ok, no_entries (search found nothing) or no_matches (filters removed everything).'),
    rawCount: z.number().int().describe('Entries returned by the search.'),
    enrichedCount: z
      .number()
      .int()
      .describe('Entries whose metadata was fetched successfully.'),
    filteredCount: z.number().int().describe('Entries passing all filters.'),
    results: z
      .array(EntryRecordSchema)
      .describe('Filtered structures, ascending by resolution.'),
    topXray: z
      .array(EntryRecordSchema)
      .describe('Up to 3 best-resolution X-ray structures among the results.'),
    enrichmentFailures: z
      .array(ItemFailureSchema)
      .describe('Entries dropped because their metadata could not be fetched.'),
  })
  .describe('Structure search session results.');

type SearchInput = z.infer<typeof InputSchema>;
type SearchOutput = z.infer<typeof OutputSchema>;

async function structureFinderSearchLogic(
  input: SearchInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<SearchOutput> {
  logger.debug('Searching structures', { ...appContext, toolInput: input });

  const service =
    container.resolve<StructureFinderServiceClass>(StructureFinderService);
  const session = await service.runSearch(toSearchRequest(input), appContext);

  logger.info('Structure search tool completed', {
    ...appContext,
    status: session.status,
    rawCount: session.rawCount,
    filteredCount: session.filteredCount,
  });

  return {
    query: session.query,
    status: session.status,
    rawCount: session.rawCount,
    enrichedCount: session.enrichedCount,
    filteredCount: session.filteredCount,
    results: session.records,
    topXray: session.topRanked,
    enrichmentFailures: session.enrichmentFailures,
  };
}

function formatRow(r: EntryRecord): string {
  return `• ${r.pdbId}: ${r.title.slice(0, 60)}\n  ${r.method} | ${formatResolution(r.resolution)} | ${r.organism} | ${r.chainCount} chain(s)`;
}

function responseFormatter(result: SearchOutput): ContentBlock[] {
  if (result.status === 'no_entries') {
    return [{ type: 'text', text: 'No entries found for your query.' }];
  }

  const counters = `Total Entries: ${result.rawCount} | Filtered Entries: ${result.filteredCount}`;
  const dropped =
    result.enrichmentFailures.length > 0
      ? `\n(${result.enrichmentFailures.length} entr${result.enrichmentFailures.length === 1 ? 'y' : 'ies'} skipped: metadata unavailable)`
      : '';

  if (result.status === 'no_matches') {
    return [
      {
        type: 'text',
        text: `${counters}${dropped}\n\nNo structures matched your filters.`,
      },
    ];
  }

  const table = result.results.map(formatRow).join('\n');
  const top =
    result.topXray.length > 0
      ? `Top ${result.topXray.length} X-ray structures:\n${result.topXray
          .map((r, i) => `${i + 1}. ${r.pdbId} (${formatResolution(r.resolution)})`)
          .join('\n')}`
      : 'No X-ray structures available in filtered results.';

  return [
    {
      type: 'text',
      text: `${counters}${dropped}\n\nMatching structures:\n${table}\n\n${top}`,
    },
  ];
}

export const structureFinderSearchTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureFinderSearchLogic,
  responseFormatter,
};
