/**
 * @fileoverview Two-stage entry search against the RCSB Search API: a precise
 * attribute query first, then a full-text fallback when it yields nothing.
 * @module src/services/structure-finder/providers/rcsb/search-client
 */

import { logger, fetchWithTimeout, type RequestContext } from '@/utils/index.js';
import type { PdbId } from '../../types.js';
import {
  buildFullTextQuery,
  buildPreciseQuery,
  buildSearchRequest,
} from './query-builder.js';
import { RcsbSearchResponseSchema, type RcsbSearchQuery } from './types.js';

export interface SearchClientSettings {
  searchUrl: string;
  timeoutMs: number;
}

type SearchStage = 'precise' | 'full_text';

/**
 * Run one search request. Any failure is logged and reported as no hits.
 */
async function runSearchStage(
  stage: SearchStage,
  query: RcsbSearchQuery,
  settings: SearchClientSettings,
  context: RequestContext,
): Promise<PdbId[]> {
  try {
    return await fetchWithTimeout<PdbId[]>(settings.searchUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(buildSearchRequest(query)),
      timeout: settings.timeoutMs,
      context,
      parse: async (response) => {
        // The search service answers 204 with an empty body when nothing matches.
        if (response.status === 204) return [];
        const data = RcsbSearchResponseSchema.parse(await response.json());
        return data.result_set?.map((r) => r.identifier) ?? [];
      },
    });
  } catch (error) {
    logger.warning('RCSB search stage failed; treating as no results', {
      ...context,
      stage,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

/**
 * Search entries by protein or gene name. Returns the precise result set when
 * it is non-empty, otherwise the full-text result set; never a mix of both.
 */
export async function searchEntryIds(
  query: string,
  settings: SearchClientSettings,
  context: RequestContext,
): Promise<PdbId[]> {
  logger.debug('Searching RCSB entries', { ...context, query });

  const precise = await runSearchStage(
    'precise',
    buildPreciseQuery(query),
    settings,
    context,
  );
  if (precise.length > 0) {
    logger.debug('Precise search matched', {
      ...context,
      count: precise.length,
    });
    return precise;
  }

  const fallback = await runSearchStage(
    'full_text',
    buildFullTextQuery(query),
    settings,
    context,
  );
  logger.debug('Full-text fallback search finished', {
    ...context,
    count: fallback.length,
  });
  return fallback;
}
