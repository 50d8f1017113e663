/**
 * @fileoverview Metadata enrichment: turns entry identifiers into flat
 * EntryRecords by fetching entry and polymer-entity metadata through a bounded
 * task queue.
 * @module src/services/structure-finder/core/enricher
 */
import pLimit from 'p-limit';

import { logger, type RequestContext } from '@/utils/index.js';
import type {
  EnrichmentOutcome,
  EnrichmentReport,
  EntryRecord,
  EntrySummary,
  PdbId,
  PolymerEntitySummary,
} from '../types.js';
import type { IStructureDataProvider } from './IStructureDataProvider.js';
import { toItemFailure } from './failures.js';

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 20;

/**
 * Collapse an entry and its polymer entities into one record.
 */
export function buildEntryRecord(
  entry: EntrySummary,
  entities: PolymerEntitySummary[],
): EntryRecord {
  const organisms = new Set<string>();
  const chains = new Set<string>();

  for (const entity of entities) {
    if (entity.organism !== null) organisms.add(entity.organism);
    for (const chainId of entity.chainIds) chains.add(chainId);
  }

  return {
    pdbId: entry.pdbId,
    title: entry.title,
    method: entry.method,
    resolution: entry.resolution,
    organism: [...organisms].sort().join(', ') || 'Unknown',
    chainCount: chains.size,
  };
}

/**
 * Fetch chain for one identifier. Entity requests run one after another; any
 * failure drops the whole identifier.
 */
export async function enrichEntry(
  pdbId: PdbId,
  provider: IStructureDataProvider,
  context: RequestContext,
): Promise<EnrichmentOutcome> {
  try {
    const entry = await provider.fetchEntrySummary(pdbId, context);
    const entities: PolymerEntitySummary[] = [];
    for (const entityId of entry.polymerEntityIds) {
      entities.push(
        await provider.fetchPolymerEntitySummary(pdbId, entityId, context),
      );
    }
    return { status: 'enriched', record: buildEntryRecord(entry, entities) };
  } catch (error) {
    const failure = toItemFailure(pdbId, error);
    logger.debug('Dropping entry that could not be enriched', {
      ...context,
      ...failure,
    });
    return { status: 'failed', failure };
  }
}

/**
 * Enrich every identifier with at most `concurrency` fetch chains in flight.
 * Resolves once all chains have settled; records are in completion order.
 */
export async function enrichEntries(
  pdbIds: readonly PdbId[],
  concurrency: number,
  provider: IStructureDataProvider,
  context: RequestContext,
): Promise<EnrichmentReport> {
  const limit = pLimit(concurrency);
  const report: EnrichmentReport = { records: [], failures: [] };

  await Promise.all(
    pdbIds.map((pdbId) =>
      limit(async () => {
        const outcome = await enrichEntry(pdbId, provider, context);
        if (outcome.status === 'enriched') {
          report.records.push(outcome.record);
        } else {
          report.failures.push(outcome.failure);
        }
      }),
    ),
  );

  logger.info('Metadata enrichment finished', {
    ...context,
    requested: pdbIds.length,
    enriched: report.records.length,
    failed: report.failures.length,
    concurrency,
  });

  return report;
}
