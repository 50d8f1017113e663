/**
 * @fileoverview Orchestrates the structure finder pipeline: search, metadata
 * enrichment, filtering, ranking, archive export and viewer rendering.
 * Search and enrichment results are memoized in bounded TTL caches.
 * @module src/services/structure-finder/core/StructureFinderService
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig, StructureDataProvider } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, TtlCache, type RequestContext } from '@/utils/index.js';
import {
  ArchiveScope,
  type ArchiveBundle,
  type ArchiveExport,
  type EnrichmentReport,
  type PdbId,
  type SearchSession,
  type StructureFilters,
  type StructureSearchRequest,
  type StructureView,
} from '../types.js';
import {
  countAtomRecords,
  renderViewerHtml,
} from '../viewer/viewer-html.js';
import type { IStructureDataProvider } from './IStructureDataProvider.js';
import { ARCHIVE_MIME_TYPE, buildStructureArchive } from './archive.js';
import { enrichEntries, MAX_CONCURRENCY, MIN_CONCURRENCY } from './enricher.js';
import { isTransientFailure } from './failures.js';
import {
  filterRecords,
  MAX_RESOLUTION_CEILING,
  MIN_RESOLUTION_CEILING,
  sortByResolution,
} from './filter.js';
import { rankTopStructures } from './ranking.js';

const ARCHIVE_FILE_NAMES: Record<ArchiveScope, string> = {
  [ArchiveScope.FILTERED]: 'filtered_structures.zip',
  [ArchiveScope.TOP3]: 'top3_structures.zip',
};

const PDB_ID_PATTERN = /^[0-9A-Z]{4}$/;

function copyReport(report: EnrichmentReport): EnrichmentReport {
  return {
    records: [...report.records],
    failures: report.failures.map((failure) => ({ ...failure })),
  };
}

@injectable()
export class StructureFinderService {
  private readonly searchCache: TtlCache<PdbId[]>;
  private readonly enrichmentCache: TtlCache<EnrichmentReport>;

  constructor(
    @inject(StructureDataProvider)
    private readonly provider: IStructureDataProvider,
    @inject(AppConfig) private readonly config: AppConfigType,
  ) {
    const cacheOptions = {
      ttlMs: config.structureFinder.cacheTtlMs,
      maxEntries: config.structureFinder.cacheMaxEntries,
    };
    this.searchCache = new TtlCache(cacheOptions);
    this.enrichmentCache = new TtlCache(cacheOptions);
  }

  /**
   * Entry identifiers for a query. Non-empty results are memoized per
   * trimmed query.
   */
  async search(query: string, context: RequestContext): Promise<PdbId[]> {
    const normalized = this.normalizeQuery(query, context);
    const cached = this.searchCache.get(normalized);
    if (cached) {
      logger.debug('Search cache hit', { ...context, query: normalized });
      return [...cached];
    }

    const ids = await this.provider.searchEntries(normalized, context);
    if (ids.length > 0) {
      this.searchCache.set(normalized, [...ids]);
      logger.debug('Search result cached', {
        ...context,
        query: normalized,
        cachedQueries: this.searchCache.size,
      });
    }
    return ids;
  }

  /**
   * Enrich identifiers with metadata using up to `concurrency` parallel
   * fetch chains. Memoized by the sorted identifier set unless a failure is
   * transient (timeout, network or HTTP error).
   */
  async enrich(
    pdbIds: readonly PdbId[],
    concurrency: number,
    context: RequestContext,
  ): Promise<EnrichmentReport> {
    this.assertConcurrency(concurrency, context);

    const key = [...pdbIds].sort().join(',');
    const cached = this.enrichmentCache.get(key);
    if (cached) {
      logger.debug('Enrichment cache hit', {
        ...context,
        idCount: pdbIds.length,
      });
      return copyReport(cached);
    }

    const report = await enrichEntries(
      pdbIds,
      concurrency,
      this.provider,
      context,
    );
    if (report.failures.some(isTransientFailure)) {
      logger.debug('Enrichment report not cached: transient failures', {
        ...context,
        failureCount: report.failures.length,
      });
    } else {
      this.enrichmentCache.set(key, copyReport(report));
    }
    return report;
  }

  /**
   * Run one full search interaction and return its session state.
   */
  async runSearch(
    request: StructureSearchRequest,
    context: RequestContext,
  ): Promise<SearchSession> {
    const query = this.normalizeQuery(request.query, context);
    const filters = request.filters;
    const concurrency =
      request.concurrency ?? this.config.structureFinder.defaultConcurrency;
    this.assertFilters(filters, context);
    this.assertConcurrency(concurrency, context);

    logger.debug('Running structure search', {
      ...context,
      provider: this.provider.name,
      query,
      filters,
      concurrency,
    });

    const ids = await this.search(query, context);
    if (ids.length === 0) {
      logger.info('No entries found for query', { ...context, query });
      return {
        query,
        filters,
        concurrency,
        status: 'no_entries',
        rawCount: 0,
        enrichedCount: 0,
        filteredCount: 0,
        records: [],
        topRanked: [],
        enrichmentFailures: [],
      };
    }

    const report = await this.enrich(ids, concurrency, context);
    const records = sortByResolution(filterRecords(report.records, filters));
    const topRanked = rankTopStructures(records);

    logger.info('Structure search completed', {
      ...context,
      query,
      rawCount: ids.length,
      enrichedCount: report.records.length,
      filteredCount: records.length,
    });

    return {
      query,
      filters,
      concurrency,
      status: records.length > 0 ? 'ok' : 'no_matches',
      rawCount: ids.length,
      enrichedCount: report.records.length,
      filteredCount: records.length,
      records,
      topRanked,
      enrichmentFailures: report.failures,
    };
  }

  /**
   * ZIP the structure files of the given identifiers.
   */
  async buildArchive(
    pdbIds: readonly PdbId[],
    context: RequestContext,
  ): Promise<ArchiveBundle> {
    return buildStructureArchive(
      pdbIds,
      (pdbId, ctx) => this.provider.downloadStructureFile(pdbId, ctx),
      context,
    );
  }

  /**
   * Run the search session for `request` and archive the chosen scope.
   */
  async exportArchive(
    request: StructureSearchRequest,
    scope: ArchiveScope,
    context: RequestContext,
  ): Promise<ArchiveExport> {
    const session = await this.runSearch(request, context);
    const selected =
      scope === ArchiveScope.TOP3 ? session.topRanked : session.records;
    const bundle = await this.buildArchive(
      selected.map((r) => r.pdbId),
      context,
    );

    return {
      scope,
      fileName: ARCHIVE_FILE_NAMES[scope],
      mimeType: ARCHIVE_MIME_TYPE,
      bundle,
      session,
    };
  }

  /**
   * Download a structure and render it as an embeddable viewer page.
   * @throws {McpError} when the id is invalid or the download fails
   */
  async viewStructure(
    pdbId: string,
    context: RequestContext,
  ): Promise<StructureView> {
    const normalizedId = pdbId.trim().toUpperCase();
    if (!PDB_ID_PATTERN.test(normalizedId)) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Invalid PDB ID format: ${pdbId}. Must be 4 alphanumeric characters.`,
        { requestId: context.requestId, pdbId },
      );
    }

    let pdbText: string;
    try {
      pdbText = await this.provider.downloadStructureFile(normalizedId, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to load structure for viewer', {
        ...context,
        pdbId: normalizedId,
        error: message,
      });
      throw new McpError(
        error instanceof McpError
          ? error.code
          : JsonRpcErrorCode.ServiceUnavailable,
        `Could not load structure ${normalizedId}: ${message}`,
        { requestId: context.requestId, pdbId: normalizedId },
      );
    }

    return {
      pdbId: normalizedId,
      html: renderViewerHtml(normalizedId, pdbText),
      atomCount: countAtomRecords(pdbText),
      byteLength: Buffer.byteLength(pdbText, 'utf-8'),
    };
  }

  clearCaches(): void {
    this.searchCache.clear();
    this.enrichmentCache.clear();
  }

  private normalizeQuery(query: string, context: RequestContext): string {
    const normalized = query.trim();
    if (normalized.length === 0) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        'Please enter a protein or gene name.',
        { requestId: context.requestId },
      );
    }
    return normalized;
  }

  private assertConcurrency(concurrency: number, context: RequestContext): void {
    if (
      !Number.isInteger(concurrency) ||
      concurrency < MIN_CONCURRENCY ||
      concurrency > MAX_CONCURRENCY
    ) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Concurrency must be an integer between ${MIN_CONCURRENCY} and ${MAX_CONCURRENCY}.`,
        { requestId: context.requestId, concurrency },
      );
    }
  }

  private assertFilters(filters: StructureFilters, context: RequestContext): void {
    if (
      !Number.isFinite(filters.maxResolution) ||
      filters.maxResolution < MIN_RESOLUTION_CEILING ||
      filters.maxResolution > MAX_RESOLUTION_CEILING
    ) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Maximum resolution must be between ${MIN_RESOLUTION_CEILING} and ${MAX_RESOLUTION_CEILING} Å.`,
        { requestId: context.requestId, maxResolution: filters.maxResolution },
      );
    }
  }
}
