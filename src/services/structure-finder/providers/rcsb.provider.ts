/**
 * @fileoverview RCSB PDB implementation of the structure data provider.
 * Search runs against the Search API, metadata against the REST data API and
 * structure files against the file download service.
 * @module src/services/structure-finder/providers/rcsb.provider
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import type { RequestContext } from '@/utils/index.js';
import type { IStructureDataProvider } from '../core/IStructureDataProvider.js';
import type {
  EntrySummary,
  PdbId,
  PolymerEntitySummary,
} from '../types.js';
import { fetchEntry, fetchPolymerEntity } from './rcsb/data-client.js';
import { downloadPdbFile } from './rcsb/file-client.js';
import { searchEntryIds } from './rcsb/search-client.js';

@injectable()
export class RcsbStructureProvider implements IStructureDataProvider {
  public readonly name = 'RCSB PDB';

  constructor(@inject(AppConfig) private readonly config: AppConfigType) {}

  async searchEntries(query: string, context: RequestContext): Promise<PdbId[]> {
    return searchEntryIds(
      query,
      {
        searchUrl: this.config.rcsb.searchUrl,
        timeoutMs: this.config.rcsb.searchTimeoutMs,
      },
      context,
    );
  }

  async fetchEntrySummary(
    pdbId: PdbId,
    context: RequestContext,
  ): Promise<EntrySummary> {
    return fetchEntry(pdbId, this.dataSettings(), context);
  }

  async fetchPolymerEntitySummary(
    pdbId: PdbId,
    entityId: string,
    context: RequestContext,
  ): Promise<PolymerEntitySummary> {
    return fetchPolymerEntity(pdbId, entityId, this.dataSettings(), context);
  }

  async downloadStructureFile(
    pdbId: PdbId,
    context: RequestContext,
  ): Promise<string> {
    return downloadPdbFile(
      pdbId,
      {
        filesUrl: this.config.rcsb.filesUrl,
        timeoutMs: this.config.rcsb.fileTimeoutMs,
      },
      context,
    );
  }

  private dataSettings() {
    return {
      dataUrl: this.config.rcsb.dataUrl,
      timeoutMs: this.config.rcsb.metadataTimeoutMs,
    };
  }
}
