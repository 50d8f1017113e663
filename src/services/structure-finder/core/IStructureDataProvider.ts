/**
 * @fileoverview Provider interface for structure data sources.
 * @module src/services/structure-finder/core/IStructureDataProvider
 */

import type { RequestContext } from '@/utils/index.js';
import type {
  EntrySummary,
  PdbId,
  PolymerEntitySummary,
} from '../types.js';

/**
 * Contract between the structure finder pipeline and a remote database.
 */
export interface IStructureDataProvider {
  /**
   * Human-readable provider name
   */
  readonly name: string;

  /**
   * Find entry identifiers matching a protein or gene name.
   * Failed remote calls resolve to an empty list rather than throwing.
   */
  searchEntries(query: string, context: RequestContext): Promise<PdbId[]>;

  /**
   * Fetch entry-level metadata.
   * @throws {McpError} on HTTP, timeout or network failure
   * @throws {ZodError} when the response does not have the expected shape
   */
  fetchEntrySummary(
    pdbId: PdbId,
    context: RequestContext,
  ): Promise<EntrySummary>;

  /**
   * Fetch metadata for one polymer entity of an entry.
   * @throws {McpError} on HTTP, timeout or network failure
   * @throws {ZodError} when the response does not have the expected shape
   */
  fetchPolymerEntitySummary(
    pdbId: PdbId,
    entityId: string,
    context: RequestContext,
  ): Promise<PolymerEntitySummary>;

  /**
   * Download the raw PDB-format structure file as text.
   * @throws {McpError} on HTTP, timeout or network failure
   */
  downloadStructureFile(pdbId: PdbId, context: RequestContext): Promise<string>;
}
