/**
 * @fileoverview Type definitions for the structure finder domain: entry records,
 * filter criteria, enrichment and archive reports, and search sessions.
 * @module src/services/structure-finder/types
 */

/**
 * Entry identifier as returned by the search service (e.g., "1M17").
 */
export type PdbId = string;

/**
 * Experimental method choices offered by the method filter
 */
export enum MethodFilter {
  ANY = 'Any',
  XRAY = 'X-RAY',
  ELECTRON_MICROSCOPY = 'ELECTRON MICROSCOPY',
  NMR = 'NMR',
}

/**
 * Archive scopes available for export
 */
export enum ArchiveScope {
  FILTERED = 'filtered',
  TOP3 = 'top3',
}

/**
 * Flat, normalized metadata for one structure entry.
 */
export interface EntryRecord {
  readonly pdbId: PdbId;
  readonly title: string;
  readonly method: string;
  /** Resolution in Angstroms; null when the method reports none. */
  readonly resolution: number | null;
  /** Sorted, comma-joined organism names, or "Unknown". */
  readonly organism: string;
  /** Number of distinct chain labels across all polymer entities. */
  readonly chainCount: number;
}

/**
 * Entry-level metadata as reported by a data provider.
 */
export interface EntrySummary {
  pdbId: PdbId;
  title: string;
  method: string;
  resolution: number | null;
  polymerEntityIds: string[];
}

/**
 * Polymer-entity metadata as reported by a data provider.
 */
export interface PolymerEntitySummary {
  /** First source organism name; null when the entity lists no source organism. */
  organism: string | null;
  chainIds: string[];
}

/**
 * Predicates applied by the filter pipeline.
 */
export interface StructureFilters {
  /** Keep only records whose organism contains "Homo sapiens". */
  organismFilterOn: boolean;
  /** Keep only records with exactly one distinct chain. */
  monomerOnly: boolean;
  /** Resolution ceiling in Angstroms (1.0 - 5.0). */
  maxResolution: number;
  methodFilter: MethodFilter;
}

export type FailureKind =
  | 'timeout'
  | 'not_found'
  | 'http_error'
  | 'malformed_response'
  | 'network_error';

/**
 * Why a single identifier could not be processed in a batch operation.
 */
export interface ItemFailure {
  pdbId: PdbId;
  kind: FailureKind;
  message: string;
}

export type EnrichmentOutcome =
  | { status: 'enriched'; record: EntryRecord }
  | { status: 'failed'; failure: ItemFailure };

/**
 * Aggregated result of enriching a batch of identifiers. Records are in
 * completion order.
 */
export interface EnrichmentReport {
  records: EntryRecord[];
  failures: ItemFailure[];
}

/**
 * ZIP archive of raw structure files.
 */
export interface ArchiveBundle {
  data: Uint8Array;
  /** Entry names written to the archive, in write order. */
  entries: string[];
  /** Identifiers skipped because their file could not be fetched. */
  failures: ItemFailure[];
}

export interface StructureSearchRequest {
  query: string;
  filters: StructureFilters;
  /** Parallel metadata fetches (1 - 20); defaults to the configured value. */
  concurrency?: number;
}

export type SearchStatus = 'ok' | 'no_entries' | 'no_matches';

/**
 * State of one search interaction, from query to ranked subset.
 */
export interface SearchSession {
  query: string;
  filters: StructureFilters;
  concurrency: number;
  status: SearchStatus;
  /** Identifiers returned by the search stage. */
  rawCount: number;
  /** Records that were enriched successfully. */
  enrichedCount: number;
  filteredCount: number;
  /** Filtered records, ascending by resolution. */
  records: EntryRecord[];
  /** Best X-ray structures among `records`, at most three. */
  topRanked: EntryRecord[];
  enrichmentFailures: ItemFailure[];
}

export interface ArchiveExport {
  scope: ArchiveScope;
  fileName: string;
  mimeType: 'application/zip';
  bundle: ArchiveBundle;
  session: SearchSession;
}

export interface StructureView {
  pdbId: PdbId;
  html: string;
  atomCount: number;
  byteLength: number;
}
