/**
 * @fileoverview REST client for RCSB entry and polymer-entity metadata. Maps
 * the nested API documents onto the provider-neutral summaries.
 * @module src/services/structure-finder/providers/rcsb/data-client
 */

import { fetchWithTimeout, type RequestContext } from '@/utils/index.js';
import { MalformedEntryError } from '../../core/failures.js';
import type {
  EntrySummary,
  PdbId,
  PolymerEntitySummary,
} from '../../types.js';
import { ENTRY_PATH, POLYMER_ENTITY_PATH } from './config.js';
import {
  RcsbEntrySchema,
  RcsbPolymerEntitySchema,
  type RcsbEntry,
  type RcsbPolymerEntity,
} from './types.js';

export interface DataClientSettings {
  dataUrl: string;
  timeoutMs: number;
}

/**
 * Entry document → summary. An empty `exptl` or `resolution_combined` array is
 * treated as malformed; an absent one falls back to the default.
 */
export function toEntrySummary(pdbId: PdbId, entry: RcsbEntry): EntrySummary {
  const methods = entry.exptl ?? [{}];
  const firstMethod = methods[0];
  if (!firstMethod) {
    throw new MalformedEntryError(`Entry ${pdbId} lists no experimental method`);
  }

  const resolutions = entry.rcsb_entry_info?.resolution_combined ?? [null];
  if (resolutions.length === 0) {
    throw new MalformedEntryError(`Entry ${pdbId} has an empty resolution list`);
  }

  return {
    pdbId,
    title: entry.struct?.title ?? 'No Title',
    method: firstMethod.method ?? 'Unknown',
    resolution: resolutions[0] ?? null,
    polymerEntityIds:
      entry.rcsb_entry_container_identifiers?.polymer_entity_ids ?? [],
  };
}

/**
 * Only the first listed source organism counts for an entity.
 */
export function toPolymerEntitySummary(
  entity: RcsbPolymerEntity,
): PolymerEntitySummary {
  const sources = entity.rcsb_entity_source_organism ?? [];
  const firstSource = sources[0];
  return {
    organism: firstSource ? (firstSource.scientific_name ?? 'Unknown') : null,
    chainIds:
      entity.rcsb_polymer_entity_container_identifiers?.auth_asym_ids ?? [],
  };
}

export async function fetchEntry(
  pdbId: PdbId,
  settings: DataClientSettings,
  context: RequestContext,
): Promise<EntrySummary> {
  const url = `${settings.dataUrl}${ENTRY_PATH}/${encodeURIComponent(pdbId)}`;
  const entry = await fetchWithTimeout(url, {
    method: 'GET',
    timeout: settings.timeoutMs,
    context,
    parse: async (response) => RcsbEntrySchema.parse(await response.json()),
  });
  return toEntrySummary(pdbId, entry);
}

export async function fetchPolymerEntity(
  pdbId: PdbId,
  entityId: string,
  settings: DataClientSettings,
  context: RequestContext,
): Promise<PolymerEntitySummary> {
  const url = `${settings.dataUrl}${POLYMER_ENTITY_PATH}/${encodeURIComponent(pdbId)}/${encodeURIComponent(entityId)}`;
  const entity = await fetchWithTimeout(url, {
    method: 'GET',
    timeout: settings.timeoutMs,
    context,
    parse: async (response) =>
      RcsbPolymerEntitySchema.parse(await response.json()),
  });
  return toPolymerEntitySummary(entity);
}
