/**
 * @fileoverview Record filtering and display ordering.
 * @module src/services/structure-finder/core/filter
 */

import {
  MethodFilter,
  type EntryRecord,
  type StructureFilters,
} from '../types.js';

export const HUMAN_ORGANISM = 'Homo sapiens';
export const MIN_RESOLUTION_CEILING = 1.0;
export const MAX_RESOLUTION_CEILING = 5.0;

export const DEFAULT_FILTERS: Readonly<StructureFilters> = {
  organismFilterOn: true,
  monomerOnly: true,
  maxResolution: 3.0,
  methodFilter: MethodFilter.ANY,
};

/**
 * Case-insensitive substring test on an experimental method string.
 */
export function methodMatches(method: string, name: string): boolean {
  return method.toLowerCase().includes(name.toLowerCase());
}

function matches(record: EntryRecord, filters: StructureFilters): boolean {
  if (filters.organismFilterOn && !record.organism.includes(HUMAN_ORGANISM)) {
    return false;
  }
  if (filters.monomerOnly && record.chainCount !== 1) {
    return false;
  }
  if (
    filters.methodFilter !== MethodFilter.ANY &&
    !methodMatches(record.method, filters.methodFilter)
  ) {
    return false;
  }
  return record.resolution !== null && record.resolution <= filters.maxResolution;
}

/**
 * Keep records satisfying every active predicate. Input order is preserved.
 */
export function filterRecords(
  records: readonly EntryRecord[],
  filters: StructureFilters,
): EntryRecord[] {
  return records.filter((record) => matches(record, filters));
}

/**
 * Ascending by resolution, nulls last. Stable for equal resolutions.
 */
export function sortByResolution(records: readonly EntryRecord[]): EntryRecord[] {
  return [...records].sort((a, b) => {
    if (a.resolution === null) return b.resolution === null ? 0 : 1;
    if (b.resolution === null) return -1;
    return a.resolution - b.resolution;
  });
}
