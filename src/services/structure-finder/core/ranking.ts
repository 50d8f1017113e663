/**
 * @fileoverview Top-N selection of X-ray structures.
 * @module src/services/structure-finder/core/ranking
 */

import type { EntryRecord } from '../types.js';
import { methodMatches, sortByResolution } from './filter.js';

export const RANKED_METHOD = 'X-RAY';
export const RANKED_LIMIT = 3;

export function rankTopStructures(
  records: readonly EntryRecord[],
  limit: number = RANKED_LIMIT,
): EntryRecord[] {
  const xray = records.filter((r) => methodMatches(r.method, RANKED_METHOD));
  return sortByResolution(xray).slice(0, limit);
}
