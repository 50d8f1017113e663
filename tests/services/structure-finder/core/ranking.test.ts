/**
 * @fileoverview Unit tests for top X-ray ranking.
 * @module tests/services/structure-finder/core/ranking.test
 */
import { describe, expect, it } from 'vitest';

import { rankTopStructures } from '@/services/structure-finder/core/ranking.js';
import type { EntryRecord } from '@/services/structure-finder/types.js';

function record(pdbId: string, resolution: number | null, method = 'X-RAY DIFFRACTION'): EntryRecord {
  return {
    pdbId,
    title: `Structure ${pdbId}`,
    method,
    resolution,
    organism: 'Homo sapiens',
    chainCount: 1,
  };
}

describe('rankTopStructures', () => {
  it('should return the three best resolutions in ascending order', () => {
    const records = [
      record('1AAA', 2.1),
      record('2BBB', 1.0),
      record('3CCC', 1.8),
      record('4DDD', 0.9),
    ];

    const ranked = rankTopStructures(records);

    expect(ranked.map((r) => r.resolution)).toEqual([0.9, 1.0, 1.8]);
    expect(ranked.map((r) => r.pdbId)).toEqual(['4DDD', '2BBB', '3CCC']);
  });

  it('should consider only X-ray methods, case-insensitively', () => {
    const records = [
      record('1AAA', 0.5, 'ELECTRON MICROSCOPY'),
      record('2BBB', 1.5, 'x-ray diffraction'),
      record('3CCC', 1.2, 'SOLUTION NMR'),
    ];

    expect(rankTopStructures(records).map((r) => r.pdbId)).toEqual(['2BBB']);
  });

  it('should return fewer than three when fewer qualify', () => {
    expect(rankTopStructures([])).toEqual([]);
    expect(rankTopStructures([record('1AAA', 2.0)])).toHaveLength(1);
  });

  it('should never return more than three records', () => {
    const records = Array.from({ length: 8 }, (_, i) => record(`${i}XYZ`, 3 - i * 0.1));

    const ranked = rankTopStructures(records);

    expect(ranked).toHaveLength(3);
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i]?.resolution ?? Infinity).toBeGreaterThanOrEqual(
        ranked[i - 1]?.resolution ?? Infinity,
      );
    }
  });
});
