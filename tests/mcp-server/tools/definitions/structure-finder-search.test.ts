/**
 * @fileoverview Unit tests for the structure_finder_search tool.
 * @module tests/mcp-server/tools/definitions/structure-finder-search.test
 */
import { container } from 'tsyringe';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StructureFinderService as StructureFinderServiceToken } from '@/container/tokens.js';
import { structureFinderSearchTool } from '@/mcp-server/tools/definitions/structure-finder-search.tool.js';
import { StructureFinderService } from '@/services/structure-finder/core/StructureFinderService.js';
import { MethodFilter } from '@/services/structure-finder/types.js';
import { logger } from '@/utils/index.js';
import {
  createEgfrProvider,
  createTestConfig,
  createTestContext,
  type FakeStructureProvider,
} from '../../../helpers/fakeStructureProvider.js';

describe('structure_finder_search tool', () => {
  const context = createTestContext();
  const sdkContext = {
    signal: new AbortController().signal,
    requestId: 'test-req-1',
    sendNotification: vi.fn(),
    sendRequest: vi.fn(),
  };

  let provider: FakeStructureProvider;

  beforeEach(() => {
    vi.spyOn(logger, 'debug').mockImplementation(() => {});
    vi.spyOn(logger, 'info').mockImplementation(() => {});

    provider = createEgfrProvider();
    container.registerInstance(
      StructureFinderServiceToken,
      new StructureFinderService(provider, createTestConfig()),
    );
  });

  afterEach(() => {
    container.reset();
  });

  describe('Tool Metadata', () => {
    it('should have correct tool name', () => {
      expect(structureFinderSearchTool.name).toBe('structure_finder_search');
    });

    it('should have correct annotations', () => {
      expect(structureFinderSearchTool.annotations).toEqual({
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      });
    });
  });

  describe('Input Validation', () => {
    it('should apply filter defaults', () => {
      const input = structureFinderSearchTool.inputSchema.parse({
        query: '  EGFR ',
      });

      expect(input).toEqual({
        query: 'EGFR',
        onlyHuman: true,
        monomerOnly: true,
        maxResolution: 3.0,
        method: MethodFilter.ANY,
        concurrency: 10,
      });
    });

    it('should reject an empty query', () => {
      expect(
        structureFinderSearchTool.inputSchema.safeParse({ query: '   ' }).success,
      ).toBe(false);
    });

    it('should reject a resolution ceiling above 5.0', () => {
      expect(
        structureFinderSearchTool.inputSchema.safeParse({
          query: 'EGFR',
          maxResolution: 6,
        }).success,
      ).toBe(false);
    });

    it('should reject concurrency above 20', () => {
      expect(
        structureFinderSearchTool.inputSchema.safeParse({
          query: 'EGFR',
          concurrency: 21,
        }).success,
      ).toBe(false);
    });
  });

  describe('Tool Logic', () => {
    it('should return filtered results and the top X-ray structures', async () => {
      const input = structureFinderSearchTool.inputSchema.parse({
        query: 'EGFR',
        maxResolution: 2.5,
        method: 'X-RAY',
      });

      const result = await structureFinderSearchTool.logic(
        input,
        context,
        sdkContext,
      );

      expect(result.status).toBe('ok');
      expect(result.rawCount).toBe(5);
      expect(result.filteredCount).toBe(2);
      expect(result.results.map((r) => r.pdbId)).toEqual(['E002', 'E001']);
      expect(result.topXray[0]).toEqual({
        pdbId: 'E002',
        title: 'Structure E002',
        method: 'X-RAY DIFFRACTION',
        resolution: 1.9,
        organism: 'Homo sapiens',
        chainCount: 1,
      });
      expect(
        structureFinderSearchTool.outputSchema.safeParse(result).success,
      ).toBe(true);
    });

    it('should report no_entries for a query without hits', async () => {
      const input = structureFinderSearchTool.inputSchema.parse({
        query: 'UNKNOWN1',
      });

      const result = await structureFinderSearchTool.logic(
        input,
        context,
        sdkContext,
      );

      expect(result.status).toBe('no_entries');
      expect(result.results).toEqual([]);
    });
  });

  describe('Response Formatter', () => {
    it('should render counters, rows and the top X-ray list', async () => {
      const input = structureFinderSearchTool.inputSchema.parse({
        query: 'EGFR',
        maxResolution: 2.5,
        method: 'X-RAY',
      });
      const result = await structureFinderSearchTool.logic(
        input,
        context,
        sdkContext,
      );

      const content = structureFinderSearchTool.responseFormatter?.(result);

      expect(content).toEqual([
        {
          type: 'text',
          text: [
            'Total Entries: 5 | Filtered Entries: 2',
            '',
            'Matching structures:',
            '• E002: Structure E002',
            '  X-RAY DIFFRACTION | 1.90Å | Homo sapiens | 1 chain(s)',
            '• E001: Structure E001',
            '  X-RAY DIFFRACTION | 2.30Å | Homo sapiens | 1 chain(s)',
            '',
            'Top 2 X-ray structures:',
            '1. E002 (1.90Å)',
            '2. E001 (2.30Å)',
          ].join('\n'),
        },
      ]);
    });

    it('should say so when the search finds nothing', async () => {
      const result = await structureFinderSearchTool.logic(
        structureFinderSearchTool.inputSchema.parse({ query: 'UNKNOWN1' }),
        context,
        sdkContext,
      );

      expect(structureFinderSearchTool.responseFormatter?.(result)).toEqual([
        { type: 'text', text: 'No entries found for your query.' },
      ]);
    });

    it('should say so when filters remove everything', async () => {
      const result = await structureFinderSearchTool.logic(
        structureFinderSearchTool.inputSchema.parse({
          query: 'EGFR',
          method: 'NMR',
        }),
        context,
        sdkContext,
      );

      expect(structureFinderSearchTool.responseFormatter?.(result)).toEqual([
        {
          type: 'text',
          text: 'Total Entries: 5 | Filtered Entries: 0\n\nNo structures matched your filters.',
        },
      ]);
    });

    it('should note when filtered results contain no X-ray structure', async () => {
      const result = await structureFinderSearchTool.logic(
        structureFinderSearchTool.inputSchema.parse({
          query: 'EGFR',
          monomerOnly: false,
          method: 'ELECTRON MICROSCOPY',
        }),
        context,
        sdkContext,
      );

      const text = structureFinderSearchTool.responseFormatter?.(result)[0];
      expect(text).toEqual({
        type: 'text',
        text: [
          'Total Entries: 5 | Filtered Entries: 1',
          '',
          'Matching structures:',
          '• E004: Structure E004',
          '  ELECTRON MICROSCOPY | 2.40Å | Homo sapiens | 1 chain(s)',
          '',
          'No X-ray structures available in filtered results.',
        ].join('\n'),
      });
    });
  });
});
