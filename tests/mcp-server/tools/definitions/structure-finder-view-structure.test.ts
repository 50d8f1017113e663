/**
 * @fileoverview Unit tests for the structure_finder_view_structure tool.
 * @module tests/mcp-server/tools/definitions/structure-finder-view-structure.test
 */
import { container } from 'tsyringe';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StructureFinderService as StructureFinderServiceToken } from '@/container/tokens.js';
import { structureFinderViewStructureTool } from '@/mcp-server/tools/definitions/structure-finder-view-structure.tool.js';
import { StructureFinderService } from '@/services/structure-finder/core/StructureFinderService.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/index.js';
import {
  createTestConfig,
  createTestContext,
  FakeStructureProvider,
} from '../../../helpers/fakeStructureProvider.js';

const PDB_TEXT = 'ATOM      1  N   MET A   1\nATOM      2  CA  MET A   1\nEND\n';

describe('structure_finder_view_structure tool', () => {
  const context = createTestContext();
  const sdkContext = {
    signal: new AbortController().signal,
    requestId: 'test-req-1',
    sendNotification: vi.fn(),
    sendRequest: vi.fn(),
  };

  beforeEach(() => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});

    const provider = new FakeStructureProvider();
    provider.files.set('1M17', PDB_TEXT);
    container.registerInstance(
      StructureFinderServiceToken,
      new StructureFinderService(provider, createTestConfig()),
    );
  });

  afterEach(() => {
    container.reset();
  });

  it('should reject identifiers that are not 4 alphanumeric characters', () => {
    const schema = structureFinderViewStructureTool.inputSchema;
    expect(schema.safeParse({ pdbId: '1M1' }).success).toBe(false);
    expect(schema.safeParse({ pdbId: '1M1!' }).success).toBe(false);
    expect(schema.safeParse({ pdbId: '1m17' }).success).toBe(true);
  });

  it('should render the viewer page for a lowercase id', async () => {
    const input = structureFinderViewStructureTool.inputSchema.parse({
      pdbId: '1m17',
    });

    const result = await structureFinderViewStructureTool.logic(
      input,
      context,
      sdkContext,
    );

    expect(result.pdbId).toBe('1M17');
    expect(result.atomCount).toBe(2);
    expect(result.byteLength).toBe(PDB_TEXT.length);
    expect(result.html).toContain('<title>1M17 - 3D structure</title>');
  });

  it('should embed the page as an HTML resource', async () => {
    const result = await structureFinderViewStructureTool.logic(
      structureFinderViewStructureTool.inputSchema.parse({ pdbId: '1M17' }),
      context,
      sdkContext,
    );

    const content = structureFinderViewStructureTool.responseFormatter?.(result);

    expect(content?.[0]).toEqual({
      type: 'text',
      text: `3D viewer for 1M17 (2 atoms, ${(PDB_TEXT.length / 1024).toFixed(1)} KB)`,
    });
    expect(content?.[1]).toEqual({
      type: 'resource',
      resource: {
        uri: 'structure-finder://viewer/1M17.html',
        mimeType: 'text/html',
        text: result.html,
      },
    });
  });

  it('should fail when the structure cannot be downloaded', async () => {
    await expect(
      structureFinderViewStructureTool.logic(
        structureFinderViewStructureTool.inputSchema.parse({ pdbId: '9ZZZ' }),
        context,
        sdkContext,
      ),
    ).rejects.toMatchObject({ code: JsonRpcErrorCode.NotFound });
  });
});
