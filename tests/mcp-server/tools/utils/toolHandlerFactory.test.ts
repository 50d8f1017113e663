/**
 * @fileoverview Unit tests for the MCP tool handler factory.
 * @module tests/mcp-server/tools/utils/toolHandlerFactory.test
 */
import { container } from 'tsyringe';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StructureFinderService as StructureFinderServiceToken } from '@/container/tokens.js';
import { structureFinderViewStructureTool } from '@/mcp-server/tools/definitions/structure-finder-view-structure.tool.js';
import { createMcpToolHandler } from '@/mcp-server/tools/utils/toolHandlerFactory.js';
import { StructureFinderService } from '@/services/structure-finder/core/StructureFinderService.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/index.js';
import {
  createTestConfig,
  FakeStructureProvider,
} from '../../../helpers/fakeStructureProvider.js';

describe('createMcpToolHandler', () => {
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
    provider.files.set('1ABC', 'ATOM      1  N   MET A   1\nEND\n');
    container.registerInstance(
      StructureFinderServiceToken,
      new StructureFinderService(provider, createTestConfig()),
    );
  });

  afterEach(() => {
    container.reset();
  });

  it('should return structured content and formatted blocks on success', async () => {
    const handler = createMcpToolHandler(structureFinderViewStructureTool);

    const result = await handler({ pdbId: '1abc' }, sdkContext);

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toMatchObject({
      pdbId: '1ABC',
      atomCount: 1,
    });
    expect(result.content).toHaveLength(2);
  });

  it('should turn thrown McpErrors into error results', async () => {
    const handler = createMcpToolHandler(structureFinderViewStructureTool);

    const result = await handler({ pdbId: '9ZZZ' }, sdkContext);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Error: Could not load structure 9ZZZ: HTTP error! Status: 404 Not Found',
      },
    ]);
    expect(result.structuredContent).toMatchObject({
      code: JsonRpcErrorCode.NotFound,
    });
  });

  it('should report invalid input as a validation error', async () => {
    const handler = createMcpToolHandler(structureFinderViewStructureTool);

    const result = await handler({ pdbId: 'TOOLONG' }, sdkContext);

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      code: JsonRpcErrorCode.ValidationError,
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
