/**
 * @fileoverview Barrel file for all tool definitions, plus the array used for
 * registration.
 * @module src/mcp-server/tools/definitions
 */
import type { ZodObject, ZodRawShape } from 'zod';

import type { ToolDefinition } from '../utils/toolDefinition.js';
import { structureFinderExportArchiveTool } from './structure-finder-export-archive.tool.js';
import { structureFinderSearchTool } from './structure-finder-search.tool.js';
import { structureFinderViewStructureTool } from './structure-finder-view-structure.tool.js';

export {
  structureFinderExportArchiveTool,
  structureFinderSearchTool,
  structureFinderViewStructureTool,
};

/**
 * An array containing all tool definitions for easy iteration.
 */
export const allToolDefinitions: ToolDefinition<
  ZodObject<ZodRawShape>,
  ZodObject<ZodRawShape>
>[] = [
  structureFinderSearchTool,
  structureFinderExportArchiveTool,
  structureFinderViewStructureTool,
];
