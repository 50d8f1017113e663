/**
 * @fileoverview Tool definition for rendering a structure in an embeddable
 * 3D viewer page.
 * @module src/mcp-server/tools/definitions/structure-finder-view-structure.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StructureFinderService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StructureFinderService as StructureFinderServiceClass } from '@/services/structure-finder/core/StructureFinderService.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'structure_finder_view_structure';
const TOOL_TITLE = 'View Structure in 3D';
const TOOL_DESCRIPTION =
  'Download a PDB entry and return a standalone HTML page that renders it with 3Dmol.js as a spectrum-coloured cartoon. Embed the page in an iframe or open it in a browser.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    pdbId: z
      .string()
      .trim()
      .length(4, 'PDB ID must be exactly 4 characters.')
      .regex(/^[0-9A-Z]{4}$/i, 'PDB ID must be alphanumeric.')
      .describe('4-character PDB identifier (e.g., "1M17").'),
  })
  .describe('Structure to display.');

const OutputSchema = z
  .object({
    pdbId: z.string().describe('Normalized PDB identifier.'),
    atomCount: z.number().int().describe('ATOM and HETATM records in the file.'),
    byteLength: z.number().int().describe('Size of the structure file in bytes.'),
    html: z.string().describe('Standalone HTML viewer page.'),
  })
  .describe('Embeddable 3D viewer for a structure.');

type ViewInput = z.infer<typeof InputSchema>;
type ViewOutput = z.infer<typeof OutputSchema>;

async function structureFinderViewStructureLogic(
  input: ViewInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ViewOutput> {
  const service =
    container.resolve<StructureFinderServiceClass>(StructureFinderService);
  const view = await service.viewStructure(input.pdbId, appContext);

  logger.info('Structure viewer rendered', {
    ...appContext,
    pdbId: view.pdbId,
    atomCount: view.atomCount,
  });

  return view;
}

function responseFormatter(result: ViewOutput): ContentBlock[] {
  return [
    {
      type: 'text',
      text: `3D viewer for ${result.pdbId} (${result.atomCount} atoms, ${(result.byteLength / 1024).toFixed(1)} KB)`,
    },
    {
      type: 'resource',
      resource: {
        uri: `structure-finder://viewer/${result.pdbId}.html`,
        mimeType: 'text/html',
        text: result.html,
      },
    },
  ];
}

export const structureFinderViewStructureTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureFinderViewStructureLogic,
  responseFormatter,
};
