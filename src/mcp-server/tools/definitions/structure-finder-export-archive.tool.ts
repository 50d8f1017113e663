/**
 * @fileoverview Tool definition for downloading structure files of a search
 * as a ZIP archive, either every filtered structure or the top 3 X-ray ones.
 * @module src/mcp-server/tools/definitions/structure-finder-export-archive.tool
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
import { ArchiveScope } from '@/services/structure-finder/index.js';
import { type RequestContext, logger } from '@/utils/index.js';
import {
  ItemFailureSchema,
  SearchInputShape,
  toSearchRequest,
} from './shared-schemas.js';

const TOOL_NAME = 'structure_finder_export_archive';
const TOOL_TITLE = 'Export Structure Archive';
const TOOL_DESCRIPTION =
  'Run a structure search with the given filters and bundle the PDB files of the results into a ZIP archive. Scope "filtered" archives every filtered structure; "top3" archives the three best-resolution X-ray structures. Files that cannot be downloaded are skipped and listed in failures.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    ...SearchInputShape,
    scope: z
      .nativeEnum(ArchiveScope)
      .default(ArchiveScope.FILTERED)
      .describe('Which structures to archive: "filtered" (all results) or "top3".'),
  })
  .describe('Search parameters and archive scope.');

const OutputSchema = z
  .object({
    fileName: z.string().describe('Suggested archive file name.'),
    mimeType: z.literal('application/zip'),
    scope: z.nativeEnum(ArchiveScope),
    entryCount: z.number().int().describe('Number of files in the archive.'),
    entries: z.array(z.string()).describe('Archive entry names.'),
    failures: z
      .array(ItemFailureSchema)
      .describe('Structures skipped because their file could not be fetched.'),
    byteLength: z.number().int().describe('Archive size in bytes.'),
    base64: z.string().describe('Base64-encoded archive bytes.'),
  })
  .describe('ZIP archive of structure files.');

type ExportInput = z.infer<typeof InputSchema>;
type ExportOutput = z.infer<typeof OutputSchema>;

async function structureFinderExportArchiveLogic(
  input: ExportInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ExportOutput> {
  logger.debug('Exporting structure archive', {
    ...appContext,
    toolInput: input,
  });

  const service =
    container.resolve<StructureFinderServiceClass>(StructureFinderService);
  const exported = await service.exportArchive(
    toSearchRequest(input),
    input.scope,
    appContext,
  );
  const { bundle } = exported;

  logger.info('Structure archive exported', {
    ...appContext,
    scope: exported.scope,
    entryCount: bundle.entries.length,
    failureCount: bundle.failures.length,
  });

  return {
    fileName: exported.fileName,
    mimeType: exported.mimeType,
    scope: exported.scope,
    entryCount: bundle.entries.length,
    entries: bundle.entries,
    failures: bundle.failures,
    byteLength: bundle.data.byteLength,
    base64: Buffer.from(bundle.data).toString('base64'),
  };
}

function responseFormatter(result: ExportOutput): ContentBlock[] {
  const skipped =
    result.failures.length > 0
      ? `\nSkipped: ${result.failures.map((f) => `${f.pdbId} (${f.kind})`).join(', ')}`
      : '';

  return [
    {
      type: 'text',
      text: `${result.fileName}: ${result.entryCount} file(s), ${(result.byteLength / 1024).toFixed(1)} KB${skipped}`,
    },
    {
      type: 'resource',
      resource: {
        uri: `structure-finder://archive/${result.fileName}`,
        mimeType: result.mimeType,
        blob: result.base64,
      },
    },
  ];
}

export const structureFinderExportArchiveTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureFinderExportArchiveLogic,
  responseFormatter,
};
