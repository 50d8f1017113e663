/**
 * @fileoverview Raw structure file downloads from RCSB.
 * @module src/services/structure-finder/providers/rcsb/file-client
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { fetchWithTimeout, logger, type RequestContext } from '@/utils/index.js';
import type { PdbId } from '../../types.js';

export interface FileClientSettings {
  filesUrl: string;
  timeoutMs: number;
}

/**
 * Download `{id}.pdb` and return its text unchanged.
 */
export async function downloadPdbFile(
  pdbId: PdbId,
  settings: FileClientSettings,
  context: RequestContext,
): Promise<string> {
  const url = `${settings.filesUrl}/${encodeURIComponent(pdbId)}.pdb`;
  const text = await fetchWithTimeout(url, {
    method: 'GET',
    timeout: settings.timeoutMs,
    context,
    parse: (response) => response.text(),
  });
  if (text.length === 0) {
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Structure file for ${pdbId} is empty`,
      { requestId: context.requestId, pdbId },
    );
  }

  logger.debug('Downloaded structure file', {
    ...context,
    pdbId,
    bytes: text.length,
  });
  return text;
}
