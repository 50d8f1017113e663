/**
 * @fileoverview Packs raw structure files into a ZIP archive.
 * @module src/services/structure-finder/core/archive
 */
import JSZip from 'jszip';

import { logger, type RequestContext } from '@/utils/index.js';
import type { ArchiveBundle, ItemFailure, PdbId } from '../types.js';
import { toItemFailure } from './failures.js';

export type StructureFileFetcher = (
  pdbId: PdbId,
  context: RequestContext,
) => Promise<string>;

export const ARCHIVE_MIME_TYPE = 'application/zip';

/**
 * Fetch each file in turn and add it as `{id}.pdb`. Identifiers whose file
 * cannot be fetched are skipped and listed in `failures`.
 */
export async function buildStructureArchive(
  pdbIds: readonly PdbId[],
  fetchFile: StructureFileFetcher,
  context: RequestContext,
): Promise<ArchiveBundle> {
  const zip = new JSZip();
  const entries: string[] = [];
  const failures: ItemFailure[] = [];

  for (const pdbId of pdbIds) {
    try {
      const text = await fetchFile(pdbId, context);
      const entryName = `${pdbId}.pdb`;
      zip.file(entryName, text);
      entries.push(entryName);
    } catch (error) {
      const failure = toItemFailure(pdbId, error);
      logger.warning('Skipping structure file in archive', {
        ...context,
        ...failure,
      });
      failures.push(failure);
    }
  }

  const data = await zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
  });

  logger.info('Structure archive built', {
    ...context,
    entryCount: entries.length,
    failureCount: failures.length,
    bytes: data.byteLength,
  });

  return { data, entries, failures };
}
