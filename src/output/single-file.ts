import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { OutputFormat } from '../types/config.js';
import type { SerializedManifest } from '../types/k8s.js';
import { ConversionError, errorMessage } from '../utils/errors.js';
import { frameDocument } from './frame.js';

/**
 * Write all manifests, in order, into one file.
 */
export async function writeSingleFileOutput(
  manifests: SerializedManifest[],
  outFile: string,
  format: OutputFormat,
): Promise<string[]> {
  const content = manifests.map((entry) => frameDocument(entry.content, format)).join('');

  try {
    await mkdir(dirname(outFile), { recursive: true });
    await writeFile(outFile, content, 'utf-8');
  } catch (err) {
    throw new ConversionError('IOFailure', `Failed to write ${outFile}: ${errorMessage(err)}`);
  }

  return [outFile];
}
