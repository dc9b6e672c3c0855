import type { Writable } from 'node:stream';
import type { ConvertConfig } from '../types/config.js';
import type { SerializedManifest } from '../types/k8s.js';
import { writePlainOutput } from './plain.js';
import { writeSingleFileOutput } from './single-file.js';
import { writeStreamOutput } from './stream.js';

export type OutputTarget = Pick<ConvertConfig, 'outFile' | 'toStdout' | 'outputDir' | 'format'>;

/**
 * Route manifests to stdout, a single aggregate file, or one file each.
 * Returns the files written.
 */
export async function writeOutput(
  manifests: SerializedManifest[],
  target: OutputTarget,
  stdout?: Writable,
): Promise<string[]> {
  if (target.toStdout) {
    await writeStreamOutput(manifests, target.format, stdout);
    return [];
  }
  if (target.outFile) {
    return writeSingleFileOutput(manifests, target.outFile, target.format);
  }
  return writePlainOutput(manifests, target.outputDir, target.format);
}
