import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { OutputFormat } from '../types/config.js';
import type { SerializedManifest } from '../types/k8s.js';
import { ConversionError, errorMessage } from '../utils/errors.js';
import { formatExtension } from '../utils/serialize.js';

/**
 * Sanitize a filename to prevent path traversal.
 */
function sanitizeFilename(filename: string): string {
  return basename(filename).replace(/[^a-zA-Z0-9._-]/g, '-');
}

export function manifestFilename(entry: SerializedManifest, format: OutputFormat): string {
  return sanitizeFilename(`${entry.serviceName}-${entry.suffix}.${formatExtension(format)}`);
}

/**
 * Write each manifest to its own `<service>-<kind>.<ext>` file.
 */
export async function writePlainOutput(
  manifests: SerializedManifest[],
  outputDir: string,
  format: OutputFormat,
): Promise<string[]> {
  const resolvedDir = resolve(outputDir);
  const writtenFiles: string[] = [];

  try {
    await mkdir(resolvedDir, { recursive: true });
  } catch (err) {
    throw new ConversionError('IOFailure', `Failed to create ${resolvedDir}: ${errorMessage(err)}`);
  }

  for (const entry of manifests) {
    const filePath = join(resolvedDir, manifestFilename(entry, format));
    try {
      await writeFile(filePath, entry.content, { encoding: 'utf-8', mode: 0o644 });
    } catch (err) {
      throw new ConversionError(
        'IOFailure',
        `Failed to write ${entry.suffix}: ${errorMessage(err)}`,
      );
    }
    writtenFiles.push(filePath);
  }

  return writtenFiles;
}
