import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { StoredManifest } from '../types/k8s.js';
import { ConversionError, errorMessage } from '../utils/errors.js';

function identitySchema<K extends string>(kind: K) {
  return z
    .object({
      apiVersion: z.literal('v1'),
      kind: z.literal(kind),
      metadata: z.object({ name: z.string().min(1) }).passthrough(),
    })
    .passthrough();
}

export const serviceManifestSchema: z.ZodType<StoredManifest> = identitySchema('Service');

export const replicationControllerManifestSchema: z.ZodType<StoredManifest> =
  identitySchema('ReplicationController');

export type ManifestEncoding = 'json' | 'yaml';

/**
 * Guess the encoding of a manifest file from its name.
 */
export function encodingFromFilename(filename: string): ManifestEncoding | undefined {
  if (filename.includes('json')) return 'json';
  if (filename.includes('yaml') || filename.includes('yml')) return 'yaml';
  return undefined;
}

/**
 * Decode manifest text and validate it against a schema.
 */
export function decodeManifest<T>(
  content: string,
  encoding: ManifestEncoding,
  schema: z.ZodType<T>,
  source: string,
): T {
  let raw: unknown;
  try {
    raw = encoding === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConversionError(
      'InvalidManifest',
      `Failed to unmarshal file ${source}: ${errorMessage(err)}`,
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConversionError('InvalidManifest', `Invalid manifest in ${source}: ${details}`);
  }
  return result.data;
}
