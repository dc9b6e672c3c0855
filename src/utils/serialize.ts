import { stringify } from 'yaml';
import type { OutputFormat } from '../types/config.js';
import type { K8sManifest } from '../types/k8s.js';
import { ConversionError, errorMessage } from './errors.js';

const KEY_ORDER = ['apiVersion', 'kind', 'metadata', 'spec'];

/** File extension for an output format. */
export function formatExtension(format: OutputFormat): string {
  return format === 'yaml' ? 'yaml' : 'json';
}

function orderKeys(manifest: K8sManifest): Record<string, unknown> {
  const entries = new Map<string, unknown>(Object.entries(manifest));
  const ordered: Record<string, unknown> = {};
  for (const key of KEY_ORDER) {
    if (entries.has(key)) ordered[key] = entries.get(key);
  }
  for (const [key, value] of entries) {
    if (!(key in ordered)) ordered[key] = value;
  }
  return ordered;
}

/**
 * Serialize a manifest as indented JSON or as YAML.
 */
export function serializeManifest(manifest: K8sManifest, format: OutputFormat): string {
  const ordered = orderKeys(manifest);
  try {
    if (format === 'yaml') {
      // YAML 1.1 rules quote strings such as `yes` and `off`, which
      // kubectl would otherwise read as booleans.
      return stringify(ordered, {
        version: '1.1',
        indent: 2,
        lineWidth: 0,
        aliasDuplicateObjects: false,
      });
    }
    return JSON.stringify(ordered, null, 2);
  } catch (err) {
    throw new ConversionError(
      'SerializationError',
      `Failed to marshal the ${manifest.kind}: ${errorMessage(err)}`,
    );
  }
}
