import type { ServiceDescriptor } from '../types/compose.js';

/**
 * Compose keys with no counterpart in the generated manifests.
 */
export const UNSUPPORTED_KEYS: ReadonlySet<string> = new Set([
  'build',
  'cap_add',
  'cap_drop',
  'cpuset',
  'cpu_shares',
  'container_name',
  'devices',
  'dns',
  'dns_search',
  'dockerfile',
  'domainname',
  'entrypoint',
  'env_file',
  'hostname',
  'log_driver',
  'log_opt',
  'mem_limit',
  'memswap_limit',
  'net',
  'network_mode',
  'pid',
  'uts',
  'ipc',
  'read_only',
  'stdin_open',
  'security_opt',
  'tty',
  'user',
  'volume_driver',
  'volumes_from',
  'expose',
  'external_links',
  'extra_hosts',
]);

function isSet(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

/**
 * List a warning for every unsupported key the service sets. Never fatal.
 */
export function detectUnsupportedKeys(descriptor: ServiceDescriptor): string[] {
  const warnings: string[] = [];
  for (const [key, value] of Object.entries(descriptor.extras)) {
    if (UNSUPPORTED_KEYS.has(key) && isSet(value)) {
      warnings.push(`Unsupported key ${key} in service "${descriptor.name}" - ignoring`);
    }
  }
  return warnings;
}
