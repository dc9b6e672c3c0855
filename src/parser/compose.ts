import { readFile } from 'node:fs/promises';
import { isMap, isScalar, parseDocument } from 'yaml';
import { ZodError } from 'zod';
import { composeSchema, type ComposeInput, type ServiceInput } from './schema.js';
import { interpolateAll } from './env.js';
import {
  normalizeCommand,
  normalizeEnvironment,
  normalizeLabels,
  normalizePorts,
  normalizeVolumes,
} from './normalize.js';
import type { ComposeProject, ParseResult, ServiceDescriptor } from '../types/compose.js';

export interface ParseOptions {
  file: string;
  env?: Record<string, string | undefined>;
}

const KNOWN_KEYS = new Set([
  'image',
  'command',
  'working_dir',
  'environment',
  'ports',
  'volumes',
  'links',
  'labels',
  'privileged',
  'restart',
]);

/**
 * Service names in the order the file lists them. Plain objects put
 * integer-like keys first, so the order is read from the YAML nodes.
 */
function serviceOrder(contents: unknown, hasServicesSection: boolean): string[] {
  const node = hasServicesSection && isMap(contents) ? contents.get('services', true) : contents;
  if (!isMap(node)) return [];
  return node.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Files without a `services` section use the version 1 layout, where every
 * top-level key is a service.
 */
function withServicesSection(raw: Record<string, unknown>): Record<string, unknown> {
  if ('services' in raw) return raw;
  return { services: raw };
}

/**
 * Turn one validated service into the descriptor the converter consumes.
 */
export function toServiceDescriptor(name: string, service: ServiceInput): ServiceDescriptor {
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(service)) {
    if (!KNOWN_KEYS.has(key)) extras[key] = value;
  }

  return {
    name,
    image: service.image,
    command: normalizeCommand(service.command),
    workingDir: service.working_dir,
    environment: normalizeEnvironment(service.environment),
    ports: normalizePorts(service.ports),
    volumes: normalizeVolumes(service.volumes),
    links: service.links ?? [],
    labels: normalizeLabels(service.labels),
    privileged: service.privileged ?? false,
    restart: service.restart,
    extras,
  };
}

/**
 * Parse compose YAML text into a project.
 */
export function parseComposeContent(
  content: string,
  sourceFile: string,
  env: Record<string, string | undefined> = process.env,
): ParseResult {
  const warnings: string[] = [];

  const doc = parseDocument(content);
  const [yamlError] = doc.errors;
  if (yamlError) {
    throw new Error(`Failed to parse YAML in ${sourceFile}: ${yamlError.message}`);
  }

  let raw: unknown;
  try {
    raw = doc.toJS();
  } catch (err) {
    throw new Error(
      `Failed to parse YAML in ${sourceFile}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isRecord(raw)) {
    throw new Error(
      `Invalid compose file: ${sourceFile} does not contain a valid YAML object`,
    );
  }

  const missing = new Set<string>();
  const interpolated = interpolateAll(withServicesSection(raw), env, (name) => missing.add(name));
  for (const name of missing) {
    warnings.push(`The ${name} variable is not set. Substituting a blank string.`);
  }

  let parsed: ComposeInput;
  try {
    parsed = composeSchema.parse(interpolated);
  } catch (err) {
    if (err instanceof ZodError) {
      const details = err.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
      throw new Error(`Invalid compose file structure in ${sourceFile}:\n${details}`);
    }
    throw err;
  }

  const services = new Map<string, ServiceDescriptor>();
  const names = [
    ...serviceOrder(doc.contents, 'services' in raw),
    ...Object.keys(parsed.services),
  ];
  for (const name of names) {
    const service = parsed.services[name];
    if (service === undefined || services.has(name)) continue;
    services.set(name, toServiceDescriptor(name, service));
  }

  const project: ComposeProject = {
    version: parsed.version === undefined ? undefined : String(parsed.version),
    services,
  };

  return { project, warnings, sourceFile };
}

/**
 * Read and parse a compose file.
 */
export async function parseComposeFile(options: ParseOptions): Promise<ParseResult> {
  let content: string;
  try {
    content = await readFile(options.file, 'utf-8');
  } catch (err) {
    throw new Error(
      `Failed to read ${options.file}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseComposeContent(content, options.file, options.env);
}
