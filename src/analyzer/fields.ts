import type { EnvVar, ContainerPort, ServicePort } from '../types/k8s.js';
import { ConversionError } from '../utils/errors.js';
import { randomVolumeName } from '../utils/k8s-names.js';

export interface VolumeBinding {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
  generatedName: string;
}

const MAX_INT32 = 2 ** 31 - 1;

/**
 * Split `head<sep>tail` on the first separator, trimming both sides.
 */
function splitFirst(raw: string, separator: string): [string, string] {
  const index = raw.indexOf(separator);
  return [raw.slice(0, index).trim(), raw.slice(index + 1).trim()];
}

function toPortNumber(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const port = Number(value);
  return port <= MAX_INT32 ? port : undefined;
}

function invalidPort(raw: string, serviceName: string): ConversionError {
  return new ConversionError(
    'InvalidPort',
    `Invalid container port ${raw} for service ${serviceName}`,
  );
}

/**
 * Parse one environment entry. `KEY=VALUE` is tried first; `KEY: 'VALUE'`
 * is the fallback and loses one pair of surrounding single quotes.
 */
export function parseEnv(raw: string, serviceName: string): EnvVar {
  let entry: EnvVar | undefined;

  if (raw.includes('=')) {
    const [name, value] = splitFirst(raw, '=');
    entry = { name, value };
  } else if (raw.includes(':')) {
    const [name, quoted] = splitFirst(raw, ':');
    const value =
      quoted.length >= 2 && quoted.startsWith("'") && quoted.endsWith("'")
        ? quoted.slice(1, -1)
        : quoted;
    entry = { name, value };
  }

  if (!entry || entry.name === '') {
    throw new ConversionError(
      'MalformedEnvEntry',
      `Invalid container env ${raw} for service ${serviceName}`,
    );
  }
  return entry;
}

/**
 * Parse `host:container[:mode]`. Only an explicit `rw` mode makes the mount
 * writable. Entries without any `:` yield undefined and are dropped.
 */
export function parseVolume(
  raw: string,
  generateName: () => string = randomVolumeName,
): VolumeBinding | undefined {
  const first = raw.indexOf(':');
  if (first === -1) return undefined;

  const last = raw.lastIndexOf(':');
  const hostPath = raw.slice(0, first).trim();
  let containerPath = raw.slice(first + 1).trim();
  let readOnly = true;

  if (first !== last) {
    readOnly = raw.slice(last + 1) !== 'rw';
    containerPath = containerPath.slice(0, containerPath.indexOf(':'));
  }

  return { hostPath, containerPath, readOnly, generatedName: generateName() };
}

/**
 * Parse every volume of a service, keeping generated names unique.
 */
export function parseVolumes(
  volumes: string[],
  generateName: () => string = randomVolumeName,
): VolumeBinding[] {
  const used = new Set<string>();
  const uniqueName = () => {
    let name = generateName();
    while (used.has(name)) name = generateName();
    used.add(name);
    return name;
  };

  const bindings: VolumeBinding[] = [];
  for (const raw of volumes) {
    const binding = parseVolume(raw, uniqueName);
    if (binding) bindings.push(binding);
  }
  return bindings;
}

/**
 * Container side of a port entry; the host side of `host:container` is dropped.
 */
export function parseContainerPort(raw: string, serviceName: string): ContainerPort {
  const value = raw.includes(':') ? splitFirst(raw, ':')[1] : raw.trim();
  const containerPort = toPortNumber(value);
  if (containerPort === undefined) throw invalidPort(raw, serviceName);
  return { containerPort };
}

/**
 * Exposed and target port of a port entry. A bare port is used for both.
 */
export function parseServicePort(raw: string, serviceName: string): ServicePort {
  const [exposed, target] = raw.includes(':')
    ? splitFirst(raw, ':')
    : [raw.trim(), raw.trim()];

  const port = toPortNumber(exposed);
  if (port === undefined) throw invalidPort(raw, serviceName);
  const targetPort = toPortNumber(target);
  if (targetPort === undefined) throw invalidPort(raw, serviceName);

  return { name: String(port), protocol: 'TCP', port, targetPort };
}
