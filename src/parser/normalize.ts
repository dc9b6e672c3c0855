import type { ServiceInput } from './schema.js';

type Scalar = string | number | boolean | null;

function scalarToString(value: Scalar): string {
  return value === null ? '' : String(value);
}

/**
 * Normalize environment from list or mapping form to `KEY=VALUE` entries.
 * List entries are kept verbatim so the env mapper sees the raw syntax.
 */
export function normalizeEnvironment(env: ServiceInput['environment']): string[] {
  if (!env) return [];
  if (Array.isArray(env)) return env;
  return Object.entries(env).map(([key, value]) => `${key}=${scalarToString(value)}`);
}

/**
 * Normalize labels from `key=value` list or mapping form to a record.
 */
export function normalizeLabels(labels: ServiceInput['labels']): Record<string, string> {
  if (!labels) return {};

  const result: Record<string, string> = {};
  if (Array.isArray(labels)) {
    for (const label of labels) {
      const eqIndex = label.indexOf('=');
      if (eqIndex === -1) {
        result[label] = '';
      } else {
        result[label.slice(0, eqIndex)] = label.slice(eqIndex + 1);
      }
    }
    return result;
  }

  for (const [key, value] of Object.entries(labels)) {
    result[key] = scalarToString(value);
  }
  return result;
}

/**
 * Normalize ports to the `port` / `host:container` string syntax.
 */
export function normalizePorts(ports: ServiceInput['ports']): string[] {
  if (!ports) return [];
  return ports.map((port) => {
    if (typeof port === 'string') return port;
    if (typeof port === 'number') return String(port);
    return port.published !== undefined
      ? `${port.published}:${port.target}`
      : String(port.target);
  });
}

/**
 * Normalize volumes to the `host:container[:mode]` string syntax. Long-form
 * entries without a source have no host path and come out as a bare target.
 */
export function normalizeVolumes(volumes: ServiceInput['volumes']): string[] {
  if (!volumes) return [];
  return volumes.map((volume) => {
    if (typeof volume === 'string') return volume;
    if (!volume.source) return volume.target;
    return `${volume.source}:${volume.target}:${volume.read_only ? 'ro' : 'rw'}`;
  });
}

/**
 * Normalize a command given as a string or as a list of tokens.
 */
export function normalizeCommand(command: ServiceInput['command']): string[] {
  if (command === undefined) return [];
  return Array.isArray(command) ? command : splitShellWords(command);
}

/**
 * Split a shell command line into words. Single quotes are literal, double
 * quotes allow backslash escapes, unquoted whitespace separates words.
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (ch === '\\' && i + 1 < input.length) {
      current += input[++i];
      inWord = true;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else current += ch;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated quote in command: ${input}`);
  }
  if (inWord) words.push(current);
  return words;
}
