import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

const COMPOSE_FILE_NAMES = [
  'docker-compose.yml',
  'docker-compose.yaml',
  'compose.yaml',
  'compose.yml',
];

/**
 * Auto-detect a compose file in a directory.
 */
export function findComposeFile(dir: string): string | null {
  for (const name of COMPOSE_FILE_NAMES) {
    const fullPath = resolve(dir, name);
    if (existsSync(fullPath)) return fullPath;
  }
  return null;
}

/**
 * Pick the compose file: explicit flag, then `COMPOSE_FILE`, then the first
 * well-known name present in `dir`. Falls back to `docker-compose.yml` so the
 * parser can report the missing file.
 */
export function resolveComposeFile(
  explicit: string | undefined,
  dir: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) return resolve(dir, explicit);
  if (env.COMPOSE_FILE) return resolve(dir, env.COMPOSE_FILE);
  return findComposeFile(dir) ?? resolve(dir, COMPOSE_FILE_NAMES[0]);
}
