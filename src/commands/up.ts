import { readdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { z } from 'zod';
import type { ClusterClient } from '../cluster/client.js';
import { createClusterClient } from '../cluster/client.js';
import {
  decodeManifest,
  encodingFromFilename,
  replicationControllerManifestSchema,
  serviceManifestSchema,
} from '../cluster/decode.js';
import { ConversionError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { runOrExit } from './shared.js';

export interface UpOptions {
  dir?: string;
  namespace?: string;
}

export interface UpContext {
  client: ClusterClient;
  logger: Logger;
}

export interface UpReport {
  created: string[];
  failed: string[];
}

async function readManifest(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConversionError('IOFailure', `Failed to load ${path}: ${errorMessage(err)}`);
  }
}

/**
 * Submit generated manifests from a directory: every `svc` file first, then
 * every `rc` file. A file matching both is only submitted as a service.
 * Rejected submissions are logged and skipped; unreadable files abort.
 */
export async function runUp(options: UpOptions, context: UpContext): Promise<UpReport> {
  const { client, logger: log } = context;
  const dir = resolve(options.dir ?? '.');
  const report: UpReport = { created: [], failed: [] };

  let files: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw new ConversionError(
      'IOFailure',
      `Failed to load rc, svc manifest files: ${errorMessage(err)}`,
    );
  }

  const serviceFiles = files.filter((name) => name.includes('svc'));
  const controllerFiles = files.filter((name) => !name.includes('svc') && name.includes('rc'));

  const submitAll = async <T extends { metadata: { name: string } }>(
    names: string[],
    schema: z.ZodType<T>,
    kind: string,
    submit: (manifest: T) => Promise<void>,
  ) => {
    for (const name of names) {
      const encoding = encodingFromFilename(name);
      if (!encoding) {
        log.debug(`Skipping ${name}: neither json nor yaml`);
        continue;
      }
      const content = await readManifest(join(dir, name));
      const manifest = decodeManifest(content, encoding, schema, name);
      try {
        await submit(manifest);
        report.created.push(name);
        log.success(`${kind} "${manifest.metadata.name}" created from ${name}`);
      } catch (err) {
        report.failed.push(name);
        log.error(`Failed to create ${kind} from ${name}: ${errorMessage(err)}`);
      }
    }
  };

  await submitAll(serviceFiles, serviceManifestSchema, 'Service', (m) =>
    client.createService(m),
  );
  await submitAll(
    controllerFiles,
    replicationControllerManifestSchema,
    'ReplicationController',
    (m) => client.createReplicationController(m),
  );

  return report;
}

export async function up(options: UpOptions): Promise<void> {
  const log = createLogger();
  await runOrExit(log, async () => {
    const client = createClusterClient({ namespace: options.namespace });
    await runUp(options, { client, logger: log });
  });
}
