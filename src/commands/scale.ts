import type { ClusterClient } from '../cluster/client.js';
import { createClusterClient } from '../cluster/client.js';
import { ConversionError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { loadServiceNames, runOrExit } from './shared.js';

export interface ScaleOptions {
  file?: string;
  namespace?: string;
  scale?: string;
  rc?: string;
}

export interface ScaleContext {
  client: ClusterClient;
  logger: Logger;
}

export function parseReplicaCount(value: string | undefined): number {
  const replicas = value !== undefined && /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isSafeInteger(replicas) || replicas <= 0) {
    throw new ConversionError(
      'ConfigurationConflict',
      'Scale must be defined and a positive number',
    );
  }
  return replicas;
}

/**
 * Scale the ReplicationControllers of the project's services, or only the
 * one named by `--rc`. Returns the accepted replica count per controller.
 */
export async function runScale(
  serviceNames: string[],
  options: ScaleOptions,
  context: ScaleContext,
): Promise<Record<string, number>> {
  const { client, logger: log } = context;
  const replicas = parseReplicaCount(options.scale);
  const scaled: Record<string, number> = {};

  for (const name of serviceNames) {
    if (options.rc && options.rc !== name) continue;
    try {
      scaled[name] = await client.scaleReplicationController(name, replicas);
    } catch (err) {
      throw new ConversionError(
        'IOFailure',
        `Error updating scaling data for ${name}: ${errorMessage(err)}`,
      );
    }
    log.info(`Scaling ${name} to: ${scaled[name]}`);
  }

  return scaled;
}

export async function scale(options: ScaleOptions): Promise<void> {
  const log = createLogger();
  await runOrExit(log, async () => {
    parseReplicaCount(options.scale);
    const serviceNames = await loadServiceNames(options.file);
    const client = createClusterClient({ namespace: options.namespace });
    await runScale(serviceNames, options, { client, logger: log });
  });
}
