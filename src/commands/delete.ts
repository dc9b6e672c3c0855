import type { ClusterClient } from '../cluster/client.js';
import { createClusterClient } from '../cluster/client.js';
import { ConversionError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { loadServiceNames, runOrExit } from './shared.js';

export interface DeleteOptions {
  file?: string;
  namespace?: string;
  name?: string;
  svc?: boolean;
  rc?: boolean;
}

export interface DeleteContext {
  client: ClusterClient;
  logger: Logger;
}

/**
 * Delete the Services and/or ReplicationControllers of the project's
 * services, optionally only the one named by `--name`. Stops at the first
 * failure.
 */
export async function runDelete(
  serviceNames: string[],
  options: DeleteOptions,
  context: DeleteContext,
): Promise<string[]> {
  const { client, logger: log } = context;
  const both = !options.svc && !options.rc;
  const deleted: string[] = [];

  for (const name of serviceNames) {
    if (options.name && name !== options.name) continue;

    if (both || options.svc) {
      try {
        await client.deleteService(name);
      } catch (err) {
        throw new ConversionError(
          'IOFailure',
          `Unable to delete service ${name}: ${errorMessage(err)}`,
        );
      }
      deleted.push(`svc/${name}`);
      log.success(`Service "${name}" deleted`);
    }

    if (both || options.rc) {
      try {
        await client.deleteReplicationController(name);
      } catch (err) {
        throw new ConversionError(
          'IOFailure',
          `Unable to delete replication controller ${name}: ${errorMessage(err)}`,
        );
      }
      deleted.push(`rc/${name}`);
      log.success(`ReplicationController "${name}" deleted`);
    }
  }

  return deleted;
}

export async function deleteResources(options: DeleteOptions): Promise<void> {
  const log = createLogger();
  await runOrExit(log, async () => {
    const serviceNames = await loadServiceNames(options.file);
    const client = createClusterClient({ namespace: options.namespace });
    await runDelete(serviceNames, options, { client, logger: log });
  });
}
