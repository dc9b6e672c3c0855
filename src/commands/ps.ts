import type { Writable } from 'node:stream';
import type { ClusterClient } from '../cluster/client.js';
import { createClusterClient } from '../cluster/client.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { loadServiceNames, runOrExit } from './shared.js';

export interface PsOptions {
  file?: string;
  namespace?: string;
  svc?: boolean;
  rc?: boolean;
}

export interface PsContext {
  client: ClusterClient;
  logger: Logger;
  stdout?: Writable;
}

function row(cells: Array<[string, number]>): string {
  return cells.map(([value, width]) => value.padEnd(width)).join('') + '\n';
}

function joinPairs(record: Record<string, string>): string {
  return Object.entries(record)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/**
 * Print the Services and ReplicationControllers of the project's services.
 * Both tables are shown unless one of them is asked for explicitly.
 */
export async function runPs(
  serviceNames: string[],
  options: PsOptions,
  context: PsContext,
): Promise<void> {
  const { client, logger: log } = context;
  const out = context.stdout ?? process.stdout;
  const showAll = !options.svc && !options.rc;

  if (showAll || options.svc) {
    out.write(row([['Name', 20], ['Cluster IP', 20], ['Ports', 20], ['Selectors', 20]]));
    for (const name of serviceNames) {
      try {
        const svc = await client.getService(name);
        const ports = svc.ports.map((p) => `${p.protocol}(${p.port})`).join(',');
        out.write(
          row([
            [svc.name, 20],
            [svc.clusterIP ?? '', 20],
            [ports, 20],
            [joinPairs(svc.labels), 20],
          ]),
        );
      } catch (err) {
        log.debug(`Cannot find service for ${name}: ${errorMessage(err)}`);
      }
    }
  }

  if (showAll || options.rc) {
    out.write(
      row([['Name', 15], ['Containers', 15], ['Images', 30], ['Replicas', 10], ['Selectors', 20]]),
    );
    for (const name of serviceNames) {
      try {
        const rc = await client.getReplicationController(name);
        out.write(
          row([
            [rc.name, 15],
            [rc.containers.map((c) => c.name).join(','), 15],
            [rc.containers.map((c) => c.image ?? '').join(','), 30],
            [String(rc.replicas), 10],
            [joinPairs(rc.selector), 20],
          ]),
        );
      } catch (err) {
        log.debug(`Cannot find rc for ${name}: ${errorMessage(err)}`);
      }
    }
  }
}

export async function ps(options: PsOptions): Promise<void> {
  const log = createLogger();
  await runOrExit(log, async () => {
    const serviceNames = await loadServiceNames(options.file);
    const client = createClusterClient({ namespace: options.namespace });
    await runPs(serviceNames, options, { client, logger: log });
  });
}
