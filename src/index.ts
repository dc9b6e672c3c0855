#!/usr/bin/env node
import { Command } from 'commander';
import { convert } from './commands/convert.js';
import { up } from './commands/up.js';
import { ps } from './commands/ps.js';
import { deleteResources } from './commands/delete.js';
import { scale } from './commands/scale.js';
import { setVerbose } from './utils/logger.js';

const program = new Command();

program
  .name('compose-kube')
  .description('Convert compose files to Kubernetes manifests and run them on a cluster')
  .version('0.1.0')
  .option('--verbose', 'Print debug output')
  .hook('preAction', () => {
    setVerbose(Boolean(program.opts().verbose));
  });

// Default command: convert
program
  .command('convert', { isDefault: true })
  .description('Convert a compose file to Kubernetes manifests')
  .option('-f, --file <path>', 'Compose file (default: $COMPOSE_FILE or docker-compose.yml)')
  .option('-o, --out <path>', 'Write all manifests to a single file')
  .option('--stdout', 'Print manifests to stdout instead of writing files')
  .option('-y, --yaml', 'Generate YAML instead of JSON')
  .option('-d, --deployment', 'Generate a Deployment for each service')
  .option('--daemonset', 'Generate a DaemonSet for each service')
  .option('--replicaset', 'Generate a ReplicaSet for each service')
  .option('-c, --chart', 'Generate a chart (not supported, only validated)')
  .option('--output-dir <dir>', 'Directory for per-resource files', '.')
  .action(convert);

program
  .command('up')
  .description('Submit generated svc and rc manifests to the cluster')
  .option('--dir <dir>', 'Directory containing the manifests', '.')
  .option('-n, --namespace <ns>', 'Kubernetes namespace', 'default')
  .action(up);

program
  .command('ps')
  .description('List the services and replication controllers of the project')
  .option('-f, --file <path>', 'Compose file')
  .option('-n, --namespace <ns>', 'Kubernetes namespace', 'default')
  .option('--svc', 'Only list services')
  .option('--rc', 'Only list replication controllers')
  .action(ps);

program
  .command('delete')
  .description('Delete the services and replication controllers of the project')
  .option('-f, --file <path>', 'Compose file')
  .option('-n, --namespace <ns>', 'Kubernetes namespace', 'default')
  .option('--name <service>', 'Only delete resources of this service')
  .option('--svc', 'Only delete services')
  .option('--rc', 'Only delete replication controllers')
  .action(deleteResources);

program
  .command('scale')
  .description('Scale the replication controllers of the project')
  .option('-f, --file <path>', 'Compose file')
  .option('-n, --namespace <ns>', 'Kubernetes namespace', 'default')
  .requiredOption('--scale <n>', 'Number of replicas')
  .option('--rc <name>', 'Only scale this replication controller')
  .action(scale);

program.parse();
