import { resolve } from 'node:path';
import type { ConvertConfig } from '../types/config.js';
import { ConversionError } from '../utils/errors.js';
import { resolveComposeFile } from '../utils/detect.js';
import { convertOptionsSchema, type ConvertOptions } from './schema.js';

function conflict(message: string): ConversionError {
  return new ConversionError('ConfigurationConflict', message);
}

/**
 * Reject option combinations that cannot be honoured together.
 */
export function checkConflicts(options: ConvertOptions): void {
  if (options.out && options.stdout) {
    throw conflict("--out and --stdout can't be set at the same time");
  }
  if (options.chart && options.stdout) {
    throw conflict('chart cannot be generated when --stdout is specified');
  }

  const singleOutput = Boolean(options.out) || options.stdout;
  const controllers = [options.deployment, options.daemonset, options.replicaset].filter(
    Boolean,
  ).length;
  if (singleOutput && controllers > 1) {
    throw conflict(
      'only one type of Kubernetes controller can be generated when --out or --stdout is specified',
    );
  }
}

/**
 * Validate raw CLI options and resolve them into the convert configuration.
 */
export function loadConvertConfig(
  raw: unknown,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ConvertConfig {
  const parsed = convertOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw conflict(`Invalid options: ${details}`);
  }

  const options = parsed.data;
  checkConflicts(options);

  return {
    composeFile: resolveComposeFile(options.file, cwd, env),
    outFile: options.out ? resolve(cwd, options.out) : undefined,
    toStdout: options.stdout,
    format: options.yaml ? 'yaml' : 'json',
    createDeployment: options.deployment,
    createDaemonSet: options.daemonset,
    createReplicaSet: options.replicaset,
    createChart: options.chart,
    outputDir: resolve(cwd, options.outputDir),
  };
}
