import type { Writable } from 'node:stream';
import type { ConvertConfig } from '../types/config.js';
import type { GeneratorOutput } from '../types/k8s.js';
import type { ConvertOptionsInput } from '../config/schema.js';
import { loadConvertConfig } from '../config/loader.js';
import { parseComposeFile } from '../parser/compose.js';
import { generateManifests } from '../generator/index.js';
import type { BuildOptions } from '../generator/container.js';
import { writeOutput } from '../output/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { runOrExit } from './shared.js';

export interface ConvertContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: Writable;
  logger?: Logger;
  build?: BuildOptions;
}

export interface ConvertReport {
  config: ConvertConfig;
  output: GeneratorOutput;
  writtenFiles: string[];
}

/**
 * Convert a compose project into manifests and write them out. Options are
 * validated and every manifest is built before anything is written.
 */
export async function runConvert(
  options: ConvertOptionsInput,
  context: ConvertContext = {},
): Promise<ConvertReport> {
  const cwd = context.cwd ?? process.cwd();
  const env = context.env ?? process.env;
  const log = context.logger ?? createLogger({ stderr: Boolean(options.stdout) });

  const config = loadConvertConfig(options, cwd, env);
  if (config.createChart) {
    log.warn('Chart generation is not supported - generating plain manifests only');
  }

  const parseResult = await parseComposeFile({ file: config.composeFile, env });
  for (const w of parseResult.warnings) log.warn(w);
  log.debug(
    `Parsed ${parseResult.project.services.size} services from ${config.composeFile}`,
  );

  const output = generateManifests(parseResult.project, config, context.build);
  for (const w of output.warnings) log.warn(w);
  for (const name of output.placeholders) {
    log.debug(`Linked service "${name}" is not defined in the project - no manifest generated`);
  }
  for (const entry of output.manifests) {
    log.debug(`${entry.serviceName}-${entry.suffix}:\n${entry.content}`);
  }

  const writtenFiles = await writeOutput(output.manifests, config, context.stdout);
  // The aggregate file is reported as the user named it.
  const reported = config.outFile && options.out ? [options.out] : writtenFiles;
  for (const file of reported) {
    log.success(`file "${file}" created`);
  }

  return { config, output, writtenFiles };
}

export async function convert(options: ConvertOptionsInput): Promise<void> {
  const log = createLogger({ stderr: Boolean(options.stdout) });
  await runOrExit(log, async () => {
    await runConvert(options, { logger: log });
  });
}
