import { parseComposeFile } from '../parser/compose.js';
import { resolveComposeFile } from '../utils/detect.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Names of the services declared by the compose file, in file order.
 */
export async function loadServiceNames(
  file: string | undefined,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> {
  const composeFile = resolveComposeFile(file, cwd, env);
  const { project } = await parseComposeFile({ file: composeFile, env });
  return [...project.services.keys()];
}

/**
 * Run a command body; any error is reported once and ends the process.
 */
export async function runOrExit(log: Logger, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    log.error(errorMessage(err));
    process.exit(1);
  }
}
