import * as p from '@clack/prompts';
import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /**
   * Write to stderr instead of through the prompt renderer, which prints to
   * stdout. Used while manifests are streamed to stdout.
   */
  stderr?: boolean;
}

let verboseEnabled = false;

/**
 * Enable debug output for loggers created afterwards.
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? verboseEnabled;

  if (options.stderr) {
    const write = (line: string) => process.stderr.write(`${line}\n`);
    return {
      debug: (message) => {
        if (verbose) write(chalk.dim(message));
      },
      info: (message) => write(message),
      success: (message) => write(chalk.green(message)),
      warn: (message) => write(chalk.yellow(`WARNING: ${message}`)),
      error: (message) => write(chalk.red(`ERROR: ${message}`)),
    };
  }

  return {
    debug: (message) => {
      if (verbose) p.log.message(chalk.dim(message));
    },
    info: (message) => p.log.info(message),
    success: (message) => p.log.success(message),
    warn: (message) => p.log.warn(message),
    error: (message) => p.log.error(message),
  };
}
