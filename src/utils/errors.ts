export type ConversionErrorCode =
  | 'MalformedEnvEntry'
  | 'InvalidPort'
  | 'UnknownRestartPolicy'
  | 'SerializationError'
  | 'ConfigurationConflict'
  | 'IOFailure'
  | 'InvalidManifest';

/**
 * Raised for every condition that aborts a run. Commands catch it once,
 * print the message and exit.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
