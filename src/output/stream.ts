import type { Writable } from 'node:stream';
import type { OutputFormat } from '../types/config.js';
import type { SerializedManifest } from '../types/k8s.js';
import { ConversionError } from '../utils/errors.js';
import { frameDocument } from './frame.js';

function isBrokenPipe(err: Error): boolean {
  return 'code' in err && err.code === 'EPIPE';
}

// Write failures are settled through the write callbacks below.
function onStreamError(): void {}

/**
 * Stream manifests to a writable, stdout by default. Touches no files.
 * A reader that goes away early (`| head`) ends the output quietly.
 */
export function writeStreamOutput(
  manifests: SerializedManifest[],
  format: OutputFormat,
  stream: Writable = process.stdout,
): Promise<void> {
  if (!stream.listeners('error').includes(onStreamError)) {
    stream.on('error', onStreamError);
  }

  return new Promise((resolve, reject) => {
    let pending = manifests.length;
    if (pending === 0) {
      resolve();
      return;
    }

    for (const entry of manifests) {
      stream.write(frameDocument(entry.content, format), (err) => {
        if (err) {
          if (isBrokenPipe(err)) {
            resolve();
          } else {
            reject(new ConversionError('IOFailure', `Failed to write manifests: ${err.message}`));
          }
          return;
        }
        pending -= 1;
        if (pending === 0) resolve();
      });
    }
  });
}
