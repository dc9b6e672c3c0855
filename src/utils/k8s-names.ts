import { randomInt } from 'node:crypto';

const VOLUME_NAME_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Random DNS-safe name tying a volume mount to its volume declaration.
 */
export function randomVolumeName(length = 20): string {
  let name = '';
  for (let i = 0; i < length; i++) {
    name += VOLUME_NAME_ALPHABET[randomInt(VOLUME_NAME_ALPHABET.length)];
  }
  return name;
}

/**
 * Selector matching the pods of a compose service.
 */
export function selectorLabels(serviceName: string): Record<string, string> {
  return { service: serviceName };
}

/**
 * The `service` label plus the compose labels, which win on collision.
 */
export function serviceLabels(
  serviceName: string,
  composeLabels: Record<string, string>,
): Record<string, string> {
  return { ...selectorLabels(serviceName), ...composeLabels };
}
