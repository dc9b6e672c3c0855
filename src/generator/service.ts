import type { ServiceDescriptor } from '../types/compose.js';
import type { ServiceManifest } from '../types/k8s.js';
import { parseServicePort } from '../analyzer/fields.js';
import { selectorLabels, serviceLabels } from '../utils/k8s-names.js';

/**
 * Build the Service exposing a compose service's published ports.
 */
export function generateService(descriptor: ServiceDescriptor): ServiceManifest {
  const { name } = descriptor;
  const ports = descriptor.ports.map((raw) => parseServicePort(raw, name));

  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name,
      labels: serviceLabels(name, descriptor.labels),
    },
    spec: {
      selector: selectorLabels(name),
      ...(ports.length ? { ports } : {}),
    },
  };
}
