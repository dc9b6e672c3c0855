import type { ServiceDescriptor } from '../types/compose.js';
import type { Container, PodSpec, RestartPolicy, Volume, VolumeMount } from '../types/k8s.js';
import { parseContainerPort, parseEnv, parseVolumes } from '../analyzer/fields.js';
import { ConversionError } from '../utils/errors.js';
import { randomVolumeName } from '../utils/k8s-names.js';

export interface BuildOptions {
  /** Source of volume names; random unless a test pins it. */
  generateVolumeName?: () => string;
}

/**
 * Map a compose restart policy to the pod restart policy.
 */
export function toRestartPolicy(descriptor: ServiceDescriptor): RestartPolicy {
  switch (descriptor.restart) {
    case undefined:
    case '':
    case 'always':
      return 'Always';
    case 'no':
      return 'Never';
    case 'on-failure':
      return 'OnFailure';
    default:
      throw new ConversionError(
        'UnknownRestartPolicy',
        `Unknown restart policy ${descriptor.restart} for service ${descriptor.name}`,
      );
  }
}

/**
 * Build the single-container pod spec shared by every controller kind.
 */
export function buildPodSpec(
  descriptor: ServiceDescriptor,
  options: BuildOptions = {},
): PodSpec {
  const { name } = descriptor;

  const env = descriptor.environment.map((raw) => parseEnv(raw, name));
  const ports = descriptor.ports.map((raw) => parseContainerPort(raw, name));

  const bindings = parseVolumes(
    descriptor.volumes,
    options.generateVolumeName ?? randomVolumeName,
  );
  const volumeMounts: VolumeMount[] = bindings.map((b) => ({
    name: b.generatedName,
    mountPath: b.containerPath,
    ...(b.readOnly ? { readOnly: true } : {}),
  }));
  const volumes: Volume[] = bindings.map((b) => ({
    name: b.generatedName,
    hostPath: { path: b.hostPath },
  }));

  const container: Container = {
    name,
    ...(descriptor.image ? { image: descriptor.image } : {}),
    ...(descriptor.command.length ? { command: descriptor.command } : {}),
    ...(descriptor.workingDir ? { workingDir: descriptor.workingDir } : {}),
    ...(env.length ? { env } : {}),
    ...(ports.length ? { ports } : {}),
    ...(volumeMounts.length ? { volumeMounts } : {}),
    ...(descriptor.privileged ? { securityContext: { privileged: true } } : {}),
  };

  return {
    containers: [container],
    ...(volumes.length ? { volumes } : {}),
    restartPolicy: toRestartPolicy(descriptor),
  };
}
