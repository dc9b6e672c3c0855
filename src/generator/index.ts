import type { ComposeProject, ServiceDescriptor } from '../types/compose.js';
import type { ConvertConfig } from '../types/config.js';
import type {
  GeneratorOutput,
  ManifestSuffix,
  ResourceSet,
  SerializedManifest,
} from '../types/k8s.js';
import { detectUnsupportedKeys } from '../analyzer/unsupported.js';
import { serializeManifest } from '../utils/serialize.js';
import { buildPodSpec, type BuildOptions } from './container.js';
import { generateService } from './service.js';
import {
  generateDaemonSet,
  generateDeployment,
  generateReplicaSet,
  generateReplicationController,
} from './controllers.js';

export type GenerateConfig = Pick<
  ConvertConfig,
  'format' | 'outFile' | 'toStdout' | 'createDeployment' | 'createDaemonSet' | 'createReplicaSet'
>;

/**
 * Build all five resources for one compose service. Which of them get
 * emitted is decided by the caller.
 */
export function buildResources(
  descriptor: ServiceDescriptor,
  options: BuildOptions = {},
): ResourceSet {
  const podSpec = buildPodSpec(descriptor, options);
  return {
    service: generateService(descriptor),
    replicationController: generateReplicationController(descriptor, podSpec),
    deployment: generateDeployment(descriptor, podSpec),
    daemonSet: generateDaemonSet(descriptor, podSpec),
    replicaSet: generateReplicaSet(descriptor, podSpec),
  };
}

/**
 * Link entries are `service` or `service:alias`.
 */
export function linkTarget(link: string): string {
  const index = link.indexOf(':');
  return (index === -1 ? link : link.slice(0, index)).trim();
}

/**
 * Convert every service of the project and return the serialized manifests
 * in emission order: services, deployments, daemon sets, replica sets, then
 * replication controllers.
 */
export function generateManifests(
  project: ComposeProject,
  config: GenerateConfig,
  options: BuildOptions = {},
): GeneratorOutput {
  const warnings: string[] = [];
  const services = new Map<string, string | null>();
  const deployments = new Map<string, string>();
  const daemonSets = new Map<string, string>();
  const replicaSets = new Map<string, string>();
  const replicationControllers = new Map<string, string>();
  const links: string[] = [];

  for (const [name, descriptor] of project.services) {
    warnings.push(...detectUnsupportedKeys(descriptor));

    const resources = buildResources(descriptor, options);
    services.set(name, serializeManifest(resources.service, config.format));
    deployments.set(name, serializeManifest(resources.deployment, config.format));
    daemonSets.set(name, serializeManifest(resources.daemonSet, config.format));
    replicaSets.set(name, serializeManifest(resources.replicaSet, config.format));
    replicationControllers.set(
      name,
      serializeManifest(resources.replicationController, config.format),
    );

    for (const link of descriptor.links) {
      const target = linkTarget(link);
      if (target && !links.includes(target)) links.push(target);
    }
  }

  // Linked services outside the project get a name but never a manifest.
  const placeholders: string[] = [];
  for (const target of links) {
    if (!services.has(target)) {
      services.set(target, null);
      placeholders.push(target);
    }
  }

  const manifests: SerializedManifest[] = [];
  const emit = (collection: Map<string, string | null>, suffix: ManifestSuffix) => {
    for (const [serviceName, content] of collection) {
      if (content !== null) manifests.push({ serviceName, suffix, content });
    }
  };

  const singleOutput = Boolean(config.outFile) || config.toStdout;
  const anyController =
    config.createDeployment || config.createDaemonSet || config.createReplicaSet;

  emit(services, 'svc');
  if (config.createDeployment) emit(deployments, 'deployment');
  if (config.createDaemonSet) emit(daemonSets, 'daemonset');
  if (config.createReplicaSet) emit(replicaSets, 'replicaset');
  if (!singleOutput || !anyController) emit(replicationControllers, 'rc');

  return { manifests, placeholders, warnings };
}
