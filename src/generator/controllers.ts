import type { ServiceDescriptor } from '../types/compose.js';
import type {
  DaemonSetManifest,
  DeploymentManifest,
  PodSpec,
  ReplicaSetManifest,
  ReplicationControllerManifest,
} from '../types/k8s.js';
import { selectorLabels, serviceLabels } from '../utils/k8s-names.js';

const DEFAULT_REPLICAS = 1;

export function generateReplicationController(
  descriptor: ServiceDescriptor,
  podSpec: PodSpec,
): ReplicationControllerManifest {
  const { name } = descriptor;
  const labels = serviceLabels(name, descriptor.labels);

  return {
    apiVersion: 'v1',
    kind: 'ReplicationController',
    metadata: { name, labels },
    spec: {
      replicas: DEFAULT_REPLICAS,
      selector: selectorLabels(name),
      template: { metadata: { labels }, spec: podSpec },
    },
  };
}

export function generateDeployment(
  descriptor: ServiceDescriptor,
  podSpec: PodSpec,
): DeploymentManifest {
  const { name } = descriptor;
  const labels = serviceLabels(name, descriptor.labels);

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, labels },
    spec: {
      replicas: DEFAULT_REPLICAS,
      selector: { matchLabels: selectorLabels(name) },
      template: { metadata: { labels }, spec: podSpec },
    },
  };
}

/**
 * DaemonSets run one pod per node, so there is no replica count.
 */
export function generateDaemonSet(
  descriptor: ServiceDescriptor,
  podSpec: PodSpec,
): DaemonSetManifest {
  const { name } = descriptor;
  const labels = serviceLabels(name, descriptor.labels);

  return {
    apiVersion: 'apps/v1',
    kind: 'DaemonSet',
    metadata: { name, labels },
    spec: {
      selector: { matchLabels: selectorLabels(name) },
      template: { metadata: { name, labels }, spec: podSpec },
    },
  };
}

export function generateReplicaSet(
  descriptor: ServiceDescriptor,
  podSpec: PodSpec,
): ReplicaSetManifest {
  const { name } = descriptor;
  const labels = serviceLabels(name, descriptor.labels);

  return {
    apiVersion: 'apps/v1',
    kind: 'ReplicaSet',
    metadata: { name, labels },
    spec: {
      replicas: DEFAULT_REPLICAS,
      selector: { matchLabels: selectorLabels(name) },
      template: { metadata: { labels }, spec: podSpec },
    },
  };
}
