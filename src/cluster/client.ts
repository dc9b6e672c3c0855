import * as k8s from '@kubernetes/client-node';
import type { StoredManifest } from '../types/k8s.js';

export interface ServiceStatus {
  name: string;
  clusterIP?: string;
  ports: Array<{ protocol: string; port: number }>;
  labels: Record<string, string>;
}

export interface ReplicationControllerStatus {
  name: string;
  containers: Array<{ name: string; image?: string }>;
  replicas: number;
  selector: Record<string, string>;
}

/**
 * The cluster operations the commands need, scoped to one namespace.
 */
export interface ClusterClient {
  readonly namespace: string;
  createService(manifest: StoredManifest): Promise<void>;
  createReplicationController(manifest: StoredManifest): Promise<void>;
  getService(name: string): Promise<ServiceStatus>;
  getReplicationController(name: string): Promise<ReplicationControllerStatus>;
  deleteService(name: string): Promise<void>;
  deleteReplicationController(name: string): Promise<void>;
  /** Set the replica count and return the value the cluster accepted. */
  scaleReplicationController(name: string, replicas: number): Promise<number>;
}

export interface ClusterClientOptions {
  namespace?: string;
  /** Kubeconfig contents; the default locations are used when omitted. */
  kubeconfig?: string;
}

/**
 * Create a cluster client backed by @kubernetes/client-node.
 */
export function createClusterClient(options: ClusterClientOptions = {}): ClusterClient {
  const namespace = options.namespace ?? 'default';
  const kc = new k8s.KubeConfig();
  if (options.kubeconfig) {
    kc.loadFromString(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);

  return {
    namespace,

    async createService(manifest) {
      await coreApi.createNamespacedService({ namespace, body: manifest });
    },

    async createReplicationController(manifest) {
      await coreApi.createNamespacedReplicationController({ namespace, body: manifest });
    },

    async getService(name) {
      const service = await coreApi.readNamespacedService({ name, namespace });
      return {
        name: service.metadata?.name ?? name,
        clusterIP: service.spec?.clusterIP,
        ports: (service.spec?.ports ?? []).map((p) => ({
          protocol: p.protocol ?? 'TCP',
          port: p.port,
        })),
        labels: service.metadata?.labels ?? {},
      };
    },

    async getReplicationController(name) {
      const rc = await coreApi.readNamespacedReplicationController({ name, namespace });
      return {
        name: rc.metadata?.name ?? name,
        containers: (rc.spec?.template?.spec?.containers ?? []).map((c) => ({
          name: c.name,
          image: c.image,
        })),
        replicas: rc.spec?.replicas ?? 0,
        selector: rc.spec?.selector ?? {},
      };
    },

    async deleteService(name) {
      await coreApi.deleteNamespacedService({ name, namespace });
    },

    async deleteReplicationController(name) {
      await coreApi.deleteNamespacedReplicationController({ name, namespace });
    },

    async scaleReplicationController(name, replicas) {
      const scale = await coreApi.readNamespacedReplicationControllerScale({ name, namespace });
      const updated = await coreApi.replaceNamespacedReplicationControllerScale({
        name,
        namespace,
        body: { ...scale, spec: { ...scale.spec, replicas } },
      });
      return updated.spec?.replicas ?? replicas;
    },
  };
}
