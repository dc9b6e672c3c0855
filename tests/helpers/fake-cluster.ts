import type {
  ClusterClient,
  ReplicationControllerStatus,
  ServiceStatus,
} from '../../src/cluster/client.js';
import type { StoredManifest } from '../../src/types/k8s.js';

/**
 * In-memory cluster that records every call. Names listed in `rejects`
 * fail on create, delete and scale.
 */
export class FakeCluster implements ClusterClient {
  readonly namespace = 'default';
  readonly calls: string[] = [];
  readonly services = new Map<string, ServiceStatus>();
  readonly controllers = new Map<string, ReplicationControllerStatus>();
  readonly rejects = new Set<string>();
  /** Manifests accepted by create calls, as received. */
  readonly submitted: StoredManifest[] = [];

  private check(call: string, name: string): void {
    this.calls.push(call);
    if (this.rejects.has(name)) throw new Error(`${name} rejected`);
  }

  async createService(manifest: StoredManifest): Promise<void> {
    this.check(`createService ${manifest.metadata.name}`, manifest.metadata.name);
    this.submitted.push(manifest);
    this.services.set(manifest.metadata.name, {
      name: manifest.metadata.name,
      ports: [],
      labels: {},
    });
  }

  async createReplicationController(manifest: StoredManifest): Promise<void> {
    this.check(`createReplicationController ${manifest.metadata.name}`, manifest.metadata.name);
    this.submitted.push(manifest);
    this.controllers.set(manifest.metadata.name, {
      name: manifest.metadata.name,
      containers: [],
      replicas: 1,
      selector: {},
    });
  }

  async getService(name: string): Promise<ServiceStatus> {
    const service = this.services.get(name);
    if (!service) throw new Error(`services "${name}" not found`);
    return service;
  }

  async getReplicationController(name: string): Promise<ReplicationControllerStatus> {
    const rc = this.controllers.get(name);
    if (!rc) throw new Error(`replicationcontrollers "${name}" not found`);
    return rc;
  }

  async deleteService(name: string): Promise<void> {
    this.check(`deleteService ${name}`, name);
    this.services.delete(name);
  }

  async deleteReplicationController(name: string): Promise<void> {
    this.check(`deleteReplicationController ${name}`, name);
    this.controllers.delete(name);
  }

  async scaleReplicationController(name: string, replicas: number): Promise<number> {
    this.check(`scaleReplicationController ${name} ${replicas}`, name);
    const rc = this.controllers.get(name);
    if (rc) rc.replicas = replicas;
    return replicas;
  }
}
