export interface ObjectMeta {
  name: string;
  labels?: Record<string, string>;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface ContainerPort {
  containerPort: number;
}

export interface ServicePort {
  name: string;
  protocol: 'TCP';
  port: number;
  targetPort: number;
}

export interface VolumeMount {
  name: string;
  mountPath: string;
  readOnly?: boolean;
}

export interface Volume {
  name: string;
  hostPath: { path: string };
}

export interface SecurityContext {
  privileged: boolean;
}

export type RestartPolicy = 'Always' | 'Never' | 'OnFailure';

export interface Container {
  name: string;
  image?: string;
  command?: string[];
  workingDir?: string;
  env?: EnvVar[];
  ports?: ContainerPort[];
  volumeMounts?: VolumeMount[];
  securityContext?: SecurityContext;
}

export interface PodSpec {
  containers: Container[];
  volumes?: Volume[];
  restartPolicy: RestartPolicy;
}

export interface PodTemplateSpec {
  metadata: Partial<ObjectMeta>;
  spec: PodSpec;
}

export interface LabelSelector {
  matchLabels: Record<string, string>;
}

export interface ServiceManifest {
  apiVersion: 'v1';
  kind: 'Service';
  metadata: ObjectMeta;
  spec: {
    selector: Record<string, string>;
    ports?: ServicePort[];
  };
}

export interface ReplicationControllerManifest {
  apiVersion: 'v1';
  kind: 'ReplicationController';
  metadata: ObjectMeta;
  spec: {
    replicas: number;
    selector: Record<string, string>;
    template: PodTemplateSpec;
  };
}

export interface DeploymentManifest {
  apiVersion: 'apps/v1';
  kind: 'Deployment';
  metadata: ObjectMeta;
  spec: {
    replicas: number;
    selector: LabelSelector;
    template: PodTemplateSpec;
  };
}

export interface DaemonSetManifest {
  apiVersion: 'apps/v1';
  kind: 'DaemonSet';
  metadata: ObjectMeta;
  spec: {
    selector: LabelSelector;
    template: PodTemplateSpec;
  };
}

export interface ReplicaSetManifest {
  apiVersion: 'apps/v1';
  kind: 'ReplicaSet';
  metadata: ObjectMeta;
  spec: {
    replicas: number;
    selector: LabelSelector;
    template: PodTemplateSpec;
  };
}

export type K8sManifest =
  | ServiceManifest
  | ReplicationControllerManifest
  | DeploymentManifest
  | DaemonSetManifest
  | ReplicaSetManifest;

/** The five manifests built for one compose service. */
export interface ResourceSet {
  service: ServiceManifest;
  replicationController: ReplicationControllerManifest;
  deployment: DeploymentManifest;
  daemonSet: DaemonSetManifest;
  replicaSet: ReplicaSetManifest;
}

/** Suffix used in output file names, e.g. `web-svc.json`. */
export type ManifestSuffix = 'svc' | 'deployment' | 'daemonset' | 'replicaset' | 'rc';

export interface SerializedManifest {
  serviceName: string;
  suffix: ManifestSuffix;
  content: string;
}

export interface GeneratorOutput {
  /** Manifests in emission order. */
  manifests: SerializedManifest[];
  /** Link targets that are not services of the project. */
  placeholders: string[];
  warnings: string[];
}

/**
 * A manifest read back from disk. Only the identifying fields are known;
 * everything else is submitted as written.
 */
export interface StoredManifest {
  apiVersion: string;
  kind: string;
  metadata: { name: string; [key: string]: unknown };
  [key: string]: unknown;
}
