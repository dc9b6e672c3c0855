/**
 * One service of a compose project, normalized to the string mini-syntaxes
 * the field mappers understand.
 */
export interface ServiceDescriptor {
  name: string;
  image?: string;
  command: string[];
  workingDir?: string;
  /** Raw `KEY=VALUE` or `KEY: VALUE` entries. */
  environment: string[];
  /** Raw `port` or `host:container` entries. */
  ports: string[];
  /** Raw `host:container[:mode]` entries. */
  volumes: string[];
  /** Raw `service[:alias]` entries. */
  links: string[];
  labels: Record<string, string>;
  privileged: boolean;
  restart?: string;
  /** Every other key the service declares, as found in the file. */
  extras: Record<string, unknown>;
}

export interface ComposeProject {
  version?: string;
  /** Keyed by service name, in file order. */
  services: Map<string, ServiceDescriptor>;
}

export interface ParseResult {
  project: ComposeProject;
  warnings: string[];
  sourceFile: string;
}
