// ─── Service Descriptors ────────────────────────────────────────

export type ServiceRole = 'store' | 'broker' | 'api' | 'worker' | 'scheduler' | 'unknown';

export type RestartPolicy = 'no' | 'always' | 'on-failure' | 'unless-stopped';

export interface PortMapping {
  /** Host port; absent when the port is only exposed to the container network. */
  host?: number;
  container: number;
  protocol: 'tcp' | 'udp';
}

export interface VolumeMount {
  kind: 'named' | 'bind';
  /** Volume name or host path; absent for anonymous volumes. */
  source?: string;
  target: string;
  readOnly: boolean;
}

/** One deployable process and its runtime configuration. */
export interface ServiceDescriptor {
  name: string;
  image?: string;
  build?: { context: string; dockerfile?: string };
  ports: PortMapping[];
  environment: Record<string, string>;
  volumes: VolumeMount[];
  command?: string;
  restart: RestartPolicy;
  dependsOn: string[];
  replicas: number;
  labels: Record<string, string>;
  role: ServiceRole;
}

/** A named persistent volume declared at the top level. */
export interface VolumeDescriptor {
  name: string;
}

export interface Topology {
  services: ServiceDescriptor[];
  volumes: VolumeDescriptor[];
}

// ─── Issues ─────────────────────────────────────────────────────

export type IssueSeverity = 'error' | 'warning';

export type TopologyIssueCode =
  | 'DANGLING_DEPENDENCY'
  | 'DEPENDENCY_CYCLE'
  | 'UNDECLARED_VOLUME'
  | 'VOLUME_SHARED'
  | 'STORE_VOLUME_MISSING'
  | 'STORE_DATA_PATH_MISMATCH'
  | 'BROKER_HOST_MISMATCH'
  | 'BROKER_URL_MISSING'
  | 'BROKER_PORT_PUBLISHED'
  | 'CONNECTION_SHAPE_CONFLICT'
  | 'CREDENTIAL_MISMATCH'
  | 'MIGRATION_NOT_GATED'
  | 'SCHEDULER_NOT_SINGLETON'
  | 'IMPLICIT_BROKER_DEPENDENCY'
  | 'RESTART_POLICY_MISSING';

export interface TopologyIssue {
  severity: IssueSeverity;
  code: TopologyIssueCode;
  /** Offending service; absent for deployment-wide issues. */
  service?: string;
  message: string;
}
