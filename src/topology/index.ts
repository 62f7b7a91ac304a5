// Types
export type {
  IssueSeverity,
  PortMapping,
  RestartPolicy,
  ServiceDescriptor,
  ServiceRole,
  Topology,
  TopologyIssue,
  TopologyIssueCode,
  VolumeDescriptor,
  VolumeMount,
} from './types.js';

// Parsing
export { parseComposeFile, parsePortSpec, parseVolumeSpec } from './parser.js';
export { inferRole, ROLE_LABEL } from './roles.js';

// Ordering
export { findDependencyCycle, planStartupOrder } from './startup-order.js';

// Checks
export { checkTopology, hasErrors, DEFAULT_PGDATA } from './checks.js';
