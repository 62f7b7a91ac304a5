/**
 * Static deployment checks over a parsed Topology.
 *
 * Each check is a pure function returning the issues it found; `checkTopology`
 * runs them all in a fixed order.
 */
import type { DatabaseConnectionParts } from '@/config/connection.js';
import {
  diffConnections,
  parseDatabaseDsn,
  readDiscreteConnection,
} from '@/config/connection.js';
import { parseRedisUrl } from '@/infrastructure/redis.js';
import { MIGRATE_COMMAND } from './roles.js';
import { findDependencyCycle } from './startup-order.js';
import type {
  ServiceDescriptor,
  ServiceRole,
  Topology,
  TopologyIssue,
} from './types.js';

export const DEFAULT_PGDATA = '/var/lib/postgresql/data';
const STORE_PORT = 5432;
const DSN_KEYS = ['DATABASE_DSN', 'DATABASE_URL'] as const;
const BROKER_URL = /^rediss?:\/\//;

type Check = (topology: Topology) => TopologyIssue[];

// ─── Helpers ────────────────────────────────────────────────────

function withRole(topology: Topology, ...roles: ServiceRole[]): ServiceDescriptor[] {
  return topology.services.filter((service) => roles.includes(service.role));
}

/** Values using compose interpolation cannot be checked statically. */
function isInterpolated(value: string): boolean {
  return value.includes('${');
}

function brokerUrlsOf(service: ServiceDescriptor): string[] {
  return Object.values(service.environment).filter((value) => BROKER_URL.test(value));
}

function isWithin(path: string, mountTarget: string): boolean {
  const target = mountTarget.replace(/\/+$/, '');
  return path === target || path.startsWith(`${target}/`);
}

// ─── Dependencies ───────────────────────────────────────────────

export const checkDependencies: Check = (topology) => {
  const known = new Set(topology.services.map((s) => s.name));
  const issues: TopologyIssue[] = topology.services.flatMap((service) =>
    service.dependsOn
      .filter((dependency) => !known.has(dependency))
      .map((dependency): TopologyIssue => ({
        severity: 'error',
        code: 'DANGLING_DEPENDENCY',
        service: service.name,
        message: `Service "${service.name}" depends on undeclared service "${dependency}"`,
      })),
  );

  const cycle = findDependencyCycle(topology);
  if (cycle) {
    issues.push({
      severity: 'error',
      code: 'DEPENDENCY_CYCLE',
      service: cycle[0],
      message: `Dependency cycle: ${cycle.join(' → ')}`,
    });
  }
  return issues;
};

// ─── Volumes ────────────────────────────────────────────────────

export const checkVolumes: Check = (topology) => {
  const declared = new Set(topology.volumes.map((v) => v.name));
  const users = new Map<string, string[]>();
  const issues: TopologyIssue[] = [];

  for (const service of topology.services) {
    for (const mount of service.volumes) {
      if (mount.kind !== 'named' || !mount.source) continue;
      if (!declared.has(mount.source)) {
        issues.push({
          severity: 'error',
          code: 'UNDECLARED_VOLUME',
          service: service.name,
          message: `Service "${service.name}" mounts undeclared volume "${mount.source}"`,
        });
      }
      const list = users.get(mount.source) ?? [];
      if (!list.includes(service.name)) list.push(service.name);
      users.set(mount.source, list);
    }
  }

  for (const [volume, services] of users) {
    if (services.length < 2) continue;
    issues.push({
      severity: 'warning',
      code: 'VOLUME_SHARED',
      message: `Volume "${volume}" is mounted by several services: ${services.join(', ')}`,
    });
  }
  return issues;
};

export const checkStorePersistence: Check = (topology) =>
  withRole(topology, 'store').flatMap((store): TopologyIssue[] => {
    const named = store.volumes.filter((mount) => mount.kind === 'named' && mount.source);
    if (named.length === 0) {
      return [{
        severity: 'error',
        code: 'STORE_VOLUME_MISSING',
        service: store.name,
        message: `Store "${store.name}" keeps its data outside a named volume`,
      }];
    }

    const dataPath = store.environment['PGDATA'] || DEFAULT_PGDATA;
    if (named.some((mount) => isWithin(dataPath, mount.target))) return [];
    return [{
      severity: 'error',
      code: 'STORE_DATA_PATH_MISMATCH',
      service: store.name,
      message: `Store "${store.name}" writes to ${dataPath}, which no named volume covers`,
    }];
  });

// ─── Broker ─────────────────────────────────────────────────────

export const checkBroker: Check = (topology) => {
  const brokers = withRole(topology, 'broker');
  const brokerNames = new Set(brokers.map((b) => b.name));
  const issues: TopologyIssue[] = [];

  for (const broker of brokers) {
    if (!broker.ports.some((port) => port.host !== undefined)) continue;
    issues.push({
      severity: 'warning',
      code: 'BROKER_PORT_PUBLISHED',
      service: broker.name,
      message: `Broker "${broker.name}" publishes its port on the host`,
    });
  }

  const hostsByService = new Map<string, string>();
  for (const service of topology.services) {
    if (service.role === 'broker') continue;
    for (const url of brokerUrlsOf(service)) {
      if (isInterpolated(url)) continue;
      const parsed = parseRedisUrl(url);
      if (!parsed.ok) continue;
      const { host } = parsed.value;
      hostsByService.set(service.name, host);
      if (brokerNames.has(host)) continue;
      issues.push({
        severity: 'error',
        code: 'BROKER_HOST_MISMATCH',
        service: service.name,
        message: `Service "${service.name}" points at broker host "${host}", which is not a broker service`,
      });
    }
  }

  for (const consumer of withRole(topology, 'worker', 'scheduler')) {
    if (brokerUrlsOf(consumer).length === 0) {
      issues.push({
        severity: 'warning',
        code: 'BROKER_URL_MISSING',
        service: consumer.name,
        message: `Service "${consumer.name}" declares no broker URL`,
      });
    }
    if (brokers.length > 0 && !consumer.dependsOn.some((name) => brokerNames.has(name))) {
      issues.push({
        severity: 'warning',
        code: 'IMPLICIT_BROKER_DEPENDENCY',
        service: consumer.name,
        message: `Service "${consumer.name}" does not depend on the broker and must retry until it is reachable`,
      });
    }
  }

  const distinctHosts = new Set(hostsByService.values());
  if (distinctHosts.size > 1) {
    const described = [...hostsByService].map(([service, host]) => `${service} → ${host}`);
    issues.push({
      severity: 'error',
      code: 'BROKER_HOST_MISMATCH',
      message: `Services disagree on the broker host: ${described.join(', ')}`,
    });
  }
  return issues;
};

// ─── Store Connection ───────────────────────────────────────────

type ConnectionShape = 'dsn' | 'discrete';

interface DeclaredConnection {
  shape: ConnectionShape;
  /** Null when the values are interpolated or unparseable. */
  parts: DatabaseConnectionParts | null;
}

function declaredConnections(service: ServiceDescriptor): {
  connections: DeclaredConnection[];
  issues: TopologyIssue[];
} {
  const env = service.environment;
  const connections: DeclaredConnection[] = [];
  const issues: TopologyIssue[] = [];

  for (const key of DSN_KEYS) {
    const value = env[key];
    if (!value) continue;
    connections.push({
      shape: 'dsn',
      parts: isInterpolated(value) ? null : parseDatabaseDsn(value),
    });
  }

  const discrete = readDiscreteConnection(env);
  if (discrete && 'missing' in discrete) {
    issues.push({
      severity: 'error',
      code: 'CONNECTION_SHAPE_CONFLICT',
      service: service.name,
      message: `Service "${service.name}" declares an incomplete DB_* set (missing ${discrete.missing.join(', ')})`,
    });
  } else if (discrete) {
    const interpolated = Object.entries(env).some(
      ([key, value]) => key.startsWith('DB_') && isInterpolated(value),
    );
    connections.push({ shape: 'discrete', parts: interpolated ? null : discrete.parts });
  }

  return { connections, issues };
}

/** What a client must use to reach the store, from the store's own settings. */
function expectedConnection(store: ServiceDescriptor): DatabaseConnectionParts | null {
  const env = store.environment;
  const values = ['POSTGRES_USER', 'POSTGRES_PASSWORD', 'POSTGRES_DB'].map((key) => env[key] ?? '');
  if (values.some(isInterpolated)) return null;

  const user = env['POSTGRES_USER'] || 'postgres';
  return {
    host: store.name,
    port: STORE_PORT,
    database: env['POSTGRES_DB'] || user,
    user,
    password: env['POSTGRES_PASSWORD'] ?? '',
  };
}

export const checkStoreConnections: Check = (topology) => {
  const stores = withRole(topology, 'store');
  const store = stores.length === 1 ? stores[0] : undefined;
  const expected = store ? expectedConnection(store) : null;
  const shapes = new Map<ConnectionShape, string[]>();
  const issues: TopologyIssue[] = [];

  for (const service of topology.services) {
    if (service.role === 'store') continue;
    const declared = declaredConnections(service);
    issues.push(...declared.issues);

    const serviceShapes = new Set(declared.connections.map((c) => c.shape));
    if (serviceShapes.size > 1) {
      issues.push({
        severity: 'error',
        code: 'CONNECTION_SHAPE_CONFLICT',
        service: service.name,
        message: `Service "${service.name}" declares both a DSN and discrete DB_* fields`,
      });
    }
    for (const shape of serviceShapes) {
      shapes.set(shape, [...(shapes.get(shape) ?? []), service.name]);
    }

    if (!store || !expected) continue;
    for (const connection of declared.connections) {
      if (!connection.parts) continue;
      const fields = diffConnections(connection.parts, expected);
      if (fields.length === 0) continue;
      issues.push({
        severity: 'error',
        code: 'CREDENTIAL_MISMATCH',
        service: service.name,
        message: `Service "${service.name}" disagrees with store "${store.name}" on ${fields.join(', ')}`,
      });
    }
  }

  if (shapes.size > 1) {
    const described = [...shapes].map(([shape, services]) => `${shape} (${services.join(', ')})`);
    issues.push({
      severity: 'error',
      code: 'CONNECTION_SHAPE_CONFLICT',
      message: `Services use different connection shapes: ${described.join(', ')}`,
    });
  }
  return issues;
};

// ─── Process Discipline ─────────────────────────────────────────

/**
 * The API command must run migrations and then serve, joined by `&&`,
 * so a failed migration never reaches the listen step.
 */
export const checkMigrationGate: Check = (topology) =>
  withRole(topology, 'api').flatMap((api): TopologyIssue[] => {
    const segments = (api.command ?? '').split('&&').map((segment) => segment.trim());
    const migrateAt = segments.findIndex((segment) => MIGRATE_COMMAND.test(segment));
    if (migrateAt !== -1 && migrateAt < segments.length - 1) return [];
    return [{
      severity: 'error',
      code: 'MIGRATION_NOT_GATED',
      service: api.name,
      message: migrateAt === -1
        ? `API service "${api.name}" serves without running migrations first`
        : `API service "${api.name}" does not gate serving on a successful migration`,
    }];
  });

export const checkSchedulerSingleton: Check = (topology) => {
  const schedulers = withRole(topology, 'scheduler');
  const issues: TopologyIssue[] = schedulers
    .filter((scheduler) => scheduler.replicas > 1)
    .map((scheduler): TopologyIssue => ({
      severity: 'error',
      code: 'SCHEDULER_NOT_SINGLETON',
      service: scheduler.name,
      message: `Scheduler "${scheduler.name}" runs ${scheduler.replicas} replicas`,
    }));

  if (schedulers.length > 1) {
    issues.push({
      severity: 'error',
      code: 'SCHEDULER_NOT_SINGLETON',
      message: `Several scheduler services are declared: ${schedulers.map((s) => s.name).join(', ')}`,
    });
  }
  return issues;
};

export const checkRestartPolicies: Check = (topology) =>
  topology.services
    .filter((service) => service.role !== 'unknown')
    .filter((service) => service.restart !== 'always' && service.restart !== 'unless-stopped')
    .map((service): TopologyIssue => ({
      severity: 'warning',
      code: 'RESTART_POLICY_MISSING',
      service: service.name,
      message: `Service "${service.name}" is not restarted after a crash`,
    }));

// ─── Entry Point ────────────────────────────────────────────────

const CHECKS: readonly Check[] = [
  checkDependencies,
  checkVolumes,
  checkStorePersistence,
  checkBroker,
  checkStoreConnections,
  checkMigrationGate,
  checkSchedulerSingleton,
  checkRestartPolicies,
];

/** Run every deployment check. Issues come back grouped by check. */
export function checkTopology(topology: Topology): TopologyIssue[] {
  return CHECKS.flatMap((check) => check(topology));
}

export function hasErrors(issues: readonly TopologyIssue[]): boolean {
  return issues.some((issue) => issue.severity === 'error');
}
