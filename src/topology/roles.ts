import type { ServiceDescriptor, ServiceRole } from './types.js';

export const ROLE_LABEL = 'service.role';

const ROLES: readonly ServiceRole[] = ['store', 'broker', 'api', 'worker', 'scheduler', 'unknown'];

const STORE_IMAGE = /^(?:[\w.-]+\/)*(?:postgres|postgis|timescaledb)(?::|$)/;
const BROKER_IMAGE = /^(?:[\w.-]+\/)*(?:redis|valkey|keydb)(?::|$)/;

/**
 * Matches a command that runs schema migrations: anything naming a migrate
 * step (`npm run migrate`, `prisma migrate deploy`, `knex migrate:latest`,
 * `flyway migrate`) plus the tools that call it an upgrade.
 */
export const MIGRATE_COMMAND = /\bmigrat|\balembic\s+upgrade\b|\b(?:dbmate|goose)\s+up\b/;

function isRole(value: string): value is ServiceRole {
  return ROLES.some((role) => role === value);
}

/**
 * Infer what a service does. An explicit `service.role` label wins;
 * otherwise the image, name and command are inspected.
 */
export function inferRole(
  service: Pick<ServiceDescriptor, 'name' | 'image' | 'command' | 'ports' | 'labels'>,
): ServiceRole {
  const label = service.labels[ROLE_LABEL];
  if (label && isRole(label)) return label;

  const image = service.image ?? '';
  if (STORE_IMAGE.test(image)) return 'store';
  if (BROKER_IMAGE.test(image)) return 'broker';

  const text = `${service.name} ${service.command ?? ''}`.toLowerCase();
  if (/\bbeat\b|scheduler/.test(text)) return 'scheduler';
  if (/worker/.test(text)) return 'worker';

  const command = service.command ?? '';
  const publishes = service.ports.some((port) => port.host !== undefined);
  if (publishes || (MIGRATE_COMMAND.test(command) && command.includes('&&'))) return 'api';

  return 'unknown';
}
