/**
 * Compose file parser.
 *
 * Accepts the subset of the Compose format a service topology uses, in both
 * short and long syntaxes, and normalises it into a Topology.
 */
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError, toError } from '@/core/errors.js';
import { inferRole } from './roles.js';
import type {
  PortMapping,
  RestartPolicy,
  ServiceDescriptor,
  Topology,
  VolumeMount,
} from './types.js';

// ─── Raw Schema ─────────────────────────────────────────────────

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const keyValueSchema = z.union([
  z.array(z.string()),
  z.record(z.union([scalarSchema, z.null()])),
]);

const rawServiceSchema = z
  .object({
    image: z.string().optional(),
    build: z
      .union([
        z.string(),
        z.object({ context: z.string(), dockerfile: z.string().optional() }).passthrough(),
      ])
      .optional(),
    ports: z
      .array(
        z.union([
          z.string(),
          z.number(),
          z
            .object({
              target: z.number().int(),
              published: z.union([z.number().int(), z.string()]).optional(),
              protocol: z.enum(['tcp', 'udp']).optional(),
            })
            .passthrough(),
        ]),
      )
      .optional(),
    environment: keyValueSchema.optional(),
    volumes: z
      .array(
        z.union([
          z.string(),
          z
            .object({
              type: z.string(),
              source: z.string().optional(),
              target: z.string(),
              read_only: z.boolean().optional(),
            })
            .passthrough(),
        ]),
      )
      .optional(),
    command: z.union([z.string(), z.array(z.string())]).optional(),
    restart: z.string().optional(),
    depends_on: z
      .union([z.array(z.string()), z.record(z.object({}).passthrough())])
      .optional(),
    deploy: z
      .object({ replicas: z.number().int().min(0).optional() })
      .passthrough()
      .optional(),
    labels: keyValueSchema.optional(),
  })
  .passthrough();

const rawComposeSchema = z
  .object({
    services: z.record(rawServiceSchema),
    volumes: z.record(z.union([z.object({}).passthrough(), z.null()])).optional(),
  })
  .passthrough();

type RawService = z.infer<typeof rawServiceSchema>;

// ─── Normalisers ────────────────────────────────────────────────

/** `KEY=value` lists and maps both become a string map. */
function toStringMap(raw: z.infer<typeof keyValueSchema> | undefined): Record<string, string> {
  if (!raw) return {};
  if (Array.isArray(raw)) {
    const map: Record<string, string> = {};
    for (const item of raw) {
      const separator = item.indexOf('=');
      if (separator === -1) {
        map[item] = '';
      } else {
        map[item.slice(0, separator)] = item.slice(separator + 1);
      }
    }
    return map;
  }
  const map: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    map[key] = value ?? '';
  }
  return map;
}

/** `[ip:][host:]container[/protocol]`; ranges keep their first port. */
export function parsePortSpec(spec: string | number): PortMapping | null {
  const [body = '', protocolPart] = String(spec).split('/');
  const protocol = protocolPart === 'udp' ? 'udp' : 'tcp';
  const parts = body.split(':');
  const firstPort = (value: string | undefined): number =>
    Number((value ?? '').split('-')[0]);

  const container = firstPort(parts[parts.length - 1]);
  if (!Number.isInteger(container) || container <= 0) return null;

  if (parts.length === 1) return { container, protocol };

  const host = firstPort(parts[parts.length - 2]);
  if (!Number.isInteger(host) || host <= 0) return null;
  return { host, container, protocol };
}

/** `source:target[:mode]` or a bare `target` (anonymous volume). */
export function parseVolumeSpec(spec: string): VolumeMount | null {
  const parts = spec.split(':');
  const [first = '', second, mode] = parts;

  if (parts.length === 1) {
    return first.startsWith('/') ? { kind: 'named', target: first, readOnly: false } : null;
  }
  if (!second) return null;

  const isPath = /^[./~]/.test(first);
  return {
    kind: isPath ? 'bind' : 'named',
    source: first,
    target: second,
    readOnly: mode === 'ro',
  };
}

function toRestartPolicy(raw: string | undefined): RestartPolicy {
  if (raw === 'always' || raw === 'unless-stopped') return raw;
  if (raw?.startsWith('on-failure')) return 'on-failure';
  return 'no';
}

function normaliseService(
  name: string,
  raw: RawService,
): Result<Omit<ServiceDescriptor, 'role'>, ValidationError> {
  const ports: PortMapping[] = [];
  for (const spec of raw.ports ?? []) {
    if (typeof spec === 'object') {
      const published = Number(String(spec.published ?? '').split('-')[0]);
      ports.push({
        host: Number.isInteger(published) && published > 0 ? published : undefined,
        container: spec.target,
        protocol: spec.protocol ?? 'tcp',
      });
      continue;
    }
    const port = parsePortSpec(spec);
    if (!port) {
      return err(new ValidationError(`Service "${name}" has an invalid port "${String(spec)}"`, {
        service: name,
      }));
    }
    ports.push(port);
  }

  const volumes: VolumeMount[] = [];
  for (const spec of raw.volumes ?? []) {
    if (typeof spec === 'object') {
      volumes.push({
        kind: spec.type === 'bind' ? 'bind' : 'named',
        source: spec.source,
        target: spec.target,
        readOnly: spec.read_only ?? false,
      });
      continue;
    }
    const mount = parseVolumeSpec(spec);
    if (!mount) {
      return err(new ValidationError(`Service "${name}" has an invalid volume "${spec}"`, {
        service: name,
      }));
    }
    volumes.push(mount);
  }

  const build =
    typeof raw.build === 'string'
      ? { context: raw.build }
      : raw.build
        ? { context: raw.build.context, dockerfile: raw.build.dockerfile }
        : undefined;

  return ok({
    name,
    image: raw.image,
    build,
    ports,
    environment: toStringMap(raw.environment),
    volumes,
    command: Array.isArray(raw.command) ? raw.command.join(' ') : raw.command,
    restart: toRestartPolicy(raw.restart),
    dependsOn: Array.isArray(raw.depends_on)
      ? raw.depends_on
      : Object.keys(raw.depends_on ?? {}),
    replicas: raw.deploy?.replicas ?? 1,
    labels: toStringMap(raw.labels),
  });
}

// ─── Parser ─────────────────────────────────────────────────────

/** Parse a compose document into a Topology. */
export function parseComposeFile(text: string): Result<Topology, ValidationError> {
  let document: unknown;
  try {
    document = parseYaml(text, { merge: true });
  } catch (error) {
    return err(new ValidationError('Compose file is not valid YAML', {
      reason: toError(error).message,
    }));
  }

  const parsed = rawComposeSchema.safeParse(document);
  if (!parsed.success) {
    return err(new ValidationError('Compose file does not describe services', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    }));
  }

  const services: ServiceDescriptor[] = [];
  for (const [name, raw] of Object.entries(parsed.data.services)) {
    const normalised = normaliseService(name, raw);
    if (!normalised.ok) return normalised;
    services.push({ ...normalised.value, role: inferRole(normalised.value) });
  }

  return ok({
    services,
    volumes: Object.keys(parsed.data.volumes ?? {}).map((name) => ({ name })),
  });
}
