import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError } from '@/core/errors.js';
import type { Topology } from './types.js';

/**
 * Find one dependency cycle, as a closed path (`a → b → a`).
 * Dependencies on undeclared services are ignored.
 */
export function findDependencyCycle(topology: Topology): string[] | null {
  const dependsOn = new Map(topology.services.map((s) => [s.name, s.dependsOn]));
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === 'done') return null;
    if (current === 'visiting') return [...path.slice(path.indexOf(name)), name];

    state.set(name, 'visiting');
    path.push(name);
    for (const dependency of dependsOn.get(name) ?? []) {
      if (!dependsOn.has(dependency)) continue;
      const cycle = visit(dependency);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(name, 'done');
    return null;
  };

  for (const service of topology.services) {
    const cycle = visit(service.name);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Order services so that each one starts after everything it depends on.
 * Ties keep declaration order.
 */
export function planStartupOrder(topology: Topology): Result<string[], ValidationError> {
  const names = topology.services.map((s) => s.name);
  const known = new Set(names);

  const missing = topology.services.flatMap((service) =>
    service.dependsOn
      .filter((dependency) => !known.has(dependency))
      .map((dependency) => `${service.name} → ${dependency}`),
  );
  if (missing.length > 0) {
    return err(new ValidationError('Services depend on undeclared services', { missing }));
  }

  const pending = new Map(topology.services.map((s) => [s.name, new Set(s.dependsOn)]));
  const order: string[] = [];

  while (pending.size > 0) {
    const ready = names.find((name) => pending.get(name)?.size === 0);
    if (ready === undefined) {
      return err(new ValidationError('Service dependencies form a cycle', {
        cycle: findDependencyCycle(topology),
      }));
    }
    order.push(ready);
    pending.delete(ready);
    for (const dependencies of pending.values()) dependencies.delete(ready);
  }

  return ok(order);
}
