/**
 * Module-to-module requirements.
 *
 * A module whose own clauses fail is disabled; so is every module that
 * (transitively) requires a disabled one. References to modules that are
 * never defined, and requirement cycles, are configuration errors.
 */

import { ConfigurationError } from '../errors.js';

export interface DependencyNode {
  name: string;
  /** Outcome of the module's own (non-module) requirements and `enabled` flag */
  satisfied: boolean;
  dependsOn: readonly string[];
}

export interface DependencyResolution {
  enabled: Set<string>;
  /** Disabled module name -> reason */
  disabled: Map<string, string>;
}

/**
 * @param definedNames every module name present in the configuration,
 *   including modules that are switched off or not selected
 */
export function resolveModuleDependencies(
  nodes: readonly DependencyNode[],
  definedNames: ReadonlySet<string>
): DependencyResolution {
  const errors: string[] = [];
  for (const node of nodes) {
    for (const dependency of node.dependsOn) {
      if (!definedNames.has(dependency)) {
        errors.push(`module "${node.name}" requires undefined module "${dependency}"`);
      }
    }
  }
  if (errors.length > 0) {
    throw new ConfigurationError('Unresolvable module requirements', errors);
  }

  const cycle = findCycle(nodes);
  if (cycle) {
    throw new ConfigurationError(`Module requirement cycle: ${cycle.join(' -> ')}`);
  }

  const enabled = new Set<string>();
  const disabled = new Map<string, string>();
  for (const node of nodes) {
    if (node.satisfied) {
      enabled.add(node.name);
    } else {
      disabled.set(node.name, 'requirements not met');
    }
  }

  // Prune until stable: disabling one module can disable its dependents
  let changed = true;
  while (changed) {
    changed = false;
    for (const node of nodes) {
      if (!enabled.has(node.name)) continue;
      const missing = node.dependsOn.find((dependency) => !enabled.has(dependency));
      if (missing !== undefined) {
        enabled.delete(node.name);
        disabled.set(node.name, `missing module dependency "${missing}"`);
        changed = true;
      }
    }
  }

  return { enabled, disabled };
}

/** Returns the names along one cycle (first name repeated at the end), or null */
export function findCycle(nodes: readonly DependencyNode[]): string[] | null {
  const edges = new Map(nodes.map((node) => [node.name, node.dependsOn]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === 'done') return null;
    if (current === 'visiting') {
      return [...stack.slice(stack.indexOf(name)), name];
    }

    state.set(name, 'visiting');
    stack.push(name);
    for (const next of edges.get(name) ?? []) {
      const found = visit(next);
      if (found) return found;
    }
    stack.pop();
    state.set(name, 'done');
    return null;
  };

  for (const node of nodes) {
    const found = visit(node.name);
    if (found) return found;
  }
  return null;
}
