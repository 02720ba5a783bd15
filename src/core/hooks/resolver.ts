/**
 * DependencyResolver
 *
 * Orders the hooks matched for one dispatch so every prerequisite runs before its dependents.
 * Only edges between matched hooks count: a prerequisite that did not match is already satisfied.
 * Independent hooks keep registration order.
 */

import type { HookDefinition } from '../../types/index.js';
import { CyclicDependencyError } from '../errors/index.js';

/** Registration index of a hook; lower runs first among independent hooks */
export type OrderOf = (name: string) => number;

export class DependencyResolver {
  /**
   * Topologically sort the matched hooks (Kahn's algorithm)
   * @throws CyclicDependencyError if the induced subgraph has a cycle
   */
  resolve(matched: readonly HookDefinition[], orderOf: OrderOf): HookDefinition[] {
    const byName = new Map(matched.map((hook) => [hook.name, hook]));
    const inDegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const hook of matched) {
      inDegree.set(hook.name, 0);
    }

    for (const hook of matched) {
      if (hook.dependsOn === undefined || !byName.has(hook.dependsOn)) continue;
      inDegree.set(hook.name, (inDegree.get(hook.name) ?? 0) + 1);
      const list = dependents.get(hook.dependsOn) ?? [];
      list.push(hook.name);
      dependents.set(hook.dependsOn, list);
    }

    const ready: string[] = [];
    for (const [name, degree] of inDegree) {
      if (degree === 0) ready.push(name);
    }

    const result: HookDefinition[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => orderOf(a) - orderOf(b));
      const name = ready.shift();
      const hook = name !== undefined ? byName.get(name) : undefined;
      if (name === undefined || hook === undefined) break;

      result.push(hook);

      for (const dependent of dependents.get(name) ?? []) {
        const degree = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, degree);
        if (degree === 0) ready.push(dependent);
      }
    }

    if (result.length !== matched.length) {
      const placed = new Set(result.map((hook) => hook.name));
      throw new CyclicDependencyError(findCycle(matched.filter((hook) => !placed.has(hook.name))));
    }

    return result;
  }
}

/**
 * Every unplaced hook sits on or behind a cycle; follow dependsOn until a name repeats
 */
function findCycle(unplaced: HookDefinition[]): string[] {
  const byName = new Map(unplaced.map((hook) => [hook.name, hook]));
  const path: string[] = [];
  let current: HookDefinition | undefined = unplaced[0];

  while (current !== undefined && !path.includes(current.name)) {
    path.push(current.name);
    current = current.dependsOn !== undefined ? byName.get(current.dependsOn) : undefined;
  }

  if (current === undefined) {
    return path;
  }
  return [...path.slice(path.indexOf(current.name)), current.name];
}
