/**
 * HookRegistry
 *
 * Validates hook definitions once and indexes them by event kind.
 * Read-only after load, so one registry can serve concurrent dispatches.
 */

import type { Condition, HookDefinition, HookEventKind } from '../../types/index.js';
import { HOOK_EVENT_KINDS, SCOPED_EVENT_KINDS } from '../../types/index.js';
import { formatIssues, HookDefinitionSchema } from '../config/schema.js';
import type { ParsedHookDefinition } from '../config/schema.js';
import { CyclicDependencyError, ValidationError, ValidationErrorCode } from '../errors/index.js';

export type RegistryLoadResult =
  | { success: true; registry: HookRegistry }
  | { success: false; error: ValidationError };

export class HookRegistry {
  private readonly byName: Map<string, HookDefinition>;
  private readonly byEvent: Map<HookEventKind, HookDefinition[]>;
  private readonly order: Map<string, number>;

  private constructor(definitions: HookDefinition[]) {
    this.byName = new Map(definitions.map((hook) => [hook.name, hook]));
    this.order = new Map(definitions.map((hook, index) => [hook.name, index]));
    this.byEvent = new Map(HOOK_EVENT_KINDS.map((kind) => [kind, []]));

    for (const hook of definitions) {
      this.byEvent.get(hook.eventKind)?.push(hook);
    }
  }

  /**
   * Build a registry, throwing ValidationError on the first problem found
   * @param definitions Raw definitions in registration order
   */
  static load(definitions: readonly unknown[]): HookRegistry {
    const hooks = definitions.map((raw, index) => toDefinition(raw, index));

    assertUniqueNames(hooks);
    for (const hook of hooks) {
      assertToolFilterScope(hook);
    }
    assertDependencies(hooks);
    assertAcyclic(hooks);

    return new HookRegistry(hooks);
  }

  /**
   * Like load(), but reports failure as a value
   */
  static safeLoad(definitions: readonly unknown[]): RegistryLoadResult {
    try {
      return { success: true, registry: HookRegistry.load(definitions) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Enabled hooks bound to an event, in registration order.
   * For scoped events, a hook with a non-empty toolFilter needs toolName in it.
   */
  lookup(eventKind: HookEventKind, toolName?: string | null): HookDefinition[] {
    const hooks = this.byEvent.get(eventKind) ?? [];
    const scoped = SCOPED_EVENT_KINDS.has(eventKind);

    return hooks.filter((hook) => {
      if (!hook.enabled) return false;
      if (!scoped || hook.toolFilter.length === 0) return true;
      return toolName != null && hook.toolFilter.includes(toolName);
    });
  }

  get(name: string): HookDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Registration index of a hook, -1 if unknown
   */
  indexOf(name: string): number {
    return this.order.get(name) ?? -1;
  }

  get size(): number {
    return this.byName.size;
  }

  all(): HookDefinition[] {
    return [...this.byName.values()];
  }

  getStats(): { total: number; byEvent: Record<HookEventKind, number> } {
    const byEvent: Record<HookEventKind, number> = {
      ToolBefore: 0,
      ToolAfter: 0,
      SessionStart: 0,
      SessionEnd: 0,
      AgentCreated: 0,
      AgentDestroyed: 0,
      SlashCommand: 0,
    };
    for (const hook of this.byName.values()) {
      byEvent[hook.eventKind] += 1;
    }

    return { total: this.size, byEvent };
  }
}

function toDefinition(raw: unknown, index: number): HookDefinition {
  const parsed = HookDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const label = describeRaw(raw, index);
    throw new ValidationError(
      `Invalid hook definition ${label}: ${formatIssues(parsed.error)}`,
      ValidationErrorCode.INVALID_DEFINITION,
      label,
    );
  }

  return freezeDefinition(parsed.data);
}

function freezeDefinition(data: ParsedHookDefinition): HookDefinition {
  let matchRegex: RegExp | undefined;
  if (data.matchRegex !== undefined) {
    try {
      matchRegex = new RegExp(data.matchRegex);
    } catch (error) {
      throw new ValidationError(
        `Hook "${data.name}" has an invalid matchRegex: ${error instanceof Error ? error.message : String(error)}`,
        ValidationErrorCode.INVALID_REGEX,
        data.name,
      );
    }
  }

  const conditions: Condition[] = data.conditions.map((condition) => Object.freeze({ ...condition }));

  return Object.freeze({
    name: data.name,
    eventKind: data.eventKind,
    toolFilter: Object.freeze([...new Set(data.toolFilter)]),
    commandLine: data.commandLine,
    enabled: data.enabled,
    interactive: data.interactive,
    advisory: data.advisory,
    timeoutSeconds: data.timeoutSeconds,
    conditions: Object.freeze(conditions),
    dependsOn: data.dependsOn,
    matchPattern: data.matchPattern,
    matchRegex,
    description: data.description,
  });
}

function describeRaw(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return `"${raw.name}"`;
  }
  return `#${index}`;
}

function assertUniqueNames(hooks: HookDefinition[]): void {
  const seen = new Set<string>();
  for (const hook of hooks) {
    if (seen.has(hook.name)) {
      throw new ValidationError(
        `Duplicate hook name "${hook.name}"`,
        ValidationErrorCode.DUPLICATE_NAME,
        hook.name,
      );
    }
    seen.add(hook.name);
  }
}

function assertToolFilterScope(hook: HookDefinition): void {
  if (hook.toolFilter.length > 0 && !SCOPED_EVENT_KINDS.has(hook.eventKind)) {
    throw new ValidationError(
      `Hook "${hook.name}" sets toolFilter on ${hook.eventKind}, which carries no tool name`,
      ValidationErrorCode.UNSCOPED_TOOL_FILTER,
      hook.name,
      'Remove toolFilter or bind the hook to ToolBefore, ToolAfter or SlashCommand.',
    );
  }
}

/**
 * Empty filters overlap everything
 */
function filtersOverlap(a: readonly string[], b: readonly string[]): boolean {
  if (a.length === 0 || b.length === 0) return true;
  return a.some((name) => b.includes(name));
}

function assertDependencies(hooks: HookDefinition[]): void {
  const byName = new Map(hooks.map((hook) => [hook.name, hook]));

  for (const hook of hooks) {
    if (hook.dependsOn === undefined) continue;

    const prerequisite = byName.get(hook.dependsOn);
    if (!prerequisite) {
      throw new ValidationError(
        `Hook "${hook.name}" depends on unknown hook "${hook.dependsOn}"`,
        ValidationErrorCode.DANGLING_DEPENDENCY,
        hook.name,
      );
    }

    if (prerequisite.eventKind !== hook.eventKind) {
      throw new ValidationError(
        `Hook "${hook.name}" (${hook.eventKind}) depends on "${prerequisite.name}" (${prerequisite.eventKind})`,
        ValidationErrorCode.INCOMPATIBLE_DEPENDENCY,
        hook.name,
        'A prerequisite must be bound to the same event kind.',
      );
    }

    if (SCOPED_EVENT_KINDS.has(hook.eventKind) && !filtersOverlap(hook.toolFilter, prerequisite.toolFilter)) {
      throw new ValidationError(
        `Hook "${hook.name}" and its prerequisite "${prerequisite.name}" share no tool`,
        ValidationErrorCode.INCOMPATIBLE_DEPENDENCY,
        hook.name,
      );
    }
  }
}

/**
 * Depth-first walk along dependsOn edges; reaching a node still on the stack is a cycle
 */
function assertAcyclic(hooks: HookDefinition[]): void {
  const edges = new Map<string, string[]>();
  for (const hook of hooks) {
    edges.set(hook.name, hook.dependsOn !== undefined ? [hook.dependsOn] : []);
  }

  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const path: string[] = [];

  const dfs = (node: string): void => {
    visited.add(node);
    recursionStack.add(node);
    path.push(node);

    for (const next of edges.get(node) ?? []) {
      if (recursionStack.has(next)) {
        const start = path.indexOf(next);
        throw new CyclicDependencyError([...path.slice(start), next]);
      }
      if (!visited.has(next)) {
        dfs(next);
      }
    }

    path.pop();
    recursionStack.delete(node);
  };

  for (const hook of hooks) {
    if (!visited.has(hook.name)) {
      dfs(hook.name);
    }
  }
}
