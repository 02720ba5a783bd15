/**
 * Hook engine building blocks: registry, matching, ordering, execution.
 */

export { HookRegistry } from './registry.js';
export type { RegistryLoadResult } from './registry.js';
export { HookMatcher } from './matcher.js';
export { DependencyResolver } from './resolver.js';
export type { OrderOf } from './resolver.js';
export { HookExecutor } from './executor.js';
export type { HookExecutorOptions, RunOptions } from './executor.js';
