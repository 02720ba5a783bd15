/**
 * hookshot
 *
 * Event hook engine: registers hooks against host events, filters them by context,
 * orders them by their dependencies and runs each one as a time-bounded child process.
 *
 * Event Kinds:
 * - ToolBefore: before a tool runs; a failing hook blocks the tool
 * - ToolAfter: after a tool ran; failures are warnings
 * - SessionStart / SessionEnd: session lifecycle
 * - AgentCreated / AgentDestroyed: agent lifecycle
 * - SlashCommand: before a slash command; a failing hook vetoes it
 *
 * Exit codes seen by a hook author: 0 success, 2 "does not apply", anything else failure.
 *
 * Usage:
 * ```typescript
 * import { HookRegistry, HookDispatcher, formatFailure } from 'hookshot';
 *
 * const registry = HookRegistry.load([
 *   {
 *     name: 'no-force-push',
 *     eventKind: 'ToolBefore',
 *     toolFilter: ['bash'],
 *     matchRegex: '^git push.*--force',
 *     commandLine: 'echo "force push is not allowed" >&2; exit 1',
 *   },
 * ]);
 *
 * const dispatcher = new HookDispatcher(registry);
 * const outcome = await dispatcher.toolBefore('bash', {
 *   sessionId,
 *   workingDirectory: process.cwd(),
 *   commandText: 'git push --force origin main',
 * });
 * if (outcome.blockedBy) {
 *   console.log(formatFailure(outcome.blockedBy));
 * }
 * ```
 */

export * from '../types/index.js';
export * from '../core/errors/index.js';
export * from '../core/hooks/index.js';
export { HookDispatcher, formatFailure } from './dispatcher.js';
export type { DispatchOptions, HookDispatcherOptions } from './dispatcher.js';
export { loadHookConfig, loadRegistry, mergeHooksFiles, readHooksFile } from '../core/config/loader.js';
export type { HookConfig, LoadConfigOptions } from '../core/config/types.js';
export { HookDefinitionSchema, ConditionSchema, HooksFileSchema } from '../core/config/schema.js';
export type { HookDefinitionInput, HooksFile } from '../core/config/schema.js';
export { logger, setDebugLogging, TailBuffer } from '../utils/index.js';
