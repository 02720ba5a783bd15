/**
 * Hook Dispatcher
 *
 * Entry point for the host: given an event, runs the applicable hooks in dependency order
 * and returns their results plus a Proceed/Block verdict.
 */

import type {
  DispatchOutcome,
  EventContext,
  ExecutionContext,
  ExecutionResult,
  HookDefinition,
  HookEventKind,
} from '../types/index.js';
import { BLOCKING_EVENT_KINDS } from '../types/index.js';
import type { HookRegistry } from '../core/hooks/registry.js';
import { HookMatcher } from '../core/hooks/matcher.js';
import { DependencyResolver } from '../core/hooks/resolver.js';
import { HookExecutor } from '../core/hooks/executor.js';
import type { HookExecutorOptions } from '../core/hooks/executor.js';
import { CyclicDependencyError } from '../core/errors/index.js';
import { logger } from '../utils/index.js';

export interface DispatchOptions {
  /** Aborting kills running hooks and stops the dispatch */
  signal?: AbortSignal;
}

export interface HookDispatcherOptions extends HookExecutorOptions {
  /** Replace the process runner (tests, custom sandboxes) */
  executor?: HookExecutor;
}

export class HookDispatcher {
  private readonly matcher = new HookMatcher();
  private readonly resolver = new DependencyResolver();
  private readonly executor: HookExecutor;
  private readonly inFlight = new Map<AbortController, Promise<DispatchOutcome>>();
  private closed = false;

  constructor(
    private readonly registry: HookRegistry,
    options: HookDispatcherOptions = {},
  ) {
    this.executor =
      options.executor ??
      new HookExecutor({
        outputTailBytes: options.outputTailBytes,
        killGraceMillis: options.killGraceMillis,
      });
  }

  getRegistry(): HookRegistry {
    return this.registry;
  }

  /**
   * Derive the per-dispatch context and the variables every hook receives
   */
  buildContext(eventKind: HookEventKind, toolName: string | null, event: EventContext): ExecutionContext {
    const filePath = event.filePath ?? null;
    const commandText = event.commandText ?? null;

    const environmentOverrides: Record<string, string> = {
      ...event.environment,
      TOOL_NAME: toolName ?? '',
      FILE_PATH: filePath ?? '',
      CLAUDE_SESSION_ID: event.sessionId,
    };
    if (commandText !== null) {
      environmentOverrides.BASH_COMMAND = commandText;
    }

    return {
      eventKind,
      toolName,
      filePath,
      commandText,
      sessionId: event.sessionId,
      workingDirectory: event.workingDirectory,
      environmentOverrides,
    };
  }

  /**
   * Run every hook bound to an event
   * @throws ResourceExhaustedError when no process can be started at all
   */
  async dispatch(
    eventKind: HookEventKind,
    toolName: string | null | undefined,
    event: EventContext,
    options: DispatchOptions = {},
  ): Promise<DispatchOutcome> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (this.closed || options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forward, { once: true });
    }

    const pending = this.runDispatch(eventKind, toolName ?? null, event, controller.signal);
    this.inFlight.set(controller, pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(controller);
      options.signal?.removeEventListener('abort', forward);
    }
  }

  /**
   * Cancel every dispatch in flight and wait until their children are gone.
   * Dispatches started afterwards return cancelled without running any hook.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    const pending = [...this.inFlight.entries()];
    for (const [controller] of pending) {
      controller.abort();
    }
    await Promise.allSettled(pending.map(([, promise]) => promise));
  }

  get activeDispatches(): number {
    return this.inFlight.size;
  }

  private async runDispatch(
    eventKind: HookEventKind,
    toolName: string | null,
    event: EventContext,
    signal: AbortSignal,
  ): Promise<DispatchOutcome> {
    const startTime = Date.now();
    const blocking = BLOCKING_EVENT_KINDS.has(eventKind);
    const context = this.buildContext(eventKind, toolName, event);

    const candidates = this.registry.lookup(eventKind, toolName);
    const matched = await this.matcher.filter(candidates, context);
    logger.debug(`${eventKind}${toolName ? `/${toolName}` : ''}: ${matched.length} of ${candidates.length} hooks matched`);

    let ordered: HookDefinition[];
    try {
      ordered = this.resolver.resolve(matched, (name) => this.registry.indexOf(name));
    } catch (error) {
      if (error instanceof CyclicDependencyError) {
        logger.error(`${eventKind}: ${error.message}; no hooks executed`);
        return {
          eventKind,
          results: [],
          verdict: blocking ? 'Block' : 'Proceed',
          cancelled: false,
          error: error.message,
          totalDurationMillis: Date.now() - startTime,
        };
      }
      throw error;
    }

    const results: ExecutionResult[] = [];
    // Hooks whose dependents must not run, with the reason
    const failed = new Map<string, string>();
    let blockedBy: ExecutionResult | undefined;

    for (const hook of ordered) {
      if (signal.aborted) break;

      const prerequisiteFailure = hook.dependsOn !== undefined ? failed.get(hook.dependsOn) : undefined;
      if (prerequisiteFailure !== undefined) {
        results.push(notRun(hook, `prerequisite ${hook.dependsOn} ${prerequisiteFailure}`));
        failed.set(hook.name, 'was not run');
        continue;
      }

      const result = await this.executor.run(hook, context, { signal });
      results.push(result);
      this.report(hook, result, blocking);

      if (result.outcome === 'TimedOut') failed.set(hook.name, 'timed out');
      if (result.outcome === 'Aborted') failed.set(hook.name, 'was aborted');

      if (blocking && blocks(hook, result)) {
        blockedBy = result;
        break;
      }
    }

    const cancelled = signal.aborted;
    return {
      eventKind,
      results,
      verdict: blockedBy !== undefined || (cancelled && blocking) ? 'Block' : 'Proceed',
      blockedBy,
      cancelled,
      totalDurationMillis: Date.now() - startTime,
    };
  }

  private report(hook: HookDefinition, result: ExecutionResult, blocking: boolean): void {
    if (result.outcome === 'Success' || result.outcome === 'Skipped') {
      logger.debug(`Hook ${hook.name}: ${result.outcome} in ${result.durationMillis}ms`);
    } else if (blocking && blocks(hook, result)) {
      logger.error(formatFailure(result));
    } else {
      logger.warn(formatFailure(result));
    }
  }

  // ============================================
  // CONVENIENCE METHODS FOR SPECIFIC EVENTS
  // ============================================

  async toolBefore(toolName: string, event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('ToolBefore', toolName, event, options);
  }

  async toolAfter(toolName: string, event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('ToolAfter', toolName, event, options);
  }

  async sessionStart(event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('SessionStart', null, event, options);
  }

  async sessionEnd(event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('SessionEnd', null, event, options);
  }

  async agentCreated(event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('AgentCreated', null, event, options);
  }

  async agentDestroyed(event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('AgentDestroyed', null, event, options);
  }

  /**
   * Validation hooks for a slash command; the command name is matched against toolFilter
   */
  async slashCommand(commandName: string, event: EventContext, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatch('SlashCommand', commandName, event, options);
  }
}

function blocks(hook: HookDefinition, result: ExecutionResult): boolean {
  return result.outcome === 'Aborted' || (result.outcome === 'TimedOut' && !hook.advisory);
}

function notRun(hook: HookDefinition, detail: string): ExecutionResult {
  return {
    hookName: hook.name,
    exitCode: null,
    timedOut: false,
    durationMillis: 0,
    stdoutTail: '',
    stderrTail: '',
    outcome: 'Skipped',
    detail,
  };
}

/**
 * Diagnostic text for a failed hook: name, exit status and captured output
 */
export function formatFailure(result: ExecutionResult): string {
  let status: string;
  if (result.timedOut) {
    status = result.detail ?? 'timed out';
  } else if (result.exitCode !== null) {
    status = `exited with code ${result.exitCode}`;
  } else {
    status = result.detail ?? 'failed';
  }

  const lines = [`Hook "${result.hookName}" ${status} (${result.outcome})`];
  const stderr = result.stderrTail.trim();
  const stdout = result.stdoutTail.trim();
  if (stderr) lines.push(`stderr: ${stderr}`);
  if (stdout) lines.push(`stdout: ${stdout}`);
  return lines.join('\n');
}
