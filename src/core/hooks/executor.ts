/**
 * HookExecutor
 *
 * Runs one hook command as a supervised child process.
 *
 * Protocol:
 * - Input: environment variables (TOOL_NAME, FILE_PATH, BASH_COMMAND, CLAUDE_SESSION_ID, HOOK_NAME)
 *   and a JSON description of the event on stdin (non-interactive hooks only)
 * - Output: stdout/stderr, kept as a bounded tail
 * - Exit codes: 0=success, 2=skipped, other=failure (blocks before-events unless advisory)
 *
 * Non-interactive children lead their own process group; the group is killed when the hook ends,
 * so nothing they started outlives run(). Interactive children stay in the terminal's foreground
 * group and only the shell itself is killed.
 */

import { spawn } from 'child_process';
import type { ChildProcess, StdioOptions } from 'child_process';
import type { ExecutionContext, ExecutionOutcome, ExecutionResult, HookDefinition } from '../../types/index.js';
import { BLOCKING_EVENT_KINDS, DEFAULT_ENGINE_SETTINGS } from '../../types/index.js';
import { ResourceExhaustedError } from '../errors/index.js';
import { logger, TailBuffer } from '../../utils/index.js';

export interface HookExecutorOptions {
  /** Bytes of stdout/stderr kept per stream (default: 64 KiB) */
  outputTailBytes?: number;
  /** Wait for streams to close after a kill before giving up on them (default: 2000) */
  killGraceMillis?: number;
}

export interface RunOptions {
  /** Aborting kills the child and reports the hook as Aborted */
  signal?: AbortSignal;
}

const SKIP_EXIT_CODE = 2;
const EXHAUSTION_CODES = new Set(['EAGAIN', 'ENOMEM', 'EMFILE', 'ENFILE']);

export class HookExecutor {
  private readonly outputTailBytes: number;
  private readonly killGraceMillis: number;

  constructor(options: HookExecutorOptions = {}) {
    this.outputTailBytes = options.outputTailBytes ?? DEFAULT_ENGINE_SETTINGS.outputTailBytes;
    this.killGraceMillis = options.killGraceMillis ?? DEFAULT_ENGINE_SETTINGS.killGraceMillis;
  }

  /**
   * Inherited environment overlaid by the context's overrides and the hook's name
   */
  buildEnvironment(hook: HookDefinition, context: ExecutionContext): NodeJS.ProcessEnv {
    return {
      ...process.env,
      ...context.environmentOverrides,
      HOOK_NAME: hook.name,
    };
  }

  /**
   * Map an exit code to an outcome
   */
  classifyExit(hook: HookDefinition, exitCode: number): ExecutionOutcome {
    if (exitCode === 0) return 'Success';
    if (exitCode === SKIP_EXIT_CODE) return 'Skipped';
    return failureOutcome(hook);
  }

  /**
   * Execute a hook and wait for it (and its process group) to finish
   * @throws ResourceExhaustedError if the host cannot start a process at all
   */
  async run(hook: HookDefinition, context: ExecutionContext, options: RunOptions = {}): Promise<ExecutionResult> {
    const startTime = Date.now();
    const { signal } = options;

    if (signal?.aborted) {
      return {
        hookName: hook.name,
        exitCode: null,
        timedOut: false,
        durationMillis: 0,
        stdoutTail: '',
        stderrTail: '',
        outcome: 'Aborted',
        detail: 'cancelled',
      };
    }

    logger.debug(`Running hook ${hook.name}: ${hook.commandLine}`);

    return new Promise<ExecutionResult>((resolve, reject) => {
      const isWindows = process.platform === 'win32';
      const shell = isWindows ? 'cmd.exe' : '/bin/sh';
      const shellArgs = isWindows ? ['/c', hook.commandLine] : ['-c', hook.commandLine];
      const detached = !hook.interactive && !isWindows;
      const stdio: StdioOptions = hook.interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'];

      let child: ChildProcess;
      try {
        child = spawn(shell, shellArgs, {
          cwd: context.workingDirectory,
          env: this.buildEnvironment(hook, context),
          stdio,
          detached,
        });
      } catch (error) {
        // Some errno values are thrown synchronously instead of emitted
        const spawnError = error instanceof Error ? error : new Error(String(error));
        const code = errnoCode(spawnError);
        if (code !== undefined && EXHAUSTION_CODES.has(code)) {
          reject(exhausted(hook, spawnError, code));
        } else {
          resolve(spawnFailure(hook, spawnError, startTime));
        }
        return;
      }

      const stdout = new TailBuffer(this.outputTailBytes);
      const stderr = new TailBuffer(this.outputTailBytes);
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        clearTimeout(watchdog);
        if (graceTimer) clearTimeout(graceTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = (exitCode: number | null, spawnError?: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        // Background jobs the shell left behind die with it
        if (detached) terminate(child, true);

        let outcome: ExecutionOutcome;
        let detail: string | undefined;
        if (cancelled) {
          outcome = 'Aborted';
          detail = 'cancelled';
        } else if (timedOut) {
          outcome = 'TimedOut';
          detail = `timed out after ${hook.timeoutSeconds}s`;
        } else if (spawnError) {
          outcome = failureOutcome(hook);
          detail = `spawn failed: ${spawnError.message}`;
        } else if (exitCode === null) {
          outcome = failureOutcome(hook);
          detail = 'terminated by signal';
        } else {
          outcome = this.classifyExit(hook, exitCode);
        }

        resolve({
          hookName: hook.name,
          exitCode: timedOut || cancelled ? null : exitCode,
          timedOut,
          durationMillis: Date.now() - startTime,
          stdoutTail: stdout.toString(),
          stderrTail: stderr.toString(),
          outcome,
          detail,
        });
      };

      const kill = () => {
        if (graceTimer !== undefined) return;
        terminate(child, detached);
        // A grandchild that left the group can keep the pipes open
        graceTimer = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          finish(null);
        }, this.killGraceMillis);
      };

      const watchdog = setTimeout(() => {
        timedOut = true;
        logger.debug(`Hook ${hook.name} exceeded ${hook.timeoutSeconds}s, killing`);
        kill();
      }, hook.timeoutSeconds * 1000);

      const onAbort = () => {
        cancelled = true;
        kill();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (data: Buffer) => stdout.push(data));
      child.stderr?.on('data', (data: Buffer) => stderr.push(data));

      child.on('error', (error) => {
        if (settled) return;
        const code = errnoCode(error);
        if (code !== undefined && EXHAUSTION_CODES.has(code)) {
          settled = true;
          cleanup();
          reject(exhausted(hook, error, code));
          return;
        }
        finish(null, error);
      });

      child.on('close', (code) => {
        finish(code);
      });

      if (child.stdin) {
        // Hooks that never read stdin close it early
        child.stdin.on('error', (error) => {
          logger.debug(`Hook ${hook.name} stdin: ${error.message}`);
        });
        child.stdin.end(JSON.stringify(toStdinPayload(hook, context)));
      }
    });
  }
}

function failureOutcome(hook: HookDefinition): ExecutionOutcome {
  return BLOCKING_EVENT_KINDS.has(hook.eventKind) && !hook.advisory ? 'Aborted' : 'Warning';
}

function exhausted(hook: HookDefinition, error: Error, code: string): ResourceExhaustedError {
  return new ResourceExhaustedError(`Cannot start hook ${hook.name}: ${error.message}`, hook.name, code, {
    cause: error,
  });
}

function spawnFailure(hook: HookDefinition, error: Error, startTime: number): ExecutionResult {
  return {
    hookName: hook.name,
    exitCode: null,
    timedOut: false,
    durationMillis: Date.now() - startTime,
    stdoutTail: '',
    stderrTail: '',
    outcome: failureOutcome(hook),
    detail: `spawn failed: ${error.message}`,
  };
}

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function terminate(child: ChildProcess, group: boolean): void {
  if (child.pid === undefined) return;
  try {
    if (group) {
      process.kill(-child.pid, 'SIGKILL');
    } else {
      child.kill('SIGKILL');
    }
  } catch (error) {
    if (error instanceof Error && errnoCode(error) === 'ESRCH') return;
    logger.debug(`Kill of pid ${child.pid} failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function toStdinPayload(hook: HookDefinition, context: ExecutionContext): Record<string, unknown> {
  return {
    hook_name: hook.name,
    event_kind: context.eventKind,
    tool_name: context.toolName,
    file_path: context.filePath,
    command_text: context.commandText,
    session_id: context.sessionId,
    cwd: context.workingDirectory,
  };
}
