import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import {
  DependencyResolver,
  HookDispatcher,
  HookExecutor,
  HookRegistry,
  CyclicDependencyError,
  ResourceExhaustedError,
  formatFailure,
  type EventContext,
  type ExecutionResult,
  type HookDefinition,
  type HookDefinitionInput,
} from '../../../src/hooks/index.js';

function def(name: string, extra: Partial<HookDefinitionInput> = {}): HookDefinitionInput {
  return { name, eventKind: 'ToolBefore', commandLine: 'true', timeoutSeconds: 5, ...extra };
}

const names = (results: ExecutionResult[]) => results.map((result) => result.hookName);

describe('HookDispatcher', () => {
  let workDir: string;

  const event = (overrides: Partial<EventContext> = {}): EventContext => ({
    sessionId: 'sess-1',
    workingDirectory: workDir,
    ...overrides,
  });

  beforeAll(async () => {
    workDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'hook-dispatcher-')));
  });

  afterAll(async () => {
    await fs.remove(workDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('blocking', () => {
    const registry = HookRegistry.load([
      def('no-force-push', {
        toolFilter: ['bash'],
        matchRegex: '^git push.*--force',
        commandLine: 'echo "force push is not allowed" >&2; exit 1',
      }),
    ]);

    it('should block a force push', async () => {
      const dispatcher = new HookDispatcher(registry);
      const outcome = await dispatcher.toolBefore('bash', event({ commandText: 'git push --force origin main' }));

      expect(outcome.verdict).toBe('Block');
      expect(outcome.cancelled).toBe(false);
      expect(names(outcome.results)).toEqual(['no-force-push']);
      expect(outcome.results[0]?.outcome).toBe('Aborted');
      expect(outcome.results[0]?.exitCode).toBe(1);
      expect(outcome.blockedBy?.hookName).toBe('no-force-push');
      expect(outcome.blockedBy && formatFailure(outcome.blockedBy)).toBe(
        'Hook "no-force-push" exited with code 1 (Aborted)\nstderr: force push is not allowed',
      );
    });

    it('should reach the same verdict for the same event', async () => {
      const dispatcher = new HookDispatcher(registry);
      const input = event({ commandText: 'git push --force origin main' });

      const first = await dispatcher.toolBefore('bash', input);
      const second = await dispatcher.toolBefore('bash', input);

      expect(second.verdict).toBe(first.verdict);
      expect(second.results.map((result) => [result.hookName, result.outcome, result.exitCode])).toEqual(
        first.results.map((result) => [result.hookName, result.outcome, result.exitCode]),
      );
    });

    it('should let other commands through without running the hook', async () => {
      const dispatcher = new HookDispatcher(registry);
      const outcome = await dispatcher.toolBefore('bash', event({ commandText: 'git status' }));

      expect(outcome.results).toEqual([]);
      expect(outcome.verdict).toBe('Proceed');
      expect(outcome.blockedBy).toBeUndefined();
    });

    it('should ignore hooks filtered to other tools', async () => {
      const dispatcher = new HookDispatcher(registry);
      const outcome = await dispatcher.toolBefore('Edit', event({ commandText: 'git push --force' }));
      expect(outcome.results).toEqual([]);
    });

    it('should stop at the first blocking failure', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('first', { commandLine: 'exit 1' }), def('second')]),
      );
      const outcome = await dispatcher.toolBefore('bash', event());

      expect(names(outcome.results)).toEqual(['first']);
      expect(outcome.verdict).toBe('Block');
    });

    it('should keep going past an advisory failure', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('first', { commandLine: 'exit 1', advisory: true }), def('second')]),
      );
      const outcome = await dispatcher.toolBefore('bash', event());

      expect(outcome.results.map((result) => result.outcome)).toEqual(['Warning', 'Success']);
      expect(outcome.verdict).toBe('Proceed');
    });

    it('should not block on a skipped hook', async () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([def('not-mine', { commandLine: 'exit 2' })]));
      const outcome = await dispatcher.toolBefore('bash', event());

      expect(outcome.results[0]?.outcome).toBe('Skipped');
      expect(outcome.verdict).toBe('Proceed');
    });

    it('should block on a timed-out before-hook', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('slow', { commandLine: 'sleep 10', timeoutSeconds: 1 })]),
      );
      const outcome = await dispatcher.toolBefore('bash', event());

      expect(outcome.verdict).toBe('Block');
      expect(outcome.blockedBy?.outcome).toBe('TimedOut');
      expect(outcome.totalDurationMillis).toBeLessThan(3000);
    });

    it('should veto a slash command', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('deploy-guard', { eventKind: 'SlashCommand', toolFilter: ['/deploy'], commandLine: 'exit 1' }),
        ]),
      );

      const vetoed = await dispatcher.slashCommand('/deploy', event());
      expect(vetoed.eventKind).toBe('SlashCommand');
      expect(vetoed.verdict).toBe('Block');

      const allowed = await dispatcher.slashCommand('/help', event());
      expect(allowed.results).toEqual([]);
      expect(allowed.verdict).toBe('Proceed');
    });
  });

  describe('non-blocking events', () => {
    it('should run every after-hook and report failures as warnings', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('broken', { eventKind: 'ToolAfter', commandLine: 'exit 1' }),
          def('fine', { eventKind: 'ToolAfter' }),
        ]),
      );
      const outcome = await dispatcher.toolAfter('Write', event());

      expect(outcome.results.map((result) => result.outcome)).toEqual(['Warning', 'Success']);
      expect(outcome.verdict).toBe('Proceed');
    });

    it('should dispatch lifecycle events without a tool name', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('greet', { eventKind: 'SessionStart', commandLine: 'printf "[%s]" "$TOOL_NAME"' })]),
      );
      const outcome = await dispatcher.sessionStart(event());

      expect(outcome.results[0]?.stdoutTail).toBe('[]');
      expect(outcome.verdict).toBe('Proceed');
    });

    it('should route each lifecycle method to its event', async () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([]));

      expect((await dispatcher.sessionEnd(event())).eventKind).toBe('SessionEnd');
      expect((await dispatcher.agentCreated(event())).eventKind).toBe('AgentCreated');
      expect((await dispatcher.agentDestroyed(event())).eventKind).toBe('AgentDestroyed');
    });
  });

  describe('dependencies', () => {
    it('should run prerequisites first', async () => {
      const log = path.join(workDir, 'order.log');
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('format', { dependsOn: 'lint', commandLine: `echo format >> "${log}"` }),
          def('lint', { commandLine: `echo lint >> "${log}"` }),
        ]),
      );
      const outcome = await dispatcher.toolBefore('Edit', event());

      expect(names(outcome.results)).toEqual(['lint', 'format']);
      expect(await fs.readFile(log, 'utf-8')).toBe('lint\nformat\n');
    });

    it('should run a dependent whose prerequisite did not match', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('lint', { matchPattern: 'npm' }), def('format', { dependsOn: 'lint' })]),
      );
      const outcome = await dispatcher.toolBefore('bash', event({ commandText: 'ls' }));

      expect(names(outcome.results)).toEqual(['format']);
      expect(outcome.results[0]?.outcome).toBe('Success');
    });

    it('should not run dependents of a timed-out prerequisite', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('slow', { eventKind: 'ToolAfter', commandLine: 'sleep 10', timeoutSeconds: 1 }),
          def('after-slow', { eventKind: 'ToolAfter', dependsOn: 'slow' }),
          def('last', { eventKind: 'ToolAfter', dependsOn: 'after-slow' }),
          def('unrelated', { eventKind: 'ToolAfter' }),
        ]),
      );
      const outcome = await dispatcher.toolAfter('bash', event());

      expect(outcome.results.map((result) => [result.hookName, result.outcome, result.detail])).toEqual([
        ['slow', 'TimedOut', 'timed out after 1s'],
        ['after-slow', 'Skipped', 'prerequisite slow timed out'],
        ['last', 'Skipped', 'prerequisite after-slow was not run'],
        ['unrelated', 'Success', undefined],
      ]);
      expect(outcome.verdict).toBe('Proceed');
    });

    it('should abort the dispatch on a cycle without running anything', async () => {
      vi.spyOn(DependencyResolver.prototype, 'resolve').mockImplementation(() => {
        throw new CyclicDependencyError(['a', 'b', 'a']);
      });
      const dispatcher = new HookDispatcher(HookRegistry.load([def('a'), def('b')]));

      const before = await dispatcher.toolBefore('bash', event());
      expect(before.results).toEqual([]);
      expect(before.error).toBe('Cyclic hook dependency: a -> b -> a');
      expect(before.verdict).toBe('Block');

      const dispatcherAfter = new HookDispatcher(
        HookRegistry.load([def('c', { eventKind: 'ToolAfter' })]),
      );
      const after = await dispatcherAfter.toolAfter('bash', event());
      expect(after.verdict).toBe('Proceed');
    });
  });

  describe('environment', () => {
    it('should pass event details to every hook', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('env-hook', {
            commandLine:
              'printf "%s|%s|%s|%s|%s" "$TOOL_NAME" "$FILE_PATH" "$CLAUDE_SESSION_ID" "$HOOK_NAME" "$BASH_COMMAND"',
          }),
        ]),
      );
      const outcome = await dispatcher.toolBefore('bash', event({ filePath: 'a.ts', commandText: 'ls' }));

      expect(outcome.results[0]?.stdoutTail).toBe('bash|a.ts|sess-1|env-hook|ls');
    });

    it('should build the context from the event', () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([]));
      const context = dispatcher.buildContext('SessionEnd', null, event({ environment: { STAGE: 'test' } }));

      expect(context.environmentOverrides).toEqual({
        STAGE: 'test',
        TOOL_NAME: '',
        FILE_PATH: '',
        CLAUDE_SESSION_ID: 'sess-1',
      });
      expect(context.filePath).toBeNull();
      expect(context.commandText).toBeNull();
    });

    it('should not let host variables replace the event variables', () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([]));
      const context = dispatcher.buildContext('ToolBefore', 'bash', event({ environment: { TOOL_NAME: 'other' } }));
      expect(context.environmentOverrides.TOOL_NAME).toBe('bash');
    });

    it('should apply the output tail setting', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('chatty', { commandLine: 'printf "0123456789abcdefghijklmnopqrstuvwxyz"' })]),
        { outputTailBytes: 16 },
      );
      const outcome = await dispatcher.toolBefore('bash', event());
      expect(outcome.results[0]?.stdoutTail).toBe('klmnopqrstuvwxyz');
    });
  });

  describe('cancellation', () => {
    it('should block a cancelled before-event', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('slow', { commandLine: 'sleep 10' }), def('next')]),
      );
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);

      const outcome = await dispatcher.toolBefore('bash', event(), { signal: controller.signal });

      expect(outcome.cancelled).toBe(true);
      expect(outcome.verdict).toBe('Block');
      expect(names(outcome.results)).toEqual(['slow']);
      expect(outcome.results[0]?.detail).toBe('cancelled');
    });

    it('should proceed after a cancelled lifecycle event', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([
          def('slow', { eventKind: 'SessionEnd', commandLine: 'sleep 10' }),
          def('next', { eventKind: 'SessionEnd' }),
        ]),
      );
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);

      const outcome = await dispatcher.sessionEnd(event(), { signal: controller.signal });

      expect(outcome.cancelled).toBe(true);
      expect(outcome.verdict).toBe('Proceed');
      expect(names(outcome.results)).toEqual(['slow']);
    });

    it('should run nothing when the signal is already aborted', async () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([def('a')]));
      const controller = new AbortController();
      controller.abort();

      const outcome = await dispatcher.toolBefore('bash', event(), { signal: controller.signal });

      expect(outcome.results).toEqual([]);
      expect(outcome.cancelled).toBe(true);
      expect(outcome.verdict).toBe('Block');
    });

    it('should kill running hooks on shutdown', async () => {
      const dispatcher = new HookDispatcher(
        HookRegistry.load([def('slow', { eventKind: 'ToolAfter', commandLine: 'sleep 10' })]),
      );

      const pending = dispatcher.toolAfter('bash', event());
      await new Promise((resolve) => setTimeout(resolve, 100));
      expect(dispatcher.activeDispatches).toBe(1);

      await dispatcher.shutdown();
      const outcome = await pending;

      expect(dispatcher.activeDispatches).toBe(0);
      expect(outcome.cancelled).toBe(true);
      expect(outcome.totalDurationMillis).toBeLessThan(3000);
    });
  });

  describe('after shutdown', () => {
    it('should not run hooks of later dispatches', async () => {
      const marker = path.join(workDir, 'after-shutdown');
      const dispatcher = new HookDispatcher(HookRegistry.load([def('late', { commandLine: `touch "${marker}"` })]));

      await dispatcher.shutdown();
      const outcome = await dispatcher.toolBefore('bash', event());

      expect(outcome.cancelled).toBe(true);
      expect(outcome.results).toEqual([]);
      expect(outcome.verdict).toBe('Block');
      expect(await fs.pathExists(marker)).toBe(false);
    });
  });

  describe('resource exhaustion', () => {
    class ExhaustedExecutor extends HookExecutor {
      override async run(hook: HookDefinition): Promise<ExecutionResult> {
        throw new ResourceExhaustedError(`Cannot start hook ${hook.name}: spawn EAGAIN`, hook.name, 'EAGAIN');
      }
    }

    it('should propagate to the host', async () => {
      const dispatcher = new HookDispatcher(HookRegistry.load([def('a')]), { executor: new ExhaustedExecutor() });

      await expect(dispatcher.toolBefore('bash', event())).rejects.toBeInstanceOf(ResourceExhaustedError);
      expect(dispatcher.activeDispatches).toBe(0);
    });
  });

  describe('formatFailure()', () => {
    const base: ExecutionResult = {
      hookName: 'h',
      exitCode: null,
      timedOut: false,
      durationMillis: 5,
      stdoutTail: '',
      stderrTail: '',
      outcome: 'Aborted',
    };

    it('should describe a timeout', () => {
      expect(
        formatFailure({ ...base, timedOut: true, outcome: 'TimedOut', detail: 'timed out after 3s', stdoutTail: 'partial\n' }),
      ).toBe('Hook "h" timed out after 3s (TimedOut)\nstdout: partial');
    });

    it('should fall back to the detail without an exit code', () => {
      expect(formatFailure({ ...base, detail: 'spawn failed: spawn /bin/sh ENOENT' })).toBe(
        'Hook "h" spawn failed: spawn /bin/sh ENOENT (Aborted)',
      );
      expect(formatFailure(base)).toBe('Hook "h" failed (Aborted)');
    });
  });
});
