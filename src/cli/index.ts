import path from 'path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { HookEventKind } from '../types/index.js';
import { HOOK_EVENT_KINDS } from '../types/index.js';
import { loadRegistry } from '../core/config/loader.js';
import { ConfigError, ResourceExhaustedError, ValidationError } from '../core/errors/index.js';
import { HookDispatcher } from '../hooks/dispatcher.js';
import { generateSessionId, setDebugLogging } from '../utils/index.js';
import { renderError, renderHookList, renderOutcome, renderSummary } from './renderer.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/** Exit code returned when a dispatch is blocked */
export const BLOCK_EXIT_CODE = 2;

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith('\n') ? text : `${text}\n`),
};

export function parseEventKind(value: string): HookEventKind {
  const kind = HOOK_EVENT_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${HOOK_EVENT_KINDS.join(', ')}`);
  }
  return kind;
}

interface CommonOptions {
  config?: string;
  cwd?: string;
  debug?: boolean;
}

interface ListOptions extends CommonOptions {
  event?: HookEventKind;
  tool?: string;
}

interface DispatchCommandOptions extends CommonOptions {
  event: HookEventKind;
  tool?: string;
  command?: string;
  file?: string;
  session?: string;
  json?: boolean;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name('hookshot')
    .description('Run event hooks for a host application')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  const withCommonOptions = (command: Command): Command =>
    command
      .option('-c, --config <path>', 'Read hooks from this file only')
      .option('--cwd <dir>', 'Project directory (default: current directory)')
      .option('--debug', 'Log hook matching and execution');

  withCommonOptions(program.command('validate').description('Check the hook configuration')).action(
    async (options: CommonOptions) => {
      const { registry, config } = await load(options);
      io.stdout(renderSummary(registry, config.sources));
    },
  );

  withCommonOptions(program.command('list').description('List registered hooks'))
    .addOption(new Option('-e, --event <kind>', 'Only hooks for this event').argParser(parseEventKind))
    .option('-t, --tool <name>', 'Only hooks that apply to this tool')
    .action(async (options: ListOptions) => {
      const { registry } = await load(options);
      const hooks = options.event ? registry.lookup(options.event, options.tool) : registry.all();
      io.stdout(renderHookList(hooks));
    });

  withCommonOptions(program.command('dispatch').description('Dispatch an event and run its hooks'))
    .addOption(
      new Option('-e, --event <kind>', 'Event kind').argParser(parseEventKind).makeOptionMandatory(),
    )
    .option('-t, --tool <name>', 'Tool (or slash command) name')
    .option('--command <text>', 'Command text the host is about to run')
    .option('-f, --file <path>', 'File the event concerns')
    .option('-s, --session <id>', 'Session ID (default: random)')
    .option('--json', 'Print the outcome as JSON')
    .action(async (options: DispatchCommandOptions) => {
      const { registry, config } = await load(options);
      const dispatcher = new HookDispatcher(registry, config.settings);

      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        const outcome = await dispatcher.dispatch(
          options.event,
          options.tool,
          {
            sessionId: options.session ?? generateSessionId(),
            workingDirectory: resolveCwd(options),
            filePath: options.file,
            commandText: options.command,
          },
          { signal: controller.signal },
        );
        io.stdout(options.json ? JSON.stringify(outcome, null, 2) : renderOutcome(outcome));
        exitCode = outcome.verdict === 'Block' ? BLOCK_EXIT_CODE : 0;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (
      error instanceof ConfigError ||
      error instanceof ValidationError ||
      error instanceof ResourceExhaustedError
    ) {
      io.stderr(renderError(error));
      return 1;
    }
    throw error;
  }

  return exitCode;
}

function resolveCwd(options: CommonOptions): string {
  return path.resolve(options.cwd ?? process.cwd());
}

async function load(options: CommonOptions) {
  const loaded = await loadRegistry({ cwd: resolveCwd(options), configPath: options.config });
  setDebugLogging(Boolean(options.debug) || loaded.config.settings.debug);
  return loaded;
}
