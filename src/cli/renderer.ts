import chalk from 'chalk';
import type { DispatchOutcome, ExecutionOutcome, ExecutionResult, HookDefinition } from '../types/index.js';
import { formatFailure } from '../hooks/dispatcher.js';
import type { HookRegistry } from '../core/hooks/registry.js';
import { ConfigError, ValidationError } from '../core/errors/index.js';

function outcomeIcon(outcome: ExecutionOutcome): string {
  switch (outcome) {
    case 'Success':
      return chalk.green('✔');
    case 'Warning':
      return chalk.yellow('⚠');
    case 'Skipped':
      return chalk.gray('○');
    case 'Aborted':
      return chalk.red('✖');
    case 'TimedOut':
      return chalk.red('⏱');
  }
}

export function renderResult(result: ExecutionResult): string {
  const detail = result.detail ? chalk.dim(` - ${result.detail}`) : '';
  return `${outcomeIcon(result.outcome)} ${result.hookName} ${result.outcome} (${result.durationMillis}ms)${detail}`;
}

export function renderOutcome(outcome: DispatchOutcome): string {
  const lines: string[] = [];

  if (outcome.results.length === 0 && !outcome.error) {
    lines.push(chalk.dim('No hooks matched.'));
  }
  for (const result of outcome.results) {
    lines.push(renderResult(result));
  }

  if (outcome.error) {
    lines.push(chalk.red(`Error: ${outcome.error}`));
  }
  if (outcome.blockedBy) {
    lines.push('', chalk.red(formatFailure(outcome.blockedBy)));
  }
  if (outcome.cancelled) {
    lines.push(chalk.yellow('Dispatch cancelled.'));
  }

  lines.push(
    outcome.verdict === 'Block' ? chalk.red.bold('Verdict: Block') : chalk.green.bold('Verdict: Proceed'),
  );
  return lines.join('\n');
}

export function renderHook(hook: HookDefinition): string {
  let line = `${chalk.bold(hook.name)} ${hook.eventKind}`;
  if (hook.toolFilter.length > 0) line += ` [${hook.toolFilter.join(', ')}]`;
  if (hook.dependsOn) line += ` after ${hook.dependsOn}`;
  if (!hook.enabled) line += chalk.dim(' (disabled)');
  if (hook.description) line += chalk.dim(` - ${hook.description}`);
  return line;
}

export function renderHookList(hooks: readonly HookDefinition[]): string {
  if (hooks.length === 0) return chalk.dim('No hooks.');
  return hooks.map(renderHook).join('\n');
}

export function renderSummary(registry: HookRegistry, sources: readonly string[]): string {
  const { total, byEvent } = registry.getStats();
  const lines = [chalk.green(`✔ ${total} hook${total === 1 ? '' : 's'} valid`)];

  for (const [event, count] of Object.entries(byEvent)) {
    if (count > 0) lines.push(`  ${event}: ${count}`);
  }
  if (sources.length > 0) {
    lines.push(chalk.dim(`Loaded from: ${sources.join(', ')}`));
  }
  return lines.join('\n');
}

export function renderError(error: Error): string {
  if (error instanceof ValidationError || error instanceof ConfigError) {
    const suggestion = error.suggestion ? `\n${chalk.dim(error.suggestion)}` : '';
    return chalk.red(`✖ [${error.code}] ${error.message}`) + suggestion;
  }
  return chalk.red(`✖ ${error.message}`);
}
