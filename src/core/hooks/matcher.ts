/**
 * HookMatcher
 *
 * Decides whether a hook applies to a concrete event context.
 * Every condition must hold; a hook without conditions matches anything in its scope.
 * File checks that cannot be completed count as a non-match.
 */

import fs from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';
import type {
  Condition,
  ExecutionContext,
  FileSizeLimitCondition,
  HookDefinition,
} from '../../types/index.js';
import { ConditionEvaluationError } from '../errors/index.js';
import { logger } from '../../utils/index.js';

export class HookMatcher {
  /**
   * Check a hook's command patterns and conditions against a context
   */
  async matches(hook: HookDefinition, context: ExecutionContext): Promise<boolean> {
    if (!this.matchesCommand(hook, context.commandText)) {
      return false;
    }

    for (const condition of hook.conditions) {
      try {
        if (!(await this.evaluate(condition, context, hook.name))) {
          return false;
        }
      } catch (error) {
        if (error instanceof ConditionEvaluationError) {
          logger.debug(`Condition ${condition.type} of hook ${hook.name} treated as non-match: ${error.message}`);
          return false;
        }
        throw error;
      }
    }

    return true;
  }

  /**
   * Keep the hooks that match, preserving order
   */
  async filter(hooks: readonly HookDefinition[], context: ExecutionContext): Promise<HookDefinition[]> {
    const matched: HookDefinition[] = [];
    for (const hook of hooks) {
      if (await this.matches(hook, context)) {
        matched.push(hook);
      }
    }
    return matched;
  }

  /**
   * matchPattern is a literal substring, matchRegex a regular expression.
   * With either set, a missing command text never matches.
   */
  matchesCommand(hook: HookDefinition, commandText: string | null): boolean {
    if (hook.matchPattern === undefined && hook.matchRegex === undefined) {
      return true;
    }
    if (commandText === null) {
      return false;
    }
    if (hook.matchPattern !== undefined && !commandText.includes(hook.matchPattern)) {
      return false;
    }
    if (hook.matchRegex !== undefined && !hook.matchRegex.test(commandText)) {
      return false;
    }
    return true;
  }

  private async evaluate(condition: Condition, context: ExecutionContext, hookName: string): Promise<boolean> {
    const { filePath, workingDirectory } = context;
    if (filePath === null) {
      return false;
    }

    switch (condition.type) {
      case 'FileExtension': {
        const suffix = condition.ext.startsWith('.') ? condition.ext : `.${condition.ext}`;
        return filePath.endsWith(suffix);
      }
      case 'PathPrefix':
        return isWithin(path.resolve(workingDirectory, condition.prefix), path.resolve(workingDirectory, filePath));
      case 'PathGlob': {
        const relative = path.relative(workingDirectory, path.resolve(workingDirectory, filePath));
        return minimatch(relative.split(path.sep).join('/'), condition.pattern, { dot: true });
      }
      case 'FileSizeLimit':
        return this.checkSize(condition, path.resolve(workingDirectory, filePath), hookName);
    }
  }

  private async checkSize(
    condition: FileSizeLimitCondition,
    absolutePath: string,
    hookName: string,
  ): Promise<boolean> {
    let size: number;
    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) return false;
      size = stats.size;
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return false;
      }
      throw new ConditionEvaluationError(`Cannot stat ${absolutePath}`, hookName, { cause: error });
    }

    switch (condition.op) {
      case '<':
        return size < condition.bytes;
      case '<=':
        return size <= condition.bytes;
      case '>':
        return size > condition.bytes;
      case '>=':
        return size >= condition.bytes;
    }
  }
}

function isWithin(prefix: string, target: string): boolean {
  if (target === prefix) return true;
  const withSep = prefix.endsWith(path.sep) ? prefix : prefix + path.sep;
  return target.startsWith(withSep);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
