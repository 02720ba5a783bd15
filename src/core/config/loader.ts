import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { EngineSettings } from '../../types/index.js';
import { DEFAULT_ENGINE_SETTINGS } from '../../types/index.js';
import type { HookConfig, LoadConfigOptions } from './types.js';
import { formatIssues, HooksFileSchema } from './schema.js';
import type { HooksFile } from './schema.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { HookRegistry } from '../hooks/registry.js';

export const CONFIG_DIR_NAME = '.hookshot';
export const HOOKS_FILE_NAME = 'hooks.json';

/**
 * Get the home directory at runtime (not at module load time)
 */
function getHomeDir(): string {
  return os.homedir();
}

/**
 * Load and merge hook configuration
 *
 * Loading order (priority):
 * 1. Defaults (no hooks)
 * 2. Global config (~/.hookshot/hooks.json)
 * 3. Project config (./.hookshot/hooks.json) - Overrides global
 *
 * An explicit configPath replaces steps 2 and 3 and must exist.
 */
export async function loadHookConfig(options: LoadConfigOptions = {}): Promise<HookConfig> {
  if (options.configPath) {
    const filePath = path.resolve(options.cwd || process.cwd(), options.configPath);
    const file = await readHooksFile(filePath);
    if (!file) {
      throw new ConfigError(
        `Hook config not found: ${filePath}`,
        ConfigErrorCode.FILE_NOT_FOUND,
        'Check the --config path.',
      );
    }
    return toHookConfig(file, [filePath]);
  }

  const cwd = options.cwd || process.cwd();
  const globalPath = path.join(options.homeDir || getHomeDir(), CONFIG_DIR_NAME, HOOKS_FILE_NAME);
  const projectPath = path.join(cwd, CONFIG_DIR_NAME, HOOKS_FILE_NAME);

  let merged: HooksFile = { hooks: [] };
  const sources: string[] = [];

  for (const filePath of [globalPath, projectPath]) {
    // The same file must not be merged twice when cwd is the home directory
    if (sources.includes(filePath)) continue;
    const file = await readHooksFile(filePath);
    if (file) {
      merged = mergeHooksFiles(merged, file);
      sources.push(filePath);
    }
  }

  return toHookConfig(merged, sources);
}

/**
 * Read config and build the registry in one step
 */
export async function loadRegistry(
  options: LoadConfigOptions = {},
): Promise<{ registry: HookRegistry; config: HookConfig }> {
  const config = await loadHookConfig(options);
  return { registry: HookRegistry.load(config.hooks), config };
}

/**
 * Merge two hook files
 * - hooks: Deduplicate by name, local overrides global in place, new local hooks appended
 * - settings: Shallow merge (override)
 */
export function mergeHooksFiles(global: HooksFile, local: HooksFile): HooksFile {
  return {
    description: local.description ?? global.description,
    settings: { ...global.settings, ...local.settings },
    hooks: mergeHooks(global.hooks, local.hooks),
  };
}

/**
 * Read one hooks.json; null when the file does not exist
 */
export async function readHooksFile(filePath: string): Promise<HooksFile | null> {
  if (!(await fs.pathExists(filePath))) {
    return null;
  }

  const stats = await fs.stat(filePath);
  if (!stats.isFile()) return null;

  const content = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(
      `Invalid JSON in hook config: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      'Check the configuration file syntax.',
    );
  }

  const parsed = HooksFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid hook config ${filePath}: ${formatIssues(parsed.error)}`,
      ConfigErrorCode.INVALID_SCHEMA,
    );
  }
  return parsed.data;
}

// Helper functions

function toHookConfig(file: HooksFile, sources: string[]): HookConfig {
  const settings: EngineSettings = {
    outputTailBytes: file.settings?.outputTailBytes ?? DEFAULT_ENGINE_SETTINGS.outputTailBytes,
    killGraceMillis: file.settings?.killGraceMillis ?? DEFAULT_ENGINE_SETTINGS.killGraceMillis,
    debug: file.settings?.debug ?? DEFAULT_ENGINE_SETTINGS.debug,
  };

  return {
    description: file.description,
    settings,
    hooks: file.hooks,
    sources,
  };
}

/**
 * Only names shared between the two lists are replaced; duplicates within one list
 * are left for the registry to reject
 */
function mergeHooks(globalList: unknown[], localList: unknown[]): unknown[] {
  const result = [...globalList];
  const globalIndex = new Map<string, number>();
  globalList.forEach((entry, index) => {
    const name = nameOf(entry);
    if (name !== undefined && !globalIndex.has(name)) globalIndex.set(name, index);
  });

  for (const entry of localList) {
    const name = nameOf(entry);
    const index = name !== undefined ? globalIndex.get(name) : undefined;
    if (index !== undefined) {
      result[index] = entry;
    } else {
      result.push(entry);
    }
  }

  return result;
}

function nameOf(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
    return entry.name;
  }
  return undefined;
}
