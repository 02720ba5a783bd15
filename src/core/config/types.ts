/**
 * Hook Config Types
 */

import type { EngineSettings } from '../../types/index.js';

/**
 * Merged result of every hooks.json that was read
 */
export interface HookConfig {
  description?: string;

  /** Engine settings with defaults applied */
  settings: EngineSettings;

  /** Raw hook definitions, validated when the registry loads */
  hooks: unknown[];

  /** Files the configuration came from, lowest priority first */
  sources: string[];
}

export interface LoadConfigOptions {
  /** Project directory (default: process.cwd()) */
  cwd?: string;

  /** Read only this file instead of the global and project files */
  configPath?: string;

  /** Override the home directory used for the global file */
  homeDir?: string;
}
