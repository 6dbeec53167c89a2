/**
 * Shared types for the upgrade-planner CLI
 */

import type { PlannerSettings, SettingSource } from './config/settings.js';
import type { PlannerLogger } from './utils/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** User recorded on configuration revisions */
  actor?: string;
  /** Settings file instead of .upgrade-planner/config.yaml */
  config?: string;
}

export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  settings: PlannerSettings;
  settingsSources: Record<keyof PlannerSettings, SettingSource>;
  logger: PlannerLogger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
