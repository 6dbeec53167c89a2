/**
 * Planner settings resolution
 *
 * Each setting resolves independently, highest priority first:
 * 1. CLI flag
 * 2. Environment variable (UPGRADE_PLANNER_*)
 * 3. Local config file (.upgrade-planner/config.yaml)
 * 4. Built-in default
 *
 * Invalid values are reported as warnings and the next source is used.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { errorMessage } from '../errors.js';
import { parseLogLevel, type LogLevel } from '../utils/logger.js';
import { isRecord, oneOf } from '../utils/parse.js';

/** Local config file, relative to the working directory */
export const LOCAL_CONFIG_PATH = '.upgrade-planner/config.yaml';

export const DEFAULT_ACTOR = 'admin';
export const DEFAULT_CHANGE_COMMENT = 'Configuration created for Upgrade';

/**
 * How a downgrade that crosses stacks treats the remaining services:
 * - all-services: revert every service that crossed a stack boundary
 * - first-service: stop after the first reverted service
 */
export type DowngradeScope = 'all-services' | 'first-service';

export const DOWNGRADE_SCOPES: readonly DowngradeScope[] = ['all-services', 'first-service'];

export interface PlannerSettings {
  /** User recorded on created configuration revisions */
  actor: string;
  /** Comment recorded on created configuration revisions */
  changeComment: string;
  downgradeScope: DowngradeScope;
  logLevel: LogLevel;
  jsonLogs: boolean;
}

export type SettingSource = 'cli' | 'env' | 'local_config' | 'default';

export const DEFAULT_SETTINGS: PlannerSettings = {
  actor: DEFAULT_ACTOR,
  changeComment: DEFAULT_CHANGE_COMMENT,
  downgradeScope: 'all-services',
  logLevel: 'info',
  jsonLogs: false,
};

const ENV_VARS: Record<keyof PlannerSettings, string> = {
  actor: 'UPGRADE_PLANNER_ACTOR',
  changeComment: 'UPGRADE_PLANNER_CHANGE_COMMENT',
  downgradeScope: 'UPGRADE_PLANNER_DOWNGRADE_SCOPE',
  logLevel: 'UPGRADE_PLANNER_LOG_LEVEL',
  jsonLogs: 'UPGRADE_PLANNER_LOG_JSON',
};

export interface SettingsResolveOptions {
  /** Values given on the command line */
  cli?: Partial<PlannerSettings>;
  /** Working directory for local config lookup */
  cwd?: string;
  /** Explicit config file instead of the local one */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}

export interface SettingsResolutionResult {
  settings: PlannerSettings;
  /** Where each setting came from */
  sources: Record<keyof PlannerSettings, SettingSource>;
  /** Config file that was read, if any */
  configPath?: string;
  warnings: string[];
}

type Parser<T> = (value: unknown) => T | undefined;

const parseText: Parser<string> = (value) =>
  typeof value === 'string' && value.trim() !== '' ? value : undefined;

const parseBoolean: Parser<boolean> = (value) => {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
};

const parseScope: Parser<DowngradeScope> = (value) => oneOf(value, DOWNGRADE_SCOPES);

const parseLevel: Parser<LogLevel> = (value) =>
  typeof value === 'string' ? parseLogLevel(value) : undefined;

/**
 * Resolve planner settings from every source
 */
export function resolveSettings(options: SettingsResolveOptions = {}): SettingsResolutionResult {
  const env = options.env ?? process.env;
  const cli = options.cli ?? {};
  const warnings: string[] = [];

  const configPath = options.configPath ?? resolve(options.cwd ?? process.cwd(), LOCAL_CONFIG_PATH);
  const fileValues = loadConfigFile(configPath, warnings);

  const pick = <T>(
    key: keyof PlannerSettings,
    cliValue: T | undefined,
    fallback: T,
    parse: Parser<T>
  ): [T, SettingSource] => {
    if (cliValue !== undefined) {
      return [cliValue, 'cli'];
    }

    const envName = ENV_VARS[key];
    const rawEnv = env[envName];
    if (rawEnv !== undefined && rawEnv !== '') {
      const parsed = parse(rawEnv);
      if (parsed !== undefined) return [parsed, 'env'];
      warnings.push(`Ignoring ${envName}=${rawEnv}: invalid value`);
    }

    const rawFile = fileValues?.[key];
    if (rawFile !== undefined) {
      const parsed = parse(rawFile);
      if (parsed !== undefined) return [parsed, 'local_config'];
      warnings.push(`Ignoring ${key} in ${configPath}: invalid value`);
    }

    return [fallback, 'default'];
  };

  const [actor, actorSource] = pick('actor', cli.actor, DEFAULT_SETTINGS.actor, parseText);
  const [changeComment, commentSource] = pick(
    'changeComment',
    cli.changeComment,
    DEFAULT_SETTINGS.changeComment,
    parseText
  );
  const [downgradeScope, scopeSource] = pick(
    'downgradeScope',
    cli.downgradeScope,
    DEFAULT_SETTINGS.downgradeScope,
    parseScope
  );
  const [logLevel, levelSource] = pick('logLevel', cli.logLevel, DEFAULT_SETTINGS.logLevel, parseLevel);
  const [jsonLogs, jsonSource] = pick('jsonLogs', cli.jsonLogs, DEFAULT_SETTINGS.jsonLogs, parseBoolean);

  return {
    settings: { actor, changeComment, downgradeScope, logLevel, jsonLogs },
    sources: {
      actor: actorSource,
      changeComment: commentSource,
      downgradeScope: scopeSource,
      logLevel: levelSource,
      jsonLogs: jsonSource,
    },
    configPath: fileValues ? configPath : undefined,
    warnings,
  };
}

/**
 * Load the local config file; missing files are not an error
 */
function loadConfigFile(path: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const data: unknown = parseYaml(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) {
      return {};
    }
    if (!isRecord(data)) {
      warnings.push(`Ignoring ${path}: expected a mapping`);
      return null;
    }
    return data;
  } catch (err) {
    warnings.push(`Ignoring ${path}: ${errorMessage(err)}`);
    return null;
  }
}
