#!/usr/bin/env node
/**
 * upgrade-planner CLI - Plan stack upgrades and reconcile configurations
 *
 * Commands:
 * - plan: Show the ordered groups, stages and tasks of an upgrade or downgrade
 * - reconcile-configs: Move repositories and merge/revert configuration
 *   across a stack boundary
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { planCommand, reconcileCommand } from './commands/index.js';
import { error, printResult, verbose as verboseLog, warn } from './utils/output.js';
import { resolveSettings, DOWNGRADE_SCOPES, type DowngradeScope } from './config/settings.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './errors.js';
import { PackLoadError } from './pack/errors.js';
import { oneOf } from './utils/parse.js';
import {
  DIRECTIONS,
  UPGRADE_SCOPES,
  UPGRADE_TYPES,
  type Direction,
} from './upgrade/types.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const resolution = resolveSettings({
    cli: { actor: options.actor },
    configPath: options.config,
  });

  for (const warning of resolution.warnings) {
    warn(warning);
  }

  if (options.verbose) {
    const sources = Object.entries(resolution.sources)
      .map(([key, source]) => `${key}=${source}`)
      .join(', ');
    verboseLog(`Settings resolved from: ${sources}`, true);
    if (resolution.configPath) {
      verboseLog(`Config file: ${resolution.configPath}`, true);
    }
  }

  const { settings } = resolution;
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    settingsSources: resolution.sources,
    logger: createLogger({
      level: options.verbose ? 'debug' : settings.logLevel,
      json: settings.jsonLogs,
    }),
  };
}

function parseDirection(value: string): Direction {
  const direction = oneOf(value.toUpperCase(), DIRECTIONS);
  if (!direction) {
    throw new Error(`Unknown direction "${value}"`);
  }
  return direction;
}

/**
 * Print the result and exit; failures print every validation issue
 */
async function run<T>(label: string, ctx: CommandContext, command: () => Promise<CommandResult<T>>): Promise<void> {
  try {
    const result = await command();
    if (ctx.outputFormat === 'json' || !result.success) {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${errorMessage(err)}`);
    if (err instanceof PackLoadError && err.result.issues.length > 0) {
      console.log(err.formatAll());
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('upgrade-planner')
  .description('Plan stack upgrades and reconcile service configurations')
  .version(VERSION)
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false))
  .addOption(new Option('--actor <name>', 'User recorded on configuration revisions'))
  .addOption(new Option('--config <file>', 'Settings file (default: .upgrade-planner/config.yaml)'));

interface PlanCliOptions {
  pack: string;
  cluster: string;
  direction: string;
  target: string;
  source?: string;
  type?: string;
  scope?: string;
  packName?: string;
}

/**
 * plan command - Show the upgrade sequence
 */
program
  .command('plan')
  .description('Plan the upgrade or downgrade sequence for a cluster')
  .requiredOption('--pack <path>', 'Upgrade pack file, or a directory of packs')
  .requiredOption('--cluster <file>', 'Cluster topology file')
  .addOption(new Option('--direction <direction>', 'Direction').choices(['upgrade', 'downgrade']).default('upgrade'))
  .requiredOption('--target <version>', 'Repository version to move to')
  .option('--source <version>', 'Repository version to move from (default: current)')
  .addOption(new Option('--type <type>', 'Upgrade type').choices([...UPGRADE_TYPES]))
  .addOption(new Option('--scope <scope>', 'Upgrade scope').choices([...UPGRADE_SCOPES]))
  .option('--pack-name <name>', 'Upgrade pack to prefer')
  .action(async (cmdOpts: PlanCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    await run('Plan', ctx, () =>
      planCommand(ctx, {
        pack: cmdOpts.pack,
        cluster: cmdOpts.cluster,
        direction: parseDirection(cmdOpts.direction),
        target: cmdOpts.target,
        source: cmdOpts.source,
        type: oneOf(cmdOpts.type, UPGRADE_TYPES),
        scope: oneOf(cmdOpts.scope, UPGRADE_SCOPES),
        packName: cmdOpts.packName,
      })
    );
  });

interface ReconcileCliOptions {
  cluster: string;
  direction: string;
  target: string;
  source?: string;
  dryRun: boolean;
  downgradeScope?: string;
}

/**
 * reconcile-configs command - Merge or revert configuration
 */
program
  .command('reconcile-configs')
  .description('Set desired repositories and merge or revert configurations across stacks')
  .requiredOption('--cluster <file>', 'Cluster topology file')
  .addOption(new Option('--direction <direction>', 'Direction').choices(['upgrade', 'downgrade']).default('upgrade'))
  .requiredOption('--target <version>', 'Repository version to move to')
  .option('--source <version>', 'Repository version to move from (default: current)')
  .option('--dry-run', 'Show what would change without writing', false)
  .addOption(
    new Option('--downgrade-scope <scope>', 'Services a stack downgrade reverts').choices([...DOWNGRADE_SCOPES])
  )
  .action(async (cmdOpts: ReconcileCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    const downgradeScope: DowngradeScope | undefined = oneOf(cmdOpts.downgradeScope, DOWNGRADE_SCOPES);
    await run('Reconcile', ctx, () =>
      reconcileCommand(ctx, {
        cluster: cmdOpts.cluster,
        direction: parseDirection(cmdOpts.direction),
        target: cmdOpts.target,
        source: cmdOpts.source,
        dryRun: cmdOpts.dryRun,
        downgradeScope,
      })
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  error(errorMessage(err));
  process.exit(1);
});
