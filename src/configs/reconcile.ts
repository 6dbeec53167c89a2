/**
 * Configuration reconciliation across stack boundaries
 *
 * For every supported service whose source and target stacks differ:
 * - downgrade: make the latest configuration of the target stack current
 * - upgrade: create a revision on the target stack from the three-way merge
 *
 * Services that stay on their stack are left alone. All writes happen in one
 * store transaction; any failure rolls back every service.
 */

import type { ClusterStore } from '../cluster/types.js';
import { errorMessage, MergeFatalError } from '../errors.js';
import { DEFAULT_SETTINGS, type PlannerSettings } from '../config/settings.js';
import type { UpgradeContext } from '../upgrade/context.js';
import {
  getDirectionPreposition,
  getDirectionText,
  isDowngrade,
} from '../upgrade/direction.js';
import { formatStackId, sameStack } from '../upgrade/stack.js';
import type { RepositoryVersion } from '../upgrade/types.js';
import { logger as defaultLogger, type PlannerLogger } from '../utils/logger.js';
import { mergeServiceConfigurations, type MergeResult } from './merge.js';

// =============================================================================
// Types
// =============================================================================

export type ReconcileAction =
  /** Source and target are on the same stack */
  | 'unchanged'
  /** Target stack configuration made current again */
  | 'reverted'
  /** New revision created from the merge */
  | 'merged'
  /** Left alone because an earlier service ended a first-service downgrade */
  | 'not-processed';

export interface ServiceReconciliation {
  service: string;
  action: ReconcileAction;
  sourceStack: string;
  targetStack: string;
  /** Set when action is `merged` */
  merge?: MergeResult;
}

export interface ReconcileResult {
  dryRun: boolean;
  services: ServiceReconciliation[];
}

export type ReconcileSettings = Pick<PlannerSettings, 'actor' | 'changeComment' | 'downgradeScope'>;

export interface ReconcileOptions {
  settings?: Partial<ReconcileSettings>;
  logger?: PlannerLogger;
  /** Compute the outcome without writing */
  dryRun?: boolean;
}

// =============================================================================
// Reconciliation
// =============================================================================

/**
 * Merge or revert configurations for every service that crosses stacks
 *
 * @throws MergeFatalError when a repository version or store lookup fails;
 * nothing is committed in that case
 */
export async function reconcileConfigurations(
  context: UpgradeContext,
  store: ClusterStore,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  return runFatal(() => store.transaction((tx) => reconcileWithin(context, tx, options)));
}

/**
 * Reconcile using an already open transaction
 */
export async function reconcileWithin(
  context: UpgradeContext,
  tx: ClusterStore,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const settings: ReconcileSettings = {
    actor: options.settings?.actor ?? DEFAULT_SETTINGS.actor,
    changeComment: options.settings?.changeComment ?? DEFAULT_SETTINGS.changeComment,
    downgradeScope: options.settings?.downgradeScope ?? DEFAULT_SETTINGS.downgradeScope,
  };
  const log = (options.logger ?? defaultLogger).child({ cluster: context.cluster.clusterName });
  const dryRun = options.dryRun ?? false;
  const { direction } = context;
  const results: ServiceReconciliation[] = [];
  let stopped = false;

  for (const serviceName of context.getSupportedServices()) {
    const source = requireVersion(context.getSourceRepositoryVersion(serviceName), serviceName, 'source');
    const target = requireVersion(context.getTargetRepositoryVersion(serviceName), serviceName, 'target');
    const base = {
      service: serviceName,
      sourceStack: formatStackId(source.stackId),
      targetStack: formatStackId(target.stackId),
    };

    if (stopped) {
      results.push({ ...base, action: 'not-processed' });
      continue;
    }

    if (sameStack(source.stackId, target.stackId)) {
      log.info(
        `The ${getDirectionText(direction)} ${getDirectionPreposition(direction)} ${context.repositoryVersion.version} ` +
          `will not change stack configurations for ${serviceName} since the source and target are both ${base.targetStack}`
      );
      results.push({ ...base, action: 'unchanged' });
      continue;
    }

    if (isDowngrade(direction)) {
      log.info(`Reverting ${serviceName} to the latest configurations of ${base.targetStack}`);
      if (!dryRun) {
        await tx.applyLatestConfigurations(target.stackId, serviceName);
      }
      results.push({ ...base, action: 'reverted' });
      stopped = settings.downgradeScope === 'first-service';
      continue;
    }

    const merge = mergeServiceConfigurations({
      oldDefaults: await tx.getDefaultProperties(source.stackId, serviceName),
      newDefaults: await tx.getDefaultProperties(target.stackId, serviceName),
      live: await tx.getLiveConfig(serviceName),
    });

    for (const key of merge.removed) {
      log.info(
        `The property ${key} exists in both ${base.sourceStack} and ${base.targetStack} but is not part of the ` +
          'current set of configurations and will therefore not be included in the configuration merge'
      );
    }

    const types = Object.keys(merge.configs);
    log.info(`The ${getDirectionText(direction)} will create the following configurations for stack ${base.targetStack}: ${types.join(',')}`);

    if (!dryRun) {
      await tx.createConfigTypes(
        context.cluster.clusterName,
        target.stackId,
        serviceName,
        merge.configs,
        settings.actor,
        settings.changeComment
      );
    }
    results.push({ ...base, action: 'merged', merge });
  }

  return { dryRun, services: results };
}

function requireVersion(
  version: RepositoryVersion | undefined,
  serviceName: string,
  side: 'source' | 'target'
): RepositoryVersion {
  if (!version) {
    throw new MergeFatalError(
      `No ${side} repository version for ${serviceName}`,
      'MISSING_REPOSITORY_VERSION',
      { service: serviceName, side }
    );
  }
  return version;
}

/**
 * Run `work`, reporting any failure as a MergeFatalError
 */
export async function runFatal<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (err instanceof MergeFatalError) {
      throw err;
    }
    throw new MergeFatalError(
      `Configuration reconciliation failed: ${errorMessage(err)}`,
      'STORE_FAILURE',
      undefined,
      { cause: err }
    );
  }
}
