/**
 * Desired repository transition
 *
 * Points every supported service and component at its target repository
 * version and marks host components for the upgrade, then (optionally)
 * reconciles configurations, all in one transaction.
 */

import type { ClusterStore, UpgradeState } from '../cluster/types.js';
import { UNKNOWN_VERSION } from '../cluster/types.js';
import type { MetadataCatalog } from '../catalog/types.js';
import { errorMessage, MergeFatalError } from '../errors.js';
import type { UpgradeContext } from '../upgrade/context.js';
import { logger as defaultLogger, type PlannerLogger } from '../utils/logger.js';
import {
  reconcileWithin,
  runFatal,
  type ReconcileOptions,
  type ReconcileResult,
} from './reconcile.js';

export interface ComponentTransition {
  service: string;
  component: string;
  version: string;
  upgradeState: UpgradeState;
  /** Hosts whose state was written */
  hostsUpdated: string[];
}

export interface RepositoryTransitionResult {
  components: ComponentTransition[];
}

export interface RepositoryDeps {
  catalog: MetadataCatalog;
  logger?: PlannerLogger;
}

/**
 * Set desired repositories using an already open transaction
 *
 * Components that advertise a version on the target stack go to
 * IN_PROGRESS. The rest go to NONE and report version UNKNOWN.
 */
export async function setDesiredRepositoriesWithin(
  context: UpgradeContext,
  tx: ClusterStore,
  deps: RepositoryDeps
): Promise<RepositoryTransitionResult> {
  const log = (deps.logger ?? defaultLogger).child({ cluster: context.cluster.clusterName });
  const components: ComponentTransition[] = [];

  for (const serviceName of context.getSupportedServices()) {
    const target = context.getTargetRepositoryVersion(serviceName);
    if (!target) {
      throw new MergeFatalError(
        `No target repository version for ${serviceName}`,
        'MISSING_REPOSITORY_VERSION',
        { service: serviceName, side: 'target' }
      );
    }

    await tx.setServiceDesiredRepository(serviceName, target);

    for (const component of await tx.getServiceComponents(serviceName)) {
      await tx.setComponentDesiredRepository(serviceName, component.name, target);

      let advertised = false;
      try {
        advertised = deps.catalog.isVersionAdvertised(target.stackId, serviceName, component.name);
      } catch (err) {
        log.warn(`Could not determine whether ${serviceName}/${component.name} advertises a version`, {
          error: errorMessage(err),
        });
      }

      const upgradeState: UpgradeState = advertised ? 'IN_PROGRESS' : 'NONE';
      const hostsUpdated: string[] = [];

      for (const host of component.hosts) {
        if (host.upgradeState !== upgradeState) {
          await tx.setHostComponentUpgradeState(serviceName, component.name, host.hostName, upgradeState);
          hostsUpdated.push(host.hostName);
        }
        if (!advertised && host.version !== UNKNOWN_VERSION) {
          await tx.setHostComponentVersion(serviceName, component.name, host.hostName, UNKNOWN_VERSION);
          if (!hostsUpdated.includes(host.hostName)) hostsUpdated.push(host.hostName);
        }
      }

      components.push({
        service: serviceName,
        component: component.name,
        version: target.version,
        upgradeState,
        hostsUpdated,
      });
    }
  }

  return { components };
}

/**
 * Set desired repositories in their own transaction
 */
export async function setDesiredRepositories(
  context: UpgradeContext,
  store: ClusterStore,
  deps: RepositoryDeps
): Promise<RepositoryTransitionResult> {
  return runFatal(() => store.transaction((tx) => setDesiredRepositoriesWithin(context, tx, deps)));
}

export interface UpgradeTransitionResult {
  repositories: RepositoryTransitionResult;
  configurations: ReconcileResult;
}

/**
 * Set desired repositories and reconcile configurations in one transaction
 */
export async function updateDesiredRepositoriesAndConfigs(
  context: UpgradeContext,
  store: ClusterStore,
  deps: RepositoryDeps & ReconcileOptions
): Promise<UpgradeTransitionResult> {
  return runFatal(() =>
    store.transaction(async (tx) => {
      const repositories = await setDesiredRepositoriesWithin(context, tx, deps);
      const configurations = await reconcileWithin(context, tx, deps);
      return { repositories, configurations };
    })
  );
}
