/**
 * reconcile-configs command - Move a cluster's repositories and configuration
 * across a stack boundary
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, info, printChanges, success, verbose } from '../utils/output.js';
import {
  createTopologyCollaborators,
  createTopologyContext,
  loadClusterTopology,
} from '../cluster/topology.js';
import type { StoredRevision } from '../cluster/in-memory.js';
import type { DowngradeScope } from '../config/settings.js';
import { reconcileConfigurations, type ServiceReconciliation } from '../configs/reconcile.js';
import {
  updateDesiredRepositoriesAndConfigs,
  type RepositoryTransitionResult,
} from '../configs/repositories.js';
import type { Direction } from '../upgrade/types.js';

export interface ReconcileCommandOptions {
  /** Cluster topology file */
  cluster: string;
  direction: Direction;
  target: string;
  source?: string;
  /** Compute the configuration outcome without writing anything */
  dryRun?: boolean;
  downgradeScope?: DowngradeScope;
}

export interface ReconcileCommandResult {
  services: ServiceReconciliation[];
  repositories?: RepositoryTransitionResult;
  /** Revisions written by this run */
  created: StoredRevision[];
}

export async function reconcileCommand(
  ctx: CommandContext,
  options: ReconcileCommandOptions
): Promise<CommandResult<ReconcileCommandResult>> {
  const { options: globalOpts, outputFormat, settings, logger } = ctx;
  const dryRun = options.dryRun ?? false;

  verbose(`Executing reconcile-configs command`, globalOpts.verbose);
  verbose(`Actor: ${settings.actor}`, globalOpts.verbose);

  const topology = await loadClusterTopology(options.cluster);
  const collaborators = createTopologyCollaborators(topology);
  const context = createTopologyContext(topology, collaborators, {
    direction: options.direction,
    type: 'NON_ROLLING',
    targetVersion: options.target,
    sourceVersion: options.source,
  });

  const reconcileSettings = {
    actor: settings.actor,
    changeComment: settings.changeComment,
    downgradeScope: options.downgradeScope ?? settings.downgradeScope,
  };

  if (outputFormat === 'human') {
    header(`Configuration Reconciliation for ${topology.clusterName}`);
    if (dryRun) dryRunNotice();
  }

  let services: ServiceReconciliation[];
  let repositories: RepositoryTransitionResult | undefined;
  if (dryRun) {
    const result = await reconcileConfigurations(context, collaborators.store, {
      settings: reconcileSettings,
      logger,
      dryRun: true,
    });
    services = result.services;
  } else {
    const result = await updateDesiredRepositoriesAndConfigs(context, collaborators.store, {
      catalog: collaborators.catalog,
      settings: reconcileSettings,
      logger,
    });
    services = result.configurations.services;
    repositories = result.repositories;
  }

  const created = collaborators.store.createdRevisions();

  if (outputFormat === 'human') {
    for (const service of services) {
      info(`${service.service}: ${service.action} (${service.sourceStack} → ${service.targetStack})`);
      if (service.merge) {
        printChanges([
          ...Object.keys(service.merge.configs).map((type) => ({ kind: 'added' as const, path: type })),
          ...service.merge.customized.map((path) => ({ kind: 'kept' as const, path })),
          ...service.merge.removed.map((path) => ({ kind: 'removed' as const, path })),
        ]);
      }
    }
    if (!dryRun) {
      success(`Created ${created.length} configuration revision(s)`);
    }
  }

  const changed = services.filter((s) => s.action === 'merged' || s.action === 'reverted').length;
  return {
    success: true,
    message: dryRun
      ? `Would change configuration of ${changed} service(s)`
      : `Changed configuration of ${changed} service(s), created ${created.length} revision(s)`,
    data: { services, repositories, created },
  };
}
