/**
 * plan command - Plan the upgrade or downgrade sequence for a cluster
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printText, verbose, warn } from '../utils/output.js';
import { loadUpgradePackSource } from '../pack/loader.js';
import { suggestUpgradePack } from '../pack/suggest.js';
import {
  createTopologyCollaborators,
  createTopologyContext,
  loadClusterTopology,
} from '../cluster/topology.js';
import { planSequence, type PlanningAccumulator } from '../planner/sequence.js';
import { formatPlanSummary, summarizePlan, type PlanSummary } from '../planner/format.js';
import type { Direction, UpgradeGroupHolder, UpgradeScope, UpgradeType } from '../upgrade/types.js';

export interface PlanOptions {
  /** Pack file, or directory of pack files */
  pack: string;
  /** Cluster topology file */
  cluster: string;
  direction: Direction;
  /** Version the cluster moves to */
  target: string;
  /** Version the cluster moves from (default: current) */
  source?: string;
  /** Upgrade type (default: the pack's, when a single pack is given) */
  type?: UpgradeType;
  scope?: UpgradeScope;
  /** Pack to prefer when several match */
  packName?: string;
}

export interface PlanResult {
  summary: PlanSummary;
  groups: UpgradeGroupHolder[];
  accumulator: PlanningAccumulator;
}

export async function planCommand(
  ctx: CommandContext,
  options: PlanOptions
): Promise<CommandResult<PlanResult>> {
  const { options: globalOpts, outputFormat, logger } = ctx;

  verbose(`Executing plan command`, globalOpts.verbose);
  verbose(`Pack source: ${options.pack}`, globalOpts.verbose);
  verbose(`Cluster: ${options.cluster}`, globalOpts.verbose);

  const packs = await loadUpgradePackSource(options.pack);
  const packList = Object.values(packs);
  const onlyPack = packList.length === 1 ? packList[0] : undefined;
  const type = options.type ?? onlyPack?.type;
  if (type === undefined) {
    return {
      success: false,
      message: 'Several upgrade packs were loaded. Use --type to choose the upgrade type',
    };
  }

  const topology = await loadClusterTopology(options.cluster);
  const collaborators = createTopologyCollaborators(topology);

  const { pack } = suggestUpgradePack({
    packs,
    repositoryVersions: topology.repositoryVersions,
    direction: options.direction,
    type,
    toVersion: options.target,
    fromVersion: options.source ?? topology.currentVersion,
    preferredPackName: options.packName ?? onlyPack?.name,
  });

  const context = createTopologyContext(topology, collaborators, {
    direction: options.direction,
    type,
    scope: options.scope,
    targetVersion: options.target,
    sourceVersion: options.source,
  });

  const result = planSequence(pack, context, {
    store: collaborators.store,
    catalog: collaborators.catalog,
    logger,
  });
  const summary = summarizePlan(pack.name, context, result.groups);

  if (outputFormat === 'human') {
    header(`Upgrade Plan for ${topology.clusterName}`);
    printText(formatPlanSummary(pack.name, context, result));
    if (result.groups.length === 0) {
      warn('The plan is empty');
    } else {
      info(`Planned ${summary.stageCount} stage(s) in ${summary.groupCount} group(s)`);
    }
  }

  return {
    success: true,
    message: `Planned ${summary.groupCount} group(s), ${summary.stageCount} stage(s) using ${pack.name}`,
    data: { summary, groups: result.groups, accumulator: result.accumulator },
  };
}
