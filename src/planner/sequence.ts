/**
 * Upgrade sequence planning
 *
 * Turns an upgrade pack and an upgrade context into the ordered list of
 * groups → stages → host-bound tasks that an executor runs:
 * 1. Filter groupings by scope and condition
 * 2. Walk services (reversed for rolling downgrades) and their components
 * 3. Resolve hosts and processing for each component
 * 4. Hand everything to the grouping's stage builder
 * 5. Keep groups whose builder produced stages, with text post-processed
 *
 * Components that cannot be planned are skipped, logged and recorded; they
 * never abort planning.
 */

import type { ClusterStore } from '../cluster/types.js';
import type { MetadataCatalog } from '../catalog/types.js';
import type { UpgradeContext } from '../upgrade/context.js';
import { isDowngrade } from '../upgrade/direction.js';
import type {
  FunctionName,
  HostsType,
  ProcessingComponent,
  UpgradeGroupHolder,
} from '../upgrade/types.js';
import { describeTask } from '../upgrade/tasks.js';
import { describeCondition, isConditionSatisfied } from '../pack/conditions.js';
import {
  getGroupingFunction,
  getGroups,
  type Grouping,
  type OrderService,
  type UpgradePack,
} from '../pack/types.js';
import { createStageBuilder } from '../stages/builders.js';
import type { StageBuilderFactory, StageWrapperBuilder } from '../stages/types.js';
import { logger as defaultLogger, type PlannerLogger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { resolveProcessingComponent } from './processing.js';
import { postProcess } from './post-process.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Why a group or component is missing from the plan
 */
export type SkipReason =
  | 'OUT_OF_SCOPE'
  | 'CONDITION_NOT_MET'
  | 'SERVICE_NOT_SUPPORTED'
  | 'NO_SERVICE_TASKS'
  | 'NO_COMPONENT_TASKS'
  | 'NO_HOSTS'
  | 'NO_PROCESSING_COMPONENT'
  | 'NAMENODE_HOSTS_UNRESOLVED'
  | 'EMPTY_GROUP';

export interface PlanningSkip {
  reason: SkipReason;
  group: string;
  service?: string;
  component?: string;
}

/**
 * Facts discovered while planning
 */
export interface PlanningAccumulator {
  /** Unhealthy hosts reported by the resolver, without duplicates */
  unhealthyHosts: string[];
  /** Service name → display name */
  serviceDisplayNames: Record<string, string>;
  /** `SERVICE/COMPONENT` → display name */
  componentDisplayNames: Record<string, string>;
  skips: PlanningSkip[];
}

export interface SequenceResult {
  groups: UpgradeGroupHolder[];
  accumulator: PlanningAccumulator;
}

export interface PlannerDeps {
  /** Resolves configuration-backed placeholder tokens */
  store: Pick<ClusterStore, 'getPlaceholderValue'>;
  catalog: MetadataCatalog;
  logger?: PlannerLogger;
  /** Stage builder per grouping (default: by grouping kind) */
  createBuilder?: StageBuilderFactory;
}

/** Parameter telling each NameNode which HA role it takes */
export const NAMENODE_ROLE_PARAM = 'desired_namenode_role';

// =============================================================================
// Planning
// =============================================================================

/**
 * Plan the ordered group list for an upgrade or downgrade
 */
export function createSequence(
  pack: UpgradePack,
  context: UpgradeContext,
  deps: PlannerDeps
): UpgradeGroupHolder[] {
  return planSequence(pack, context, deps).groups;
}

/**
 * Plan the ordered group list and report what was discovered or skipped
 */
export function planSequence(
  pack: UpgradePack,
  context: UpgradeContext,
  deps: PlannerDeps
): SequenceResult {
  const log = (deps.logger ?? defaultLogger).child({
    pack: pack.name,
    direction: context.direction,
  });
  const createBuilder = deps.createBuilder ?? createStageBuilder;
  const accumulator: PlanningAccumulator = {
    unhealthyHosts: [],
    serviceDisplayNames: {},
    componentDisplayNames: {},
    skips: [],
  };
  const groups: UpgradeGroupHolder[] = [];

  if (pack.type !== context.type) {
    log.warn(`Upgrade pack type ${pack.type} differs from requested type ${context.type}`);
  }

  for (const grouping of getGroups(pack, context.direction)) {
    if (!context.isScoped(grouping.scope)) {
      log.info(`Skipping group ${grouping.name}: scope ${grouping.scope} does not apply to ${context.scope}`);
      accumulator.skips.push({ reason: 'OUT_OF_SCOPE', group: grouping.name });
      continue;
    }

    if (grouping.condition && !isConditionSatisfied(grouping.condition, context)) {
      log.info(
        `Skipping group ${grouping.name} while building upgrade orchestration due to ${describeCondition(grouping.condition)}`
      );
      accumulator.skips.push({ reason: 'CONDITION_NOT_MET', group: grouping.name });
      continue;
    }

    const holder = createGroupHolder(grouping, context);
    const builder = createBuilder(grouping, { performServiceCheck: holder.performServiceCheck });
    const fn = getGroupingFunction(grouping);

    for (const service of orderServices(grouping, context)) {
      planService(pack, context, deps, log, accumulator, grouping, builder, service, fn);
    }

    const stages = builder.build(context);
    if (stages.length === 0) {
      log.debug(`Group ${grouping.name} produced no stages and is dropped`);
      accumulator.skips.push({ reason: 'EMPTY_GROUP', group: grouping.name });
      continue;
    }

    holder.items = stages;
    postProcess({ context, store: deps.store }, holder);
    groups.push(holder);
  }

  if (log.isLevelEnabled('debug')) {
    dumpPlan(log, groups);
  }

  return { groups, accumulator };
}

/**
 * Copy flags from the grouping; downgrades are always skippable and
 * non-rolling runs only perform service checks in service-check groups
 */
function createGroupHolder(grouping: Grouping, context: UpgradeContext): UpgradeGroupHolder {
  const performServiceCheck =
    context.type === 'NON_ROLLING' && grouping.kind !== 'service-check'
      ? false
      : grouping.performServiceCheck;

  return {
    name: grouping.name,
    title: grouping.title,
    groupKind: grouping.kind,
    allowRetry: grouping.allowRetry,
    skippable: isDowngrade(context.direction) ? true : grouping.skippable,
    supportsAutoSkipOnFailure: grouping.supportsAutoSkipOnFailure,
    performServiceCheck,
    items: [],
  };
}

/**
 * Declared service order, reversed for rolling downgrades
 */
export function orderServices(grouping: Grouping, context: UpgradeContext): OrderService[] {
  if (context.type === 'ROLLING' && isDowngrade(context.direction)) {
    return [...grouping.services].reverse();
  }
  return grouping.services;
}

function planService(
  pack: UpgradePack,
  context: UpgradeContext,
  deps: PlannerDeps,
  log: PlannerLogger,
  accumulator: PlanningAccumulator,
  grouping: Grouping,
  builder: StageWrapperBuilder,
  service: OrderService,
  fn: FunctionName | undefined
): void {
  const { serviceName } = service;
  const skip = (reason: SkipReason, component?: string): void => {
    accumulator.skips.push({ reason, group: grouping.name, service: serviceName, component });
  };

  if (!context.isServiceSupported(serviceName)) {
    skip('SERVICE_NOT_SUPPORTED');
    return;
  }

  const rolling = context.type === 'ROLLING';
  const serviceTasks = pack.processing[serviceName];
  if (rolling && serviceTasks === undefined) {
    skip('NO_SERVICE_TASKS');
    return;
  }

  const clientOnly = context.cluster.getService(serviceName)?.clientOnly ?? false;

  for (const component of service.components) {
    if (rolling && serviceTasks?.[component] === undefined) {
      skip('NO_COMPONENT_TASKS', component);
      continue;
    }

    const hostsType = context.resolver.resolve(serviceName, component);
    if (!hostsType || hostsType.hosts.length === 0) {
      skip('NO_HOSTS', component);
      continue;
    }

    for (const host of hostsType.unhealthy) {
      if (!accumulator.unhealthyHosts.includes(host)) {
        accumulator.unhealthyHosts.push(host);
      }
    }

    const processing = resolveProcessingComponent(pack.processing, serviceName, component, fn);
    if (!processing) {
      log.error(`Couldn't create a processing component for service ${serviceName} and component ${component}.`);
      skip('NO_PROCESSING_COMPONENT', component);
      continue;
    }

    recordDisplayNames(context, deps.catalog, log, accumulator, serviceName, component);

    if (isNameNode(serviceName, component)) {
      const submitted = submitNameNode(context, log, builder, hostsType, serviceName, clientOnly, processing);
      if (!submitted) {
        skip('NAMENODE_HOSTS_UNRESOLVED', component);
      }
      continue;
    }

    builder.add(context, hostsType, serviceName, clientOnly, processing);
  }
}

// =============================================================================
// NameNode HA
// =============================================================================

function isNameNode(serviceName: string, componentName: string): boolean {
  return serviceName.toUpperCase() === 'HDFS' && componentName.toUpperCase() === 'NAMENODE';
}

/**
 * Rolling: standby first, then active, in one host group.
 * Non-rolling with HA: one single-host group per NameNode, each told which
 * role to take.
 *
 * @returns false when a rolling NameNode could not be orchestrated
 */
function submitNameNode(
  context: UpgradeContext,
  log: PlannerLogger,
  builder: StageWrapperBuilder,
  hostsType: HostsType,
  serviceName: string,
  clientOnly: boolean,
  processing: ProcessingComponent
): boolean {
  const { master, secondary } = hostsType;

  switch (context.type) {
    case 'ROLLING': {
      if (hostsType.hosts.length === 0 || master === undefined || secondary === undefined) {
        log.warn('Could not orchestrate NameNode. Hosts could not be resolved', {
          hosts: hostsType.hosts.join(','),
          active: master ?? null,
          standby: secondary ?? null,
        });
        return false;
      }
      const ordered: HostsType = {
        ...hostsType,
        hosts: [...new Set([secondary, master])],
      };
      builder.add(context, ordered, serviceName, clientOnly, processing);
      return true;
    }

    case 'NON_ROLLING': {
      if (context.resolver.isNameNodeHA() && master !== undefined && secondary !== undefined) {
        builder.add(
          context,
          { hosts: [master], unhealthy: [] },
          serviceName,
          clientOnly,
          processing,
          { [NAMENODE_ROLE_PARAM]: 'active' }
        );
        builder.add(
          context,
          { hosts: [secondary], unhealthy: [] },
          serviceName,
          clientOnly,
          processing,
          { [NAMENODE_ROLE_PARAM]: 'standby' }
        );
        return true;
      }
      builder.add(context, hostsType, serviceName, clientOnly, processing);
      return true;
    }

    case 'HOST_ORDERED':
      builder.add(context, hostsType, serviceName, clientOnly, processing);
      return true;
  }
}

// =============================================================================
// Display Names / Debug
// =============================================================================

function recordDisplayNames(
  context: UpgradeContext,
  catalog: MetadataCatalog,
  log: PlannerLogger,
  accumulator: PlanningAccumulator,
  serviceName: string,
  componentName: string
): void {
  const stackId = context.cluster.getDesiredStackVersion();
  try {
    accumulator.serviceDisplayNames[serviceName] = catalog.getDisplayName(stackId, serviceName);
    accumulator.componentDisplayNames[`${serviceName}/${componentName}`] =
      catalog.getComponentDisplayName(stackId, serviceName, componentName);
  } catch (err) {
    log.debug('Could not get service detail', {
      service: serviceName,
      component: componentName,
      error: errorMessage(err),
    });
  }
}

/**
 * Render a group holder for logs
 */
export function describeGroupHolder(holder: UpgradeGroupHolder): string {
  return `UpgradeGroupHolder{name=${holder.name}, title=${holder.title}, allowRetry=${holder.allowRetry}, skippable=${holder.skippable}}`;
}

function dumpPlan(log: PlannerLogger, groups: UpgradeGroupHolder[]): void {
  for (const group of groups) {
    log.debug(group.name);
    group.items.forEach((stage, stageIndex) => {
      log.debug(`  Stage ${stageIndex}`);
      stage.tasks.forEach((wrapper, taskIndex) => {
        const tasks = wrapper.tasks.map(describeTask).join(', ');
        log.debug(`    Task ${taskIndex} ${wrapper.service}/${wrapper.component} on ${wrapper.hosts.join(',')}: ${tasks}`);
      });
    });
  }
}
