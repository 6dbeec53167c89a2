/**
 * Upgrade pack types
 *
 * An upgrade pack is the declarative definition of one upgrade path: the
 * ordered groupings for each direction plus the explicit task lists per
 * service/component.
 *
 * @example
 * ```yaml
 * name: nonrolling-upgrade-2.3
 * type: NON_ROLLING
 * targetStack: HDP-2.3
 * groups:
 *   upgrade:
 *     - kind: function
 *       name: stop-all
 *       title: Stop Services
 *       function: STOP
 *       services:
 *         - serviceName: HDFS
 *           components: [DATANODE, NAMENODE]
 * processing:
 *   HDFS:
 *     NAMENODE:
 *       tasks:
 *         - type: RESTART
 * ```
 */

import type { SecurityType } from '../cluster/types.js';
import type {
  Direction,
  FunctionName,
  ProcessingComponent,
  UpgradeScope,
  UpgradeType,
} from '../upgrade/types.js';

// =============================================================================
// Conditions
// =============================================================================

export type ConfigComparison = 'equals' | 'not-equals' | 'contains' | 'not-contains' | 'exists' | 'not-exists';

export const CONFIG_COMPARISONS: readonly ConfigComparison[] = [
  'equals',
  'not-equals',
  'contains',
  'not-contains',
  'exists',
  'not-exists',
];

/**
 * Satisfied when the cluster runs with the given security type
 */
export interface SecurityCondition {
  type: 'security';
  securityType: SecurityType;
}

/**
 * Satisfied when a desired configuration property compares as declared
 */
export interface ConfigCondition {
  type: 'config';
  configType: string;
  property: string;
  comparison: ConfigComparison;
  /** Required for every comparison except exists/not-exists */
  value?: string;
}

export type GroupCondition = SecurityCondition | ConfigCondition;

// =============================================================================
// Groupings
// =============================================================================

/**
 * Service and the ordered components of it a grouping touches
 */
export interface OrderService {
  serviceName: string;
  components: string[];
}

interface GroupingBase {
  name: string;
  title: string;
  /** Scope this grouping applies to (default: COMPLETE) */
  scope: UpgradeScope;
  condition?: GroupCondition;
  skippable: boolean;
  allowRetry: boolean;
  supportsAutoSkipOnFailure: boolean;
  performServiceCheck: boolean;
  services: OrderService[];
}

/**
 * Runs the explicit processing tasks of each component
 */
export interface DefaultGrouping extends GroupingBase {
  kind: 'default';
}

/**
 * Applies one implicit action (stop/start/restart) to every component
 */
export interface FunctionGrouping extends GroupingBase {
  kind: 'function';
  function: FunctionName;
}

/**
 * Runs service checks for the listed services
 */
export interface ServiceCheckGrouping extends GroupingBase {
  kind: 'service-check';
}

export type Grouping = DefaultGrouping | FunctionGrouping | ServiceCheckGrouping;

// =============================================================================
// Pack
// =============================================================================

/** Service → component → explicit processing */
export type ProcessingMap = Record<string, Record<string, ProcessingComponent>>;

export interface UpgradePack {
  name: string;
  type: UpgradeType;
  /** Stack the pack upgrades to, as `NAME-VERSION` */
  targetStack: string;
  groups: {
    upgrade: Grouping[];
    /** Defaults to the upgrade groupings in declared order */
    downgrade?: Grouping[];
  };
  processing: ProcessingMap;
}

/**
 * Groupings of a pack for a direction, in declared order
 */
export function getGroups(pack: UpgradePack, direction: Direction): Grouping[] {
  if (direction === 'DOWNGRADE') {
    return pack.groups.downgrade ?? pack.groups.upgrade;
  }
  return pack.groups.upgrade;
}

/**
 * Function of a grouping, if it has one
 */
export function getGroupingFunction(grouping: Grouping): FunctionName | undefined {
  return grouping.kind === 'function' ? grouping.function : undefined;
}
