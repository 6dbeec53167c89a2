/**
 * Core upgrade domain types
 *
 * Shared by the planner, the stage builders and the configuration
 * reconciler. Plans produced from these types are handed to an external
 * executor; nothing here knows how a task actually runs on a host.
 */

// =============================================================================
// Direction / Type / Scope
// =============================================================================

/**
 * Whether the cluster moves to a newer or an older repository version
 */
export type Direction = 'UPGRADE' | 'DOWNGRADE';

/**
 * Orchestration strategy of an upgrade pack
 */
export type UpgradeType = 'ROLLING' | 'NON_ROLLING' | 'HOST_ORDERED';

/**
 * Scope of an upgrade (or of a grouping that only applies to one scope)
 */
export type UpgradeScope = 'COMPLETE' | 'PARTIAL' | 'ANY';

export const DIRECTIONS: readonly Direction[] = ['UPGRADE', 'DOWNGRADE'];
export const UPGRADE_TYPES: readonly UpgradeType[] = ['ROLLING', 'NON_ROLLING', 'HOST_ORDERED'];
export const UPGRADE_SCOPES: readonly UpgradeScope[] = ['COMPLETE', 'PARTIAL', 'ANY'];

// =============================================================================
// Stacks and Repository Versions
// =============================================================================

/**
 * Stack identity, rendered as `NAME-VERSION` (e.g. `HDP-2.3`)
 */
export interface StackId {
  stackName: string;
  stackVersion: string;
}

/**
 * A registered repository version and the stack it belongs to
 */
export interface RepositoryVersion {
  /** Full build version, e.g. `2.3.0.0-2557` */
  version: string;
  stackId: StackId;
}

// =============================================================================
// Tasks
// =============================================================================

export type TaskType =
  | 'MANUAL'
  | 'RESTART'
  | 'START'
  | 'STOP'
  | 'EXECUTE'
  | 'CONFIGURE'
  | 'SERVICE_CHECK';

export const TASK_TYPES: readonly TaskType[] = [
  'MANUAL',
  'RESTART',
  'START',
  'STOP',
  'EXECUTE',
  'CONFIGURE',
  'SERVICE_CHECK',
];

/**
 * Implicit action of a function grouping
 */
export type FunctionName = 'STOP' | 'START' | 'RESTART';

export const FUNCTION_NAMES: readonly FunctionName[] = ['STOP', 'START', 'RESTART'];

interface TaskBase {
  /** Display summary; may carry `{{...}}` placeholder tokens */
  summary?: string;
}

/**
 * Instruction shown to the operator, who confirms it by hand
 */
export interface ManualTask extends TaskBase {
  type: 'MANUAL';
  messages: string[];
}

/**
 * Runs a command on the target hosts
 */
export interface ExecuteTask extends TaskBase {
  type: 'EXECUTE';
  command: string;
}

/**
 * Applies a named configuration change
 */
export interface ConfigureTask extends TaskBase {
  type: 'CONFIGURE';
  changeId: string;
}

/**
 * Lifecycle command with no extra payload
 */
export interface CommandTask extends TaskBase {
  type: 'RESTART' | 'START' | 'STOP' | 'SERVICE_CHECK';
}

export type Task = ManualTask | ExecuteTask | ConfigureTask | CommandTask;

/**
 * Ordered tasks for one component of a service
 */
export interface ProcessingComponent {
  name: string;
  tasks: Task[];
}

// =============================================================================
// Hosts
// =============================================================================

/**
 * Hosts resolved for one service/component
 */
export interface HostsType {
  /** Target hosts, in order, without duplicates */
  hosts: string[];
  /** Active master (for HA components) */
  master?: string;
  /** Standby/secondary master (for HA components) */
  secondary?: string;
  /** Hosts that are currently unhealthy */
  unhealthy: string[];
}

// =============================================================================
// Plan Output
// =============================================================================

/**
 * Tasks bound to one service/component and a host set
 */
export interface TaskWrapper {
  service: string;
  component: string;
  hosts: string[];
  tasks: Task[];
  /** Extra command parameters (e.g. `desired_namenode_role`) */
  params: Record<string, string>;
}

/**
 * One executable step; every task wrapper in it may run concurrently
 */
export interface StageWrapper {
  /** Kind of work performed by the stage */
  type: TaskType;
  /** Display text; may carry `{{...}}` placeholder tokens until post-processed */
  text?: string;
  tasks: TaskWrapper[];
}

/**
 * Kind of grouping a holder was produced from
 */
export type GroupingKind = 'default' | 'function' | 'service-check';

/**
 * Planned group: one named phase of the upgrade
 */
export interface UpgradeGroupHolder {
  name: string;
  title: string;
  groupKind: GroupingKind;
  /** Whether retry is allowed for the stages in this group */
  allowRetry: boolean;
  /** Whether a failed stage may be skipped; always true on downgrade */
  skippable: boolean;
  /** Whether failed tasks may be skipped automatically */
  supportsAutoSkipOnFailure: boolean;
  /** Whether the group runs service checks */
  performServiceCheck: boolean;
  items: StageWrapper[];
}
