/**
 * Stage builders, one per grouping kind
 *
 * - default: every task of every component becomes its own stage, in the
 *   order components were added. Rolling restarts go one host at a time.
 * - function: components are processed side by side; the Nth task of every
 *   component lands in the same stage.
 * - service-check: one service check stage per service.
 *
 * Builders other than service-check append service checks for every service
 * they touched when the group performs service checks.
 */

import type { UpgradeContext } from '../upgrade/context.js';
import type {
  HostsType,
  ProcessingComponent,
  StageWrapper,
  Task,
  TaskType,
  TaskWrapper,
} from '../upgrade/types.js';
import { cloneTask, getTaskVerb } from '../upgrade/tasks.js';
import type { Grouping } from '../pack/types.js';
import type { StageBuilderOptions, StageWrapperBuilder } from './types.js';

// =============================================================================
// Shared
// =============================================================================

/**
 * One `add()` call as recorded by a builder
 */
interface BuilderEntry {
  service: string;
  component: string;
  hosts: string[];
  clientOnly: boolean;
  tasks: Task[];
  params: Record<string, string>;
}

/** Lifecycle tasks that only make sense for daemons */
const DAEMON_TASKS: ReadonlySet<TaskType> = new Set<TaskType>(['START', 'STOP', 'RESTART']);

abstract class RecordingStageBuilder implements StageWrapperBuilder {
  protected readonly entries: BuilderEntry[] = [];

  constructor(protected readonly options: StageBuilderOptions) {}

  add(
    _context: UpgradeContext,
    hostsType: HostsType,
    serviceName: string,
    clientOnly: boolean,
    processing: ProcessingComponent,
    params?: Record<string, string>
  ): void {
    this.entries.push({
      service: serviceName,
      component: processing.name,
      hosts: [...hostsType.hosts],
      clientOnly,
      tasks: processing.tasks,
      params: { ...params },
    });
  }

  abstract build(context: UpgradeContext): StageWrapper[];

  /**
   * Service check stages for every distinct service added, in add order
   */
  protected serviceCheckStages(): StageWrapper[] {
    if (!this.options.performServiceCheck) {
      return [];
    }

    const stages: StageWrapper[] = [];
    const seen = new Set<string>();
    for (const entry of this.entries) {
      if (seen.has(entry.service) || entry.hosts.length === 0) continue;
      seen.add(entry.service);
      stages.push({
        type: 'SERVICE_CHECK',
        text: `Service Check ${entry.service}`,
        tasks: [wrap(entry, entry.hosts.slice(0, 1), { type: 'SERVICE_CHECK' })],
      });
    }
    return stages;
  }
}

function wrap(entry: BuilderEntry, hosts: string[], task: Task): TaskWrapper {
  return {
    service: entry.service,
    component: entry.component,
    hosts: [...hosts],
    tasks: [cloneTask(task)],
    params: { ...entry.params },
  };
}

function stageText(task: Task, subject: string, hosts?: string[]): string {
  if (task.summary !== undefined) {
    return task.summary;
  }
  switch (task.type) {
    case 'MANUAL':
      return 'Manual Confirmation';
    case 'CONFIGURE':
      return `Updating configuration ${task.changeId}`;
    default: {
      const onHost = hosts?.length === 1 ? ` on ${hosts[0]}` : '';
      return `${getTaskVerb(task.type)} ${subject}${onHost}`;
    }
  }
}

function skipsClient(entry: BuilderEntry, task: Task): boolean {
  return entry.clientOnly && DAEMON_TASKS.has(task.type);
}

// =============================================================================
// Default Grouping
// =============================================================================

export class DefaultStageBuilder extends RecordingStageBuilder {
  build(context: UpgradeContext): StageWrapper[] {
    const stages: StageWrapper[] = [];

    for (const entry of this.entries) {
      for (const task of entry.tasks) {
        if (skipsClient(entry, task)) continue;

        if (task.type === 'RESTART' && context.type === 'ROLLING') {
          for (const host of entry.hosts) {
            stages.push({
              type: task.type,
              text: stageText(task, entry.component, [host]),
              tasks: [wrap(entry, [host], task)],
            });
          }
          continue;
        }

        stages.push({
          type: task.type,
          text: stageText(task, entry.component, entry.hosts),
          tasks: [wrap(entry, entry.hosts, task)],
        });
      }
    }

    return [...stages, ...this.serviceCheckStages()];
  }
}

// =============================================================================
// Function Grouping
// =============================================================================

export class FunctionStageBuilder extends RecordingStageBuilder {
  build(_context: UpgradeContext): StageWrapper[] {
    const stages: StageWrapper[] = [];
    const depth = Math.max(0, ...this.entries.map((entry) => entry.tasks.length));

    for (let index = 0; index < depth; index++) {
      // Same position, same task type → same stage
      const byType = new Map<TaskType, { task: Task; wrappers: TaskWrapper[]; components: string[] }>();

      for (const entry of this.entries) {
        const task = entry.tasks[index];
        if (task === undefined || skipsClient(entry, task)) continue;

        let bucket = byType.get(task.type);
        if (!bucket) {
          bucket = { task, wrappers: [], components: [] };
          byType.set(task.type, bucket);
        }
        bucket.wrappers.push(wrap(entry, entry.hosts, task));
        if (!bucket.components.includes(entry.component)) {
          bucket.components.push(entry.component);
        }
      }

      for (const [type, bucket] of byType) {
        stages.push({
          type,
          text: stageText(bucket.task, bucket.components.join(', ')),
          tasks: bucket.wrappers,
        });
      }
    }

    return [...stages, ...this.serviceCheckStages()];
  }
}

// =============================================================================
// Service Check Grouping
// =============================================================================

export class ServiceCheckStageBuilder extends RecordingStageBuilder {
  build(_context: UpgradeContext): StageWrapper[] {
    return this.serviceCheckStages();
  }
}

/**
 * Create the builder for a grouping's kind
 */
export function createStageBuilder(
  grouping: Grouping,
  options: StageBuilderOptions
): StageWrapperBuilder {
  switch (grouping.kind) {
    case 'default':
      return new DefaultStageBuilder(options);
    case 'function':
      return new FunctionStageBuilder(options);
    case 'service-check':
      return new ServiceCheckStageBuilder({ performServiceCheck: true });
  }
}
