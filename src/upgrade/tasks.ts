/**
 * Task helpers
 */

import type { CommandTask, FunctionName, Task, TaskType } from './types.js';

const TASK_VERBS: Record<TaskType, string> = {
  MANUAL: 'Confirming',
  RESTART: 'Restarting',
  START: 'Starting',
  STOP: 'Stopping',
  EXECUTE: 'Executing',
  CONFIGURE: 'Configuring',
  SERVICE_CHECK: 'Checking',
};

/**
 * Create the single task a function grouping implies
 */
export function createFunctionTask(fn: FunctionName): CommandTask {
  return { type: fn };
}

/**
 * Copy a task so that rewriting its text never touches the pack it came from
 */
export function cloneTask(task: Task): Task {
  return task.type === 'MANUAL' ? { ...task, messages: [...task.messages] } : { ...task };
}

/** Present participle for stage text, e.g. `Restarting` */
export function getTaskVerb(type: TaskType): string {
  return TASK_VERBS[type];
}

/**
 * Render a task for debug logs
 */
export function describeTask(task: Task): string {
  switch (task.type) {
    case 'MANUAL':
      return `MANUAL(${task.messages.length} message(s))`;
    case 'EXECUTE':
      return `EXECUTE(${task.command})`;
    case 'CONFIGURE':
      return `CONFIGURE(${task.changeId})`;
    default:
      return task.type;
  }
}
