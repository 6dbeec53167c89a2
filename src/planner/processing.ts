/**
 * Processing component resolution
 *
 * Explicit pack entries drive default groupings. Function groupings may omit
 * them:
 * - STOP is always synthesized, even when the pack lists the component
 * - START/RESTART prefer the pack entry and fall back to a synthesized task
 */

import type { FunctionName, ProcessingComponent } from '../upgrade/types.js';
import { createFunctionTask } from '../upgrade/tasks.js';
import type { ProcessingMap } from '../pack/types.js';

/**
 * Explicit processing for a service/component, if the pack has one
 */
export function findProcessingComponent(
  processing: ProcessingMap,
  serviceName: string,
  componentName: string
): ProcessingComponent | undefined {
  return processing[serviceName]?.[componentName];
}

/**
 * Resolve the processing component for a service/component, synthesizing one
 * for function groupings where the pack is silent.
 *
 * @returns undefined when no processing can be produced (the caller skips)
 */
export function resolveProcessingComponent(
  processing: ProcessingMap,
  serviceName: string,
  componentName: string,
  fn?: FunctionName
): ProcessingComponent | undefined {
  if (fn === undefined) {
    return findProcessingComponent(processing, serviceName, componentName);
  }

  if (fn === 'STOP') {
    return synthesize(componentName, fn);
  }

  return findProcessingComponent(processing, serviceName, componentName)
    ?? synthesize(componentName, fn);
}

function synthesize(componentName: string, fn: FunctionName): ProcessingComponent {
  return {
    name: componentName,
    tasks: [createFunctionTask(fn)],
  };
}
