/**
 * Stack id helpers
 */

import type { StackId } from './types.js';

/**
 * Parse `NAME-VERSION` into a stack id. The version is everything after the
 * last dash, so stack names may themselves contain dashes.
 *
 * @example
 * parseStackId('HDP-2.3') // { stackName: 'HDP', stackVersion: '2.3' }
 */
export function parseStackId(value: string): StackId | null {
  const index = value.lastIndexOf('-');
  if (index <= 0 || index === value.length - 1) {
    return null;
  }
  return {
    stackName: value.slice(0, index),
    stackVersion: value.slice(index + 1),
  };
}

export function formatStackId(stackId: StackId): string {
  return `${stackId.stackName}-${stackId.stackVersion}`;
}

export function sameStack(a: StackId, b: StackId): boolean {
  return a.stackName === b.stackName && a.stackVersion === b.stackVersion;
}
