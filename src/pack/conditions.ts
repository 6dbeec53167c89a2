/**
 * Grouping condition evaluation
 */

import type { UpgradeContext } from '../upgrade/context.js';
import type { ConfigCondition, GroupCondition } from './types.js';

/**
 * Evaluate a grouping condition against the cluster in the context
 */
export function isConditionSatisfied(condition: GroupCondition, context: UpgradeContext): boolean {
  switch (condition.type) {
    case 'security':
      return context.cluster.securityType === condition.securityType;
    case 'config':
      return isConfigConditionSatisfied(condition, context);
  }
}

function isConfigConditionSatisfied(condition: ConfigCondition, context: UpgradeContext): boolean {
  const config = context.cluster.getDesiredConfigByType(condition.configType);
  const actual = config?.properties[condition.property];
  const expected = condition.value ?? '';

  switch (condition.comparison) {
    case 'exists':
      return actual !== undefined;
    case 'not-exists':
      return actual === undefined;
    case 'equals':
      return actual === expected;
    case 'not-equals':
      return actual !== expected;
    case 'contains':
      return actual !== undefined && actual.includes(expected);
    case 'not-contains':
      return actual === undefined || !actual.includes(expected);
  }
}

/**
 * Render a condition for logs
 */
export function describeCondition(condition: GroupCondition): string {
  switch (condition.type) {
    case 'security':
      return `security=${condition.securityType}`;
    case 'config': {
      const value = condition.value === undefined ? '' : ` '${condition.value}'`;
      return `${condition.configType}/${condition.property} ${condition.comparison}${value}`;
    }
  }
}
