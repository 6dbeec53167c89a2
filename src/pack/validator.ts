/**
 * Upgrade pack validation
 *
 * Turns a parsed YAML/JSON document into a typed `UpgradePack`, collecting
 * every problem on the way:
 * 1. Required fields - name, type, targetStack, groups.upgrade
 * 2. Known values - upgrade type, grouping kind, scope, function, task type
 * 3. Unique group names per direction
 * 4. Rolling packs warn about ordered services without processing
 *
 * @example Minimal pack
 * ```yaml
 * name: nonrolling-to-2.3
 * type: NON_ROLLING
 * targetStack: HDP-2.3
 * groups:
 *   upgrade:
 *     - name: stop-all
 *       kind: function
 *       function: STOP
 *       services:
 *         - serviceName: HDFS
 *           components: [NAMENODE, DATANODE]
 * ```
 */

import {
  FUNCTION_NAMES,
  TASK_TYPES,
  UPGRADE_SCOPES,
  UPGRADE_TYPES,
  type ProcessingComponent,
  type Task,
} from '../upgrade/types.js';
import { parseStackId } from '../upgrade/stack.js';
import { isRecord, isStringArray, oneOf } from '../utils/parse.js';
import {
  CONFIG_COMPARISONS,
  type GroupCondition,
  type Grouping,
  type OrderService,
  type ProcessingMap,
  type UpgradePack,
} from './types.js';
import {
  duplicateGroupName,
  invalidFieldType,
  invalidStackId,
  missingRequiredField,
  undefinedService,
  unknownValue,
  validationFailure,
  type ValidationIssue,
  type ValidationResult,
} from './errors.js';

const GROUPING_KINDS = ['default', 'function', 'service-check'] as const;
const SECURITY_TYPES = ['NONE', 'KERBEROS'] as const;

/**
 * Result of validating a document; `pack` is set only when it is valid
 */
export interface PackValidation {
  result: ValidationResult;
  pack?: UpgradePack;
}

/**
 * Validate a parsed upgrade pack document
 */
export function validateUpgradePack(data: unknown): PackValidation {
  const issues: ValidationIssue[] = [];

  if (!isRecord(data)) {
    issues.push(invalidFieldType('', 'object', data));
    return { result: validationFailure(issues) };
  }

  const name = requireString(data, 'name', '', issues);
  const type = requireOneOf(data, 'type', '', UPGRADE_TYPES, issues);
  const targetStack = requireString(data, 'targetStack', '', issues);
  if (targetStack !== undefined && parseStackId(targetStack) === null) {
    issues.push(invalidStackId('targetStack', targetStack));
  }

  const processing = validateProcessing(data.processing, issues);

  let upgrade: Grouping[] = [];
  let downgrade: Grouping[] | undefined;
  if (!isRecord(data.groups)) {
    issues.push(missingRequiredField('groups', 'upgrade'));
  } else {
    upgrade = validateGroupings(data.groups.upgrade, 'groups.upgrade', issues, true);
    if (data.groups.downgrade !== undefined) {
      downgrade = validateGroupings(data.groups.downgrade, 'groups.downgrade', issues, false);
    }
  }

  if (type === 'ROLLING') {
    warnUnprocessedServices(upgrade, processing, 'groups.upgrade', issues);
    warnUnprocessedServices(downgrade ?? [], processing, 'groups.downgrade', issues);
  }

  const result = validationFailure(issues);
  if (!result.valid || name === undefined || type === undefined || targetStack === undefined) {
    return { result };
  }

  return {
    result,
    pack: {
      name,
      type,
      targetStack,
      groups: downgrade === undefined ? { upgrade } : { upgrade, downgrade },
      processing,
    },
  };
}

// =============================================================================
// Field Helpers
// =============================================================================

function fieldPath(base: string, field: string): string {
  return base === '' ? field : `${base}.${field}`;
}

function requireString(
  record: Record<string, unknown>,
  field: string,
  path: string,
  issues: ValidationIssue[]
): string | undefined {
  const value = record[field];
  if (value === undefined || value === '') {
    issues.push(missingRequiredField(path === '' ? field : path, field));
    return undefined;
  }
  if (typeof value !== 'string') {
    issues.push(invalidFieldType(fieldPath(path, field), 'string', value));
    return undefined;
  }
  return value;
}

function optionalString(
  record: Record<string, unknown>,
  field: string,
  path: string,
  issues: ValidationIssue[]
): string | undefined {
  const value = record[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    issues.push(invalidFieldType(fieldPath(path, field), 'string', value));
    return undefined;
  }
  return value;
}

function optionalBoolean(
  record: Record<string, unknown>,
  field: string,
  path: string,
  fallback: boolean,
  issues: ValidationIssue[]
): boolean {
  const value = record[field];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    issues.push(invalidFieldType(fieldPath(path, field), 'boolean', value));
    return fallback;
  }
  return value;
}

function requireOneOf<T extends string>(
  record: Record<string, unknown>,
  field: string,
  path: string,
  allowed: readonly T[],
  issues: ValidationIssue[]
): T | undefined {
  const value = record[field];
  if (value === undefined) {
    issues.push(missingRequiredField(path === '' ? field : path, field));
    return undefined;
  }
  const match = oneOf(value, allowed);
  if (match === undefined) {
    issues.push(unknownValue(fieldPath(path, field), value, allowed));
  }
  return match;
}

// =============================================================================
// Groupings
// =============================================================================

function validateGroupings(
  value: unknown,
  path: string,
  issues: ValidationIssue[],
  required: boolean
): Grouping[] {
  if (value === undefined && required) {
    issues.push(missingRequiredField('groups', 'upgrade'));
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push(invalidFieldType(path, 'array', value));
    return [];
  }

  const groupings: Grouping[] = [];
  const seen = new Map<string, string>();

  value.forEach((entry: unknown, index) => {
    const entryPath = `${path}[${index}]`;
    const grouping = validateGrouping(entry, entryPath, issues);
    if (!grouping) return;

    const existing = seen.get(grouping.name);
    if (existing !== undefined) {
      issues.push(duplicateGroupName(entryPath, grouping.name, existing));
      return;
    }
    seen.set(grouping.name, entryPath);
    groupings.push(grouping);
  });

  return groupings;
}

function validateGrouping(
  entry: unknown,
  path: string,
  issues: ValidationIssue[]
): Grouping | undefined {
  if (!isRecord(entry)) {
    issues.push(invalidFieldType(path, 'object', entry));
    return undefined;
  }

  const name = requireString(entry, 'name', path, issues);
  const kind = entry.kind === undefined ? 'default' : requireOneOf(entry, 'kind', path, GROUPING_KINDS, issues);
  const scope = entry.scope === undefined ? 'COMPLETE' : requireOneOf(entry, 'scope', path, UPGRADE_SCOPES, issues);
  const title = optionalString(entry, 'title', path, issues);
  const condition = entry.condition === undefined
    ? undefined
    : validateCondition(entry.condition, fieldPath(path, 'condition'), issues);
  const services = validateOrderServices(entry.services, fieldPath(path, 'services'), issues);

  if (name === undefined || kind === undefined || scope === undefined) {
    return undefined;
  }

  const base = {
    name,
    title: title ?? name,
    scope,
    ...(condition ? { condition } : {}),
    skippable: optionalBoolean(entry, 'skippable', path, false, issues),
    allowRetry: optionalBoolean(entry, 'allowRetry', path, true, issues),
    supportsAutoSkipOnFailure: optionalBoolean(entry, 'supportsAutoSkipOnFailure', path, true, issues),
    performServiceCheck: optionalBoolean(entry, 'performServiceCheck', path, true, issues),
    services,
  };

  switch (kind) {
    case 'default':
      return { ...base, kind };
    case 'service-check':
      return { ...base, kind };
    case 'function': {
      const fn = requireOneOf(entry, 'function', path, FUNCTION_NAMES, issues);
      return fn === undefined ? undefined : { ...base, kind, function: fn };
    }
  }
}

function validateOrderServices(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): OrderService[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    issues.push(invalidFieldType(path, 'array', value));
    return [];
  }

  const services: OrderService[] = [];
  value.forEach((entry: unknown, index) => {
    const entryPath = `${path}[${index}]`;
    if (!isRecord(entry)) {
      issues.push(invalidFieldType(entryPath, 'object', entry));
      return;
    }
    const serviceName = requireString(entry, 'serviceName', entryPath, issues);
    const components = entry.components ?? [];
    if (!isStringArray(components)) {
      issues.push(invalidFieldType(fieldPath(entryPath, 'components'), 'string array', components));
      return;
    }
    if (serviceName !== undefined) {
      services.push({ serviceName, components });
    }
  });
  return services;
}

function validateCondition(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): GroupCondition | undefined {
  if (!isRecord(value)) {
    issues.push(invalidFieldType(path, 'object', value));
    return undefined;
  }

  const type = requireOneOf(value, 'type', path, ['security', 'config'] as const, issues);
  switch (type) {
    case undefined:
      return undefined;
    case 'security': {
      const securityType = requireOneOf(value, 'securityType', path, SECURITY_TYPES, issues);
      return securityType === undefined ? undefined : { type, securityType };
    }
    case 'config': {
      const configType = requireString(value, 'configType', path, issues);
      const property = requireString(value, 'property', path, issues);
      const comparison = requireOneOf(value, 'comparison', path, CONFIG_COMPARISONS, issues);
      const expected = optionalString(value, 'value', path, issues);
      if (configType === undefined || property === undefined || comparison === undefined) {
        return undefined;
      }
      return expected === undefined
        ? { type, configType, property, comparison }
        : { type, configType, property, comparison, value: expected };
    }
  }
}

// =============================================================================
// Processing
// =============================================================================

function validateProcessing(value: unknown, issues: ValidationIssue[]): ProcessingMap {
  const processing: ProcessingMap = {};
  if (value === undefined) return processing;
  if (!isRecord(value)) {
    issues.push(invalidFieldType('processing', 'object', value));
    return processing;
  }

  for (const [serviceName, components] of Object.entries(value)) {
    const servicePath = `processing.${serviceName}`;
    if (!isRecord(components)) {
      issues.push(invalidFieldType(servicePath, 'object', components));
      continue;
    }

    const byComponent: Record<string, ProcessingComponent> = {};
    for (const [componentName, definition] of Object.entries(components)) {
      const componentPath = `${servicePath}.${componentName}`;
      if (!isRecord(definition)) {
        issues.push(invalidFieldType(componentPath, 'object', definition));
        continue;
      }
      byComponent[componentName] = {
        name: componentName,
        tasks: validateTasks(definition.tasks, fieldPath(componentPath, 'tasks'), issues),
      };
    }
    processing[serviceName] = byComponent;
  }

  return processing;
}

function validateTasks(value: unknown, path: string, issues: ValidationIssue[]): Task[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    issues.push(invalidFieldType(path, 'array', value));
    return [];
  }

  const tasks: Task[] = [];
  value.forEach((entry: unknown, index) => {
    const task = validateTask(entry, `${path}[${index}]`, issues);
    if (task) tasks.push(task);
  });
  return tasks;
}

function validateTask(entry: unknown, path: string, issues: ValidationIssue[]): Task | undefined {
  if (!isRecord(entry)) {
    issues.push(invalidFieldType(path, 'object', entry));
    return undefined;
  }

  const type = requireOneOf(entry, 'type', path, TASK_TYPES, issues);
  const summary = optionalString(entry, 'summary', path, issues);
  const withSummary = summary === undefined ? {} : { summary };

  switch (type) {
    case undefined:
      return undefined;
    case 'MANUAL': {
      const messages = entry.messages ?? [];
      if (!isStringArray(messages)) {
        issues.push(invalidFieldType(fieldPath(path, 'messages'), 'string array', messages));
        return undefined;
      }
      return { type, messages, ...withSummary };
    }
    case 'EXECUTE': {
      const command = requireString(entry, 'command', path, issues);
      return command === undefined ? undefined : { type, command, ...withSummary };
    }
    case 'CONFIGURE': {
      const changeId = requireString(entry, 'changeId', path, issues);
      return changeId === undefined ? undefined : { type, changeId, ...withSummary };
    }
    case 'RESTART':
    case 'START':
    case 'STOP':
    case 'SERVICE_CHECK':
      return { type, ...withSummary };
  }
}

function warnUnprocessedServices(
  groupings: Grouping[],
  processing: ProcessingMap,
  path: string,
  issues: ValidationIssue[]
): void {
  groupings.forEach((grouping, index) => {
    if (grouping.kind === 'service-check') return;
    grouping.services.forEach((service, serviceIndex) => {
      if (processing[service.serviceName] === undefined) {
        issues.push(undefinedService(`${path}[${index}].services[${serviceIndex}]`, service.serviceName));
      }
    });
  });
}
