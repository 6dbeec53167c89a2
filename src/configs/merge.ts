/**
 * Three-way configuration merge
 *
 * Overlays a service's live configuration onto the new stack's defaults,
 * using the old stack's defaults to tell customized values from untouched
 * ones:
 *
 * | live vs new default | live vs old default | result        |
 * |---------------------|---------------------|---------------|
 * | equal               | -                   | new default   |
 * | different           | equal               | new default   |
 * | different           | different           | live value    |
 * | no new default      | -                   | live value    |
 *
 * A property the old stack shipped that is missing from the live
 * configuration was removed on purpose and is not reintroduced.
 *
 * Null defaults mark properties the new stack no longer ships; they never
 * reach the result unless the live configuration has the property.
 */

import type {
  ConfigRevision,
  DefaultPropertyMap,
  DefaultsByType,
  PropertiesByType,
  PropertyMap,
} from '../cluster/types.js';

export interface MergeInput {
  /** Defaults of the service on the stack it runs today */
  oldDefaults: DefaultsByType;
  /** Defaults of the service on the stack it moves to */
  newDefaults: DefaultsByType;
  /** Current configuration of each type the service owns */
  live: ConfigRevision[];
}

export interface MergeResult {
  /** Properties per configuration type for the new revision */
  configs: PropertiesByType;
  /** Live types the new stack does not define, carried over unchanged */
  carriedOver: string[];
  /** `type/property` keys where a customized live value beat the new default */
  customized: string[];
  /** `type/property` keys dropped because the cluster had removed them */
  removed: string[];
}

/**
 * Drop null values
 */
export function stripNullDefaults(defaults: DefaultPropertyMap): PropertyMap {
  const properties: PropertyMap = {};
  for (const [key, value] of Object.entries(defaults)) {
    if (value !== null) {
      properties[key] = value;
    }
  }
  return properties;
}

export function mergeServiceConfigurations(input: MergeInput): MergeResult {
  const { oldDefaults, newDefaults, live } = input;
  const configs: PropertiesByType = {};
  const carriedOver: string[] = [];
  const customized: string[] = [];
  const removed: string[] = [];

  for (const [type, defaults] of Object.entries(newDefaults)) {
    configs[type] = stripNullDefaults(defaults);
  }

  for (const revision of live) {
    const { type, properties: existing } = revision;

    if (newDefaults[type] === undefined) {
      configs[type] = { ...existing };
      carriedOver.push(type);
      continue;
    }

    const oldTypeDefaults: DefaultPropertyMap = oldDefaults[type] ?? {};
    const merged = stripNullDefaults(newDefaults[type]);

    for (const [key, value] of Object.entries(existing)) {
      if (!Object.hasOwn(merged, key)) {
        merged[key] = value;
        continue;
      }
      if (merged[key] !== value && oldTypeDefaults[key] !== value) {
        merged[key] = value;
        customized.push(`${type}/${key}`);
      }
    }

    for (const key of Object.keys(merged)) {
      if (Object.hasOwn(oldTypeDefaults, key) && !Object.hasOwn(existing, key)) {
        delete merged[key];
        removed.push(`${type}/${key}`);
      }
    }

    configs[type] = merged;
  }

  return { configs, carriedOver, customized, removed };
}
