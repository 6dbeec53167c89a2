/**
 * Cluster topology files
 *
 * A topology file describes a cluster well enough to plan and reconcile
 * against it without a server: services, component hosts, registered
 * repository versions, live configuration and stack defaults.
 *
 * @example
 * ```yaml
 * clusterName: c1
 * stack: HDP-2.2
 * currentVersion: 2.2.0.0
 * repositoryVersions:
 *   - { version: 2.2.0.0, stack: HDP-2.2 }
 *   - { version: 2.3.0.0, stack: HDP-2.3 }
 * services:
 *   ZOOKEEPER:
 *     components:
 *       ZOOKEEPER_SERVER: { hosts: [h1, h2, h3] }
 * configurations:
 *   zoo.cfg:
 *     service: ZOOKEEPER
 *     properties: { tickTime: "2000" }
 * stackDefaults:
 *   HDP-2.2:
 *     ZOOKEEPER:
 *       zoo.cfg: { tickTime: "2000" }
 * ```
 */

import { isAbsolute, resolve } from 'node:path';
import type { SchemaOptions } from 'yaml';
import { PlanningInputError } from '../errors.js';
import { readDocument } from '../pack/loader.js';
import {
  PackLoadError,
  invalidFieldType,
  invalidStackId,
  missingRequiredField,
  unknownValue,
  validationFailure,
  type ValidationIssue,
} from '../pack/errors.js';
import { InMemoryCatalog, type CatalogDefinition } from '../catalog/in-memory.js';
import { StaticHostResolver, type ComponentHosts } from '../resolver/static-resolver.js';
import { UpgradeContext } from '../upgrade/context.js';
import { formatStackId, parseStackId } from '../upgrade/stack.js';
import type {
  Direction,
  RepositoryVersion,
  StackId,
  UpgradeScope,
  UpgradeType,
} from '../upgrade/types.js';
import { isRecord, isStringArray, oneOf, scalarToString } from '../utils/parse.js';
import { InMemoryCluster, InMemoryClusterStore, type ClusterState, type StoredRevision } from './in-memory.js';
import type { DefaultPropertyMap, DefaultsByType, PropertyMap, SecurityType, UpgradeState } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ComponentTopology extends ComponentHosts {
  name: string;
  displayName?: string;
  /** Component reports its own version (default: true) */
  advertiseVersion: boolean;
}

export interface ServiceTopology {
  name: string;
  displayName?: string;
  clientOnly: boolean;
  /** Version the service runs, when it differs from the cluster's */
  version?: string;
  components: ComponentTopology[];
}

export interface LiveConfigTopology {
  type: string;
  service: string;
  tag: string;
  properties: PropertyMap;
}

export interface ClusterTopology {
  clusterName: string;
  securityType: SecurityType;
  /** Desired stack of the cluster */
  stack: StackId;
  namenodeHA: boolean;
  /** Version every service runs unless it names its own */
  currentVersion: string;
  repositoryVersions: RepositoryVersion[];
  services: ServiceTopology[];
  configurations: LiveConfigTopology[];
  /** Stack id → service → defaults by configuration type */
  stackDefaults: Record<string, Record<string, DefaultsByType>>;
}

/**
 * Collaborators backed by one topology
 */
export interface TopologyCollaborators {
  store: InMemoryClusterStore;
  cluster: InMemoryCluster;
  resolver: StaticHostResolver;
  catalog: InMemoryCatalog;
}

// =============================================================================
// Loading
// =============================================================================

const NUMBER_TAGS: ReadonlySet<string> = new Set(['tag:yaml.org,2002:int', 'tag:yaml.org,2002:float']);
const NUMBER_TAG_IDS: ReadonlySet<string> = new Set(['int', 'intHex', 'intOct', 'float', 'floatExp', 'floatNaN']);

/**
 * Plain numbers are read as text so property values keep their written
 * form (`0.10` stays `0.10`)
 */
export const TOPOLOGY_YAML: SchemaOptions = {
  customTags: (tags) =>
    tags.filter((tag) => (typeof tag === 'string' ? !NUMBER_TAG_IDS.has(tag) : !NUMBER_TAGS.has(tag.tag))),
};

export async function loadClusterTopology(path: string, basePath?: string): Promise<ClusterTopology> {
  const filePath = isAbsolute(path) ? path : resolve(basePath ?? process.cwd(), path);
  return parseClusterTopology(await readDocument(filePath, TOPOLOGY_YAML), filePath);
}

/**
 * Validate a parsed topology document
 *
 * @throws PackLoadError with every issue found
 */
export function parseClusterTopology(data: unknown, source = 'topology'): ClusterTopology {
  const issues: ValidationIssue[] = [];
  const fail = (): never => {
    throw new PackLoadError(
      `Invalid cluster topology ${source}: ${issues.length} error(s)`,
      'INVALID_CONTENT',
      validationFailure(issues)
    );
  };

  if (!isRecord(data)) {
    issues.push(invalidFieldType('', 'object', data));
    return fail();
  }

  const clusterName = requireString(data, 'clusterName', issues);
  const currentVersion = requireString(data, 'currentVersion', issues);
  const stack = requireStack(data.stack, 'stack', issues);

  const securityType = data.securityType === undefined
    ? 'NONE'
    : oneOf(data.securityType, ['NONE', 'KERBEROS'] as const);
  if (securityType === undefined) {
    issues.push(unknownValue('securityType', data.securityType, ['NONE', 'KERBEROS']));
  }

  const namenodeHA = data.namenodeHA ?? false;
  if (typeof namenodeHA !== 'boolean') {
    issues.push(invalidFieldType('namenodeHA', 'boolean', namenodeHA));
  }

  const repositoryVersions = parseRepositoryVersions(data.repositoryVersions, issues);
  const services = parseServices(data.services, issues);
  const configurations = parseConfigurations(data.configurations, issues);
  const stackDefaults = parseStackDefaults(data.stackDefaults, issues);

  if (
    clusterName === undefined ||
    currentVersion === undefined ||
    stack === undefined ||
    securityType === undefined ||
    typeof namenodeHA !== 'boolean' ||
    issues.length > 0
  ) {
    return fail();
  }

  return {
    clusterName,
    securityType,
    stack,
    namenodeHA,
    currentVersion,
    repositoryVersions,
    services,
    configurations,
    stackDefaults,
  };
}

function requireString(record: Record<string, unknown>, field: string, issues: ValidationIssue[]): string | undefined {
  const value = scalarToString(record[field]);
  if (value === undefined || value === '') {
    issues.push(missingRequiredField(field, field));
  }
  return value;
}

function requireStack(value: unknown, path: string, issues: ValidationIssue[]): StackId | undefined {
  if (typeof value !== 'string') {
    issues.push(missingRequiredField(path, 'stack'));
    return undefined;
  }
  const stackId = parseStackId(value);
  if (!stackId) {
    issues.push(invalidStackId(path, value));
    return undefined;
  }
  return stackId;
}

function parseRepositoryVersions(value: unknown, issues: ValidationIssue[]): RepositoryVersion[] {
  if (!Array.isArray(value)) {
    issues.push(missingRequiredField('repositoryVersions', 'repositoryVersions'));
    return [];
  }

  const versions: RepositoryVersion[] = [];
  value.forEach((entry: unknown, index) => {
    const path = `repositoryVersions[${index}]`;
    if (!isRecord(entry)) {
      issues.push(invalidFieldType(path, 'object', entry));
      return;
    }
    const version = scalarToString(entry.version);
    const stackId = requireStack(entry.stack, `${path}.stack`, issues);
    if (version === undefined) {
      issues.push(missingRequiredField(path, 'version'));
      return;
    }
    if (stackId) {
      versions.push({ version, stackId });
    }
  });
  return versions;
}

function parseServices(value: unknown, issues: ValidationIssue[]): ServiceTopology[] {
  if (value === undefined) return [];
  if (!isRecord(value)) {
    issues.push(invalidFieldType('services', 'object', value));
    return [];
  }

  const services: ServiceTopology[] = [];
  for (const [name, entry] of Object.entries(value)) {
    const path = `services.${name}`;
    if (!isRecord(entry)) {
      issues.push(invalidFieldType(path, 'object', entry));
      continue;
    }
    const service: ServiceTopology = {
      name,
      clientOnly: entry.clientOnly === true,
      components: parseComponents(entry.components, `${path}.components`, issues),
    };
    const displayName = scalarToString(entry.displayName);
    if (displayName !== undefined) service.displayName = displayName;
    const version = scalarToString(entry.version);
    if (version !== undefined) service.version = version;
    services.push(service);
  }
  return services;
}

function parseComponents(value: unknown, path: string, issues: ValidationIssue[]): ComponentTopology[] {
  if (value === undefined) return [];
  if (!isRecord(value)) {
    issues.push(invalidFieldType(path, 'object', value));
    return [];
  }

  const components: ComponentTopology[] = [];
  for (const [name, entry] of Object.entries(value)) {
    const componentPath = `${path}.${name}`;
    if (!isRecord(entry)) {
      issues.push(invalidFieldType(componentPath, 'object', entry));
      continue;
    }
    const hosts = entry.hosts ?? [];
    const unhealthy = entry.unhealthy ?? [];
    if (!isStringArray(hosts) || !isStringArray(unhealthy)) {
      issues.push(invalidFieldType(componentPath, 'string arrays for hosts/unhealthy', entry.hosts));
      continue;
    }

    const component: ComponentTopology = {
      name,
      hosts,
      unhealthy,
      advertiseVersion: entry.advertiseVersion !== false,
    };
    const displayName = scalarToString(entry.displayName);
    if (displayName !== undefined) component.displayName = displayName;
    if (typeof entry.master === 'string') component.master = entry.master;
    if (typeof entry.secondary === 'string') component.secondary = entry.secondary;
    components.push(component);
  }
  return components;
}

function parseProperties(value: unknown, path: string, issues: ValidationIssue[]): PropertyMap {
  const properties: PropertyMap = {};
  if (value === undefined) return properties;
  if (!isRecord(value)) {
    issues.push(invalidFieldType(path, 'object', value));
    return properties;
  }
  for (const [key, raw] of Object.entries(value)) {
    const text = scalarToString(raw);
    if (text === undefined) {
      issues.push(invalidFieldType(`${path}.${key}`, 'scalar', raw));
      continue;
    }
    properties[key] = text;
  }
  return properties;
}

function parseConfigurations(value: unknown, issues: ValidationIssue[]): LiveConfigTopology[] {
  if (value === undefined) return [];
  if (!isRecord(value)) {
    issues.push(invalidFieldType('configurations', 'object', value));
    return [];
  }

  const configurations: LiveConfigTopology[] = [];
  for (const [type, entry] of Object.entries(value)) {
    const path = `configurations.${type}`;
    if (!isRecord(entry)) {
      issues.push(invalidFieldType(path, 'object', entry));
      continue;
    }
    const service = scalarToString(entry.service);
    if (service === undefined) {
      issues.push(missingRequiredField(path, 'service'));
      continue;
    }
    configurations.push({
      type,
      service,
      tag: scalarToString(entry.tag) ?? 'version1',
      properties: parseProperties(entry.properties, `${path}.properties`, issues),
    });
  }
  return configurations;
}

function parseStackDefaults(
  value: unknown,
  issues: ValidationIssue[]
): Record<string, Record<string, DefaultsByType>> {
  const defaults: Record<string, Record<string, DefaultsByType>> = {};
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    issues.push(invalidFieldType('stackDefaults', 'object', value));
    return defaults;
  }

  for (const [stack, services] of Object.entries(value)) {
    if (!parseStackId(stack)) {
      issues.push(invalidStackId(`stackDefaults.${stack}`, stack));
      continue;
    }
    if (!isRecord(services)) {
      issues.push(invalidFieldType(`stackDefaults.${stack}`, 'object', services));
      continue;
    }

    const byService: Record<string, DefaultsByType> = {};
    for (const [service, types] of Object.entries(services)) {
      const servicePath = `stackDefaults.${stack}.${service}`;
      if (!isRecord(types)) {
        issues.push(invalidFieldType(servicePath, 'object', types));
        continue;
      }
      const byType: DefaultsByType = {};
      for (const [type, properties] of Object.entries(types)) {
        byType[type] = parseDefaults(properties, `${servicePath}.${type}`, issues);
      }
      byService[service] = byType;
    }
    defaults[stack] = byService;
  }
  return defaults;
}

/**
 * Like `parseProperties`, but `null` marks a property the stack dropped
 */
function parseDefaults(value: unknown, path: string, issues: ValidationIssue[]): DefaultPropertyMap {
  const defaults: DefaultPropertyMap = {};
  if (!isRecord(value)) {
    issues.push(invalidFieldType(path, 'object', value));
    return defaults;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (raw === null) {
      defaults[key] = null;
      continue;
    }
    const text = scalarToString(raw);
    if (text === undefined) {
      issues.push(invalidFieldType(`${path}.${key}`, 'scalar or null', raw));
      continue;
    }
    defaults[key] = text;
  }
  return defaults;
}

// =============================================================================
// Collaborators
// =============================================================================

export function findRepositoryVersion(
  topology: ClusterTopology,
  version: string
): RepositoryVersion | undefined {
  return topology.repositoryVersions.find((rv) => rv.version === version);
}

const INITIAL_UPGRADE_STATE: UpgradeState = 'NONE';

/**
 * Build the store, cluster view, resolver and catalog for a topology
 */
export function createTopologyCollaborators(topology: ClusterTopology): TopologyCollaborators {
  const desiredStack = formatStackId(topology.stack);

  const revisions: StoredRevision[] = topology.configurations.map((config, index) => ({
    type: config.type,
    serviceName: config.service,
    stack: desiredStack,
    tag: config.tag,
    version: index + 1,
    properties: { ...config.properties },
  }));

  const state: ClusterState = {
    clusterName: topology.clusterName,
    securityType: topology.securityType,
    desiredStack: { ...topology.stack },
    services: topology.services.map((service) => ({
      name: service.name,
      clientOnly: service.clientOnly,
      desiredRepository: findRepositoryVersion(topology, service.version ?? topology.currentVersion),
      components: service.components.map((component) => ({
        name: component.name,
        desiredVersion: service.version ?? topology.currentVersion,
        hosts: component.hosts.map((hostName) => ({
          hostName,
          upgradeState: INITIAL_UPGRADE_STATE,
          version: service.version ?? topology.currentVersion,
        })),
      })),
    })),
    revisions,
    current: Object.fromEntries(revisions.map((revision) => [revision.type, revision.version])),
    defaults: structuredClone(topology.stackDefaults),
    componentRepositories: {},
  };

  const hosts: Record<string, Record<string, ComponentHosts>> = {};
  for (const service of topology.services) {
    hosts[service.name] = Object.fromEntries(
      service.components.map((component) => [component.name, component])
    );
  }

  const catalogServices = topology.services.map((service) => ({
    name: service.name,
    displayName: service.displayName,
    components: service.components.map((component) => ({
      name: component.name,
      displayName: component.displayName,
      advertiseVersion: component.advertiseVersion,
    })),
  }));
  const definition: CatalogDefinition = {};
  for (const rv of topology.repositoryVersions) {
    definition[formatStackId(rv.stackId)] = catalogServices;
  }
  definition[desiredStack] = catalogServices;

  const store = new InMemoryClusterStore(state);
  return {
    store,
    cluster: new InMemoryCluster(store),
    resolver: new StaticHostResolver(hosts, topology.namenodeHA),
    catalog: new InMemoryCatalog(definition),
  };
}

// =============================================================================
// Context
// =============================================================================

export interface TopologyContextRequest {
  direction: Direction;
  type: UpgradeType;
  scope?: UpgradeScope;
  /** Version the cluster moves to */
  targetVersion: string;
  /** Version the cluster moves from (default: each service's current version) */
  sourceVersion?: string;
}

/**
 * Build an upgrade context for every service in the topology
 *
 * @throws PlanningInputError when a version is not registered
 */
export function createTopologyContext(
  topology: ClusterTopology,
  collaborators: Pick<TopologyCollaborators, 'cluster' | 'resolver'>,
  request: TopologyContextRequest
): UpgradeContext {
  const lookup = (version: string): RepositoryVersion => {
    const rv = findRepositoryVersion(topology, version);
    if (!rv) {
      throw new PlanningInputError(
        `Repository version ${version} was not found`,
        'REPOSITORY_VERSION_NOT_FOUND',
        { version }
      );
    }
    return rv;
  };

  const target = lookup(request.targetVersion);
  const sourceVersions: Record<string, RepositoryVersion> = {};
  const targetVersions: Record<string, RepositoryVersion> = {};
  for (const service of topology.services) {
    sourceVersions[service.name] = lookup(request.sourceVersion ?? service.version ?? topology.currentVersion);
    targetVersions[service.name] = target;
  }

  const source = lookup(request.sourceVersion ?? topology.currentVersion);

  return new UpgradeContext({
    cluster: collaborators.cluster,
    resolver: collaborators.resolver,
    direction: request.direction,
    type: request.type,
    scope: request.scope,
    repositoryVersion: request.direction === 'DOWNGRADE' ? source : target,
    sourceVersions,
    targetVersions,
    supportedServices: topology.services.map((service) => service.name),
  });
}
