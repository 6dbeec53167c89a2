/**
 * Shared test fixtures: cluster view, context, pack and logger builders
 */

import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  Cluster,
  ClusterService,
  ConfigRevision,
  SecurityType,
} from '../src/cluster/types.js';
import { InMemoryCatalog } from '../src/catalog/in-memory.js';
import type {
  DefaultGrouping,
  FunctionGrouping,
  Grouping,
  OrderService,
  ProcessingMap,
  ServiceCheckGrouping,
  UpgradePack,
} from '../src/pack/types.js';
import { StaticHostResolver } from '../src/resolver/static-resolver.js';
import { UpgradeContext, type UpgradeContextInit } from '../src/upgrade/context.js';
import type {
  FunctionName,
  RepositoryVersion,
  StackId,
  UpgradeType,
} from '../src/upgrade/types.js';
import { createLogger, type LogLevel, type PlannerLogger } from '../src/utils/logger.js';

export const FIXTURES = resolve(dirname(fileURLToPath(import.meta.url)), 'fixtures');

// =============================================================================
// Versions
// =============================================================================

export const HDP_22: StackId = { stackName: 'HDP', stackVersion: '2.2' };
export const HDP_23: StackId = { stackName: 'HDP', stackVersion: '2.3' };
export const RV_220: RepositoryVersion = { version: '2.2.0.0', stackId: HDP_22 };
export const RV_230: RepositoryVersion = { version: '2.3.0.0', stackId: HDP_23 };

// =============================================================================
// Cluster / Context
// =============================================================================

export class TestCluster implements Cluster {
  constructor(
    readonly clusterName = 'c1',
    readonly securityType: SecurityType = 'NONE',
    private readonly services: ClusterService[] = [],
    private readonly configs: ConfigRevision[] = []
  ) {}

  getDesiredStackVersion(): StackId {
    return { ...HDP_22 };
  }

  getService(serviceName: string): ClusterService | undefined {
    return this.services.find((service) => service.name === serviceName);
  }

  getDesiredConfigByType(configType: string): ConfigRevision | undefined {
    return this.configs.find((config) => config.type === configType);
  }
}

export const testResolver = (namenodeHA = true): StaticHostResolver =>
  new StaticHostResolver(
    {
      A: { A1: { hosts: ['h1'] } },
      B: { B1: { hosts: ['h2'] } },
      ZOOKEEPER: { ZOOKEEPER_SERVER: { hosts: ['h1', 'h2', 'h3'] } },
      HDFS: {
        NAMENODE: { hosts: ['h1', 'h2'], master: 'h1', secondary: 'h2' },
        DATANODE: { hosts: ['h2', 'h3', 'h4'], unhealthy: ['h4'] },
      },
    },
    namenodeHA
  );

export const testCatalog = (): InMemoryCatalog => {
  const services = [
    {
      name: 'ZOOKEEPER',
      displayName: 'ZooKeeper',
      components: [{ name: 'ZOOKEEPER_SERVER', displayName: 'ZooKeeper Server', advertiseVersion: true }],
    },
    {
      name: 'HDFS',
      components: [
        { name: 'NAMENODE', displayName: 'NameNode', advertiseVersion: true },
        { name: 'DATANODE', displayName: 'DataNode', advertiseVersion: true },
      ],
    },
  ];
  return new InMemoryCatalog({ 'HDP-2.2': services, 'HDP-2.3': services });
};

/**
 * Context over `TestCluster` and `testResolver()`; every supported service
 * moves from 2.2.0.0 to 2.3.0.0 unless overridden
 */
export function makeContext(init: Partial<UpgradeContextInit> = {}): UpgradeContext {
  const services = [...(init.supportedServices ?? ['A', 'B', 'ZOOKEEPER', 'HDFS'])];
  return new UpgradeContext({
    cluster: init.cluster ?? new TestCluster(),
    resolver: init.resolver ?? testResolver(),
    direction: init.direction ?? 'UPGRADE',
    type: init.type ?? 'NON_ROLLING',
    scope: init.scope,
    repositoryVersion: init.repositoryVersion ?? RV_230,
    sourceVersions: init.sourceVersions ?? Object.fromEntries(services.map((s) => [s, RV_220])),
    targetVersions: init.targetVersions ?? Object.fromEntries(services.map((s) => [s, RV_230])),
    supportedServices: services,
  });
}

// =============================================================================
// Packs
// =============================================================================

const GROUP_DEFAULTS = {
  scope: 'COMPLETE',
  skippable: false,
  allowRetry: true,
  supportsAutoSkipOnFailure: true,
  performServiceCheck: false,
} as const;

type GroupOverrides = Partial<Omit<DefaultGrouping, 'kind' | 'name' | 'services'>>;

export function defaultGroup(
  name: string,
  services: OrderService[],
  overrides: GroupOverrides = {}
): DefaultGrouping {
  return { ...GROUP_DEFAULTS, name, title: name, services, ...overrides, kind: 'default' };
}

export function functionGroup(
  name: string,
  fn: FunctionName,
  services: OrderService[],
  overrides: GroupOverrides = {}
): FunctionGrouping {
  return { ...GROUP_DEFAULTS, name, title: name, services, ...overrides, kind: 'function', function: fn };
}

export function serviceCheckGroup(name: string, services: OrderService[]): ServiceCheckGrouping {
  return { ...GROUP_DEFAULTS, name, title: name, services, performServiceCheck: true, kind: 'service-check' };
}

export function makePack(
  type: UpgradeType,
  upgrade: Grouping[],
  processing: ProcessingMap = {}
): UpgradePack {
  return { name: 'test-pack', type, targetStack: 'HDP-2.3', groups: { upgrade }, processing };
}

// =============================================================================
// Logging
// =============================================================================

export interface CapturedLogs {
  logger: PlannerLogger;
  /** Formatted lines, without timestamps */
  lines: string[];
}

export function captureLogger(level: LogLevel = 'debug'): CapturedLogs {
  const lines: string[] = [];
  const logger = createLogger({ level, timestamps: false }, { sink: (_level, formatted) => lines.push(formatted) });
  return { logger, lines };
}

export const silentLogger = (): PlannerLogger => createLogger({ level: 'error' }, { sink: () => undefined });
