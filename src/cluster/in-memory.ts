/**
 * In-memory cluster and configuration store
 *
 * Backs the CLI (from a topology file) and the tests. Transactions run
 * against a copy of the state that replaces the original only when the work
 * resolves.
 */

import { formatStackId } from '../upgrade/stack.js';
import type { RepositoryVersion, StackId } from '../upgrade/types.js';
import type {
  Cluster,
  ClusterService,
  ClusterStore,
  ConfigRevision,
  DefaultsByType,
  PropertiesByType,
  PropertyMap,
  SecurityType,
  ServiceComponentState,
  UpgradeState,
} from './types.js';

// =============================================================================
// State
// =============================================================================

/**
 * One stored configuration revision
 */
export interface StoredRevision {
  type: string;
  serviceName: string;
  /** Stack the revision belongs to, e.g. `HDP-2.3` */
  stack: string;
  tag: string;
  /** Monotonic per store; higher is newer */
  version: number;
  properties: PropertyMap;
  actor?: string;
  comment?: string;
}

export interface InMemoryServiceState {
  name: string;
  clientOnly: boolean;
  desiredRepository?: RepositoryVersion;
  components: ServiceComponentState[];
}

export interface ClusterState {
  clusterName: string;
  securityType: SecurityType;
  desiredStack: StackId;
  services: InMemoryServiceState[];
  /** Every revision ever stored, oldest first */
  revisions: StoredRevision[];
  /** Configuration type → version of the current revision */
  current: Record<string, number>;
  /** Stack id → service → defaults by type */
  defaults: Record<string, Record<string, DefaultsByType>>;
  /** Service → component → desired repository */
  componentRepositories: Record<string, Record<string, RepositoryVersion>>;
}

function cloneState(state: ClusterState): ClusterState {
  return structuredClone(state);
}

// =============================================================================
// Cluster View
// =============================================================================

/**
 * Read-only cluster view over a store's live state
 */
export class InMemoryCluster implements Cluster {
  constructor(private readonly store: InMemoryClusterStore) {}

  get clusterName(): string {
    return this.store.snapshot().clusterName;
  }

  get securityType(): SecurityType {
    return this.store.snapshot().securityType;
  }

  getDesiredStackVersion(): StackId {
    return { ...this.store.snapshot().desiredStack };
  }

  getService(serviceName: string): ClusterService | undefined {
    const service = this.store.snapshot().services.find((s) => s.name === serviceName);
    return service ? { name: service.name, clientOnly: service.clientOnly } : undefined;
  }

  getDesiredConfigByType(configType: string): ConfigRevision | undefined {
    return this.store.currentRevision(configType);
  }
}

// =============================================================================
// Store
// =============================================================================

export class InMemoryClusterStore implements ClusterStore {
  private state: ClusterState;

  constructor(state: ClusterState) {
    this.state = cloneState(state);
  }

  /** Current state (read-only use) */
  snapshot(): ClusterState {
    return this.state;
  }

  /** Revisions created through `createConfigTypes`, oldest first */
  createdRevisions(): StoredRevision[] {
    return this.state.revisions.filter((revision) => revision.actor !== undefined);
  }

  currentRevision(configType: string): ConfigRevision | undefined {
    const version = this.state.current[configType];
    const revision = this.state.revisions.find((r) => r.version === version);
    if (version === undefined || !revision) {
      return undefined;
    }
    return { type: revision.type, tag: revision.tag, properties: { ...revision.properties } };
  }

  async getDefaultProperties(stackId: StackId, serviceName: string): Promise<DefaultsByType> {
    const stack = formatStackId(stackId);
    const byService = this.state.defaults[stack];
    if (!byService) {
      throw new Error(`No stack definition for ${stack}`);
    }
    return structuredClone(byService[serviceName] ?? {});
  }

  async getLiveConfig(serviceName: string): Promise<ConfigRevision[]> {
    const live: ConfigRevision[] = [];
    for (const type of Object.keys(this.state.current)) {
      const revision = this.currentStored(type);
      if (revision?.serviceName === serviceName) {
        live.push({ type, tag: revision.tag, properties: { ...revision.properties } });
      }
    }
    return live;
  }

  async applyLatestConfigurations(stackId: StackId, serviceName: string): Promise<void> {
    const stack = formatStackId(stackId);
    const latest = new Map<string, StoredRevision>();
    for (const revision of this.state.revisions) {
      if (revision.serviceName === serviceName && revision.stack === stack) {
        latest.set(revision.type, revision);
      }
    }
    if (latest.size === 0) {
      throw new Error(`No configurations for ${serviceName} on stack ${stack}`);
    }

    for (const type of Object.keys(this.state.current)) {
      if (this.currentStored(type)?.serviceName === serviceName && !latest.has(type)) {
        delete this.state.current[type];
      }
    }
    for (const [type, revision] of latest) {
      this.state.current[type] = revision.version;
    }
  }

  async createConfigTypes(
    _clusterName: string,
    stackId: StackId,
    serviceName: string,
    configs: PropertiesByType,
    actor: string,
    comment: string
  ): Promise<void> {
    const stack = formatStackId(stackId);
    for (const [type, properties] of Object.entries(configs)) {
      const version = this.nextVersion();
      this.state.revisions.push({
        type,
        serviceName,
        stack,
        tag: `version${version}`,
        version,
        properties: { ...properties },
        actor,
        comment,
      });
      this.state.current[type] = version;
    }
  }

  getPlaceholderValue(_clusterName: string, token: string): string | undefined {
    const body = token.replace(/^\{\{/, '').replace(/\}\}$/, '');
    const slash = body.indexOf('/');
    if (slash <= 0) {
      return undefined;
    }
    return this.currentRevision(body.slice(0, slash))?.properties[body.slice(slash + 1)];
  }

  async setServiceDesiredRepository(serviceName: string, version: RepositoryVersion): Promise<void> {
    this.service(serviceName).desiredRepository = structuredClone(version);
  }

  async getServiceComponents(serviceName: string): Promise<ServiceComponentState[]> {
    return structuredClone(this.service(serviceName).components);
  }

  async setComponentDesiredRepository(
    serviceName: string,
    componentName: string,
    version: RepositoryVersion
  ): Promise<void> {
    this.component(serviceName, componentName).desiredVersion = version.version;
    const byComponent = this.state.componentRepositories[serviceName] ?? {};
    byComponent[componentName] = structuredClone(version);
    this.state.componentRepositories[serviceName] = byComponent;
  }

  async setHostComponentUpgradeState(
    serviceName: string,
    componentName: string,
    hostName: string,
    state: UpgradeState
  ): Promise<void> {
    this.hostComponent(serviceName, componentName, hostName).upgradeState = state;
  }

  async setHostComponentVersion(
    serviceName: string,
    componentName: string,
    hostName: string,
    version: string
  ): Promise<void> {
    this.hostComponent(serviceName, componentName, hostName).version = version;
  }

  async transaction<T>(work: (tx: ClusterStore) => Promise<T>): Promise<T> {
    const tx = new InMemoryClusterStore(this.state);
    const result = await work(tx);
    this.state = tx.state;
    return result;
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  private currentStored(type: string): StoredRevision | undefined {
    const version = this.state.current[type];
    return version === undefined ? undefined : this.state.revisions.find((r) => r.version === version);
  }

  private nextVersion(): number {
    return this.state.revisions.reduce((max, revision) => Math.max(max, revision.version), 0) + 1;
  }

  private service(serviceName: string): InMemoryServiceState {
    const service = this.state.services.find((s) => s.name === serviceName);
    if (!service) {
      throw new Error(`Service ${serviceName} is not installed in ${this.state.clusterName}`);
    }
    return service;
  }

  private component(serviceName: string, componentName: string): ServiceComponentState {
    const component = this.service(serviceName).components.find((c) => c.name === componentName);
    if (!component) {
      throw new Error(`Component ${serviceName}/${componentName} is not installed`);
    }
    return component;
  }

  private hostComponent(serviceName: string, componentName: string, hostName: string) {
    const host = this.component(serviceName, componentName).hosts.find((h) => h.hostName === hostName);
    if (!host) {
      throw new Error(`Component ${serviceName}/${componentName} is not installed on ${hostName}`);
    }
    return host;
  }
}
