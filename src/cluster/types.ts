/**
 * Cluster and configuration store contracts
 *
 * The planner only reads the cluster view. The reconciler writes through the
 * store, always inside `transaction()` so that a failure leaves no partial
 * state behind.
 */

import type { RepositoryVersion, StackId } from '../upgrade/types.js';

// =============================================================================
// Property Maps
// =============================================================================

/** Property name → value */
export type PropertyMap = Record<string, string>;

/**
 * Stack defaults; a `null` value marks a property the stack no longer ships
 */
export type DefaultPropertyMap = Record<string, string | null>;

/** Configuration type (e.g. `hdfs-site`) → defaults */
export type DefaultsByType = Record<string, DefaultPropertyMap>;

/** Configuration type → properties */
export type PropertiesByType = Record<string, PropertyMap>;

/**
 * Live configuration of one type
 */
export interface ConfigRevision {
  type: string;
  tag: string;
  properties: PropertyMap;
}

// =============================================================================
// Cluster View
// =============================================================================

export type SecurityType = 'NONE' | 'KERBEROS';

export type UpgradeState = 'NONE' | 'IN_PROGRESS' | 'COMPLETE' | 'FAILED';

/** Version reported by components that do not advertise one */
export const UNKNOWN_VERSION = 'UNKNOWN';

export interface ClusterService {
  name: string;
  /** Service has only client components (no daemons to restart) */
  clientOnly: boolean;
}

/**
 * Read-only cluster view borrowed by the planner
 */
export interface Cluster {
  readonly clusterName: string;
  readonly securityType: SecurityType;
  getDesiredStackVersion(): StackId;
  getService(serviceName: string): ClusterService | undefined;
  getDesiredConfigByType(configType: string): ConfigRevision | undefined;
}

// =============================================================================
// Store
// =============================================================================

export interface HostComponentState {
  hostName: string;
  upgradeState: UpgradeState;
  version: string;
}

export interface ServiceComponentState {
  name: string;
  desiredVersion?: string;
  hosts: HostComponentState[];
}

/**
 * Configuration revision created by the reconciler
 */
export interface CreatedConfigRevision {
  stackId: StackId;
  serviceName: string;
  configs: PropertiesByType;
  actor: string;
  comment: string;
}

/**
 * Cluster/config persistence collaborator
 */
export interface ClusterStore {
  /** Default properties of a service on a stack, keyed by configuration type */
  getDefaultProperties(stackId: StackId, serviceName: string): Promise<DefaultsByType>;

  /** Current configuration of every type the service owns */
  getLiveConfig(serviceName: string): Promise<ConfigRevision[]>;

  /** Make the latest configurations created for `stackId` current again */
  applyLatestConfigurations(stackId: StackId, serviceName: string): Promise<void>;

  /** Create a new configuration revision for a stack */
  createConfigTypes(
    clusterName: string,
    stackId: StackId,
    serviceName: string,
    configs: PropertiesByType,
    actor: string,
    comment: string
  ): Promise<void>;

  /**
   * Resolve a `{{config-type/property}}` token against the desired
   * configuration. Returns undefined when nothing matches.
   */
  getPlaceholderValue(clusterName: string, token: string): string | undefined;

  setServiceDesiredRepository(serviceName: string, version: RepositoryVersion): Promise<void>;

  getServiceComponents(serviceName: string): Promise<ServiceComponentState[]>;

  setComponentDesiredRepository(
    serviceName: string,
    componentName: string,
    version: RepositoryVersion
  ): Promise<void>;

  setHostComponentUpgradeState(
    serviceName: string,
    componentName: string,
    hostName: string,
    state: UpgradeState
  ): Promise<void>;

  setHostComponentVersion(
    serviceName: string,
    componentName: string,
    hostName: string,
    version: string
  ): Promise<void>;

  /**
   * Run `work` against a transactional view. Writes become visible only if
   * `work` resolves; a rejection discards all of them.
   */
  transaction<T>(work: (tx: ClusterStore) => Promise<T>): Promise<T>;
}
