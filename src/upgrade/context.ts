/**
 * Upgrade context
 *
 * Immutable bundle of everything one planning or reconciliation run needs:
 * direction, type, scope, repository versions per service, the services that
 * participate, the cluster view and the host resolver. Anything discovered
 * while planning goes into a `PlanningAccumulator` instead of this object.
 */

import type { Cluster } from '../cluster/types.js';
import type { HostResolver } from '../resolver/types.js';
import type {
  Direction,
  RepositoryVersion,
  UpgradeScope,
  UpgradeType,
} from './types.js';

export interface UpgradeContextInit {
  cluster: Cluster;
  resolver: HostResolver;
  direction: Direction;
  type: UpgradeType;
  /** Scope of this run (default: COMPLETE) */
  scope?: UpgradeScope;
  /** Version the run is associated with (target on upgrade, source on downgrade) */
  repositoryVersion: RepositoryVersion;
  /** Repository version each service runs before the run */
  sourceVersions: Record<string, RepositoryVersion>;
  /** Repository version each service runs after the run */
  targetVersions: Record<string, RepositoryVersion>;
  /** Services participating in the run, in iteration order */
  supportedServices: Iterable<string>;
}

export class UpgradeContext {
  readonly cluster: Cluster;
  readonly resolver: HostResolver;
  readonly direction: Direction;
  readonly type: UpgradeType;
  readonly scope: UpgradeScope;
  readonly repositoryVersion: RepositoryVersion;
  private readonly sourceVersions: ReadonlyMap<string, RepositoryVersion>;
  private readonly targetVersions: ReadonlyMap<string, RepositoryVersion>;
  private readonly supportedServices: ReadonlySet<string>;

  constructor(init: UpgradeContextInit) {
    this.cluster = init.cluster;
    this.resolver = init.resolver;
    this.direction = init.direction;
    this.type = init.type;
    this.scope = init.scope ?? 'COMPLETE';
    this.repositoryVersion = init.repositoryVersion;
    this.sourceVersions = new Map(Object.entries(init.sourceVersions));
    this.targetVersions = new Map(Object.entries(init.targetVersions));
    this.supportedServices = new Set(init.supportedServices);
  }

  /**
   * Whether a grouping declared for `scope` applies to this run
   */
  isScoped(scope: UpgradeScope): boolean {
    return scope === 'ANY' || this.scope === 'ANY' || scope === this.scope;
  }

  isServiceSupported(serviceName: string): boolean {
    return this.supportedServices.has(serviceName);
  }

  getSupportedServices(): ReadonlySet<string> {
    return this.supportedServices;
  }

  getSourceRepositoryVersion(serviceName: string): RepositoryVersion | undefined {
    return this.sourceVersions.get(serviceName);
  }

  getTargetRepositoryVersion(serviceName: string): RepositoryVersion | undefined {
    return this.targetVersions.get(serviceName);
  }
}
