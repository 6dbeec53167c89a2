/**
 * Host resolver over a fixed component → hosts table
 */

import type { HostsType } from '../upgrade/types.js';
import type { HostResolver } from './types.js';

export interface ComponentHosts {
  hosts: string[];
  /** Active instance of an HA component */
  master?: string;
  /** Standby instance of an HA component */
  secondary?: string;
  /** Hosts currently reported unhealthy; excluded from `hosts` */
  unhealthy?: string[];
}

export class StaticHostResolver implements HostResolver {
  private readonly table = new Map<string, ComponentHosts>();

  constructor(
    entries: Record<string, Record<string, ComponentHosts>>,
    private readonly namenodeHA = false
  ) {
    for (const [serviceName, components] of Object.entries(entries)) {
      for (const [componentName, hosts] of Object.entries(components)) {
        this.table.set(key(serviceName, componentName), hosts);
      }
    }
  }

  resolve(serviceName: string, componentName: string): HostsType | undefined {
    const entry = this.table.get(key(serviceName, componentName));
    if (!entry) {
      return undefined;
    }

    const unhealthy = entry.unhealthy ?? [];
    const resolved: HostsType = {
      hosts: entry.hosts.filter((host) => !unhealthy.includes(host)),
      unhealthy: [...unhealthy],
    };
    if (entry.master !== undefined) resolved.master = entry.master;
    if (entry.secondary !== undefined) resolved.secondary = entry.secondary;
    return resolved;
  }

  isNameNodeHA(): boolean {
    return this.namenodeHA;
  }
}

function key(serviceName: string, componentName: string): string {
  return `${serviceName}/${componentName}`;
}
