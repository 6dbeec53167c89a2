/**
 * Host resolution contract
 *
 * Master/secondary detection for HA components happens inside the resolver;
 * the planner only consumes the result.
 */

import type { HostsType } from '../upgrade/types.js';

export interface HostResolver {
  /**
   * Resolve target hosts for a service/component.
   * Returns undefined when the component is not installed anywhere.
   */
  resolve(serviceName: string, componentName: string): HostsType | undefined;

  /** Whether NameNode high availability is enabled */
  isNameNodeHA(): boolean;
}
