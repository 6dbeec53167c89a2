/**
 * Stage builder contract
 *
 * One builder instance per grouping. The planner feeds it every resolved
 * service/component and treats the stage order it returns as opaque.
 */

import type { UpgradeContext } from '../upgrade/context.js';
import type { HostsType, ProcessingComponent, StageWrapper } from '../upgrade/types.js';
import type { Grouping } from '../pack/types.js';

export interface StageWrapperBuilder {
  add(
    context: UpgradeContext,
    hostsType: HostsType,
    serviceName: string,
    clientOnly: boolean,
    processing: ProcessingComponent,
    params?: Record<string, string>
  ): void;

  build(context: UpgradeContext): StageWrapper[];
}

export interface StageBuilderOptions {
  /** Effective service-check flag of the group being built */
  performServiceCheck: boolean;
}

export type StageBuilderFactory = (
  grouping: Grouping,
  options: StageBuilderOptions
) => StageWrapperBuilder;
