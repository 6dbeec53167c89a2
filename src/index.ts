/**
 * stack-upgrade-planner public API
 */

export * from './upgrade/types.js';
export { UpgradeContext, type UpgradeContextInit } from './upgrade/context.js';
export {
  getDirectionPast,
  getDirectionPlural,
  getDirectionPreposition,
  getDirectionText,
  getDirectionVerb,
  isDowngrade,
} from './upgrade/direction.js';
export { formatStackId, parseStackId, sameStack } from './upgrade/stack.js';

export type * from './cluster/types.js';
export { UNKNOWN_VERSION } from './cluster/types.js';
export type { HostResolver } from './resolver/types.js';
export type { MetadataCatalog } from './catalog/types.js';

export * from './errors.js';

export type * from './pack/types.js';
export { getGroups } from './pack/types.js';
export { PackLoadError, type ValidationIssue, type ValidationResult } from './pack/errors.js';
export { loadUpgradePack, loadUpgradePacks, parseUpgradePack } from './pack/loader.js';
export { validateUpgradePack } from './pack/validator.js';
export { suggestUpgradePack, type PackSelection, type PackSelectionRequest } from './pack/suggest.js';

export type { StageWrapperBuilder, StageBuilderFactory, StageBuilderOptions } from './stages/types.js';
export { createStageBuilder } from './stages/builders.js';

export {
  createSequence,
  describeGroupHolder,
  planSequence,
  type PlannerDeps,
  type PlanningAccumulator,
  type PlanningSkip,
  type SequenceResult,
  type SkipReason,
} from './planner/sequence.js';
export { resolveProcessingComponent } from './planner/processing.js';
export { tokenReplace } from './planner/placeholders.js';
export { postProcess } from './planner/post-process.js';
export { formatPlanSummary } from './planner/format.js';

export { mergeServiceConfigurations, type MergeInput, type MergeResult } from './configs/merge.js';
export { reconcileConfigurations, type ReconcileResult } from './configs/reconcile.js';
export { setDesiredRepositories, updateDesiredRepositoriesAndConfigs } from './configs/repositories.js';

export { resolveSettings, type PlannerSettings } from './config/settings.js';
export { PlannerLogger, createLogger, logger } from './utils/logger.js';

export { InMemoryCluster, InMemoryClusterStore } from './cluster/in-memory.js';
export { StaticHostResolver } from './resolver/static-resolver.js';
export { InMemoryCatalog } from './catalog/in-memory.js';
export {
  createTopologyCollaborators,
  createTopologyContext,
  loadClusterTopology,
  parseClusterTopology,
} from './cluster/topology.js';
