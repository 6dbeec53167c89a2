/**
 * Command exports
 */

export { planCommand, type PlanOptions, type PlanResult } from './plan.js';
export {
  reconcileCommand,
  type ReconcileCommandOptions,
  type ReconcileCommandResult,
} from './reconcile.js';
