/**
 * Error types for upgrade planning and configuration reconciliation
 *
 * Every error carries a machine-readable code plus optional details so that
 * the CLI (and callers embedding the planner) can react without parsing
 * messages.
 */

// =============================================================================
// Planning
// =============================================================================

export type PlanningErrorCode =
  | 'REPOSITORY_VERSION_NOT_FOUND'
  | 'NO_MATCHING_PACK'
  | 'AMBIGUOUS_PACK'
  | 'MISSING_REPOSITORY_VERSION';

/**
 * Raised before any plan is produced when the requested upgrade cannot be
 * mapped onto exactly one upgrade pack and repository version
 */
export class PlanningInputError extends Error {
  constructor(
    message: string,
    public readonly code: PlanningErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlanningInputError';
  }
}

// =============================================================================
// Reconciliation
// =============================================================================

export type MergeErrorCode = 'STORE_FAILURE' | 'MISSING_REPOSITORY_VERSION';

/**
 * Aborts a whole reconciliation call; the transaction is rolled back
 */
export class MergeFatalError extends Error {
  constructor(
    message: string,
    public readonly code: MergeErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MergeFatalError';
  }
}

// =============================================================================
// Catalog
// =============================================================================

/**
 * Unknown stack, service or component in the metadata catalog
 */
export class CatalogLookupError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'CatalogLookupError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
