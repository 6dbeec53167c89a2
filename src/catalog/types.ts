/**
 * Stack metadata catalog contract (read-only)
 *
 * Lookups throw `CatalogLookupError` when the stack, service or component
 * is unknown.
 */

import type { StackId } from '../upgrade/types.js';

export interface MetadataCatalog {
  getDisplayName(stackId: StackId, serviceName: string): string;
  getComponentDisplayName(stackId: StackId, serviceName: string, componentName: string): string;
  /** Whether the component reports its own version */
  isVersionAdvertised(stackId: StackId, serviceName: string, componentName: string): boolean;
}
