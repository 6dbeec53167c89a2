/**
 * Placeholder token replacement for display text
 *
 * Tokens look like `{{hosts.all}}` or `{{hdfs-site/dfs.namenode.http-address}}`.
 * Recognised tokens resolve from the context; anything else is looked up in
 * the desired cluster configuration. A token that cannot be resolved stays in
 * the text exactly as written.
 */

import type { ClusterStore } from '../cluster/types.js';
import type { UpgradeContext } from '../upgrade/context.js';
import {
  getDirectionPast,
  getDirectionPlural,
  getDirectionText,
  getDirectionVerb,
} from '../upgrade/direction.js';

// =============================================================================
// Tokens
// =============================================================================

const PLACEHOLDER_REGEX = /\{\{.*?\}\}/g;

/**
 * Placeholder keys resolved without the configuration store
 */
export type Placeholder =
  | 'hosts.all'
  | 'hosts.master'
  | 'version'
  | 'direction.text'
  | 'direction.text.proper'
  | 'direction.past'
  | 'direction.past.proper'
  | 'direction.plural'
  | 'direction.plural.proper'
  | 'direction.verb'
  | 'direction.verb.proper';

const PLACEHOLDERS: readonly Placeholder[] = [
  'hosts.all',
  'hosts.master',
  'version',
  'direction.text',
  'direction.text.proper',
  'direction.past',
  'direction.past.proper',
  'direction.plural',
  'direction.plural.proper',
  'direction.verb',
  'direction.verb.proper',
];

/**
 * Distinct tokens in a string, in order of first appearance
 */
export function findTokens(source: string): string[] {
  return [...new Set(source.match(PLACEHOLDER_REGEX) ?? [])];
}

/**
 * Match a `{{...}}` token against the recognised placeholders
 */
export function parsePlaceholder(token: string): Placeholder | undefined {
  return PLACEHOLDERS.find((placeholder) => `{{${placeholder}}}` === token);
}

// =============================================================================
// Replacement
// =============================================================================

export interface PlaceholderDeps {
  context: UpgradeContext;
  store: Pick<ClusterStore, 'getPlaceholderValue'>;
}

/**
 * Service/component a piece of text belongs to. Host tokens only resolve
 * when both are known.
 */
export interface PlaceholderScope {
  service?: string;
  component?: string;
}

/**
 * Replace every resolvable token in `source`
 */
export function tokenReplace(
  deps: PlaceholderDeps,
  source: string,
  scope: PlaceholderScope = {}
): string {
  let result = source;

  for (const token of findTokens(source)) {
    const value = resolveToken(deps, token, scope);
    if (value !== undefined) {
      result = result.split(token).join(value);
    }
  }

  return result;
}

function resolveToken(
  deps: PlaceholderDeps,
  token: string,
  scope: PlaceholderScope
): string | undefined {
  const { context } = deps;
  const placeholder = parsePlaceholder(token);

  switch (placeholder) {
    case 'hosts.all':
      return resolveHosts(context, scope)?.hosts.join(', ');
    case 'hosts.master':
      return resolveHosts(context, scope)?.master;
    case 'version':
      return context.repositoryVersion.version;
    case 'direction.text':
    case 'direction.text.proper':
      return getDirectionText(context.direction, placeholder === 'direction.text.proper');
    case 'direction.past':
    case 'direction.past.proper':
      return getDirectionPast(context.direction, placeholder === 'direction.past.proper');
    case 'direction.plural':
    case 'direction.plural.proper':
      return getDirectionPlural(context.direction, placeholder === 'direction.plural.proper');
    case 'direction.verb':
    case 'direction.verb.proper':
      return getDirectionVerb(context.direction, placeholder === 'direction.verb.proper');
    case undefined:
      return deps.store.getPlaceholderValue(context.cluster.clusterName, token);
  }
}

function resolveHosts(context: UpgradeContext, scope: PlaceholderScope) {
  if (scope.service === undefined || scope.component === undefined) {
    return undefined;
  }
  return context.resolver.resolve(scope.service, scope.component);
}
