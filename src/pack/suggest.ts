/**
 * Upgrade pack selection
 */

import { PlanningInputError } from '../errors.js';
import { getDirectionText, isDowngrade } from '../upgrade/direction.js';
import { formatStackId } from '../upgrade/stack.js';
import type { Direction, RepositoryVersion, UpgradeType } from '../upgrade/types.js';
import type { UpgradePack } from './types.js';

export interface PackSelectionRequest {
  /** Available packs keyed by name */
  packs: Record<string, UpgradePack>;
  /** Registered repository versions */
  repositoryVersions: RepositoryVersion[];
  direction: Direction;
  type: UpgradeType;
  /** Version the cluster moves to */
  toVersion: string;
  /** Version the cluster moves from; a downgrade selects by this one */
  fromVersion?: string;
  /** Pack to use when it exists, bypassing the stack match */
  preferredPackName?: string;
}

export interface PackSelection {
  pack: UpgradePack;
  repositoryVersion: RepositoryVersion;
}

/**
 * Find the single upgrade pack for a direction, type and version
 *
 * @throws PlanningInputError when the version is unknown or the match is not
 * exactly one pack
 */
export function suggestUpgradePack(request: PackSelectionRequest): PackSelection {
  const { packs, direction, type } = request;
  const version = isDowngrade(direction) && request.fromVersion !== undefined
    ? request.fromVersion
    : request.toVersion;

  const repositoryVersion = request.repositoryVersions.find((rv) => rv.version === version);
  if (!repositoryVersion) {
    throw new PlanningInputError(
      `Repository version ${version} was not found`,
      'REPOSITORY_VERSION_NOT_FOUND',
      { version }
    );
  }

  const preferred = request.preferredPackName === undefined ? undefined : packs[request.preferredPackName];
  if (preferred) {
    return { pack: preferred, repositoryVersion };
  }

  const targetStack = formatStackId(repositoryVersion.stackId);
  const candidates = Object.values(packs).filter(
    (pack) => pack.targetStack === targetStack && pack.type === type
  );
  const directionText = getDirectionText(direction);

  if (candidates.length > 1) {
    throw new PlanningInputError(
      `Unable to perform ${directionText}. Found multiple upgrade packs for type ${type} and target version ${version}`,
      'AMBIGUOUS_PACK',
      { type, version, packs: candidates.map((pack) => pack.name) }
    );
  }

  const [pack] = candidates;
  if (pack === undefined) {
    throw new PlanningInputError(
      `Unable to perform ${directionText}. Could not locate ${type} upgrade pack for version ${version}`,
      'NO_MATCHING_PACK',
      { type, version, targetStack }
    );
  }

  return { pack, repositoryVersion };
}
