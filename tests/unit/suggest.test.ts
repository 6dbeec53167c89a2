/**
 * Tests for pack/suggest.ts
 */

import { describe, it, expect } from 'vitest';
import { suggestUpgradePack, type PackSelectionRequest } from '../../src/pack/suggest.js';
import { PlanningInputError } from '../../src/errors.js';
import type { UpgradePack } from '../../src/pack/types.js';
import type { UpgradeType } from '../../src/upgrade/types.js';
import { RV_220, RV_230, makePack } from '../helpers.js';

function pack(name: string, type: UpgradeType, targetStack: string): UpgradePack {
  return { ...makePack(type, []), name, targetStack };
}

const packs: Record<string, UpgradePack> = {
  'nonrolling-2.3': pack('nonrolling-2.3', 'NON_ROLLING', 'HDP-2.3'),
  'rolling-2.3': pack('rolling-2.3', 'ROLLING', 'HDP-2.3'),
  'rolling-2.2': pack('rolling-2.2', 'ROLLING', 'HDP-2.2'),
};

function request(overrides: Partial<PackSelectionRequest> = {}): PackSelectionRequest {
  return {
    packs,
    repositoryVersions: [RV_220, RV_230],
    direction: 'UPGRADE',
    type: 'NON_ROLLING',
    toVersion: '2.3.0.0',
    ...overrides,
  };
}

describe('suggestUpgradePack', () => {
  it('selects the pack matching type and target stack', () => {
    const selection = suggestUpgradePack(request({ type: 'ROLLING' }));

    expect(selection.pack.name).toBe('rolling-2.3');
    expect(selection.repositoryVersion).toBe(RV_230);
  });

  it('selects by the source version on downgrade', () => {
    const selection = suggestUpgradePack(
      request({ direction: 'DOWNGRADE', type: 'ROLLING', toVersion: '2.2.0.0', fromVersion: '2.3.0.0' })
    );

    expect(selection.pack.name).toBe('rolling-2.3');
    expect(selection.repositoryVersion.version).toBe('2.3.0.0');
  });

  it('prefers a named pack when it exists', () => {
    const selection = suggestUpgradePack(request({ preferredPackName: 'rolling-2.2' }));

    expect(selection.pack.name).toBe('rolling-2.2');
  });

  it('ignores a preferred pack that does not exist', () => {
    const selection = suggestUpgradePack(request({ preferredPackName: 'express-2.3' }));

    expect(selection.pack.name).toBe('nonrolling-2.3');
  });

  it('fails for unknown repository versions', () => {
    expect(() => suggestUpgradePack(request({ toVersion: '9.9.9.9' }))).toThrow(
      new PlanningInputError('Repository version 9.9.9.9 was not found', 'REPOSITORY_VERSION_NOT_FOUND')
    );
  });

  it('fails when no pack matches', () => {
    expect(() => suggestUpgradePack(request({ type: 'HOST_ORDERED' }))).toThrow(
      'Unable to perform upgrade. Could not locate HOST_ORDERED upgrade pack for version 2.3.0.0'
    );
  });

  it('fails when several packs match', () => {
    const ambiguous = { ...packs, 'nonrolling-2.3-copy': pack('nonrolling-2.3-copy', 'NON_ROLLING', 'HDP-2.3') };

    let caught: unknown;
    try {
      suggestUpgradePack(request({ packs: ambiguous }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PlanningInputError);
    expect(caught).toMatchObject({
      code: 'AMBIGUOUS_PACK',
      message: 'Unable to perform upgrade. Found multiple upgrade packs for type NON_ROLLING and target version 2.3.0.0',
      details: { packs: ['nonrolling-2.3', 'nonrolling-2.3-copy'] },
    });
  });

  it('words errors by direction', () => {
    expect(() =>
      suggestUpgradePack(request({ direction: 'DOWNGRADE', type: 'HOST_ORDERED', fromVersion: '2.2.0.0' }))
    ).toThrow('Unable to perform downgrade. Could not locate HOST_ORDERED upgrade pack for version 2.2.0.0');
  });
});
