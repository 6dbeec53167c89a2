/**
 * Tests for pack/loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  loadUpgradePack,
  loadUpgradePackSource,
  loadUpgradePacks,
  parseUpgradePack,
} from '../../src/pack/loader.js';
import { PackLoadError } from '../../src/pack/errors.js';
import { FIXTURES } from '../helpers.js';

const PACKS = resolve(FIXTURES, 'packs');

describe('loadUpgradePack', () => {
  it('loads a YAML pack', async () => {
    const pack = await loadUpgradePack('nonrolling-2.3.yaml', { basePath: PACKS });

    expect(pack.name).toBe('nonrolling-upgrade-2.3');
    expect(pack.type).toBe('NON_ROLLING');
    expect(pack.groups.upgrade.map((group) => [group.name, group.kind])).toEqual([
      ['prepare', 'default'],
      ['stop-all', 'function'],
      ['service-checks', 'service-check'],
      ['kerberos-keytabs', 'default'],
    ]);
    expect(pack.processing.HDFS?.NAMENODE?.tasks[0]).toEqual({
      type: 'MANUAL',
      summary: 'Back up NameNode',
      messages: ['Back up the NameNode metadata on {{hosts.all}} before the {{direction.text}}.'],
    });
  });

  it('reports every validation issue of an invalid pack', async () => {
    const path = resolve(FIXTURES, 'invalid-pack.yaml');

    const error = await loadUpgradePack(path).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PackLoadError);
    expect(error).toMatchObject({ code: 'INVALID_CONTENT', message: `Invalid upgrade pack ${path}: 4 error(s)` });
    if (error instanceof PackLoadError) {
      expect(error.result.errors.map((issue) => [issue.code, issue.path])).toEqual([
        ['UNKNOWN_VALUE', 'type'],
        ['INVALID_STACK_ID', 'targetStack'],
        ['DUPLICATE_GROUP_NAME', 'groups.upgrade[1]'],
        ['MISSING_REQUIRED_FIELD', 'groups.upgrade[2]'],
      ]);
      expect(error.formatErrors().split('\n').slice(0, 2)).toEqual([
        '❌ [UNKNOWN_VALUE] type',
        '   Unknown value "SIDEWAYS"',
      ]);
    }
  });

  it('fails for missing files', async () => {
    await expect(loadUpgradePack('missing.yaml', { basePath: PACKS })).rejects.toMatchObject({
      code: 'FILE_NOT_FOUND',
    });
  });
});

describe('parseUpgradePack', () => {
  it('names the source in the error', () => {
    expect(() => parseUpgradePack({}, 'inline')).toThrow('Invalid upgrade pack inline: 4 error(s)');
  });
});

describe('loadUpgradePacks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'upgrade-packs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads every pack in a directory keyed by name', async () => {
    const packs = await loadUpgradePacks(PACKS);

    expect(Object.keys(packs)).toEqual(['nonrolling-upgrade-2.3', 'rolling-upgrade-2.2']);
    expect(packs['rolling-upgrade-2.2']?.type).toBe('ROLLING');
  });

  it('loads JSON packs and ignores other files', async () => {
    const pack = {
      name: 'json-pack',
      type: 'HOST_ORDERED',
      targetStack: 'HDP-2.3',
      groups: { upgrade: [] },
    };
    await writeFile(join(dir, 'pack.json'), JSON.stringify(pack));
    await writeFile(join(dir, 'README.md'), '# packs');

    const packs = await loadUpgradePacks(dir);

    expect(Object.keys(packs)).toEqual(['json-pack']);
    expect(packs['json-pack']?.groups).toEqual({ upgrade: [] });
  });

  it('rejects two packs with the same name', async () => {
    const yaml = 'name: twin\ntype: NON_ROLLING\ntargetStack: HDP-2.3\ngroups:\n  upgrade: []\n';
    await writeFile(join(dir, 'a.yaml'), yaml);
    await writeFile(join(dir, 'b.yml'), yaml);

    await expect(loadUpgradePacks(dir)).rejects.toMatchObject({
      code: 'INVALID_CONTENT',
      message: 'Upgrade pack "twin" is defined twice',
    });
  });

  it('reports unparseable files', async () => {
    await writeFile(join(dir, 'broken.yaml'), 'name: [unclosed\n');

    await expect(loadUpgradePacks(dir)).rejects.toMatchObject({ code: 'PARSE_ERROR' });
  });
});

describe('loadUpgradePackSource', () => {
  it('accepts a single file', async () => {
    const packs = await loadUpgradePackSource(resolve(PACKS, 'rolling-2.2.yaml'));

    expect(Object.keys(packs)).toEqual(['rolling-upgrade-2.2']);
  });

  it('accepts a directory', async () => {
    const packs = await loadUpgradePackSource(PACKS);

    expect(Object.keys(packs)).toHaveLength(2);
  });
});
