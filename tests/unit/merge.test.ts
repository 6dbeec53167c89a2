/**
 * Tests for configs/merge.ts
 */

import { describe, it, expect } from 'vitest';
import { mergeServiceConfigurations, stripNullDefaults } from '../../src/configs/merge.js';
import type { ConfigRevision, DefaultsByType } from '../../src/cluster/types.js';

describe('stripNullDefaults', () => {
  it('drops null values only', () => {
    expect(stripNullDefaults({ a: '1', b: null, c: '' })).toEqual({ a: '1', c: '' });
  });
});

describe('mergeServiceConfigurations', () => {
  const oldDefaults: DefaultsByType = {
    'zoo.cfg': { tickTime: '2000', initLimit: '10', syncLimit: '5', dropped: 'x' },
  };
  const newDefaults: DefaultsByType = {
    'zoo.cfg': { tickTime: '3000', initLimit: '20', syncLimit: '5', dropped: 'y', legacy: null, brandNew: '1' },
    'zoo-env': { heap: '1024' },
  };
  const live: ConfigRevision[] = [
    { type: 'zoo.cfg', tag: 'version1', properties: { tickTime: '2000', initLimit: '15', syncLimit: '5', custom: 'abc' } },
    { type: 'zk-log4j', tag: 'version1', properties: { content: 'x' } },
  ];

  it('combines new defaults with customized live values', () => {
    const result = mergeServiceConfigurations({ oldDefaults, newDefaults, live });

    expect(result.configs).toEqual({
      'zoo.cfg': { tickTime: '3000', initLimit: '15', syncLimit: '5', brandNew: '1', custom: 'abc' },
      'zoo-env': { heap: '1024' },
      'zk-log4j': { content: 'x' },
    });
  });

  it('reports carried over types, customized keys and removed keys', () => {
    const result = mergeServiceConfigurations({ oldDefaults, newDefaults, live });

    expect(result.carriedOver).toEqual(['zk-log4j']);
    expect(result.customized).toEqual(['zoo.cfg/initLimit']);
    expect(result.removed).toEqual(['zoo.cfg/dropped']);
  });

  it('keeps a live value for a property the new stack marks null', () => {
    const result = mergeServiceConfigurations({
      oldDefaults: { 'core-site': { 'fs.trash.interval': '360' } },
      newDefaults: { 'core-site': { 'fs.trash.interval': null } },
      live: [{ type: 'core-site', tag: 'version1', properties: { 'fs.trash.interval': '360' } }],
    });

    expect(result.configs).toEqual({ 'core-site': { 'fs.trash.interval': '360' } });
    expect(result.customized).toEqual([]);
  });

  it('strips null defaults from types the cluster does not have yet', () => {
    const result = mergeServiceConfigurations({
      oldDefaults: {},
      newDefaults: { 'ranger-hdfs-audit': { 'xasecure.audit.is.enabled': 'true', 'xasecure.audit.db': null } },
      live: [],
    });

    expect(result.configs).toEqual({ 'ranger-hdfs-audit': { 'xasecure.audit.is.enabled': 'true' } });
  });

  it('keeps live properties the old stack did not ship', () => {
    const result = mergeServiceConfigurations({
      oldDefaults: { 'hdfs-site': {} },
      newDefaults: { 'hdfs-site': { 'dfs.replication': '3' } },
      live: [{ type: 'hdfs-site', tag: 'version1', properties: { 'dfs.replication': '2' } }],
    });

    expect(result.configs).toEqual({ 'hdfs-site': { 'dfs.replication': '2' } });
    expect(result.customized).toEqual(['hdfs-site/dfs.replication']);
  });

  it('leaves its inputs unchanged', () => {
    const input = structuredClone({ oldDefaults, newDefaults, live });

    mergeServiceConfigurations(input);

    expect(input).toEqual({ oldDefaults, newDefaults, live });
  });
});
