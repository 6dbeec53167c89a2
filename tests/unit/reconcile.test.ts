/**
 * Tests for configs/reconcile.ts
 *
 * Runs against the in-memory store built from tests/fixtures/cluster.yaml:
 * ZOOKEEPER and HDFS on HDP-2.2 (2.2.0.0), with 2.2.4.0 (HDP-2.2) and
 * 2.3.0.0 (HDP-2.3) registered.
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
  createTopologyCollaborators,
  createTopologyContext,
  loadClusterTopology,
  type ClusterTopology,
  type TopologyContextRequest,
} from '../../src/cluster/topology.js';
import { reconcileConfigurations } from '../../src/configs/reconcile.js';
import { MergeFatalError } from '../../src/errors.js';
import { FIXTURES, RV_220, captureLogger, makeContext, silentLogger } from '../helpers.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const loadFixture = (): Promise<ClusterTopology> => loadClusterTopology(resolve(FIXTURES, 'cluster.yaml'));

function setup(topology: ClusterTopology, request: Omit<TopologyContextRequest, 'type'>) {
  const collaborators = createTopologyCollaborators(topology);
  const context = createTopologyContext(topology, collaborators, { type: 'NON_ROLLING', ...request });
  return { ...collaborators, context };
}

/**
 * HDFS runs 2.1.0.0 on HDP-2.1, a stack with no defaults in the fixture
 */
function withUnknownHdfsStack(topology: ClusterTopology): ClusterTopology {
  return {
    ...topology,
    repositoryVersions: [
      ...topology.repositoryVersions,
      { version: '2.1.0.0', stackId: { stackName: 'HDP', stackVersion: '2.1' } },
    ],
    services: topology.services.map((service) =>
      service.name === 'HDFS' ? { ...service, version: '2.1.0.0' } : service
    ),
  };
}

// =============================================================================
// Upgrade
// =============================================================================

describe('reconcileConfigurations (upgrade)', () => {
  it('creates merged revisions on the target stack', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });

    await reconcileConfigurations(context, store, { logger: silentLogger() });

    expect(store.createdRevisions()).toEqual([
      {
        type: 'zoo.cfg',
        serviceName: 'ZOOKEEPER',
        stack: 'HDP-2.3',
        tag: 'version3',
        version: 3,
        properties: { tickTime: '3000', initLimit: '15', 'autopurge.purgeInterval': '24' },
        actor: 'admin',
        comment: 'Configuration created for Upgrade',
      },
      {
        type: 'hdfs-site',
        serviceName: 'HDFS',
        stack: 'HDP-2.3',
        tag: 'version4',
        version: 4,
        properties: {
          'dfs.replication': '3',
          'dfs.namenode.http-address': 'h1:50070',
          'dfs.webhdfs.enabled': 'true',
        },
        actor: 'admin',
        comment: 'Configuration created for Upgrade',
      },
    ]);
    expect(store.snapshot().current).toEqual({ 'zoo.cfg': 3, 'hdfs-site': 4 });
  });

  it('reports the merge per service', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });

    const result = await reconcileConfigurations(context, store, { logger: silentLogger() });

    expect(result.dryRun).toBe(false);
    expect(result.services.map((s) => [s.service, s.action, s.sourceStack, s.targetStack])).toEqual([
      ['ZOOKEEPER', 'merged', 'HDP-2.2', 'HDP-2.3'],
      ['HDFS', 'merged', 'HDP-2.2', 'HDP-2.3'],
    ]);
    expect(result.services[0]?.merge?.removed).toEqual(['zoo.cfg/syncLimit']);
    expect(result.services[0]?.merge?.customized).toEqual(['zoo.cfg/initLimit']);
    expect(result.services[1]?.merge?.customized).toEqual(['hdfs-site/dfs.namenode.http-address']);
  });

  it('logs removed properties and created types', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });
    const { logger, lines } = captureLogger('info');

    await reconcileConfigurations(context, store, { logger });

    expect(lines).toEqual([
      '[INFO] The property zoo.cfg/syncLimit exists in both HDP-2.2 and HDP-2.3 but is not part of the current ' +
        'set of configurations and will therefore not be included in the configuration merge {"cluster":"c1"}',
      '[INFO] The upgrade will create the following configurations for stack HDP-2.3: zoo.cfg {"cluster":"c1"}',
      '[INFO] The upgrade will create the following configurations for stack HDP-2.3: hdfs-site {"cluster":"c1"}',
    ]);
  });

  it('records the configured actor and comment', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });

    await reconcileConfigurations(context, store, {
      logger: silentLogger(),
      settings: { actor: 'upgrade-bot', changeComment: 'Moving to HDP-2.3' },
    });

    expect(store.createdRevisions().map((r) => [r.actor, r.comment])).toEqual([
      ['upgrade-bot', 'Moving to HDP-2.3'],
      ['upgrade-bot', 'Moving to HDP-2.3'],
    ]);
  });

  it('writes nothing on a dry run', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });

    const result = await reconcileConfigurations(context, store, { logger: silentLogger(), dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.services.map((s) => s.action)).toEqual(['merged', 'merged']);
    expect(store.createdRevisions()).toEqual([]);
    expect(store.snapshot().current).toEqual({ 'zoo.cfg': 1, 'hdfs-site': 2 });
  });

  it('leaves services on the same stack alone', async () => {
    const { store, context } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.2.4.0' });
    const { logger, lines } = captureLogger('info');

    const result = await reconcileConfigurations(context, store, { logger });

    expect(result.services.map((s) => s.action)).toEqual(['unchanged', 'unchanged']);
    expect(store.createdRevisions()).toEqual([]);
    expect(lines[0]).toBe(
      '[INFO] The upgrade to 2.2.4.0 will not change stack configurations for ZOOKEEPER since the source ' +
        'and target are both HDP-2.2 {"cluster":"c1"}'
    );
  });
});

// =============================================================================
// Downgrade
// =============================================================================

describe('reconcileConfigurations (downgrade)', () => {
  async function upgradedCluster() {
    const topology = await loadFixture();
    const upgrade = setup(topology, { direction: 'UPGRADE', targetVersion: '2.3.0.0' });
    await reconcileConfigurations(upgrade.context, upgrade.store, { logger: silentLogger() });
    const context = createTopologyContext(topology, upgrade, {
      direction: 'DOWNGRADE',
      type: 'NON_ROLLING',
      targetVersion: '2.2.0.0',
      sourceVersion: '2.3.0.0',
    });
    return { store: upgrade.store, context };
  }

  it('makes the source stack configurations current again', async () => {
    const { store, context } = await upgradedCluster();

    const result = await reconcileConfigurations(context, store, { logger: silentLogger() });

    expect(result.services.map((s) => [s.service, s.action, s.sourceStack, s.targetStack])).toEqual([
      ['ZOOKEEPER', 'reverted', 'HDP-2.3', 'HDP-2.2'],
      ['HDFS', 'reverted', 'HDP-2.3', 'HDP-2.2'],
    ]);
    expect(store.snapshot().current).toEqual({ 'zoo.cfg': 1, 'hdfs-site': 2 });
    expect(store.createdRevisions()).toHaveLength(2);
  });

  it('stops after the first service when configured to', async () => {
    const { store, context } = await upgradedCluster();

    const result = await reconcileConfigurations(context, store, {
      logger: silentLogger(),
      settings: { downgradeScope: 'first-service' },
    });

    expect(result.services.map((s) => s.action)).toEqual(['reverted', 'not-processed']);
    expect(store.snapshot().current).toEqual({ 'zoo.cfg': 1, 'hdfs-site': 4 });
  });
});

// =============================================================================
// Failures
// =============================================================================

describe('reconcileConfigurations (failures)', () => {
  it('rolls back every service when a store lookup fails', async () => {
    const { store, context } = setup(withUnknownHdfsStack(await loadFixture()), {
      direction: 'UPGRADE',
      targetVersion: '2.3.0.0',
    });

    const pending = reconcileConfigurations(context, store, { logger: silentLogger() });

    await expect(pending).rejects.toBeInstanceOf(MergeFatalError);
    await expect(pending).rejects.toMatchObject({
      code: 'STORE_FAILURE',
      message: 'Configuration reconciliation failed: No stack definition for HDP-2.1',
    });
    expect(store.createdRevisions()).toEqual([]);
    expect(store.snapshot().current).toEqual({ 'zoo.cfg': 1, 'hdfs-site': 2 });
  });

  it('fails when a service has no target repository version', async () => {
    const { store } = setup(await loadFixture(), { direction: 'UPGRADE', targetVersion: '2.3.0.0' });
    const context = makeContext({
      supportedServices: ['ZOOKEEPER'],
      sourceVersions: { ZOOKEEPER: RV_220 },
      targetVersions: {},
    });

    await expect(reconcileConfigurations(context, store, { logger: silentLogger() })).rejects.toMatchObject({
      code: 'MISSING_REPOSITORY_VERSION',
      message: 'No target repository version for ZOOKEEPER',
    });
  });
});
