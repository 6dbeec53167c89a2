/**
 * Tests for configs/repositories.ts
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
  createTopologyCollaborators,
  createTopologyContext,
  loadClusterTopology,
  type ClusterTopology,
} from '../../src/cluster/topology.js';
import type { ClusterState } from '../../src/cluster/in-memory.js';
import type { MetadataCatalog } from '../../src/catalog/types.js';
import {
  setDesiredRepositories,
  updateDesiredRepositoriesAndConfigs,
} from '../../src/configs/repositories.js';
import { MergeFatalError } from '../../src/errors.js';
import { FIXTURES, captureLogger, silentLogger } from '../helpers.js';

async function setup(transform: (topology: ClusterTopology) => ClusterTopology = (t) => t) {
  const topology = transform(await loadClusterTopology(resolve(FIXTURES, 'cluster.yaml')));
  const collaborators = createTopologyCollaborators(topology);
  const context = createTopologyContext(topology, collaborators, {
    direction: 'UPGRADE',
    type: 'NON_ROLLING',
    targetVersion: '2.3.0.0',
  });
  return { ...collaborators, context };
}

const hostState = (
  snapshot: ClusterState,
  service: string,
  component: string,
  host: string
) =>
  snapshot.services
    .find((s) => s.name === service)
    ?.components.find((c) => c.name === component)
    ?.hosts.find((h) => h.hostName === host);

describe('setDesiredRepositories', () => {
  it('moves advertised components to IN_PROGRESS', async () => {
    const { store, catalog, context } = await setup();

    const result = await setDesiredRepositories(context, store, { catalog, logger: silentLogger() });

    expect(result.components).toEqual([
      {
        service: 'ZOOKEEPER',
        component: 'ZOOKEEPER_SERVER',
        version: '2.3.0.0',
        upgradeState: 'IN_PROGRESS',
        hostsUpdated: ['h1', 'h2', 'h3'],
      },
      { service: 'HDFS', component: 'NAMENODE', version: '2.3.0.0', upgradeState: 'IN_PROGRESS', hostsUpdated: ['h1', 'h2'] },
      {
        service: 'HDFS',
        component: 'DATANODE',
        version: '2.3.0.0',
        upgradeState: 'IN_PROGRESS',
        hostsUpdated: ['h2', 'h3', 'h4'],
      },
      { service: 'HDFS', component: 'HDFS_CLIENT', version: '2.3.0.0', upgradeState: 'NONE', hostsUpdated: ['h1'] },
    ]);
  });

  it('records desired repositories and host state in the store', async () => {
    const { store, catalog, context } = await setup();

    await setDesiredRepositories(context, store, { catalog, logger: silentLogger() });

    const snapshot = store.snapshot();
    expect(snapshot.services.find((s) => s.name === 'HDFS')?.desiredRepository?.version).toBe('2.3.0.0');
    expect(snapshot.componentRepositories.HDFS?.NAMENODE?.stackId).toEqual({ stackName: 'HDP', stackVersion: '2.3' });
    expect(hostState(snapshot, 'HDFS', 'NAMENODE', 'h1')).toEqual({
      hostName: 'h1',
      upgradeState: 'IN_PROGRESS',
      version: '2.2.0.0',
    });
    expect(hostState(snapshot, 'HDFS', 'HDFS_CLIENT', 'h1')).toEqual({
      hostName: 'h1',
      upgradeState: 'NONE',
      version: 'UNKNOWN',
    });
  });

  it('treats catalog failures as components that do not advertise a version', async () => {
    const { store, context } = await setup();
    const offline: MetadataCatalog = {
      getDisplayName: (_stackId, serviceName) => serviceName,
      getComponentDisplayName: (_stackId, _serviceName, componentName) => componentName,
      isVersionAdvertised: () => {
        throw new Error('catalog offline');
      },
    };
    const { logger, lines } = captureLogger('warn');

    const result = await setDesiredRepositories(context, store, { catalog: offline, logger });

    expect(result.components.map((c) => c.upgradeState)).toEqual(['NONE', 'NONE', 'NONE', 'NONE']);
    expect(lines[0]).toBe(
      '[WARN] Could not determine whether ZOOKEEPER/ZOOKEEPER_SERVER advertises a version ' +
        '{"cluster":"c1","error":"catalog offline"}'
    );
    expect(lines).toHaveLength(4);
  });
});

describe('updateDesiredRepositoriesAndConfigs', () => {
  it('moves repositories and merges configurations together', async () => {
    const { store, catalog, context } = await setup();

    const result = await updateDesiredRepositoriesAndConfigs(context, store, { catalog, logger: silentLogger() });

    expect(result.repositories.components).toHaveLength(4);
    expect(result.configurations.services.map((s) => s.action)).toEqual(['merged', 'merged']);
    expect(store.createdRevisions().map((r) => r.type)).toEqual(['zoo.cfg', 'hdfs-site']);
  });

  it('rolls back repository changes when the merge fails', async () => {
    const { store, catalog, context } = await setup((topology) => ({
      ...topology,
      repositoryVersions: [
        ...topology.repositoryVersions,
        { version: '2.1.0.0', stackId: { stackName: 'HDP', stackVersion: '2.1' } },
      ],
      services: topology.services.map((service) =>
        service.name === 'HDFS' ? { ...service, version: '2.1.0.0' } : service
      ),
    }));

    await expect(
      updateDesiredRepositoriesAndConfigs(context, store, { catalog, logger: silentLogger() })
    ).rejects.toBeInstanceOf(MergeFatalError);

    const snapshot = store.snapshot();
    expect(snapshot.services.find((s) => s.name === 'HDFS')?.desiredRepository?.version).toBe('2.1.0.0');
    expect(hostState(snapshot, 'ZOOKEEPER', 'ZOOKEEPER_SERVER', 'h1')).toEqual({
      hostName: 'h1',
      upgradeState: 'NONE',
      version: '2.2.0.0',
    });
    expect(snapshot.componentRepositories).toEqual({});
    expect(store.createdRevisions()).toEqual([]);
  });
});
