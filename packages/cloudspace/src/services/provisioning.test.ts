import { describe, it, expect, vi } from 'vitest';
import {
  InvalidPrice,
  OperationCancelled,
  ProvisioningError,
  RemoteConflict,
  RemoteUnavailable,
} from '../errors.js';
import { FakeCloudspaceApi } from '../testing/fake-api.js';
import type { CreateRequest } from '../types.js';
import { ProvisioningSaga } from './provisioning.js';

function request(spotPools = 1, onDemandPools = 0): CreateRequest {
  return {
    name: 'demo',
    organization: 'acme',
    region: 'us-central-dfw-1',
    kubernetesVersion: '1.31.1',
    cni: 'calico',
    preemptionWebhookURL: '',
    spotPools: Array.from({ length: spotPools }, (_, i) => ({
      name: `spot-${i + 1}`,
      serverClass: 'gp.vs1.medium-dfw',
      desired: 1,
      bidPrice: '$0.08',
    })),
    onDemandPools: Array.from({ length: onDemandPools }, (_, i) => ({
      name: `od-${i + 1}`,
      serverClass: 'gp.vs1.medium-dfw',
      desired: 2,
    })),
  };
}

async function provisionError(saga: ProvisioningSaga, value: CreateRequest) {
  const error: unknown = await saga.run(value).catch((e: unknown) => e);
  if (!(error instanceof ProvisioningError) && !(error instanceof OperationCancelled)) {
    throw new Error(`expected a provisioning failure, got ${String(error)}`);
  }
  return error;
}

describe('ProvisioningSaga', () => {
  it('creates the cloudspace, then spot pools, then on-demand pools', async () => {
    const api = new FakeCloudspaceApi();
    const logger = { info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const saga = new ProvisioningSaga(api, { logger });

    const cloudspace = await saga.run(request(2, 1));

    expect(api.calls).toEqual([
      'createCloudspace:demo',
      'createSpotNodePool:spot-1',
      'createSpotNodePool:spot-2',
      'createOnDemandNodePool:od-1',
      'getCloudspace:demo',
    ]);
    expect(cloudspace).toMatchObject({ name: 'demo', org: 'acme', status: 'Provisioning' });
    expect(saga.ledger).toEqual([]);
    expect(logger.success).toHaveBeenCalledWith('Created spot node pool spot-1');
    expect(logger.success).toHaveBeenCalledWith('Created on-demand node pool od-1');
  });

  it('sends normalized bid prices and links pools to the cloudspace', async () => {
    const api = new FakeCloudspaceApi();
    await new ProvisioningSaga(api).run(request(1, 1));

    expect(api.spotPools.get('acme/spot-1')).toEqual({
      name: 'spot-1',
      org: 'acme',
      cloudspace: 'demo',
      serverClass: 'gp.vs1.medium-dfw',
      desired: 1,
      bidPrice: '0.080',
    });
    expect(api.onDemandPools.get('acme/od-1')).toMatchObject({
      cloudspace: 'demo',
      desired: 2,
    });
  });

  it('leaves nothing to undo when the cloudspace itself fails', async () => {
    const api = new FakeCloudspaceApi().failOn(
      'createCloudspace',
      'demo',
      new RemoteUnavailable('POST cloudspaces: 503', 503),
    );

    const error = await provisionError(new ProvisioningSaga(api), request());

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({ resourceKind: 'cloudspace', resourceName: 'demo' });
    expect(api.calls).toEqual(['createCloudspace:demo']);
  });

  it.each([1, 2, 3])(
    'undoes exactly the earlier pools and the cloudspace when pool %i of 3 fails',
    async (k) => {
      const api = new FakeCloudspaceApi().failOn(
        'createSpotNodePool',
        `spot-${k}`,
        new RemoteUnavailable('POST spotnodepools: 500', 500),
      );
      const saga = new ProvisioningSaga(api);

      const error = await provisionError(saga, request(3));

      const earlier = Array.from({ length: k - 1 }, (_, i) => `spot-${k - 1 - i}`);
      expect(api.callsTo('deleteSpotNodePool', 'deleteCloudspace')).toEqual([
        ...earlier.map((name) => `deleteSpotNodePool:${name}`),
        'deleteCloudspace:demo',
      ]);
      expect(api.callsTo('createSpotNodePool')).toHaveLength(k);
      expect(api.spotPools.size).toBe(0);
      expect(api.cloudspaces.size).toBe(0);
      expect(error).toMatchObject({ resourceKind: 'spotPool', resourceName: `spot-${k}` });
      expect(saga.ledger).toEqual([]);
    },
  );

  it('rolls back the cloudspace when the first spot pool conflicts', async () => {
    const api = new FakeCloudspaceApi();
    api.spotPools.set('acme/spot-1', {
      name: 'spot-1',
      org: 'acme',
      cloudspace: 'other',
      serverClass: 'gp.vs1.medium-dfw',
      desired: 1,
      bidPrice: '0.050',
    });
    const saga = new ProvisioningSaga(api);

    const error = await provisionError(saga, request(2));

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error.cause).toBeInstanceOf(RemoteConflict);
    expect(error.message).toBe(
      'failed to create spot node pool spot-1: acme/spot-1 already exists',
    );
    expect(api.cloudspaces.size).toBe(0);
    expect(api.spotPools.has('acme/spot-1')).toBe(true);
    expect(api.callsTo('createSpotNodePool')).toEqual(['createSpotNodePool:spot-1']);
    expect(error.rollbackWarnings).toEqual([]);
    expect(saga.ledger).toEqual([]);
  });

  it('rolls back on-demand pools before spot pools', async () => {
    const api = new FakeCloudspaceApi().failOn(
      'createOnDemandNodePool',
      'od-2',
      new RemoteUnavailable('POST ondemandnodepools: 502', 502),
    );

    await provisionError(new ProvisioningSaga(api), request(1, 2));

    expect(
      api.callsTo('deleteCloudspace', 'deleteSpotNodePool', 'deleteOnDemandNodePool'),
    ).toEqual([
      'deleteOnDemandNodePool:od-1',
      'deleteSpotNodePool:spot-1',
      'deleteCloudspace:demo',
    ]);
  });

  it('stops and undoes the cloudspace when cancelled before the first pool', async () => {
    const controller = new AbortController();
    const api = new FakeCloudspaceApi();
    api.onCall = (method) => {
      if (method === 'createCloudspace') {
        controller.abort();
      }
    };
    const saga = new ProvisioningSaga(api, { signal: controller.signal });

    const error = await provisionError(saga, request(2));

    expect(error).toBeInstanceOf(OperationCancelled);
    expect(error.message).toBe(
      'operation cancelled before creating spot node pool spot-1',
    );
    expect(api.calls).toEqual(['createCloudspace:demo', 'deleteCloudspace:demo']);
    expect(api.spotPools.size).toBe(0);
  });

  it('creates nothing when cancelled up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const api = new FakeCloudspaceApi();

    await expect(
      new ProvisioningSaga(api, { signal: controller.signal }).run(request()),
    ).rejects.toThrow('operation cancelled before creation started');
    expect(api.calls).toEqual([]);
  });

  it('reports resources it could not delete and keeps going', async () => {
    const api = new FakeCloudspaceApi()
      .failOn('createOnDemandNodePool', 'od-1', new RemoteUnavailable('down', 503))
      .failOn('deleteSpotNodePool', 'spot-1', new RemoteUnavailable('still down', 503));
    const logger = { info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const error = await provisionError(new ProvisioningSaga(api, { logger }), request(1, 1));

    expect(error.rollbackWarnings).toEqual([
      {
        resourceKind: 'spotPool',
        resourceName: 'spot-1',
        message: 'failed to delete spot node pool spot-1: still down',
      },
    ]);
    expect(api.callsTo('deleteCloudspace')).toEqual(['deleteCloudspace:demo']);
    expect(logger.warn).toHaveBeenCalledWith(
      'failed to delete spot node pool spot-1: still down',
    );
  });

  it('rolls back when the created cloudspace cannot be read back', async () => {
    const api = new FakeCloudspaceApi().failOn(
      'getCloudspace',
      'demo',
      new RemoteUnavailable('GET cloudspaces/demo: 504', 504),
    );

    const error = await provisionError(new ProvisioningSaga(api), request(1, 1));

    expect(error).toMatchObject({ resourceKind: 'cloudspace', resourceName: 'demo' });
    expect(api.cloudspaces.size).toBe(0);
    expect(api.spotPools.size).toBe(0);
    expect(api.onDemandPools.size).toBe(0);
  });

  it('rolls back when a bid price cannot be normalized', async () => {
    const api = new FakeCloudspaceApi();
    const value: CreateRequest = {
      ...request(0),
      spotPools: [
        { name: 'spot-1', serverClass: 'gp.vs1.medium-dfw', desired: 1, bidPrice: 'free' },
      ],
    };

    const error = await provisionError(new ProvisioningSaga(api), value);

    expect(error.cause).toBeInstanceOf(InvalidPrice);
    expect(api.callsTo('createSpotNodePool')).toEqual([]);
    expect(api.calls).toContain('deleteCloudspace:demo');
  });
});
