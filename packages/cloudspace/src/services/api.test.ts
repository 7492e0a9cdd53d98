import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RemoteConflict,
  RemoteError,
  RemoteForbidden,
  RemoteNotFound,
  RemoteUnauthorized,
  RemoteUnavailable,
} from '../errors.js';
import { HttpCloudspaceApi } from './api.js';

const fetchMock = vi.fn<typeof fetch>();

function json(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function api(): HttpCloudspaceApi {
  return new HttpCloudspaceApi({
    baseUrl: 'https://api.test/',
    accessToken: 'test-token',
  });
}

function requestInit(call = 0): RequestInit | undefined {
  return fetchMock.mock.calls[call]?.[1];
}

describe('HttpCloudspaceApi', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('lists regions with a bearer token', async () => {
    fetchMock.mockResolvedValue(
      json({ items: [{ metadata: { name: 'uk-lon-1' }, spec: { description: 'London' } }] }),
    );

    const regions = await api().listRegions();

    expect(regions).toEqual([{ name: 'uk-lon-1', description: 'London' }]);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.test/apis/ngpc.rxt.io/v1/regions',
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      }),
    );
    expect(requestInit()?.body).toBeUndefined();
  });

  it('maps server classes and keeps those of the region', async () => {
    fetchMock.mockResolvedValue(
      json({
        items: [
          {
            metadata: { name: 'gp.vs1.medium-lon' },
            spec: {
              region: 'uk-lon-1',
              resources: { cpu: '2', memory: '4GB' },
              onDemandPricing: { cost: '0.10' },
            },
            status: {
              spotPricing: { marketPricePerHour: '0.035', hammerPricePerHour: '0.02' },
            },
          },
          { metadata: { name: 'gp.vs1.medium-ord' }, spec: { region: 'us-central-ord-1' } },
        ],
      }),
    );

    const serverClasses = await api().listServerClasses('uk-lon-1');

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/serverclasses?region=uk-lon-1',
    );
    expect(serverClasses).toEqual([
      {
        name: 'gp.vs1.medium-lon',
        region: 'uk-lon-1',
        cpu: '2',
        memory: '4GB',
        currentMarketPricePerHour: '0.035',
        minBidPricePerHour: '0.02',
        onDemandPricePerHour: '0.10',
      },
    ]);
  });

  it('reads the minimum bid from the market price', async () => {
    fetchMock.mockResolvedValue(
      json({
        metadata: { name: 'gp.vs1.medium-lon' },
        status: { spotPricing: { marketPricePerHour: '0.012' } },
      }),
    );

    await expect(api().getMinimumBidPrice('gp.vs1.medium-lon')).resolves.toBe('0.012');
  });

  it('posts spot node pools as namespaced resources', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 201 }));

    await api().createSpotNodePool('acme', {
      name: 'spot-a',
      org: 'acme',
      cloudspace: 'demo',
      serverClass: 'gp.vs1.medium-lon',
      desired: 2,
      bidPrice: '0.080',
    });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/namespaces/acme/spotnodepools',
    );
    expect(requestInit()?.method).toBe('POST');
    expect(JSON.parse(String(requestInit()?.body))).toEqual({
      apiVersion: 'ngpc.rxt.io/v1',
      kind: 'SpotNodePool',
      metadata: { name: 'spot-a', namespace: 'acme' },
      spec: {
        cloudSpace: 'demo',
        serverClass: 'gp.vs1.medium-lon',
        desired: 2,
        bidPrice: '0.080',
      },
    });
  });

  it('lists spot pools of one cloudspace only', async () => {
    fetchMock.mockResolvedValue(
      json({
        items: [
          {
            metadata: { name: 'spot-a', namespace: 'acme' },
            spec: { cloudSpace: 'demo', serverClass: 'gp.vs1.medium-lon', desired: 2, bidPrice: '0.080' },
          },
          {
            metadata: { name: 'spot-b', namespace: 'acme' },
            spec: { cloudSpace: 'other', serverClass: 'gp.vs1.medium-lon', desired: 1, bidPrice: '0.050' },
          },
        ],
      }),
    );

    await expect(api().listSpotNodePools('acme', 'demo')).resolves.toEqual([
      {
        name: 'spot-a',
        org: 'acme',
        cloudspace: 'demo',
        serverClass: 'gp.vs1.medium-lon',
        desired: 2,
        bidPrice: '0.080',
      },
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/namespaces/acme/spotnodepools',
    );
  });

  it('puts on-demand pool updates at the pool path', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

    await api().updateOnDemandNodePool('acme', {
      name: 'od-1',
      org: 'acme',
      cloudspace: 'demo',
      serverClass: 'gp.vs1.large-lon',
      desired: 4,
    });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/namespaces/acme/ondemandnodepools/od-1',
    );
    expect(requestInit()?.method).toBe('PUT');
    expect(JSON.parse(String(requestInit()?.body))).toMatchObject({
      kind: 'OnDemandNodePool',
      spec: { cloudSpace: 'demo', serverClass: 'gp.vs1.large-lon', desired: 4 },
    });
  });

  it('returns the kubeconfig as text', async () => {
    fetchMock.mockResolvedValue(new Response('apiVersion: v1\nkind: Config\n'));

    await expect(api().getCloudspaceConfig('acme', 'demo')).resolves.toBe(
      'apiVersion: v1\nkind: Config\n',
    );
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/namespaces/acme/cloudspaces/demo/kubeconfig',
    );
  });

  it('lists organizations', async () => {
    fetchMock.mockResolvedValue(
      json({
        items: [
          { metadata: { name: 'acme' }, spec: { displayName: 'Acme Inc' } },
          { metadata: { name: 'globex' } },
        ],
      }),
    );

    await expect(api().listOrganizations()).resolves.toEqual([
      { name: 'acme', displayName: 'Acme Inc' },
      { name: 'globex', displayName: undefined },
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/organizations',
    );
  });

  it('maps a single server class', async () => {
    fetchMock.mockResolvedValue(
      json({
        metadata: { name: 'gp.vs1.medium-lon' },
        spec: { region: 'uk-lon-1', resources: { cpu: '2', memory: '4GB' } },
      }),
    );

    await expect(api().getServerClass('gp.vs1.medium-lon')).resolves.toEqual({
      name: 'gp.vs1.medium-lon',
      region: 'uk-lon-1',
      cpu: '2',
      memory: '4GB',
      currentMarketPricePerHour: undefined,
      minBidPricePerHour: undefined,
      onDemandPricePerHour: undefined,
    });
  });

  it('maps a cloudspace body', async () => {
    fetchMock.mockResolvedValue(
      json({
        metadata: { name: 'demo', namespace: 'acme' },
        spec: { region: 'uk-lon-1', kubernetesVersion: '1.31.1', cni: 'calico' },
        status: { phase: 'Ready' },
      }),
    );

    await expect(api().getCloudspace('acme', 'demo')).resolves.toEqual({
      name: 'demo',
      org: 'acme',
      region: 'uk-lon-1',
      kubernetesVersion: '1.31.1',
      cni: 'calico',
      preemptionWebhookURL: undefined,
      status: 'Ready',
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.test/apis/ngpc.rxt.io/v1/namespaces/acme/cloudspaces/demo',
    );
  });

  it.each([
    [401, RemoteUnauthorized],
    [403, RemoteForbidden],
    [404, RemoteNotFound],
    [409, RemoteConflict],
    [500, RemoteUnavailable],
    [503, RemoteUnavailable],
    [422, RemoteError],
  ])('maps status %i to %o', async (status, errorClass) => {
    fetchMock.mockResolvedValue(new Response('nope', { status }));

    const error: unknown = await api()
      .deleteCloudspace('acme', 'demo')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(errorClass);
    expect(error).toMatchObject({ status });
  });

  it('includes the method, path, status and body in the message', async () => {
    fetchMock.mockResolvedValue(
      new Response('already exists', { status: 409, statusText: 'Conflict' }),
    );

    await expect(
      api().createCloudspace({
        name: 'demo',
        org: 'acme',
        region: 'uk-lon-1',
        kubernetesVersion: '1.31.1',
        cni: 'calico',
      }),
    ).rejects.toThrow('POST /namespaces/acme/cloudspaces: 409 Conflict - already exists');
  });

  it('treats network failures as unavailable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error: unknown = await api().listRegions().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteUnavailable);
    expect(error).toMatchObject({ status: 0, message: 'GET /regions: fetch failed' });
  });

  it('rejects bodies of the wrong shape', async () => {
    fetchMock.mockResolvedValue(json({ regions: [] }));

    await expect(api().listRegions()).rejects.toThrow(
      'GET /regions: unexpected response: items Required',
    );
  });
});
