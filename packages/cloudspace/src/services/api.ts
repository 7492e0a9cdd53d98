import { z } from 'zod';
import {
  RemoteConflict,
  RemoteError,
  RemoteForbidden,
  RemoteNotFound,
  RemoteUnauthorized,
  RemoteUnavailable,
  errorMessage,
} from '../errors.js';
import type {
  Cloudspace,
  CloudspaceSpec,
  OnDemandNodePool,
  Organization,
  Region,
  ServerClass,
  SpotNodePool,
} from '../types.js';

export interface CloudspaceApi {
  listRegions(): Promise<Region[]>;
  getRegion(name: string): Promise<Region>;
  listServerClasses(region: string): Promise<ServerClass[]>;
  getServerClass(name: string): Promise<ServerClass>;
  getMinimumBidPrice(serverClass: string): Promise<string>;

  listOrganizations(): Promise<Organization[]>;
  deleteOrganization(name: string): Promise<void>;

  listCloudspaces(org: string): Promise<Cloudspace[]>;
  createCloudspace(spec: CloudspaceSpec): Promise<void>;
  getCloudspace(org: string, name: string): Promise<Cloudspace>;
  getCloudspaceConfig(org: string, name: string): Promise<string>;
  deleteCloudspace(org: string, name: string): Promise<void>;

  listSpotNodePools(org: string, cloudspace: string): Promise<SpotNodePool[]>;
  createSpotNodePool(org: string, pool: SpotNodePool): Promise<void>;
  getSpotNodePool(org: string, name: string): Promise<SpotNodePool>;
  updateSpotNodePool(org: string, pool: SpotNodePool): Promise<void>;
  deleteSpotNodePool(org: string, name: string): Promise<void>;

  listOnDemandNodePools(
    org: string,
    cloudspace: string,
  ): Promise<OnDemandNodePool[]>;
  createOnDemandNodePool(org: string, pool: OnDemandNodePool): Promise<void>;
  getOnDemandNodePool(org: string, name: string): Promise<OnDemandNodePool>;
  updateOnDemandNodePool(org: string, pool: OnDemandNodePool): Promise<void>;
  deleteOnDemandNodePool(org: string, name: string): Promise<void>;
}

const API_PREFIX = '/apis/ngpc.rxt.io/v1';
const DEFAULT_TIMEOUT = 30_000;

const MetadataSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
});

const RegionSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({ description: z.string().optional() }).optional(),
});

const ServerClassSchema = z.object({
  metadata: MetadataSchema,
  spec: z
    .object({
      region: z.string().optional(),
      resources: z
        .object({ cpu: z.string().optional(), memory: z.string().optional() })
        .optional(),
      onDemandPricing: z.object({ cost: z.string().optional() }).optional(),
    })
    .optional(),
  status: z
    .object({
      spotPricing: z
        .object({
          marketPricePerHour: z.string().optional(),
          hammerPricePerHour: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

const CloudspaceSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({
    region: z.string(),
    kubernetesVersion: z.string().optional(),
    cni: z.string().optional(),
    webhook: z.string().optional(),
  }),
  status: z.object({ phase: z.string().optional() }).optional(),
});

const SpotNodePoolSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({
    cloudSpace: z.string(),
    serverClass: z.string(),
    desired: z.number(),
    bidPrice: z.string(),
  }),
});

const OnDemandNodePoolSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({
    cloudSpace: z.string(),
    serverClass: z.string(),
    desired: z.number(),
  }),
});

const OrganizationSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({ displayName: z.string().optional() }).optional(),
});

const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ items: z.array(item) });

export interface HttpCloudspaceApiOptions {
  baseUrl: string;
  accessToken: string;
  timeoutMs?: number;
}

/**
 * Control-plane client over `fetch`. The access token is sent as-is; token
 * refresh is left to whoever wrote the configuration.
 */
export class HttpCloudspaceApi implements CloudspaceApi {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly timeoutMs: number;

  constructor(options: HttpCloudspaceApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
  }

  async listRegions(): Promise<Region[]> {
    const body = await this.request('GET', '/regions', listOf(RegionSchema));
    return body.items.map((item) => ({
      name: item.metadata.name,
      description: item.spec?.description,
    }));
  }

  async getRegion(name: string): Promise<Region> {
    const body = await this.request(
      'GET',
      `/regions/${encodeURIComponent(name)}`,
      RegionSchema,
    );
    return { name: body.metadata.name, description: body.spec?.description };
  }

  async listServerClasses(region: string): Promise<ServerClass[]> {
    const body = await this.request(
      'GET',
      `/serverclasses?region=${encodeURIComponent(region)}`,
      listOf(ServerClassSchema),
    );
    return body.items
      .map(toServerClass)
      .filter((serverClass) => !serverClass.region || serverClass.region === region);
  }

  async getServerClass(name: string): Promise<ServerClass> {
    const body = await this.request(
      'GET',
      `/serverclasses/${encodeURIComponent(name)}`,
      ServerClassSchema,
    );
    return toServerClass(body);
  }

  async getMinimumBidPrice(serverClass: string): Promise<string> {
    const price = (await this.getServerClass(serverClass)).currentMarketPricePerHour;
    if (!price) {
      throw new RemoteError(
        `server class ${serverClass} has no market price`,
        200,
      );
    }
    return price;
  }

  async listOrganizations(): Promise<Organization[]> {
    const body = await this.request(
      'GET',
      '/organizations',
      listOf(OrganizationSchema),
    );
    return body.items.map((item) => ({
      name: item.metadata.name,
      displayName: item.spec?.displayName,
    }));
  }

  async deleteOrganization(name: string): Promise<void> {
    await this.send('DELETE', `/organizations/${encodeURIComponent(name)}`);
  }

  async listCloudspaces(org: string): Promise<Cloudspace[]> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'cloudspaces'),
      listOf(CloudspaceSchema),
    );
    return body.items.map((item) => toCloudspace(org, item));
  }

  async createCloudspace(spec: CloudspaceSpec): Promise<void> {
    await this.send('POST', this.namespaced(spec.org, 'cloudspaces'), {
      apiVersion: 'ngpc.rxt.io/v1',
      kind: 'CloudSpace',
      metadata: { name: spec.name, namespace: spec.org },
      spec: {
        region: spec.region,
        kubernetesVersion: spec.kubernetesVersion,
        cni: spec.cni,
        webhook: spec.preemptionWebhookURL || undefined,
      },
    });
  }

  async getCloudspace(org: string, name: string): Promise<Cloudspace> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'cloudspaces', name),
      CloudspaceSchema,
    );
    return toCloudspace(org, body);
  }

  /** Returns the kubeconfig document of a ready cloudspace, as served. */
  async getCloudspaceConfig(org: string, name: string): Promise<string> {
    const path = `${this.namespaced(org, 'cloudspaces', name)}/kubeconfig`;
    const response = await this.send('GET', path);
    return response.text();
  }

  async deleteCloudspace(org: string, name: string): Promise<void> {
    await this.send('DELETE', this.namespaced(org, 'cloudspaces', name));
  }

  async listSpotNodePools(
    org: string,
    cloudspace: string,
  ): Promise<SpotNodePool[]> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'spotnodepools'),
      listOf(SpotNodePoolSchema),
    );
    return body.items
      .map((item) => toSpotNodePool(org, item))
      .filter((pool) => pool.cloudspace === cloudspace);
  }

  async createSpotNodePool(org: string, pool: SpotNodePool): Promise<void> {
    await this.send(
      'POST',
      this.namespaced(org, 'spotnodepools'),
      spotNodePoolBody(org, pool),
    );
  }

  async getSpotNodePool(org: string, name: string): Promise<SpotNodePool> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'spotnodepools', name),
      SpotNodePoolSchema,
    );
    return toSpotNodePool(org, body);
  }

  async updateSpotNodePool(org: string, pool: SpotNodePool): Promise<void> {
    await this.send(
      'PUT',
      this.namespaced(org, 'spotnodepools', pool.name),
      spotNodePoolBody(org, pool),
    );
  }

  async deleteSpotNodePool(org: string, name: string): Promise<void> {
    await this.send('DELETE', this.namespaced(org, 'spotnodepools', name));
  }

  async listOnDemandNodePools(
    org: string,
    cloudspace: string,
  ): Promise<OnDemandNodePool[]> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'ondemandnodepools'),
      listOf(OnDemandNodePoolSchema),
    );
    return body.items
      .map((item) => toOnDemandNodePool(org, item))
      .filter((pool) => pool.cloudspace === cloudspace);
  }

  async createOnDemandNodePool(
    org: string,
    pool: OnDemandNodePool,
  ): Promise<void> {
    await this.send(
      'POST',
      this.namespaced(org, 'ondemandnodepools'),
      onDemandNodePoolBody(org, pool),
    );
  }

  async getOnDemandNodePool(
    org: string,
    name: string,
  ): Promise<OnDemandNodePool> {
    const body = await this.request(
      'GET',
      this.namespaced(org, 'ondemandnodepools', name),
      OnDemandNodePoolSchema,
    );
    return toOnDemandNodePool(org, body);
  }

  async updateOnDemandNodePool(
    org: string,
    pool: OnDemandNodePool,
  ): Promise<void> {
    await this.send(
      'PUT',
      this.namespaced(org, 'ondemandnodepools', pool.name),
      onDemandNodePoolBody(org, pool),
    );
  }

  async deleteOnDemandNodePool(org: string, name: string): Promise<void> {
    await this.send('DELETE', this.namespaced(org, 'ondemandnodepools', name));
  }

  private namespaced(org: string, resource: string, name?: string): string {
    const base = `/namespaces/${encodeURIComponent(org)}/${resource}`;
    return name ? `${base}/${encodeURIComponent(name)}` : base;
  }

  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T,
  ): Promise<z.infer<T>> {
    const response = await this.send(method, path);
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new RemoteError(
        `${method} ${path}: response is not valid JSON`,
        response.status,
        { cause: error },
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteError(
        `${method} ${path}: unexpected response: ${parsed.error.issues.map((e) => `${e.path.join('.')} ${e.message}`).join(', ')}`,
        response.status,
      );
    }
    return parsed.data;
  }

  private async send(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<Response> {
    const url = `${this.baseUrl}${API_PREFIX}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: 'application/json',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RemoteUnavailable(
        `${method} ${path}: ${errorMessage(error)}`,
        0,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw await toRemoteError(method, path, response);
    }
    return response;
  }
}

async function toRemoteError(
  method: string,
  path: string,
  response: Response,
): Promise<RemoteError> {
  const detail = (await response.text().catch(() => '')).trim();
  const message = `${method} ${path}: ${response.status} ${response.statusText}${detail ? ` - ${detail}` : ''}`;

  switch (response.status) {
    case 401:
      return new RemoteUnauthorized(message, response.status);
    case 403:
      return new RemoteForbidden(message, response.status);
    case 404:
      return new RemoteNotFound(message, response.status);
    case 409:
      return new RemoteConflict(message, response.status);
  }
  if (response.status >= 500) {
    return new RemoteUnavailable(message, response.status);
  }
  return new RemoteError(message, response.status);
}

function toServerClass(item: z.infer<typeof ServerClassSchema>): ServerClass {
  return {
    name: item.metadata.name,
    region: item.spec?.region,
    cpu: item.spec?.resources?.cpu,
    memory: item.spec?.resources?.memory,
    currentMarketPricePerHour: item.status?.spotPricing?.marketPricePerHour,
    minBidPricePerHour: item.status?.spotPricing?.hammerPricePerHour,
    onDemandPricePerHour: item.spec?.onDemandPricing?.cost,
  };
}

function toCloudspace(
  org: string,
  item: z.infer<typeof CloudspaceSchema>,
): Cloudspace {
  return {
    name: item.metadata.name,
    org: item.metadata.namespace ?? org,
    region: item.spec.region,
    kubernetesVersion: item.spec.kubernetesVersion ?? '',
    cni: item.spec.cni ?? '',
    preemptionWebhookURL: item.spec.webhook,
    status: item.status?.phase,
  };
}

function spotNodePoolBody(org: string, pool: SpotNodePool) {
  return {
    apiVersion: 'ngpc.rxt.io/v1',
    kind: 'SpotNodePool',
    metadata: { name: pool.name, namespace: org },
    spec: {
      cloudSpace: pool.cloudspace,
      serverClass: pool.serverClass,
      desired: pool.desired,
      bidPrice: pool.bidPrice,
    },
  };
}

function onDemandNodePoolBody(org: string, pool: OnDemandNodePool) {
  return {
    apiVersion: 'ngpc.rxt.io/v1',
    kind: 'OnDemandNodePool',
    metadata: { name: pool.name, namespace: org },
    spec: {
      cloudSpace: pool.cloudspace,
      serverClass: pool.serverClass,
      desired: pool.desired,
    },
  };
}

function toSpotNodePool(
  org: string,
  item: z.infer<typeof SpotNodePoolSchema>,
): SpotNodePool {
  return {
    name: item.metadata.name,
    org: item.metadata.namespace ?? org,
    cloudspace: item.spec.cloudSpace,
    serverClass: item.spec.serverClass,
    desired: item.spec.desired,
    bidPrice: item.spec.bidPrice,
  };
}

function toOnDemandNodePool(
  org: string,
  item: z.infer<typeof OnDemandNodePoolSchema>,
): OnDemandNodePool {
  return {
    name: item.metadata.name,
    org: item.metadata.namespace ?? org,
    cloudspace: item.spec.cloudSpace,
    serverClass: item.spec.serverClass,
    desired: item.spec.desired,
  };
}
