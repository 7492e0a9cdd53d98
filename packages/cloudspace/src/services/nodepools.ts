import { randomUUID } from 'crypto';
import { ValidationError } from '../errors.js';
import { DesiredNodesSchema } from '../validators/cloudspace.js';
import type { CloudspaceApi } from './api.js';
import { normalizeBidPrice } from './pricing.js';
import type { OnDemandNodePool, SpotNodePool } from '../types.js';

export interface PoolTarget {
  org: string;
  cloudspace: string;
}

export interface CreatePoolInput extends PoolTarget {
  name?: string;
  serverClass: string;
  desired: string;
}

export interface CreateSpotPoolInput extends CreatePoolInput {
  bidPrice: string;
}

export interface UpdatePoolInput extends PoolTarget {
  name: string;
  desired?: string;
}

export interface UpdateSpotPoolInput extends UpdatePoolInput {
  bidPrice?: string;
}

export function parseDesired(raw: string): number {
  const trimmed = raw.trim();
  const count = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  const parsed = DesiredNodesSchema.safeParse(count);
  if (!parsed.success) {
    throw new ValidationError(
      'desired',
      `desired must be a whole number of at least 1 (got ${JSON.stringify(raw)})`,
    );
  }
  return parsed.data;
}

function requireServerClass(serverClass: string): string {
  const trimmed = serverClass.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('serverclass', 'server class is required');
  }
  return trimmed;
}

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name.localeCompare(b.name);
}

export async function listSpotPools(
  api: CloudspaceApi,
  target: PoolTarget,
): Promise<SpotNodePool[]> {
  const pools = await api.listSpotNodePools(target.org, target.cloudspace);
  return [...pools].sort(byName);
}

export async function listOnDemandPools(
  api: CloudspaceApi,
  target: PoolTarget,
): Promise<OnDemandNodePool[]> {
  const pools = await api.listOnDemandNodePools(target.org, target.cloudspace);
  return [...pools].sort(byName);
}

/**
 * Validates the input, creates the pool and returns it as the control plane
 * reports it afterwards. A pool without a name gets a UUID.
 */
export async function createSpotPool(
  api: CloudspaceApi,
  input: CreateSpotPoolInput,
  newPoolName: () => string = randomUUID,
): Promise<SpotNodePool> {
  const pool: SpotNodePool = {
    name: input.name?.trim() || newPoolName(),
    org: input.org,
    cloudspace: input.cloudspace,
    serverClass: requireServerClass(input.serverClass),
    desired: parseDesired(input.desired),
    bidPrice: normalizeBidPrice(input.bidPrice),
  };
  await api.createSpotNodePool(input.org, pool);
  return api.getSpotNodePool(input.org, pool.name);
}

export async function createOnDemandPool(
  api: CloudspaceApi,
  input: CreatePoolInput,
  newPoolName: () => string = randomUUID,
): Promise<OnDemandNodePool> {
  const pool: OnDemandNodePool = {
    name: input.name?.trim() || newPoolName(),
    org: input.org,
    cloudspace: input.cloudspace,
    serverClass: requireServerClass(input.serverClass),
    desired: parseDesired(input.desired),
  };
  await api.createOnDemandNodePool(input.org, pool);
  return api.getOnDemandNodePool(input.org, pool.name);
}

/**
 * Changes the desired count and bid price of an existing pool. Fields left
 * out keep their current value; at least one must be given.
 */
export async function updateSpotPool(
  api: CloudspaceApi,
  input: UpdateSpotPoolInput,
): Promise<SpotNodePool> {
  if (input.desired === undefined && input.bidPrice === undefined) {
    throw new ValidationError('desired', 'nothing to update: pass --desired or --bidprice');
  }
  const desired = input.desired === undefined ? undefined : parseDesired(input.desired);
  const bidPrice =
    input.bidPrice === undefined ? undefined : normalizeBidPrice(input.bidPrice);

  const current = await api.getSpotNodePool(input.org, input.name);
  assertInCloudspace(current, input);

  const updated: SpotNodePool = {
    ...current,
    desired: desired ?? current.desired,
    bidPrice: bidPrice ?? current.bidPrice,
  };
  await api.updateSpotNodePool(input.org, updated);
  return updated;
}

export async function updateOnDemandPool(
  api: CloudspaceApi,
  input: UpdatePoolInput,
): Promise<OnDemandNodePool> {
  if (input.desired === undefined) {
    throw new ValidationError('desired', 'nothing to update: pass --desired');
  }
  const desired = parseDesired(input.desired);

  const current = await api.getOnDemandNodePool(input.org, input.name);
  assertInCloudspace(current, input);

  const updated: OnDemandNodePool = { ...current, desired };
  await api.updateOnDemandNodePool(input.org, updated);
  return updated;
}

function assertInCloudspace(
  pool: { name: string; cloudspace: string },
  target: PoolTarget,
): void {
  if (pool.cloudspace !== target.cloudspace) {
    throw new ValidationError(
      'cloudspace',
      `node pool ${pool.name} belongs to cloudspace ${pool.cloudspace}, not ${target.cloudspace}`,
    );
  }
}
