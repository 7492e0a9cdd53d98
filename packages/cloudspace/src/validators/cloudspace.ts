import { z } from 'zod';
import { VALID_REGIONS } from '../constants.js';
import { ValidationError } from '../errors.js';
import { tryNormalizeBidPrice } from '../services/pricing.js';
import type { CreateRequest } from '../types.js';

export const RegionSchema = z.enum(VALID_REGIONS);

export const CloudspaceNameSchema = z
  .string()
  .trim()
  .min(1, 'Cloudspace name is required');

export const DesiredNodesSchema = z
  .number()
  .int('Desired node count must be a whole number')
  .min(1, 'Desired node count must be at least 1');

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: ValidationError };

export function isValidRegion(region: string): boolean {
  return RegionSchema.safeParse(region).success;
}

/**
 * Checks a request before anything is created remotely. Stops at the first
 * violation, in this order: name, region, pools present, spot bid prices,
 * desired counts, server classes, organization.
 */
export function validateCreateRequest(request: CreateRequest): ValidationResult {
  const fail = (field: string, reason: string): ValidationResult => ({
    ok: false,
    error: new ValidationError(field, reason),
  });

  if (!CloudspaceNameSchema.safeParse(request.name).success) {
    return fail('name', 'name is required');
  }

  if (request.region.trim().length === 0) {
    return fail('region', 'region is required');
  }
  if (!isValidRegion(request.region)) {
    return fail(
      'region',
      `region ${request.region} is not valid. Available regions: ${VALID_REGIONS.join(', ')}`,
    );
  }

  if (request.spotPools.length === 0 && request.onDemandPools.length === 0) {
    return fail(
      'pools',
      'pool required: at least one spot or on-demand node pool must be specified',
    );
  }

  for (const [index, pool] of request.spotPools.entries()) {
    if (pool.bidPrice.trim().length === 0) {
      return fail(
        `spotPools[${index}].bidPrice`,
        `bid price is required for spot node pool ${pool.name}`,
      );
    }
    const price = tryNormalizeBidPrice(pool.bidPrice);
    if (!price.ok) {
      return fail(`spotPools[${index}].bidPrice`, price.error.message);
    }
  }

  const pools = [
    ...request.spotPools.map((pool, index) => ({
      field: `spotPools[${index}]`,
      pool,
    })),
    ...request.onDemandPools.map((pool, index) => ({
      field: `onDemandPools[${index}]`,
      pool,
    })),
  ];

  for (const { field, pool } of pools) {
    const desired = DesiredNodesSchema.safeParse(pool.desired);
    if (!desired.success) {
      return fail(
        `${field}.desired`,
        `desired number of nodes must be at least 1 for node pool ${pool.name}`,
      );
    }
  }

  for (const { field, pool } of pools) {
    if (pool.serverClass.trim().length === 0) {
      return fail(
        `${field}.serverClass`,
        `server class is required for node pool ${pool.name}`,
      );
    }
  }

  if (request.organization.trim().length === 0) {
    return fail(
      'organization',
      "organization not specified (use --org or run 'cloudspace configure')",
    );
  }

  return { ok: true };
}

export function assertValidCreateRequest(request: CreateRequest): void {
  const result = validateCreateRequest(request);
  if (!result.ok) {
    throw result.error;
  }
}
