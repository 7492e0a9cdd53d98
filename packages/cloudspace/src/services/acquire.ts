import * as path from 'path';
import { randomUUID } from 'crypto';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CNI,
  DEFAULT_DESIRED_NODES,
  DEFAULT_KUBERNETES_VERSION,
  DEFAULT_SERVER_CLASS,
} from '../constants.js';
import {
  ConfigError,
  ConflictingSource,
  UnknownParameter,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { readTextFile } from '../utils/fs.js';
import type {
  CreateRequest,
  OnDemandPoolSpec,
  SpotPoolSpec,
} from '../types.js';

/** Parsed options of `cloudspaces create`, one field per flag. */
export interface CreateFlags {
  config?: string;
  name?: string;
  org?: string;
  region?: string;
  kubernetesVersion?: string;
  cni?: string;
  preemptionWebhookUrl?: string;
  spotNodepool: string[];
  ondemandNodepool: string[];
}

export type CreateFlagName = keyof CreateFlags;

export interface SourceDefaults {
  org?: string;
  region?: string;
}

export interface AcquireSource {
  flags: CreateFlags;
  /** Flags the operator typed, as opposed to ones holding a default. */
  explicit: ReadonlySet<CreateFlagName>;
  defaults?: SourceDefaults;
}

export type AcquireMode = 'file' | 'flags' | 'wizard';

export interface AcquireDeps {
  runWizard(defaults: SourceDefaults): Promise<CreateRequest>;
  newPoolName?: () => string;
}

type PoolKind = 'spot' | 'ondemand';

const SPOT_POOL_KEYS = [
  'name',
  'serverclass',
  'desired',
  'bidprice',
  'org',
  'cloudspace',
];
const ONDEMAND_POOL_KEYS = SPOT_POOL_KEYS.filter((key) => key !== 'bidprice');

const PriceSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const FilePoolSchema = z.object({
  name: z.string().optional(),
  org: z.string().optional(),
  cloudspace: z.string().optional(),
  serverClass: z.string().default(''),
  desired: z.number(),
});

export const CloudspaceFileSchema = z.object({
  cloudspace: z.object({
    name: z.string().default(''),
    org: z.string().optional(),
    region: z.string().optional(),
    kubernetesVersion: z.string().optional(),
    cni: z.string().optional(),
    preemptionWebhookURL: z.string().optional(),
  }),
  spotnodepools: z
    .array(FilePoolSchema.extend({ bidPrice: PriceSchema.default('') }))
    .default([]),
  ondemandnodepools: z.array(FilePoolSchema).default([]),
});

export type CloudspaceFile = z.infer<typeof CloudspaceFileSchema>;

/**
 * `--config` wins outright, and no other flag may accompany it. Otherwise a
 * single explicit flag selects flags mode; with none at all the wizard runs.
 */
export function selectMode(source: AcquireSource): AcquireMode {
  if (source.flags.config) {
    const others = [...source.explicit].filter((flag) => flag !== 'config');
    if (others.length > 0) {
      throw new ConflictingSource(others);
    }
    return 'file';
  }
  return source.explicit.size > 0 ? 'flags' : 'wizard';
}

export async function acquire(
  source: AcquireSource,
  deps: AcquireDeps,
): Promise<CreateRequest> {
  const defaults = source.defaults ?? {};
  const newPoolName = deps.newPoolName ?? randomUUID;

  switch (selectMode(source)) {
    case 'file':
      return applyDefaults(
        await loadFromFile(source.flags.config ?? '', newPoolName),
        defaults,
      );
    case 'flags':
      return applyDefaults(loadFromFlags(source.flags, newPoolName), defaults);
    case 'wizard':
      return applyDefaults(await deps.runWizard(defaults), defaults);
  }
}

export function applyDefaults(
  request: CreateRequest,
  defaults: SourceDefaults,
): CreateRequest {
  return {
    ...request,
    organization: request.organization || defaults.org || '',
    region: request.region || defaults.region || '',
    kubernetesVersion: request.kubernetesVersion || DEFAULT_KUBERNETES_VERSION,
    cni: request.cni || DEFAULT_CNI,
  };
}

export async function loadFromFile(
  filePath: string,
  newPoolName: () => string = randomUUID,
): Promise<CreateRequest> {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
    throw new ConfigError(
      `unsupported config file format: ${ext || filePath} (must be .yaml, .yml, or .json)`,
    );
  }

  let content: string | null;
  try {
    content = await readTextFile(filePath);
  } catch (error) {
    throw new ConfigError(`failed to read config file ${filePath}`, {
      cause: error,
    });
  }
  if (content === null) {
    throw new ConfigError(`config file not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = ext === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `failed to parse config file ${filePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return parseCloudspaceFile(document, newPoolName);
}

export function parseCloudspaceFile(
  document: unknown,
  newPoolName: () => string = randomUUID,
): CreateRequest {
  const parsed = CloudspaceFileSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? formatPath(issue.path) : 'config';
    throw new ValidationError(field || 'config', issue?.message ?? 'invalid');
  }

  const { cloudspace, spotnodepools, ondemandnodepools } = parsed.data;
  const org = cloudspace.org ?? '';

  return {
    name: cloudspace.name,
    organization: org,
    region: cloudspace.region ?? '',
    kubernetesVersion: cloudspace.kubernetesVersion ?? '',
    cni: cloudspace.cni ?? '',
    preemptionWebhookURL: cloudspace.preemptionWebhookURL ?? '',
    spotPools: spotnodepools.map((pool, index) => {
      checkReference(`spotnodepools[${index}]`, pool, org, cloudspace.name);
      return {
        name: pool.name || newPoolName(),
        serverClass: pool.serverClass,
        desired: pool.desired,
        bidPrice: pool.bidPrice,
      };
    }),
    onDemandPools: ondemandnodepools.map((pool, index) => {
      checkReference(`ondemandnodepools[${index}]`, pool, org, cloudspace.name);
      return {
        name: pool.name || newPoolName(),
        serverClass: pool.serverClass,
        desired: pool.desired,
      };
    }),
  };
}

export function loadFromFlags(
  flags: CreateFlags,
  newPoolName: () => string = randomUUID,
): CreateRequest {
  const name = flags.name ?? '';
  const org = flags.org ?? '';

  const spotPools = flags.spotNodepool.map((descriptor, index): SpotPoolSpec => {
    const params = parseNodePoolDescriptor(descriptor, 'spot');
    checkReference(`spotPools[${index}]`, params, org, name);
    return {
      name: params.name || newPoolName(),
      serverClass: params.serverclass || DEFAULT_SERVER_CLASS,
      desired: parseDesired(params.desired),
      bidPrice: params.bidprice ?? '',
    };
  });

  const onDemandPools = flags.ondemandNodepool.map(
    (descriptor, index): OnDemandPoolSpec => {
      const params = parseNodePoolDescriptor(descriptor, 'ondemand');
      checkReference(`onDemandPools[${index}]`, params, org, name);
      return {
        name: params.name || newPoolName(),
        serverClass: params.serverclass || DEFAULT_SERVER_CLASS,
        desired: parseDesired(params.desired),
      };
    },
  );

  return {
    name,
    organization: org,
    region: flags.region ?? '',
    kubernetesVersion: flags.kubernetesVersion ?? '',
    cni: flags.cni ?? '',
    preemptionWebhookURL: flags.preemptionWebhookUrl ?? '',
    spotPools,
    onDemandPools,
  };
}

/**
 * Accepts `desired=2,serverclass=gp.vs1.medium-ord,bidprice=0.08` or an
 * inline record such as `{desired: 2, serverClass: gp.vs1.medium-ord}`.
 * Keys are matched case-insensitively and returned lower-cased.
 */
export function parseNodePoolDescriptor(
  descriptor: string,
  kind: PoolKind,
): Record<string, string> {
  const allowed = kind === 'spot' ? SPOT_POOL_KEYS : ONDEMAND_POOL_KEYS;
  const entries = descriptor.trim().startsWith('{')
    ? parseInlineRecord(descriptor, kind)
    : parseKeyValueList(descriptor);

  const result: Record<string, string> = {};
  for (const [rawKey, value] of entries) {
    const key = rawKey.toLowerCase();
    if (!allowed.includes(key)) {
      throw new UnknownParameter(
        rawKey,
        `unknown ${kind === 'spot' ? 'spot' : 'on-demand'} node pool parameter: ${rawKey} (allowed: ${allowed.join(', ')})`,
      );
    }
    result[key] = value;
  }
  return result;
}

function parseKeyValueList(descriptor: string): Array<[string, string]> {
  if (descriptor.trim().length === 0) {
    return [];
  }
  return descriptor.split(',').map((pair): [string, string] => {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      throw new UnknownParameter(
        pair.trim(),
        `invalid parameter format: ${pair.trim()}, expected key=value`,
      );
    }
    return [pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()];
  });
}

function parseInlineRecord(
  descriptor: string,
  kind: PoolKind,
): Array<[string, string]> {
  const field = `${kind}-nodepool`;
  let record: unknown;
  try {
    record = parseYaml(descriptor);
  } catch (error) {
    throw new ValidationError(field, `invalid inline record: ${errorMessage(error)}`);
  }

  const parsed = z
    .record(z.union([z.string(), z.number()]))
    .safeParse(record);
  if (!parsed.success) {
    throw new ValidationError(
      field,
      'inline record must map keys to strings or numbers',
    );
  }
  return Object.entries(parsed.data).map(([key, value]) => [
    key,
    String(value).trim(),
  ]);
}

function parseDesired(value: string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_DESIRED_NODES;
  }
  return /^\d+$/.test(value) ? Number(value) : Number.NaN;
}

function checkReference(
  field: string,
  pool: { org?: string; cloudspace?: string },
  org: string,
  cloudspace: string,
): void {
  if (pool.org && org && pool.org !== org) {
    throw new ValidationError(
      `${field}.org`,
      `node pool references organization ${pool.org} but the cloudspace belongs to ${org}`,
    );
  }
  if (pool.cloudspace && cloudspace && pool.cloudspace !== cloudspace) {
    throw new ValidationError(
      `${field}.cloudspace`,
      `node pool references cloudspace ${pool.cloudspace} but the cloudspace being created is ${cloudspace}`,
    );
  }
}

function formatPath(segments: Array<string | number>): string {
  return segments
    .map((segment, index) =>
      typeof segment === 'number'
        ? `[${segment}]`
        : index === 0
          ? segment
          : `.${segment}`,
    )
    .join('');
}
