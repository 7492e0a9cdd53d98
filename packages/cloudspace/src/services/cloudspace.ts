import { randomUUID } from 'crypto';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors.js';
import type { CliConfig } from '../config.js';
import { ensureDirectoryExists, writeTextFile } from '../utils/fs.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import type { Prompter } from '../utils/prompter.js';
import { assertValidCreateRequest } from '../validators/cloudspace.js';
import { type AcquireSource, acquire } from './acquire.js';
import type { CloudspaceApi } from './api.js';
import { ProvisioningSaga } from './provisioning.js';
import { CloudspaceWizard } from './wizard.js';
import type { Cloudspace, CreateRequest } from '../types.js';

export interface CreateCloudspaceDeps {
  api: CloudspaceApi;
  prompter: Prompter;
  logger?: Logger;
  signal?: AbortSignal;
  newPoolName?: () => string;
}

export interface CreateCloudspaceResult {
  request: CreateRequest;
  cloudspace: Cloudspace;
}

/**
 * Acquires a request from exactly one source, validates it, then provisions
 * it. Nothing remote is touched until validation has passed.
 */
export async function createCloudspace(
  source: AcquireSource,
  deps: CreateCloudspaceDeps,
): Promise<CreateCloudspaceResult> {
  const logger = deps.logger ?? silentLogger;
  const newPoolName = deps.newPoolName ?? randomUUID;

  const request = await acquire(source, {
    newPoolName,
    runWizard: (defaults) =>
      new CloudspaceWizard(deps.api, deps.prompter, {
        defaults,
        signal: deps.signal,
        logger,
        newPoolName,
      }).run(),
  });

  assertValidCreateRequest(request);

  const saga = new ProvisioningSaga(deps.api, { signal: deps.signal, logger });
  const cloudspace = await saga.run(request);
  return { request, cloudspace };
}

export function resolveOrg(org: string | undefined, config: CliConfig): string {
  const resolved = org || config.org;
  if (!resolved) {
    throw new ConfigError(
      "organization not specified (use --org or run 'cloudspace configure')",
    );
  }
  return resolved;
}

export async function listCloudspaces(
  api: CloudspaceApi,
  org: string,
): Promise<Cloudspace[]> {
  const cloudspaces = await api.listCloudspaces(org);
  return [...cloudspaces].sort((a, b) => a.name.localeCompare(b.name));
}

export function defaultKubeconfigDir(): string {
  return path.join(os.homedir(), '.kube');
}

/** Writes the cloudspace kubeconfig to `<directory>/<name>.yaml`. */
export async function saveCloudspaceConfig(
  api: CloudspaceApi,
  org: string,
  name: string,
  directory: string = defaultKubeconfigDir(),
): Promise<string> {
  const kubeconfig = await api.getCloudspaceConfig(org, name);
  await ensureDirectoryExists(directory);
  const filePath = path.join(directory, `${name}.yaml`);
  await writeTextFile(filePath, kubeconfig);
  return filePath;
}
