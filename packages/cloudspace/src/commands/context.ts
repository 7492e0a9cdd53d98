import type { Command } from 'commander';
import * as clack from '@clack/prompts';
import pc from 'picocolors';
import {
  type CliConfig,
  getBaseUrl,
  loadConfig,
  requireAccessToken,
} from '../config.js';
import {
  OperationCancelled,
  ProvisioningError,
  errorMessage,
} from '../errors.js';
import { HttpCloudspaceApi } from '../services/api.js';
import { type OutputFormat, parseOutputFormat } from '../utils/output.js';

export interface CommandContext {
  config: CliConfig;
  api: HttpCloudspaceApi;
  output: OutputFormat;
}

export async function loadContext(command: Command): Promise<CommandContext> {
  const config = await loadConfig();
  const api = new HttpCloudspaceApi({
    baseUrl: getBaseUrl(config),
    accessToken: requireAccessToken(config),
  });
  return {
    config,
    api,
    output: parseOutputFormat(command.optsWithGlobals().output),
  };
}

export function reportFailure(action: string, error: unknown): void {
  if (error instanceof OperationCancelled) {
    clack.cancel(error.message);
  } else {
    clack.log.error(`${action}: ${errorMessage(error)}`);
  }

  if (
    (error instanceof OperationCancelled || error instanceof ProvisioningError) &&
    error.rollbackWarnings.length > 0
  ) {
    clack.log.warn(
      [
        pc.yellow('Some resources could not be rolled back and must be removed manually:'),
        ...error.rollbackWarnings.map((warning) => `  ${warning.message}`),
      ].join('\n'),
    );
  }

  process.exitCode = 1;
}

/**
 * Asks before deleting unless `--yes` was given. A refusal is reported as a
 * cancellation and fails the command.
 */
export async function confirmDeletion(
  resource: string,
  name: string,
  yes: boolean | undefined,
): Promise<boolean> {
  if (yes) {
    return true;
  }
  const confirmed = await clack.confirm({
    message: `Are you sure you want to delete ${resource} '${name}'?`,
    initialValue: false,
  });
  if (clack.isCancel(confirmed) || !confirmed) {
    clack.cancel(`Deletion of ${resource} ${name} cancelled`);
    process.exitCode = 1;
    return false;
  }
  return true;
}

/** Runs `task` behind a spinner, stopping it on failure as well. */
export async function withSpinner<T>(
  message: string,
  task: () => Promise<T>,
  done: (result: T) => string,
): Promise<T> {
  const spinner = clack.spinner();
  spinner.start(message);
  try {
    const result = await task();
    spinner.stop(done(result));
    return result;
  } catch (error) {
    spinner.stop(message, 1);
    throw error;
  }
}
