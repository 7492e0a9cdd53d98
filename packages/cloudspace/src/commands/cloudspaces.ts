import { Command } from 'commander';
import * as clack from '@clack/prompts';
import pc from 'picocolors';
import type { CreateFlagName, CreateFlags } from '../services/acquire.js';
import {
  createCloudspace,
  defaultKubeconfigDir,
  listCloudspaces,
  resolveOrg,
  saveCloudspaceConfig,
} from '../services/cloudspace.js';
import { clackLogger } from '../utils/logger.js';
import { printOutput } from '../utils/output.js';
import { clackPrompter } from '../utils/prompter.js';
import type { TableRow } from '../utils/table.js';
import type { Cloudspace } from '../types.js';
import {
  confirmDeletion,
  loadContext,
  reportFailure,
  withSpinner,
} from './context.js';

const CREATE_FLAG_NAMES: CreateFlagName[] = [
  'config',
  'name',
  'org',
  'region',
  'kubernetesVersion',
  'cni',
  'preemptionWebhookUrl',
  'spotNodepool',
  'ondemandNodepool',
];

const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

function cloudspaceRow(cloudspace: Cloudspace): TableRow {
  return {
    name: cloudspace.name,
    org: cloudspace.org,
    region: cloudspace.region,
    kubernetesVersion: cloudspace.kubernetesVersion,
    cni: cloudspace.cni,
    status: cloudspace.status ?? '',
  };
}

export const cloudspaces = new Command('cloudspaces')
  .alias('cs')
  .description('Manage cloudspaces');

cloudspaces
  .command('create')
  .description(
    'Create a cloudspace from a file, from flags, or interactively when no flag is given',
  )
  .option('--config <path>', 'read the cloudspace definition from a .yaml, .yml or .json file')
  .option('--name <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('--region <region>', 'region (defaults to the configured one)')
  .option('--kubernetes-version <version>', 'Kubernetes version')
  .option('--cni <cni>', 'CNI plugin')
  .option('--preemption-webhook-url <url>', 'webhook notified before spot nodes are preempted')
  .option(
    '--spot-nodepool <params>',
    'spot node pool, e.g. desired=1,serverclass=gp.vs1.medium-ord,bidprice=0.08 (repeatable)',
    collect,
    [],
  )
  .option(
    '--ondemand-nodepool <params>',
    'on-demand node pool, e.g. desired=1,serverclass=gp.vs1.medium-ord (repeatable)',
    collect,
    [],
  )
  .action(async (options: CreateFlags, command: Command) => {
    const controller = new AbortController();
    const abort = () => {
      clack.log.warn('Interrupted, stopping after the current step...');
      controller.abort();
    };
    process.once('SIGINT', abort);
    process.once('SIGTERM', abort);

    try {
      const { config, api, output } = await loadContext(command);
      const explicit = new Set(
        CREATE_FLAG_NAMES.filter(
          (flag) => command.getOptionValueSource(flag) === 'cli',
        ),
      );

      clack.intro('☁️  Creating cloudspace');

      const { cloudspace } = await createCloudspace(
        {
          flags: options,
          explicit,
          defaults: { org: config.org, region: config.region },
        },
        {
          api,
          prompter: clackPrompter,
          logger: clackLogger,
          signal: controller.signal,
        },
      );

      clack.outro(
        `🎉 Cloudspace '${pc.cyan(cloudspace.name)}' created in ${cloudspace.region}`,
      );
      printOutput(cloudspaceRow(cloudspace), output);
    } catch (error) {
      reportFailure('Failed to create cloudspace', error);
    } finally {
      process.off('SIGINT', abort);
      process.off('SIGTERM', abort);
    }
  });

cloudspaces
  .command('list')
  .description('List cloudspaces in an organization')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: { org?: string }, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);

      const items = await withSpinner(
        'Fetching cloudspaces...',
        () => listCloudspaces(api, org),
        (found) => `Found ${found.length} cloudspace(s)`,
      );

      printOutput(items.map(cloudspaceRow), output);
    } catch (error) {
      reportFailure('Failed to list cloudspaces', error);
    }
  });

cloudspaces
  .command('get')
  .description('Show a cloudspace')
  .requiredOption('--name <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: { name: string; org?: string }, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const cloudspace = await api.getCloudspace(org, options.name);
      printOutput(cloudspaceRow(cloudspace), output);
    } catch (error) {
      reportFailure('Failed to get cloudspace', error);
    }
  });

cloudspaces
  .command('get-config')
  .description('Save the kubeconfig of a cloudspace to <dir>/<name>.yaml')
  .requiredOption('--name <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('--file <dir>', 'directory to write the kubeconfig into (defaults to ~/.kube)')
  .action(
    async (
      options: { name: string; org?: string; file?: string },
      command: Command,
    ) => {
      try {
        const { config, api } = await loadContext(command);
        const org = resolveOrg(options.org, config);
        const filePath = await withSpinner(
          `Fetching kubeconfig for ${options.name}...`,
          () =>
            saveCloudspaceConfig(
              api,
              org,
              options.name,
              options.file || defaultKubeconfigDir(),
            ),
          (written) => `Config has been saved to ${written}`,
        );
        clack.log.info(`export KUBECONFIG=${pc.cyan(filePath)}`);
      } catch (error) {
        reportFailure('Failed to get cloudspace config', error);
      }
    },
  );

cloudspaces
  .command('delete')
  .description('Delete a cloudspace')
  .requiredOption('--name <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(
    async (
      options: { name: string; org?: string; yes?: boolean },
      command: Command,
    ) => {
      try {
        const { config, api } = await loadContext(command);
        const org = resolveOrg(options.org, config);

        if (!(await confirmDeletion('cloudspace', options.name, options.yes))) {
          return;
        }

        await withSpinner(
          `Deleting cloudspace ${options.name}...`,
          () => api.deleteCloudspace(org, options.name),
          () => `Cloudspace ${options.name} deleted`,
        );
      } catch (error) {
        reportFailure('Failed to delete cloudspace', error);
      }
    },
  );
