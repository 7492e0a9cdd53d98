import { Command } from 'commander';
import { resolveOrg } from '../services/cloudspace.js';
import {
  createOnDemandPool,
  createSpotPool,
  listOnDemandPools,
  listSpotPools,
  updateOnDemandPool,
  updateSpotPool,
} from '../services/nodepools.js';
import { printOutput } from '../utils/output.js';
import type { TableRow } from '../utils/table.js';
import type { OnDemandNodePool, SpotNodePool } from '../types.js';
import {
  confirmDeletion,
  loadContext,
  reportFailure,
  withSpinner,
} from './context.js';

interface PoolOptions {
  org?: string;
  cloudspace: string;
}

interface CreateOptions extends PoolOptions {
  name?: string;
  serverclass: string;
  desired: string;
}

interface UpdateOptions extends PoolOptions {
  name: string;
  desired?: string;
}

interface NamedOptions {
  name: string;
  org?: string;
  yes?: boolean;
}

function onDemandPoolRow(pool: OnDemandNodePool): TableRow {
  return {
    name: pool.name,
    cloudspace: pool.cloudspace,
    serverClass: pool.serverClass,
    desired: pool.desired,
  };
}

function spotPoolRow(pool: SpotNodePool): TableRow {
  return { ...onDemandPoolRow(pool), bidPrice: pool.bidPrice };
}

export const nodepools = new Command('nodepools')
  .alias('np')
  .description('Manage the node pools of a cloudspace');

const spot = nodepools.command('spot').description('Manage spot node pools');

spot
  .command('list')
  .description('List the spot node pools of a cloudspace')
  .requiredOption('--cloudspace <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: PoolOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const items = await withSpinner(
        'Fetching spot node pools...',
        () => listSpotPools(api, { org, cloudspace: options.cloudspace }),
        (found) => `Found ${found.length} spot node pool(s)`,
      );
      printOutput(items.map(spotPoolRow), output);
    } catch (error) {
      reportFailure('Failed to list spot node pools', error);
    }
  });

spot
  .command('get')
  .description('Show a spot node pool')
  .requiredOption('--name <name>', 'node pool name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: NamedOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      printOutput(spotPoolRow(await api.getSpotNodePool(org, options.name)), output);
    } catch (error) {
      reportFailure('Failed to get spot node pool', error);
    }
  });

spot
  .command('create')
  .description('Create a spot node pool in an existing cloudspace')
  .option('--name <name>', 'node pool name (a UUID is generated when omitted)')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .requiredOption('--cloudspace <name>', 'cloudspace name')
  .requiredOption('--serverclass <name>', 'server class, e.g. gp.vs1.medium-ord')
  .requiredOption('--desired <count>', 'desired number of nodes')
  .requiredOption('--bidprice <price>', 'maximum bid price per hour, e.g. 0.08')
  .action(async (options: CreateOptions & { bidprice: string }, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const pool = await withSpinner(
        'Creating spot node pool...',
        () =>
          createSpotPool(api, {
            name: options.name,
            org,
            cloudspace: options.cloudspace,
            serverClass: options.serverclass,
            desired: options.desired,
            bidPrice: options.bidprice,
          }),
        (created) => `Spot node pool ${created.name} created`,
      );
      printOutput(spotPoolRow(pool), output);
    } catch (error) {
      reportFailure('Failed to create spot node pool', error);
    }
  });

spot
  .command('update')
  .description('Change the desired count or bid price of a spot node pool')
  .requiredOption('--name <name>', 'node pool name')
  .requiredOption('--cloudspace <name>', 'cloudspace the pool belongs to')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('--desired <count>', 'desired number of nodes')
  .option('--bidprice <price>', 'maximum bid price per hour')
  .action(async (options: UpdateOptions & { bidprice?: string }, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const pool = await withSpinner(
        `Updating spot node pool ${options.name}...`,
        () =>
          updateSpotPool(api, {
            name: options.name,
            org,
            cloudspace: options.cloudspace,
            desired: options.desired,
            bidPrice: options.bidprice,
          }),
        (updated) => `Spot node pool ${updated.name} updated`,
      );
      printOutput(spotPoolRow(pool), output);
    } catch (error) {
      reportFailure('Failed to update spot node pool', error);
    }
  });

spot
  .command('delete')
  .description('Delete a spot node pool')
  .requiredOption('--name <name>', 'node pool name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(async (options: NamedOptions, command: Command) => {
    try {
      const { config, api } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      if (!(await confirmDeletion('spot node pool', options.name, options.yes))) {
        return;
      }
      await withSpinner(
        `Deleting spot node pool ${options.name}...`,
        () => api.deleteSpotNodePool(org, options.name),
        () => `Spot node pool ${options.name} deleted`,
      );
    } catch (error) {
      reportFailure('Failed to delete spot node pool', error);
    }
  });

const ondemand = nodepools
  .command('ondemand')
  .description('Manage on-demand node pools');

ondemand
  .command('list')
  .description('List the on-demand node pools of a cloudspace')
  .requiredOption('--cloudspace <name>', 'cloudspace name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: PoolOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const items = await withSpinner(
        'Fetching on-demand node pools...',
        () => listOnDemandPools(api, { org, cloudspace: options.cloudspace }),
        (found) => `Found ${found.length} on-demand node pool(s)`,
      );
      printOutput(items.map(onDemandPoolRow), output);
    } catch (error) {
      reportFailure('Failed to list on-demand node pools', error);
    }
  });

ondemand
  .command('get')
  .description('Show an on-demand node pool')
  .requiredOption('--name <name>', 'node pool name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .action(async (options: NamedOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      printOutput(
        onDemandPoolRow(await api.getOnDemandNodePool(org, options.name)),
        output,
      );
    } catch (error) {
      reportFailure('Failed to get on-demand node pool', error);
    }
  });

ondemand
  .command('create')
  .description('Create an on-demand node pool in an existing cloudspace')
  .option('--name <name>', 'node pool name (a UUID is generated when omitted)')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .requiredOption('--cloudspace <name>', 'cloudspace name')
  .requiredOption('--serverclass <name>', 'server class, e.g. gp.vs1.medium-ord')
  .requiredOption('--desired <count>', 'desired number of nodes')
  .action(async (options: CreateOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const pool = await withSpinner(
        'Creating on-demand node pool...',
        () =>
          createOnDemandPool(api, {
            name: options.name,
            org,
            cloudspace: options.cloudspace,
            serverClass: options.serverclass,
            desired: options.desired,
          }),
        (created) => `On-demand node pool ${created.name} created`,
      );
      printOutput(onDemandPoolRow(pool), output);
    } catch (error) {
      reportFailure('Failed to create on-demand node pool', error);
    }
  });

ondemand
  .command('update')
  .description('Change the desired count of an on-demand node pool')
  .requiredOption('--name <name>', 'node pool name')
  .requiredOption('--cloudspace <name>', 'cloudspace the pool belongs to')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('--desired <count>', 'desired number of nodes')
  .action(async (options: UpdateOptions, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      const pool = await withSpinner(
        `Updating on-demand node pool ${options.name}...`,
        () =>
          updateOnDemandPool(api, {
            name: options.name,
            org,
            cloudspace: options.cloudspace,
            desired: options.desired,
          }),
        (updated) => `On-demand node pool ${updated.name} updated`,
      );
      printOutput(onDemandPoolRow(pool), output);
    } catch (error) {
      reportFailure('Failed to update on-demand node pool', error);
    }
  });

ondemand
  .command('delete')
  .description('Delete an on-demand node pool')
  .requiredOption('--name <name>', 'node pool name')
  .option('--org <org>', 'organization (defaults to the configured one)')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(async (options: NamedOptions, command: Command) => {
    try {
      const { config, api } = await loadContext(command);
      const org = resolveOrg(options.org, config);
      if (!(await confirmDeletion('on-demand node pool', options.name, options.yes))) {
        return;
      }
      await withSpinner(
        `Deleting on-demand node pool ${options.name}...`,
        () => api.deleteOnDemandNodePool(org, options.name),
        () => `On-demand node pool ${options.name} deleted`,
      );
    } catch (error) {
      reportFailure('Failed to delete on-demand node pool', error);
    }
  });
