import { Command } from 'commander';
import { ConfigError } from '../errors.js';
import { printOutput } from '../utils/output.js';
import type { TableRow } from '../utils/table.js';
import type { ServerClass } from '../types.js';
import { loadContext, reportFailure, withSpinner } from './context.js';

function serverClassRow(sc: ServerClass): TableRow {
  return {
    name: sc.name,
    cpu: sc.cpu ?? '',
    memory: sc.memory ?? '',
    marketPrice: sc.currentMarketPricePerHour ?? '',
    minBidPrice: sc.minBidPricePerHour ?? '',
    onDemandPrice: sc.onDemandPricePerHour ?? '',
  };
}

export const serverclasses = new Command('serverclasses').description(
  'Browse server classes',
);

serverclasses
  .command('list')
  .description('List server classes available in a region')
  .option('--region <region>', 'region (defaults to the configured one)')
  .action(async (options: { region?: string }, command: Command) => {
    try {
      const { config, api, output } = await loadContext(command);
      const region = options.region || config.region;
      if (!region) {
        throw new ConfigError(
          "region not specified (use --region or run 'cloudspace configure')",
        );
      }

      const items = await withSpinner(
        `Fetching server classes in ${region}...`,
        () => api.listServerClasses(region),
        (found) => `Found ${found.length} server class(es)`,
      );
      printOutput(items.map(serverClassRow), output);
    } catch (error) {
      reportFailure('Failed to list server classes', error);
    }
  });

serverclasses
  .command('get')
  .description('Show a server class with its resources and prices')
  .requiredOption('--name <name>', 'server class name')
  .action(async (options: { name: string }, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      printOutput(serverClassRow(await api.getServerClass(options.name)), output);
    } catch (error) {
      reportFailure('Failed to get server class', error);
    }
  });
