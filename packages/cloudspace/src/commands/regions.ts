import { Command } from 'commander';
import { printOutput } from '../utils/output.js';
import type { TableRow } from '../utils/table.js';
import type { Region } from '../types.js';
import { loadContext, reportFailure, withSpinner } from './context.js';

function regionRow(region: Region): TableRow {
  return { name: region.name, description: region.description ?? '' };
}

export const regions = new Command('regions').description('Browse regions');

regions
  .command('list')
  .description('List regions offered by the control plane')
  .action(async (_options: Record<string, never>, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      const items = await withSpinner(
        'Fetching regions...',
        () => api.listRegions(),
        (found) => `Found ${found.length} region(s)`,
      );
      printOutput(
        [...items].sort((a, b) => a.name.localeCompare(b.name)).map(regionRow),
        output,
      );
    } catch (error) {
      reportFailure('Failed to list regions', error);
    }
  });

regions
  .command('get')
  .description('Show a region')
  .requiredOption('--name <name>', 'region name')
  .action(async (options: { name: string }, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      printOutput(regionRow(await api.getRegion(options.name)), output);
    } catch (error) {
      reportFailure('Failed to get region', error);
    }
  });
