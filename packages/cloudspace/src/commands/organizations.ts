import { Command } from 'commander';
import {
  getOrganization,
  listOrganizations,
} from '../services/organizations.js';
import { printOutput } from '../utils/output.js';
import type { TableRow } from '../utils/table.js';
import type { Organization } from '../types.js';
import {
  confirmDeletion,
  loadContext,
  reportFailure,
  withSpinner,
} from './context.js';

function organizationRow(org: Organization): TableRow {
  return { name: org.name, displayName: org.displayName ?? '' };
}

export const organizations = new Command('organizations')
  .alias('orgs')
  .description('Manage organizations');

organizations
  .command('list')
  .description('List organizations the access token can see')
  .action(async (_options: Record<string, never>, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      const items = await withSpinner(
        'Fetching organizations...',
        () => listOrganizations(api),
        (found) => `Found ${found.length} organization(s)`,
      );
      printOutput(items.map(organizationRow), output);
    } catch (error) {
      reportFailure('Failed to list organizations', error);
    }
  });

organizations
  .command('get')
  .description('Show an organization')
  .requiredOption('--name <name>', 'organization name')
  .action(async (options: { name: string }, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      printOutput(organizationRow(await getOrganization(api, options.name)), output);
    } catch (error) {
      reportFailure('Failed to get organization', error);
    }
  });

organizations
  .command('delete')
  .description('Delete an organization')
  .requiredOption('--name <name>', 'organization name')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(async (options: { name: string; yes?: boolean }, command: Command) => {
    try {
      const { api } = await loadContext(command);
      if (!(await confirmDeletion('organization', options.name, options.yes))) {
        return;
      }
      await withSpinner(
        `Deleting organization ${options.name}...`,
        () => api.deleteOrganization(options.name),
        () => `Organization ${options.name} deleted`,
      );
    } catch (error) {
      reportFailure('Failed to delete organization', error);
    }
  });
