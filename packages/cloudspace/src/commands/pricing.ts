import { Command } from 'commander';
import { normalizeBidPrice } from '../services/pricing.js';
import { printOutput } from '../utils/output.js';
import { loadContext, reportFailure } from './context.js';

export const pricing = new Command('pricing').description('Spot pricing');

pricing
  .command('get')
  .description('Show the minimum spot bid for a server class')
  .requiredOption('--serverclass <name>', 'server class, e.g. gp.vs1.medium-ord')
  .action(async (options: { serverclass: string }, command: Command) => {
    try {
      const { api, output } = await loadContext(command);
      const price = await api.getMinimumBidPrice(options.serverclass);
      printOutput(
        {
          serverClass: options.serverclass,
          minimumBidPricePerHour: normalizeBidPrice(price),
        },
        output,
      );
    } catch (error) {
      reportFailure('Failed to get pricing', error);
    }
  });
