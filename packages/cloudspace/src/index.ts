#!/usr/bin/env node

import { Command } from 'commander';
import { cloudspaces } from './commands/cloudspaces.js';
import { configure } from './commands/configure.js';
import { nodepools } from './commands/nodepools.js';
import { organizations } from './commands/organizations.js';
import { pricing } from './commands/pricing.js';
import { regions } from './commands/regions.js';
import { serverclasses } from './commands/serverclasses.js';

const program = new Command();

program
  .name('cloudspace')
  .description('Provision Kubernetes cloudspaces with spot and on-demand node pools')
  .version('0.1.0')
  .option('-o, --output <format>', 'output format: json, yaml or table', 'json');

program.addCommand(cloudspaces);
program.addCommand(nodepools);
program.addCommand(organizations);
program.addCommand(regions);
program.addCommand(serverclasses);
program.addCommand(pricing);
program.addCommand(configure);

await program.parseAsync();
