import { Command } from 'commander';
import * as clack from '@clack/prompts';
import { VALID_REGIONS } from '../constants.js';
import { getConfigPath, loadConfig, saveConfig } from '../config.js';
import { reportFailure } from './context.js';

export const configure = new Command('configure')
  .description('Save the organization, access token and default region')
  .action(async () => {
    try {
      clack.intro('⚙️  Configuring cloudspace');

      const current = await loadConfig();

      const org = await clack.text({
        message: 'Organization:',
        placeholder: current.org,
        defaultValue: current.org,
        validate: (value) => {
          if (!value.trim() && !current.org) {
            return 'Organization is required';
          }
        },
      });
      if (clack.isCancel(org)) {
        clack.cancel('Configuration cancelled');
        process.exitCode = 1;
        return;
      }

      const accessToken = await clack.password({
        message: current.accessToken
          ? 'Access token (leave empty to keep the current one):'
          : 'Access token:',
        validate: (value) => {
          if (!value.trim() && !current.accessToken) {
            return 'Access token is required';
          }
        },
      });
      if (clack.isCancel(accessToken)) {
        clack.cancel('Configuration cancelled');
        process.exitCode = 1;
        return;
      }

      const regionChoice = await clack.select<
        { value: string; label: string }[],
        string
      >({
        message: 'Default region:',
        options: VALID_REGIONS.map((region) => ({ value: region, label: region })),
        initialValue: current.region ?? VALID_REGIONS[0],
      });
      if (clack.isCancel(regionChoice)) {
        clack.cancel('Configuration cancelled');
        process.exitCode = 1;
        return;
      }

      await saveConfig({
        ...current,
        org: org.trim() || current.org,
        accessToken: accessToken.trim() || current.accessToken,
        region: regionChoice,
      });

      clack.outro(`🎉 Configuration saved to ${getConfigPath()}`);
    } catch (error) {
      reportFailure('Failed to save configuration', error);
    }
  });
