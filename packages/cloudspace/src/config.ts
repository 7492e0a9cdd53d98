import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from './constants.js';
import { ConfigError } from './errors.js';
import {
  ensureDirectoryExists,
  readJsonFile,
  writeJsonFile,
} from './utils/fs.js';

export const CliConfigSchema = z.object({
  org: z.string().optional(),
  region: z.string().optional(),
  accessToken: z.string().optional(),
  baseUrl: z.string().url().optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export function getCloudspaceHome(): string {
  return process.env.CLOUDSPACE_HOME ?? path.join(os.homedir(), '.cloudspace');
}

export function getConfigPath(): string {
  return path.join(getCloudspaceHome(), 'config.json');
}

export function getBaseUrl(config: CliConfig): string {
  return process.env.CLOUDSPACE_BASE_URL ?? config.baseUrl ?? DEFAULT_BASE_URL;
}

/**
 * Reads the saved CLI configuration. A missing file yields an empty config so
 * that flags alone can still drive a command.
 */
export async function loadConfig(): Promise<CliConfig> {
  const configPath = getConfigPath();
  let raw: unknown;
  try {
    raw = await readJsonFile(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}`, { cause: error });
  }
  if (raw === null) {
    return {};
  }

  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}: ${parsed.error.issues.map((e) => e.message).join(', ')}`,
    );
  }
  return parsed.data;
}

export async function saveConfig(config: CliConfig): Promise<void> {
  const validation = CliConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(
      `Validation failed: ${validation.error.issues.map((e) => e.message).join(', ')}`,
    );
  }
  await ensureDirectoryExists(getCloudspaceHome());
  await writeJsonFile(getConfigPath(), validation.data);
}

export function requireAccessToken(config: CliConfig): string {
  if (!config.accessToken) {
    throw new ConfigError(
      "No access token configured. Run 'cloudspace configure' to set it up",
    );
  }
  return config.accessToken;
}
