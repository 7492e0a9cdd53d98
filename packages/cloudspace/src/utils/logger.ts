import * as clack from '@clack/prompts';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const clackLogger: Logger = {
  info: (message) => clack.log.info(message),
  success: (message) => clack.log.success(message),
  warn: (message) => clack.log.warn(message),
  error: (message) => clack.log.error(message),
};

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
