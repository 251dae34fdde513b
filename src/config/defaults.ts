/**
 * Satori Telegram — Default Configuration
 */

import { BridgeConfigSchema, type BridgeConfig } from './types.js';

export const DEFAULT_CONFIG: BridgeConfig = BridgeConfigSchema.parse({});

export const CLI_NAME = 'satori-telegram';

export const CLI_VERSION = '0.1.0';

/**
 * Full version string for --version output.
 * Example: satori-telegram/0.1.0 linux-x64 node-v20.12.0
 */
export const VERSION_STRING =
  `${CLI_NAME}/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version}`;
