/**
 * Satori Telegram — Configuration Loader
 *
 * Reads/writes config from ~/.satori-telegram/config.json, or from an
 * explicit path. TELEGRAM_BOT_TOKEN overrides the stored bot token.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { BridgeConfigSchema, type BridgeConfig } from './types.js';

// ============================================================================
// PATHS
// ============================================================================

const CLI_DIR_NAME = '.satori-telegram';

export function getCliDir(): string {
  return join(homedir(), CLI_DIR_NAME);
}

export function getConfigPath(): string {
  return join(getCliDir(), 'config.json');
}

// ============================================================================
// ERROR
// ============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code = 'INVALID_CONFIG'
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// LOAD / SAVE
// ============================================================================

/**
 * Load config from disk. Returns defaults if the file doesn't exist;
 * throws ConfigError if it exists but is not valid.
 */
export function loadConfig(path: string = getConfigPath()): BridgeConfig {
  let raw: unknown = {};

  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`
      );
    }
  }

  const result = BridgeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config file ${path} is invalid: ${issues}`);
  }

  return applyEnv(result.data);
}

function applyEnv(config: BridgeConfig): BridgeConfig {
  const token = process.env.TELEGRAM_BOT_TOKEN;
  if (!token) return config;
  return { ...config, telegram: { ...config.telegram, botToken: token } };
}

/**
 * Save config to disk. Creates the directory if needed.
 */
export function saveConfig(config: BridgeConfig, path: string = getConfigPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), { mode: 0o600 });
}

// ============================================================================
// TYPE-SAFE CONFIGURED ACCESS
// ============================================================================

/**
 * Bot token from config, or a ConfigError explaining how to set one.
 */
export function requireBotToken(config: BridgeConfig): string {
  const token = config.telegram.botToken;
  if (!token) {
    throw new ConfigError(
      'No Telegram bot token configured. Set telegram.botToken in the config file or TELEGRAM_BOT_TOKEN.',
      'NO_BOT_TOKEN'
    );
  }
  return token;
}
