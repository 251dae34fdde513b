/**
 * Satori Telegram — Configuration Types & Schema
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

export const TelegramConfigSchema = z.object({
  botToken: z.string().optional(),
  apiBaseUrl: z.string().url().default('https://api.telegram.org'),
  pollTimeoutSeconds: z.number().int().min(0).max(50).default(30),
});

export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65_535).default(5140),
  path: z.string().default('').transform((path) => path.replace(/\/+$/, '')),
  token: z.string().optional(),
});

export const WebhookConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().optional(),
});

export const FilesConfigSchema = z.object({
  timeoutSeconds: z.number().int().min(0).default(30),
});

export const ReconnectConfigSchema = z.object({
  /** Unset retries forever. */
  maxAttempts: z.number().int().positive().optional(),
  initialDelayMs: z.number().int().positive().default(1_000),
  maxDelayMs: z.number().int().positive().default(60_000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
});

export const BridgeConfigSchema = z.object({
  telegram: TelegramConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  webhooks: z.array(WebhookConfigSchema).default([]),
  files: FilesConfigSchema.default({}),
  reconnect: ReconnectConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type WebhookConfig = z.infer<typeof WebhookConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
