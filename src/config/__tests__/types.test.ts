import { describe, it, expect } from 'vitest';
import {
  BridgeConfigSchema,
  ReconnectConfigSchema,
  ServerConfigSchema,
  TelegramConfigSchema,
  WebhookConfigSchema,
} from '../types.js';

// ============================================================================
// BridgeConfigSchema
// ============================================================================

describe('BridgeConfigSchema', () => {
  it('returns full defaults for empty input', () => {
    expect(BridgeConfigSchema.parse({})).toEqual({
      telegram: { apiBaseUrl: 'https://api.telegram.org', pollTimeoutSeconds: 30 },
      server: { host: '127.0.0.1', port: 5140, path: '' },
      webhooks: [],
      files: { timeoutSeconds: 30 },
      reconnect: { initialDelayMs: 1_000, maxDelayMs: 60_000 },
      logging: { level: 'info' },
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => BridgeConfigSchema.parse({ logging: { level: 'trace' } })).toThrow();
  });
});

// ============================================================================
// Sections
// ============================================================================

describe('TelegramConfigSchema', () => {
  it('bounds the long-poll timeout', () => {
    expect(TelegramConfigSchema.parse({ pollTimeoutSeconds: 0 }).pollTimeoutSeconds).toBe(0);
    expect(() => TelegramConfigSchema.parse({ pollTimeoutSeconds: 51 })).toThrow();
    expect(() => TelegramConfigSchema.parse({ pollTimeoutSeconds: 1.5 })).toThrow();
  });

  it('requires the API base to be a URL', () => {
    expect(() => TelegramConfigSchema.parse({ apiBaseUrl: 'telegram' })).toThrow();
  });
});

describe('ServerConfigSchema', () => {
  it('strips trailing slashes from the path', () => {
    expect(ServerConfigSchema.parse({ path: '/satori//' }).path).toBe('/satori');
    expect(ServerConfigSchema.parse({ path: '/' }).path).toBe('');
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(ServerConfigSchema.parse({ port: 0 }).port).toBe(0);
    expect(() => ServerConfigSchema.parse({ port: 70_000 })).toThrow();
  });
});

describe('WebhookConfigSchema', () => {
  it('requires a URL', () => {
    expect(WebhookConfigSchema.parse({ url: 'https://app.example.com' })).toEqual({
      url: 'https://app.example.com',
    });
    expect(() => WebhookConfigSchema.parse({ url: 'app' })).toThrow();
  });
});

describe('ReconnectConfigSchema', () => {
  it('retries forever unless maxAttempts is set', () => {
    expect(ReconnectConfigSchema.parse({}).maxAttempts).toBeUndefined();
    expect(ReconnectConfigSchema.parse({ maxAttempts: 3 }).maxAttempts).toBe(3);
  });

  it('rejects non-positive attempts and delays', () => {
    expect(() => ReconnectConfigSchema.parse({ maxAttempts: 0 })).toThrow();
    expect(() => ReconnectConfigSchema.parse({ initialDelayMs: -1 })).toThrow();
  });
});
