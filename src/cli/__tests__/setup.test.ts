import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

// ── Hoisted mock variables ─────────────────────────────────────────────────────

const {
  mockExistsSync,
  mockLoadConfig,
  mockSaveConfig,
  mockGetMe,
  mockClientCtor,
  mockPrintFailure,
  mockPrompt,
} = vi.hoisted(() => ({
  mockExistsSync: vi.fn(),
  mockLoadConfig: vi.fn(),
  mockSaveConfig: vi.fn(),
  mockGetMe: vi.fn(),
  mockClientCtor: vi.fn(),
  mockPrintFailure: vi.fn(),
  mockPrompt: vi.fn(),
}));

// ── Mocks ──────────────────────────────────────────────────────────────────────

vi.mock('node:fs', () => ({
  existsSync: (...args: unknown[]) => mockExistsSync(...args),
}));

vi.mock('../../config/loader.js', () => ({
  getConfigPath: () => '/mock-home/.satori-telegram/config.json',
  loadConfig: (...args: unknown[]) => mockLoadConfig(...args),
  saveConfig: (...args: unknown[]) => mockSaveConfig(...args),
}));

vi.mock('../../telegram/client.js', () => ({
  TelegramBotClient: class {
    constructor(...args: unknown[]) {
      mockClientCtor(...args);
    }
    getMe = () => mockGetMe();
  },
}));

vi.mock('../global-options.js', () => ({
  getConfigOverride: () => undefined,
}));

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

vi.mock('../../utils/output.js', () => ({
  ExitCode: { OK: 0, FAILED: 1, USAGE: 2, TOKEN_REJECTED: 4, INTERRUPTED: 130 },
  printFailure: (...args: unknown[]) => mockPrintFailure(...args),
}));

// chalk: passthrough for all style methods
vi.mock('chalk', () => {
  const passthrough = (s: string) => s;
  const handler: ProxyHandler<typeof passthrough> = {
    get: () => new Proxy(passthrough, handler),
    apply: (_target, _thisArg, args: [string]) => args[0],
  };
  return { default: new Proxy(passthrough, handler) };
});

vi.mock('inquirer', () => ({
  default: { prompt: (...args: unknown[]) => mockPrompt(...args) },
}));

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
  }),
}));

import { setupCommand } from '../setup.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';

// ── Mock data ──────────────────────────────────────────────────────────────────

const CONFIG_PATH = '/mock-home/.satori-telegram/config.json';
const BOT_TOKEN = '123456:test-token-placeholder-value';

const EXISTING_CONFIG = {
  ...DEFAULT_CONFIG,
  telegram: { ...DEFAULT_CONFIG.telegram, botToken: '1:old-token-placeholder-value' },
  webhooks: [{ url: 'https://app.example.com/satori' }],
};

// ── Setup ──────────────────────────────────────────────────────────────────────

let consoleSpy: MockInstance;

beforeEach(() => {
  vi.clearAllMocks();
  process.exitCode = undefined;
  consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  mockGetMe.mockResolvedValue({ id: 123456, is_bot: true, first_name: 'Bridge', username: 'bridge_bot' });
});

afterEach(() => {
  consoleSpy.mockRestore();
  process.exitCode = undefined;
});

// ── Tests ──────────────────────────────────────────────────────────────────────

describe('setupCommand', () => {
  it('saves the verified token and server settings', async () => {
    mockExistsSync.mockReturnValue(false);
    mockPrompt
      .mockResolvedValueOnce({ botToken: `  ${BOT_TOKEN} ` })
      .mockResolvedValueOnce({ port: '8080', serverToken: 'test-secret' });

    await setupCommand();

    expect(mockClientCtor).toHaveBeenCalledWith(BOT_TOKEN, 'https://api.telegram.org');
    expect(mockSaveConfig).toHaveBeenCalledWith(
      {
        ...DEFAULT_CONFIG,
        telegram: { ...DEFAULT_CONFIG.telegram, botToken: BOT_TOKEN },
        server: { ...DEFAULT_CONFIG.server, port: 8080, token: 'test-secret' },
      },
      CONFIG_PATH
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('leaves the server open when no server token is given', async () => {
    mockExistsSync.mockReturnValue(false);
    mockPrompt
      .mockResolvedValueOnce({ botToken: BOT_TOKEN })
      .mockResolvedValueOnce({ port: '5140', serverToken: '' });

    await setupCommand();

    expect(mockSaveConfig.mock.calls[0][0].server.token).toBeUndefined();
  });

  it('validates the token format before asking Telegram', async () => {
    mockExistsSync.mockReturnValue(false);
    mockPrompt
      .mockResolvedValueOnce({ botToken: BOT_TOKEN })
      .mockResolvedValueOnce({ port: '5140', serverToken: '' });

    await setupCommand();

    const [[question]] = mockPrompt.mock.calls[0];
    expect(question.validate('not-a-token')).toBe('Expected a token like 123456:ABC-DEF...');
    expect(question.validate(BOT_TOKEN)).toBe(true);

    const [[port]] = mockPrompt.mock.calls[1];
    expect(port.validate('99999')).toBe('Enter a port number');
    expect(port.validate('8080')).toBe(true);
  });

  it('stops when the user keeps the existing config', async () => {
    mockExistsSync.mockReturnValue(true);
    mockPrompt.mockResolvedValueOnce({ overwrite: false });

    await setupCommand();

    expect(mockLoadConfig).not.toHaveBeenCalled();
    expect(mockSaveConfig).not.toHaveBeenCalled();
  });

  it('keeps the other settings of an existing config', async () => {
    mockExistsSync.mockReturnValue(true);
    mockLoadConfig.mockReturnValue(EXISTING_CONFIG);
    mockPrompt
      .mockResolvedValueOnce({ overwrite: true })
      .mockResolvedValueOnce({ botToken: BOT_TOKEN })
      .mockResolvedValueOnce({ port: '5140', serverToken: '' });

    await setupCommand();

    expect(mockLoadConfig).toHaveBeenCalledWith(CONFIG_PATH);
    const [saved] = mockSaveConfig.mock.calls[0];
    expect(saved.webhooks).toEqual([{ url: 'https://app.example.com/satori' }]);
    expect(saved.telegram.botToken).toBe(BOT_TOKEN);
  });

  it('reports a token Telegram rejects', async () => {
    mockExistsSync.mockReturnValue(false);
    mockPrompt.mockResolvedValueOnce({ botToken: BOT_TOKEN });
    mockGetMe.mockRejectedValueOnce(new Error('Telegram API error (401): Unauthorized'));

    await setupCommand();

    expect(mockPrintFailure).toHaveBeenCalledWith({
      code: 'INVALID_BOT_TOKEN',
      message: 'Telegram API error (401): Unauthorized',
      suggestion: 'Check the token with @BotFather and run setup again.',
    });
    expect(process.exitCode).toBe(4);
    expect(mockPrompt).toHaveBeenCalledTimes(1);
    expect(mockSaveConfig).not.toHaveBeenCalled();
  });
});
