import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// ---------------------------------------------------------------------------
// Hoisted mock variables
// ---------------------------------------------------------------------------

const { mockParseAsync, mockPrintError } = vi.hoisted(() => ({
  mockParseAsync: vi.fn(),
  mockPrintError: vi.fn(),
}));

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('../program.js', () => ({
  createProgram: () => ({ parseAsync: mockParseAsync }),
}));

vi.mock('../helpers.js', () => ({
  printError: (...args: unknown[]) => mockPrintError(...args),
}));

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { run } from '../main.js';

beforeEach(() => {
  vi.clearAllMocks();
  process.exitCode = undefined;
});

afterEach(() => {
  process.exitCode = undefined;
});

describe('run', () => {
  it('parses the given arguments', async () => {
    mockParseAsync.mockResolvedValueOnce(undefined);

    await run(['node', 'satori-telegram', 'config', 'path']);

    expect(mockParseAsync).toHaveBeenCalledWith(['node', 'satori-telegram', 'config', 'path']);
    expect(mockPrintError).not.toHaveBeenCalled();
  });

  it('prints an error no command handled', async () => {
    const failure = new Error('boom');
    mockParseAsync.mockRejectedValueOnce(failure);

    await run(['node', 'satori-telegram', 'start']);

    expect(mockPrintError).toHaveBeenCalledWith('Fatal', failure);
  });

  it('fails the run on an unhandled rejection while a command runs', async () => {
    const before = process.listenerCount('unhandledRejection');
    mockParseAsync.mockImplementationOnce(async () => {
      const handler = process.listeners('unhandledRejection').at(-1);
      handler?.(new Error('lost'), Promise.resolve());
    });

    await run(['node', 'satori-telegram', 'start']);

    expect(process.exitCode).toBe(1);
    expect(process.listenerCount('unhandledRejection')).toBe(before);
  });
});
