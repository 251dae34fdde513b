import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

import {
  extensionFromMime,
  fetchFile,
  FileFetchError,
  mimeFromFilename,
  normalizeContentType,
} from '../files.js';

beforeEach(() => {
  mockFetch.mockReset();
});

// ============================================================================
// MIME HELPERS
// ============================================================================

describe('MIME helpers', () => {
  it('looks up the MIME type by extension, case-insensitively', () => {
    expect(mimeFromFilename('cat.PNG')).toBe('image/png');
    expect(mimeFromFilename('archive.unknown')).toBe('application/octet-stream');
  });

  it('finds the first extension for a MIME type', () => {
    expect(extensionFromMime('image/jpeg')).toBe('.jpg');
    expect(extensionFromMime('application/x-unknown')).toBe('.bin');
  });

  it('strips Content-Type parameters', () => {
    expect(normalizeContentType('image/png; charset=binary')).toBe('image/png');
    expect(normalizeContentType(null)).toBe('application/octet-stream');
    expect(normalizeContentType('')).toBe('application/octet-stream');
  });
});

// ============================================================================
// DATA URIs
// ============================================================================

describe('fetchFile: data URIs', () => {
  it('decodes base64 and names the file after its MIME type', async () => {
    const file = await fetchFile('data:image/png;base64,aGVsbG8=', '', 0);

    expect(file.filename).toBe('file.png');
    expect(file.mime).toBe('image/png');
    expect(Buffer.from(file.data).toString('utf-8')).toBe('hello');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('prefers the given name', async () => {
    const file = await fetchFile('data:image/png;base64,aGVsbG8=', 'cat.png', 0);

    expect(file.filename).toBe('cat.png');
  });
});

// ============================================================================
// LOCAL FILES
// ============================================================================

describe('fetchFile: file URIs', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'satori-telegram-files-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a local file', async () => {
    const path = join(dir, 'note.txt');
    writeFileSync(path, 'hi');

    const file = await fetchFile(pathToFileURL(path).href, '', 0);

    expect(file.filename).toBe('note.txt');
    expect(file.mime).toBe('text/plain');
    expect(Buffer.from(file.data).toString('utf-8')).toBe('hi');
  });

  it('fails for a missing file', async () => {
    await expect(fetchFile(pathToFileURL(join(dir, 'missing.txt')).href, '', 0)).rejects.toBeInstanceOf(
      FileFetchError
    );
  });
});

// ============================================================================
// REMOTE FILES
// ============================================================================

describe('fetchFile: remote URLs', () => {
  it('downloads the bytes and takes the MIME type from the response', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      headers: new Headers({ 'content-type': 'image/gif' }),
      arrayBuffer: async () => new Uint8Array([1, 2]).buffer,
    });

    const file = await fetchFile('https://example.com/media/cat.gif?size=large', '', 30);

    expect(file).toEqual({ filename: 'cat.gif', data: new Uint8Array([1, 2]), mime: 'image/gif' });
    expect(mockFetch.mock.calls[0][0]).toBe('https://example.com/media/cat.gif?size=large');
    expect(mockFetch.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('sends no timeout signal when the timeout is zero', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      headers: new Headers(),
      arrayBuffer: async () => new ArrayBuffer(0),
    });

    await fetchFile('https://example.com/a.bin', '', 0);

    expect(mockFetch.mock.calls[0][1].signal).toBeUndefined();
  });

  it('fails on an HTTP error status', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 404 });

    await expect(fetchFile('https://example.com/a.png', '', 30)).rejects.toMatchObject({
      code: 'HTTP_ERROR',
      message: 'HTTP 404 fetching attachment',
    });
  });

  it('reports a timeout', async () => {
    mockFetch.mockRejectedValueOnce(new DOMException('signal timed out', 'TimeoutError'));

    await expect(fetchFile('https://example.com/a.png', '', 5)).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Timed out after 5s',
    });
  });
});
