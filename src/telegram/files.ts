/**
 * Satori Telegram — Attachment Fetching
 *
 * Resolves an attachment reference to bytes before upload. Supports
 * base64 data URIs, local `file:` URIs and remote URLs.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Files');

const DATA_URI_HEADER = /^data:([\w/.+-]+);base64,/;

const DEFAULT_MIME = 'application/octet-stream';

/** MIME types by file extension */
export const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.svg': 'image/svg+xml',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.flac': 'audio/flac',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.json': 'application/json',
  '.txt': 'text/plain',
};

// ============================================================================
// TYPES
// ============================================================================

export interface DownloadedFile {
  filename: string;
  data: Uint8Array;
  mime: string;
}

export type FileFetcher = (
  url: string,
  name: string,
  timeoutSeconds: number
) => Promise<DownloadedFile>;

export class FileFetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly code = 'FILE_FETCH_FAILED'
  ) {
    super(message);
    this.name = 'FileFetchError';
  }
}

// ============================================================================
// MIME HELPERS
// ============================================================================

export function mimeFromFilename(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? DEFAULT_MIME;
}

export function extensionFromMime(mime: string): string {
  for (const [ext, type] of Object.entries(MIME_TYPES)) {
    if (type === mime) return ext;
  }
  return '.bin';
}

/**
 * Strip parameters from a Content-Type header value.
 */
export function normalizeContentType(header: string | null): string {
  if (!header) return DEFAULT_MIME;
  return header.split(/[;,]/, 1)[0].trim() || DEFAULT_MIME;
}

// ============================================================================
// FETCH
// ============================================================================

/**
 * Fetch attachment bytes. A non-empty `name` overrides the derived
 * filename. A timeout of 0 disables the timeout for remote URLs.
 */
export const fetchFile: FileFetcher = async (url, name, timeoutSeconds) => {
  const dataUri = DATA_URI_HEADER.exec(url);
  if (dataUri) {
    const mime = dataUri[1];
    return {
      filename: name || `file${extensionFromMime(mime)}`,
      data: Buffer.from(url.slice(dataUri[0].length), 'base64'),
      mime,
    };
  }

  if (url.startsWith('file:')) {
    return readLocalFile(url, name);
  }

  return fetchRemoteFile(url, name, timeoutSeconds);
};

async function readLocalFile(url: string, name: string): Promise<DownloadedFile> {
  try {
    const path = fileURLToPath(url);
    const data = await readFile(path);
    return {
      filename: name || basename(path),
      data,
      mime: mimeFromFilename(path),
    };
  } catch (error) {
    throw new FileFetchError(
      `Failed to read local file: ${error instanceof Error ? error.message : String(error)}`,
      url
    );
  }
}

async function fetchRemoteFile(
  url: string,
  name: string,
  timeoutSeconds: number
): Promise<DownloadedFile> {
  log.debug('Fetching remote attachment', { url, timeoutSeconds });

  let response: Response;
  try {
    response = await fetch(url, {
      signal: timeoutSeconds > 0 ? AbortSignal.timeout(timeoutSeconds * 1000) : undefined,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new FileFetchError(`Timed out after ${timeoutSeconds}s`, url, 'TIMEOUT');
    }
    throw new FileFetchError(
      `Network error: ${error instanceof Error ? error.message : String(error)}`,
      url
    );
  }

  if (!response.ok) {
    throw new FileFetchError(`HTTP ${response.status} fetching attachment`, url, 'HTTP_ERROR');
  }

  const data = new Uint8Array(await response.arrayBuffer());
  return {
    filename: name || basename(new URL(url).pathname),
    data,
    mime: normalizeContentType(response.headers.get('content-type')),
  };
}
