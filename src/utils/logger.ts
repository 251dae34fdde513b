/**
 * Satori Telegram — Logger
 *
 * Lightweight scoped logger writing to stderr, with an optional plain-text
 * copy appended to a log file. Respects NO_COLOR and non-TTY environments.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[90m';

let globalLevel: LogLevel = 'info';
let logFile: string | null = null;

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/**
 * Also append every emitted line to this file. Pass null to stop.
 */
export function setLogFile(path: string | null): void {
  logFile = path;
}

function isColorless(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  if (!process.stderr.isTTY) return true;
  return false;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown> | Error): void;
}

function formatData(data: Record<string, unknown> | Error): string {
  if (data instanceof Error) {
    const stack = data.stack && globalLevel === 'debug' ? `\n${data.stack}` : '';
    return `${data.message}${stack}`;
  }
  return Object.entries(data)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown> | Error) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const timestamp = new Date().toISOString().slice(11, 23);
    const levelTag = level.toUpperCase().padEnd(5);
    const detail = data ? formatData(data) : '';
    const plain = `${timestamp} ${levelTag} [${scope}] ${message}${detail ? ` ${detail}` : ''}`;

    let line = plain;
    if (!isColorless()) {
      const color = LEVEL_COLORS[level];
      const detailColor = data instanceof Error ? LEVEL_COLORS.error : DIM;
      line = `${DIM}${timestamp}${RESET} ${color}${levelTag}${RESET} ${DIM}[${scope}]${RESET} ${message}`;
      if (detail) line += ` ${detailColor}${detail}${RESET}`;
    }

    // stdout stays clean for command output
    process.stderr.write(line + '\n');

    if (logFile) {
      try {
        appendFileSync(logFile, plain + '\n');
      } catch (error) {
        process.stderr.write(
          `Warning: cannot write log file ${logFile}: ${error instanceof Error ? error.message : String(error)}\n`
        );
        logFile = null;
      }
    }
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}
