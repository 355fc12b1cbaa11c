/**
 * Structured logging for the analyzer.
 *
 * Components take a `Logger` as a constructor/option argument instead of
 * reaching for a global, so every run can carry its own log.
 *
 * Usage:
 *   const logger = createLogger('sp-api-client');
 *   logger.info('Fetched offers', { asin: 'B000000001', count: 4 });
 *
 *   const runLog = createRunLogger('2026-10-18T12-00-00', { dir: 'logs' });
 *   runLog.warn('Retrying', { attempt: 2 });
 *   await runLog.flush();
 */

import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import type { LogLevel } from '../config.js';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  msg: string;
  data?: unknown;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  /** Derive a logger whose messages carry an extra `[scope]` prefix. */
  child(scope: string): Logger;
}

export interface RunLogger extends Logger {
  readonly filePath: string;
  flush(): Promise<void>;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LOG_BUFFER_SIZE = 20;
const LOG_FLUSH_INTERVAL_MS = 5000;

type Sink = (entry: LogEntry) => void;

function consoleSink(entry: LogEntry): void {
  const line = `[${entry.level.toUpperCase()}] ${entry.msg}`;
  const method = entry.level === 'debug' ? 'log' : entry.level;
  if (entry.data !== undefined) {
    console[method](line, entry.data);
  } else {
    console[method](line);
  }
}

function buildLogger(prefix: string, minLevel: LogLevel, sinks: Sink[]): Logger {
  function log(level: LogLevel, msg: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const entry: LogEntry = {
      ts: Date.now(),
      level,
      msg: prefix ? `${prefix} ${msg}` : msg,
    };
    if (data !== undefined) entry.data = sanitizeData(data);
    for (const sink of sinks) sink(entry);
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (scope) => buildLogger(`${prefix}[${scope}]`, minLevel, sinks),
  };
}

export function createLogger(scope: string, options: { level?: LogLevel } = {}): Logger {
  return buildLogger(`[${scope}]`, options.level ?? 'info', [consoleSink]);
}

/** Swallows everything; the default for library code and tests. */
export const silentLogger: Logger = buildLogger('', 'error', []);

/**
 * A logger for one analysis run. Entries go to the console and are buffered,
 * then appended as JSON lines to `<dir>/<runId>.log` when the buffer fills,
 * on a timer, or on `flush()`.
 */
export function createRunLogger(
  runId: string,
  options: { dir?: string; level?: LogLevel; console?: boolean } = {}
): RunLogger {
  const dir = options.dir ?? 'logs';
  const filePath = path.join(dir, `${runId.replace(/[^A-Za-z0-9._-]/g, '_')}.log`);
  const buffer: LogEntry[] = [];
  let flushTimer: ReturnType<typeof setTimeout> | null = null;
  let pending: Promise<void> = Promise.resolve();

  async function writeEntries(entries: LogEntry[]): Promise<void> {
    await mkdir(dir, { recursive: true });
    await appendFile(filePath, entries.map((e) => JSON.stringify(e)).join('\n') + '\n', 'utf8');
  }

  function flushBuffer(): Promise<void> {
    if (buffer.length === 0) return pending;
    const toFlush = buffer.splice(0, buffer.length);
    // Chained so concurrent flushes append in order
    pending = pending.then(() =>
      writeEntries(toFlush).catch((err: unknown) => {
        console.error('[logger] Failed to flush run log:', err);
        buffer.unshift(...toFlush);
      })
    );
    return pending;
  }

  function scheduleFlush(): void {
    if (flushTimer) return;
    flushTimer = setTimeout(() => {
      flushTimer = null;
      void flushBuffer();
    }, LOG_FLUSH_INTERVAL_MS);
    flushTimer.unref();
  }

  const bufferSink: Sink = (entry) => {
    buffer.push(entry);
    if (buffer.length >= LOG_BUFFER_SIZE) {
      void flushBuffer();
    } else {
      scheduleFlush();
    }
  };

  const sinks = options.console === false ? [bufferSink] : [bufferSink, consoleSink];
  const base = buildLogger(`[run:${runId}]`, options.level ?? 'info', sinks);

  return {
    ...base,
    filePath,
    flush: async () => {
      if (flushTimer) {
        clearTimeout(flushTimer);
        flushTimer = null;
      }
      await flushBuffer();
    },
  };
}

/**
 * Sanitize data for JSON serialization.
 * Errors become plain objects; unserializable values become strings.
 */
function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) return data;

  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: data.stack?.split('\n').slice(0, 5).join('\n'),
    };
  }

  if (typeof data !== 'object') return data;

  try {
    JSON.stringify(data);
    return data;
  } catch {
    return String(data);
  }
}
