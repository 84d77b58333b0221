import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { closeSync, openSync, writeSync } from 'node:fs';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  trace: 'TRC',
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
};

const LEVEL_ALIASES = new Map<string, LogLevel>([
  ['trace', 'trace'],
  ['debug', 'debug'],
  ['info', 'info'],
  ['warn', 'warn'],
  ['warning', 'warn'],
  ['error', 'error'],
]);

/** Where formatted log lines end up. `color` decides whether the line is styled with chalk. */
export interface LogSink {
  readonly color: boolean;
  write(line: string): void;
  close?(): void;
}

export interface OutputStream {
  write(chunk: string, callback?: (err?: Error | null) => void): unknown;
  isTTY?: boolean;
  once?(event: 'error', listener: (err: Error) => void): unknown;
  off?(event: 'error', listener: (err: Error) => void): unknown;
}

/** Parse a level name, case-insensitively. Returns undefined for anything unknown. */
export function parseLogLevel(value: string): LogLevel | undefined {
  return LEVEL_ALIASES.get(value.trim().toLowerCase());
}

export function streamSink(stream: OutputStream, color = stream.isTTY === true): LogSink {
  return {
    color,
    write(line) {
      stream.write(line);
    },
  };
}

/**
 * Open `path` for writing (created, truncated, mode 0600) and return a sink for it.
 * Returns undefined when the file cannot be opened.
 */
export function openFileSink(path: string): LogSink | undefined {
  let fd: number;
  try {
    fd = openSync(path, 'w', 0o600);
  } catch {
    return undefined;
  }
  let closed = false;
  return {
    color: false,
    write(line) {
      if (!closed) writeSync(fd, line);
    },
    close() {
      if (closed) return;
      closed = true;
      closeSync(fd);
    },
  };
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') {
    return /^[\w.\-/:@]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

function timestamp(now: Date): string {
  return now.toISOString().slice(11, 19);
}

const plain = new Chalk({ level: 0 });

function paint(level: LogLevel, text: string, c: ChalkInstance): string {
  switch (level) {
    case 'trace':
    case 'debug':
      return c.gray(text);
    case 'info':
      return c.blue(text);
    case 'warn':
      return c.yellow(text);
    case 'error':
      return c.red(text);
  }
}

/** State shared by a logger and every child derived from it through `withValues`. */
export interface LoggerCore {
  level: LogLevel;
  sinks: LogSink[];
  now: () => Date;
}

export interface LoggerOptions {
  level?: LogLevel;
  sinks?: LogSink[];
  now?: () => Date;
}

export class Logger {
  private readonly core: LoggerCore;
  private readonly fields: LogFields;

  constructor(options: LoggerOptions = {}, fields: LogFields = {}, core?: LoggerCore) {
    this.core = core ?? {
      level: options.level ?? 'info',
      sinks: options.sinks ?? [streamSink(process.stderr)],
      now: options.now ?? (() => new Date()),
    };
    this.fields = fields;
  }

  get level(): LogLevel {
    return this.core.level;
  }

  /** Changes the level for this logger and every logger derived from it. */
  setLevel(level: LogLevel): void {
    this.core.level = level;
  }

  addSink(sink: LogSink): void {
    this.core.sinks.push(sink);
  }

  /** A logger writing to the same sinks with `fields` attached to every line. */
  withValues(fields: LogFields): Logger {
    return new Logger({}, { ...this.fields, ...fields }, this.core);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.core.level];
  }

  trace(msg: string, fields?: LogFields): void {
    this.emit('trace', msg, fields);
  }

  debug(msg: string, fields?: LogFields): void {
    this.emit('debug', msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit('info', msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit('warn', msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit('error', msg, fields);
  }

  /** Releases every sink that holds a resource. */
  close(): void {
    for (const sink of this.core.sinks) {
      sink.close?.();
    }
  }

  private emit(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.enabled(level)) return;
    const merged = { ...this.fields, ...fields };
    const tail = Object.keys(merged).length > 0 ? ` ${formatFields(merged)}` : '';
    const prefix = `[${timestamp(this.core.now())}] ${LEVEL_LABEL[level]}`;
    for (const sink of this.core.sinks) {
      const c = sink.color ? chalk : plain;
      sink.write(`${paint(level, prefix, c)} ${msg}${c.dim(tail)}\n`);
    }
  }
}

/** Process-wide logger for startup work that happens outside any invocation. */
export const log = new Logger();
