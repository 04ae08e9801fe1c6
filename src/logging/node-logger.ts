/**
 * Named, leveled logger for graph nodes.
 *
 * Each node logs under the dotted name derived from its fully-qualified
 * name ("/my/ns/my_node" logs as "my.ns.my_node"). Records go to a sink;
 * the default sink writes one line per record to the console.
 *
 * @module logging/node-logger
 */

import pc from 'picocolors';
import { SystemClock, type Clock, type Time } from '../clock/clock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Severities in ascending order. */
export const LOG_SEVERITIES = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogSeverity = (typeof LOG_SEVERITIES)[number];

/** A single emitted log line. */
export interface LogRecord {
  severity: LogSeverity;
  /** Dotted logger name. */
  name: string;
  message: string;
  time: Time;
}

export type LogSink = (record: LogRecord) => void;

export interface NodeLoggerOptions {
  /** Records below this severity are dropped. Default 'info'. */
  level?: LogSeverity;
  sink?: LogSink;
  clock?: Clock;
}

// ---------------------------------------------------------------------------
// Formatting and default sink
// ---------------------------------------------------------------------------

/**
 * Format a record as `[SEVERITY] [seconds.nanos] [name]: message`.
 */
export function formatLogRecord(record: LogRecord): string {
  return `[${record.severity.toUpperCase()}] [${record.time.toString()}] [${record.name}]: ${record.message}`;
}

const SEVERITY_COLOR: Record<LogSeverity, (text: string) => string> = {
  debug: pc.dim,
  info: (text) => text,
  warn: pc.yellow,
  error: pc.red,
  fatal: (text) => pc.bold(pc.red(text)),
};

/**
 * Console sink: debug/info to stdout, warn to console.warn, error/fatal to
 * console.error. Only the severity tag is colored.
 */
export const consoleSink: LogSink = (record) => {
  const tag = SEVERITY_COLOR[record.severity](`[${record.severity.toUpperCase()}]`);
  const line = `${tag} [${record.time.toString()}] [${record.name}]: ${record.message}`;

  switch (record.severity) {
    case 'debug':
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
    case 'fatal':
      console.error(line);
      break;
  }
};

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class NodeLogger {
  readonly name: string;
  private level: LogSeverity;
  private readonly sink: LogSink;
  private readonly clock: Clock;

  constructor(name: string, options: NodeLoggerOptions = {}) {
    this.name = name;
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? consoleSink;
    this.clock = options.clock ?? new SystemClock('system');
  }

  getLevel(): LogSeverity {
    return this.level;
  }

  setLevel(level: LogSeverity): void {
    this.level = level;
  }

  isEnabledFor(severity: LogSeverity): boolean {
    return LOG_SEVERITIES.indexOf(severity) >= LOG_SEVERITIES.indexOf(this.level);
  }

  /**
   * Logger named `<this.name>.<suffix>` sharing this logger's sink, clock
   * and current level.
   */
  getChild(suffix: string): NodeLogger {
    if (suffix.length === 0) {
      throw new Error('Child logger suffix must not be empty');
    }
    const childName = this.name.length === 0 ? suffix : `${this.name}.${suffix}`;
    return new NodeLogger(childName, { level: this.level, sink: this.sink, clock: this.clock });
  }

  log(severity: LogSeverity, message: string): void {
    if (!this.isEnabledFor(severity)) return;
    this.sink({ severity, name: this.name, message, time: this.clock.now() });
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  fatal(message: string): void {
    this.log('fatal', message);
  }
}
