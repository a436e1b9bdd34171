/**
 * logger.ts
 * Structured logger for the extraction and rendering pipeline.
 *
 * Use ConsoleLogger in the CLI; SilentLogger in tests or when callers
 * do not care about output. CollectingLogger records every entry so a run
 * can hand its diagnostics back to the caller.
 *
 * All parsers, resolvers and builders accept an optional Logger and default
 * to SilentLogger.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Diagnostic, DiagnosticLevel } from '../models/diagnostics.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = DiagnosticLevel | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const DEFAULT_PREFIX = 'playbook-graph';

function formatLine(
  prefix: string,
  label: string,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${label}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

export class ConsoleLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;

  constructor(level: LogLevel = 'info', prefix = DEFAULT_PREFIX) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['debug']) return;
    this._write('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['info']) return;
    this._write('INFO ', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['warn']) return;
    this._write('WARN ', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['error']) return;
    this._write('ERROR', message, context, true);
  }

  private _write(
    label: string,
    message: string,
    context?: Record<string, unknown>,
    stderr = false,
  ): void {
    const line = formatLine(this._prefix, label, message, context);
    if (stderr) {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// FileLogger - writes structured log lines to a file (for --debug audits)
// ---------------------------------------------------------------------------

export class FileLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_PREFIX) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['debug']) return;
    this._lines.push(formatLine(this._prefix, 'DEBUG', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['info']) return;
    this._lines.push(formatLine(this._prefix, 'INFO ', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['warn']) return;
    this._lines.push(formatLine(this._prefix, 'WARN ', message, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER['error']) return;
    this._lines.push(formatLine(this._prefix, 'ERROR', message, context));
  }

  /** Flush accumulated log lines to a file. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }
}

// ---------------------------------------------------------------------------
// TeeLogger - writes to both console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_PREFIX) {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// CollectingLogger - per-run diagnostics sink
// ---------------------------------------------------------------------------

/**
 * Records entries at or above `level` and forwards every call to `inner`.
 * One instance belongs to one generation run, so concurrent runs never share
 * diagnostics.
 */
export class CollectingLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _inner: Logger;
  private readonly _entries: Diagnostic[] = [];

  constructor(inner: Logger = new SilentLogger(), level: LogLevel = 'warn') {
    this._inner = inner;
    this._minLevel = LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._record('debug', message, context);
    this._inner.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._record('info', message, context);
    this._inner.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._record('warn', message, context);
    this._inner.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._record('error', message, context);
    this._inner.error(message, context);
  }

  /** Entries recorded so far, oldest first. */
  get diagnostics(): readonly Diagnostic[] {
    return this._entries;
  }

  private _record(
    level: Diagnostic['level'],
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._entries.push(context !== undefined ? { level, message, context } : { level, message });
  }
}

// ---------------------------------------------------------------------------
// SilentLogger - used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
