import { appendFileSync } from 'fs';

/**
 * Tagged stderr logging. stdout stays free for the MCP transport, so
 * everything goes through console.error the same way the CLI wrapper does.
 *
 * Lines are optionally mirrored to a log file with an ISO timestamp.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LogSinkOptions {
  level: LogLevel;
  /** Append every emitted line to this file as well. */
  file?: string;
}

let _sink: LogSinkOptions = { level: 'info' };
let _fileBroken = false;

export function configureLogging(options: LogSinkOptions): void {
  _sink = { ...options };
  _fileBroken = false;
}

function emit(scope: string, level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[_sink.level]) return;

  const prefix = level === 'info' ? '' : `${level.toUpperCase()} `;
  console.error(`[${scope}] ${prefix}${message}`);

  if (_sink.file && !_fileBroken) {
    try {
      appendFileSync(
        _sink.file,
        `${new Date().toISOString()} - ${level.toUpperCase()} - [${scope}] ${message}\n`,
      );
    } catch (err) {
      // Stop mirroring after the first failure; stderr keeps working.
      _fileBroken = true;
      console.error(
        `[${scope}] WARN log file ${_sink.file} disabled: ${err instanceof Error ? err.message : err}`,
      );
    }
  }
}

export function createLogger(scope = 'board-pilot'): Logger {
  return {
    debug: (message) => emit(scope, 'debug', message),
    info: (message) => emit(scope, 'info', message),
    warn: (message) => emit(scope, 'warn', message),
    error: (message) => emit(scope, 'error', message),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}

/** Logger that drops everything; handy as a default in tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
