// logger.ts - console logging with a subscribable line feed
import { EventEmitter } from 'events';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogLine {
  ts: string;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const ts = (): string => new Date().toISOString();

/* =========================
   Line feed
   ========================= */
class LogFeed extends EventEmitter {
  publish(line: LogLine): void {
    this.emit('line', line);
  }

  subscribe(listener: (line: LogLine) => void): () => void {
    this.on('line', listener);
    return () => this.off('line', listener);
  }
}

export const logFeed = new LogFeed();

let consoleEnabled = process.env.LOG_SILENT !== 'true';
let debugEnabled = process.env.LOG_LEVEL === 'debug';

export function configureLogging(options: { console?: boolean; debug?: boolean }): void {
  if (options.console !== undefined) consoleEnabled = options.console;
  if (options.debug !== undefined) debugEnabled = options.debug;
}

/* =========================
   Scoped loggers
   ========================= */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !debugEnabled) return;

    const line: LogLine = { ts: ts(), level, scope, message };
    logFeed.publish(line);

    if (!consoleEnabled) return;
    const text = `${line.ts} [${scope}] ${message}`;
    if (level === 'error') {
      console.error(text);
    } else if (level === 'warn') {
      console.warn(text);
    } else {
      console.log(text);
    }
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: (message, error) => {
      const detail = error === undefined ? '' : `: ${error instanceof Error ? error.message : String(error)}`;
      write('error', `${message}${detail}`);
    },
  };
}
