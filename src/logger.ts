import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let logFile: string | null = null;

/** Mirror every log line into `path` as well as the console. */
export function setLogFile(path: string | null): void {
  if (path && !existsSync(dirname(path))) {
    mkdirSync(dirname(path), { recursive: true });
  }
  logFile = path;
}

function write(level: LogLevel, scope: string, message: string) {
  const line = `[${new Date().toISOString()}] [${level}] [${scope}] ${message}`;
  if (level === 'ERROR') {
    console.error(line);
  } else if (level === 'WARN') {
    console.warn(line);
  } else {
    console.log(line);
  }
  if (logFile) {
    appendFileSync(logFile, line + '\n');
  }
}

export function createLogger(scope: string): Logger {
  return {
    info: (message) => write('INFO', scope, message),
    warn: (message) => write('WARN', scope, message),
    error: (message) => write('ERROR', scope, message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
