// src/utils/logger.ts
interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

export type LogLevelName = keyof LogLevel;

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

export type LogMeta = Record<string, unknown>;

export function isLogLevel(value: unknown): value is LogLevelName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevelName = 'INFO'): LogLevelName {
  const normalized = value?.trim().toUpperCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export class Logger {
  // null: follow the parent
  private level: number | null;
  private parent: Logger | null = null;

  constructor(level: LogLevelName = 'INFO', private readonly scope?: string) {
    this.level = LOG_LEVELS[level];
  }

  setLevel(level: LogLevelName) {
    this.level = LOG_LEVELS[level];
  }

  child(scope: string): Logger {
    const child = new Logger('INFO', this.scope ? `${this.scope}:${scope}` : scope);
    child.level = null;
    child.parent = this;
    return child;
  }

  private threshold(): number {
    return this.level ?? this.parent?.threshold() ?? LOG_LEVELS.INFO;
  }

  private log(level: LogLevelName, message: string, meta?: LogMeta) {
    if (LOG_LEVELS[level] > this.threshold()) return;

    const timestamp = new Date().toISOString();
    const line = this.scope
      ? `[${timestamp}] ${level} [${this.scope}]: ${message}`
      : `[${timestamp}] ${level}: ${message}`;

    if (level === 'ERROR') {
      console.error(line, meta || '');
    } else if (level === 'WARN') {
      console.warn(line, meta || '');
    } else {
      console.log(line, meta || '');
    }
  }

  error(message: string, meta?: LogMeta) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('DEBUG', message, meta);
  }
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
