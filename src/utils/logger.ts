// Utility: Structured logger
// One JSON line per entry, tagged with the emitting component

export interface LogContext {
  [key: string]: string | number | boolean | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveMinimumLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | 'silent' {
  const forced = env.LOG_LEVEL;
  if (forced === 'debug' || forced === 'info' || forced === 'warn' || forced === 'error' || forced === 'silent') {
    return forced;
  }
  if (env.NODE_ENV === 'test') return 'silent';
  if (env.NODE_ENV === 'production') return 'info';
  return 'debug';
}

export class Logger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const minimum = resolveMinimumLevel();
    if (minimum === 'silent' || LEVEL_ORDER[level] < LEVEL_ORDER[minimum]) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.prefix,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(formatted);
    } else if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  child(component: string): Logger {
    return new Logger(`${this.prefix}:${component}`);
  }
}

export const gameLogger = new Logger('Game');

export const contentLogger = new Logger('Content');

export const storageLogger = new Logger('Storage');

export const httpLogger = new Logger('Http');
