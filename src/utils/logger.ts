/**
 * Logger utility for the application
 * Provides consistent logging interface across the pipeline stages
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as string[]).includes(value);
}

// Children hold the same object, so setLevel on any of them applies to all
export interface LevelState {
  current: LogLevel;
}

export class Logger {
  private readonly state: LevelState;

  constructor(private readonly scope?: string, level?: LogLevel | LevelState) {
    if (typeof level === 'object') {
      this.state = level;
    } else {
      // Default to 'info' if LOG_LEVEL env var is not set or unknown
      const fromEnv = process.env.LOG_LEVEL;
      this.state = { current: level ?? (isLogLevel(fromEnv) ? fromEnv : 'info') };
    }
  }

  get level(): LogLevel {
    return this.state.current;
  }

  setLevel(level: LogLevel) {
    this.state.current = level;
  }

  /**
   * Create a logger that prefixes every message with `[scope]`
   * and shares this logger's level.
   */
  child(scope: string): Logger {
    const name = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(name, this.state);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.current);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown, error?: unknown): LogMessage {
    return {
      level,
      message: this.scope ? `[${this.scope}] ${message}` : message,
      timestamp: new Date().toISOString(),
      data,
      error
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
    const extra = data === undefined ? '' : data;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, extra);
        break;
      case 'info':
        console.info(prefix, message, extra);
        break;
      case 'warn':
        console.warn(prefix, message, extra);
        break;
      case 'error':
        console.error(prefix, message, extra, error === undefined ? '' : error);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      this.output(this.formatLog('error', message, data, error));
    }
  }
}

// Export singleton instance
export const logger = new Logger();
