import chalk from 'chalk';
import { match } from 'ts-pattern';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'json' | 'text';

export type LoggerOptions = {
  format?: LogFormat;
  level?: LogLevel;
  metadata?: Record<string, unknown>;
  silent?: boolean;
  /** Where debug/info lines go; warn/error always use stderr */
  stream?: 'stdout' | 'stderr';
  timestamp?: boolean;
  verbose?: boolean;
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
  timestamp: string;
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class Logger {
  private _options: Required<LoggerOptions>;
  private readonly _levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 999,
  };

  constructor(options: LoggerOptions = {}) {
    this._options = {
      level: this._getLogLevelFromEnv(options.level),
      format: this._getFormatFromEnv(options.format),
      verbose: options.verbose ?? this._getFlagFromEnv('VERBOSE'),
      silent: options.silent ?? this._getFlagFromEnv('SILENT'),
      stream: options.stream ?? 'stdout',
      timestamp: options.timestamp ?? false,
      metadata: options.metadata ?? {},
    };
    this._applyOverrides();
  }

  private _getLogLevelFromEnv(defaultLevel?: LogLevel): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      return envLevel;
    }
    return defaultLevel ?? 'info';
  }

  private _getFormatFromEnv(defaultFormat?: LogFormat): LogFormat {
    const envFormat = process.env.LOG_FORMAT?.toLowerCase();
    if (envFormat === 'json' || envFormat === 'text') {
      return envFormat;
    }
    return defaultFormat ?? 'text';
  }

  private _getFlagFromEnv(name: 'VERBOSE' | 'SILENT'): boolean {
    return process.env[name] === 'true' || process.env[name] === '1';
  }

  // Silent beats verbose, verbose beats the configured level
  private _applyOverrides(): void {
    if (this._options.silent) {
      this._options.level = 'silent';
    } else if (this._options.verbose) {
      this._options.level = 'debug';
    }
  }

  private _shouldLog(level: LogLevel): boolean {
    return this._levelPriority[level] >= this._levelPriority[this._options.level];
  }

  private _formatMessage(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
  ): string {
    if (this._options.format === 'json') {
      const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        metadata: { ...this._options.metadata, ...metadata },
      };
      return JSON.stringify(entry);
    }

    const timestamp = this._options.timestamp ? `[${new Date().toISOString()}] ` : '';
    const levelPrefix = match(level)
      .with('debug', () => chalk.gray('[DEBUG]'))
      .with('info', () => chalk.blue('[INFO]'))
      .with('warn', () => chalk.yellow('[WARN]'))
      .with('error', () => chalk.red('[ERROR]'))
      .with('silent', () => '')
      .exhaustive();

    const merged = { ...this._options.metadata, ...metadata };
    const metadataString =
      Object.keys(merged).length > 0 ? chalk.gray(` ${JSON.stringify(merged)}`) : '';

    return `${timestamp}${levelPrefix} ${message}${metadataString}`;
  }

  private _writeLow(line: string): void {
    if (this._options.stream === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this._shouldLog('debug')) {
      this._writeLow(this._formatMessage('debug', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this._shouldLog('info')) {
      this._writeLow(this._formatMessage('info', message, metadata));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this._shouldLog('warn')) {
      console.warn(this._formatMessage('warn', message, metadata));
    }
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    if (this._shouldLog('error')) {
      console.error(this._formatMessage('error', message, metadata));
    }
  }

  /** Unformatted output, e.g. a rendered report. Always stdout. */
  raw(message: string): void {
    if (this._options.level !== 'silent') {
      console.log(message);
    }
  }

  configure(options: Partial<LoggerOptions>): void {
    this._options = {
      ...this._options,
      ...options,
    };
    this._applyOverrides();
  }

  child(metadata: Record<string, unknown>): Logger {
    return new Logger({
      ...this._options,
      metadata: { ...this._options.metadata, ...metadata },
    });
  }

  getOptions(): Readonly<Required<LoggerOptions>> {
    return { ...this._options };
  }
}

export { Logger };
