/**
 * Process-wide logger that commands configure once from CLI flags.
 * Modules import `logger` and always reach the current instance.
 */

import { Logger, type LoggerOptions } from './logger';

class GlobalLogger {
  private static _instance: Logger = new Logger();

  static get(): Logger {
    return GlobalLogger._instance;
  }

  /**
   * Replace the instance with a fresh one built from the environment, dropping earlier configure() calls
   */
  static reset(): void {
    GlobalLogger._instance = new Logger();
  }

  static configure(options: Partial<LoggerOptions>): void {
    GlobalLogger._instance.configure(options);
  }
}

const loggerProxy = new Proxy<Logger>(GlobalLogger.get(), {
  get(_target, property) {
    const current = GlobalLogger.get();
    const value: unknown = Reflect.get(current, property, current);
    if (typeof value === 'function') {
      return value.bind(current);
    }
    return value;
  },
});

export const logger = loggerProxy;

export { GlobalLogger };
