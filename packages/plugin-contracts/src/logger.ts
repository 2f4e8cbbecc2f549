/**
 * Logger contract used by the engine and handed to plugins
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PluginLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown> | Error): void;
  child(bindings: Record<string, unknown>): PluginLogger;
}

/**
 * Logger that drops everything
 */
export function createNoopLogger(): PluginLogger {
  const logger: PluginLogger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => logger,
  };
  return logger;
}
