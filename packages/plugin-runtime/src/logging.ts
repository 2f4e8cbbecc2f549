import pino, { type DestinationStream, type LevelWithSilent, type Logger as CoreLogger } from 'pino';
import type { PluginLogger } from '@plugwork/plugin-contracts';

type Fields = Record<string, unknown>;

export interface EngineLoggerOptions {
  level?: LevelWithSilent;
  /** Where log lines go; stdout when omitted */
  destination?: DestinationStream;
  /** Extra bindings attached to every line */
  bindings?: Fields;
}

/**
 * Create the engine logger for a plugin namespace.
 *
 * @example
 * ```typescript
 * const logger = createEngineLogger('coffee', { level: 'debug' });
 * const engine = new PluginEngine({ loader, namespace: 'coffee', logger });
 * ```
 */
export function createEngineLogger(namespace: string, options: EngineLoggerOptions = {}): PluginLogger {
  const base = pino({ level: options.level ?? 'info' }, options.destination ?? pino.destination(1));

  const coreLogger = base.child({
    layer: 'plugin-engine',
    namespace,
    ...options.bindings,
  });

  return wrap(coreLogger);
}

/**
 * Adapt an existing pino logger (e.g. the host application's) to the engine.
 */
export function fromPinoLogger(logger: CoreLogger): PluginLogger {
  return wrap(logger);
}

function wrap(core: CoreLogger): PluginLogger {
  return {
    debug(message, meta) {
      core.debug(meta ?? {}, message);
    },
    info(message, meta) {
      core.info(meta ?? {}, message);
    },
    warn(message, meta) {
      core.warn(meta ?? {}, message);
    },
    error(message, meta) {
      if (meta instanceof Error) {
        core.error({ err: meta }, message);
        return;
      }
      core.error(meta ?? {}, message);
    },
    child(bindings) {
      return wrap(core.child(bindings));
    },
  };
}
