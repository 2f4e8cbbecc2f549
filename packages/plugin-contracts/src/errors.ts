/**
 * Error types for the plugin engine
 *
 * Every failure the engine reports carries a stable code so hosts can react
 * to it without matching on messages.
 */

/**
 * Error codes enum for type safety
 */
export const ErrorCode = {
  PLUGIN_NOT_FOUND: 'PLUGIN_NOT_FOUND',
  PLUGIN_AMBIGUOUS: 'PLUGIN_AMBIGUOUS',
  PLUGIN_MATERIALIZE_FAILED: 'PLUGIN_MATERIALIZE_FAILED',
  PLUGIN_CONTRACT_VIOLATION: 'PLUGIN_CONTRACT_VIOLATION',
  DEPENDENCY_GRAPH_UNRESOLVABLE: 'DEPENDENCY_GRAPH_UNRESOLVABLE',
  PLUGINS_ALREADY_LOADED: 'PLUGINS_ALREADY_LOADED',
  CONTEXT_MISMATCH: 'CONTEXT_MISMATCH',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base plugin error class
 */
export class PluginError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: string;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PluginError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }

  static fromJSON(data: SerializedError): PluginError {
    const error = new PluginError(data.message, data.code, data.details);
    error.name = data.name;
    error.stack = data.stack;
    return error;
  }
}

/**
 * No candidate was discovered for a requested plugin name
 */
export class PluginNotFoundError extends PluginError {
  constructor(public readonly pluginName: string, namespace: string) {
    super(`Plugin ${pluginName} does not exist`, ErrorCode.PLUGIN_NOT_FOUND, { plugin: pluginName, namespace });
    this.name = 'PluginNotFoundError';
  }
}

/**
 * More than one candidate was discovered for the same plugin name
 */
export class AmbiguousPluginError extends PluginError {
  constructor(
    public readonly pluginName: string,
    public readonly sources: readonly string[]
  ) {
    super(
      `Plugin name ${pluginName} is not unique (defined in ${sources.join(', ')})`,
      ErrorCode.PLUGIN_AMBIGUOUS,
      { plugin: pluginName, sources: [...sources] }
    );
    this.name = 'AmbiguousPluginError';
  }
}

/**
 * The loader could not produce an implementation for a discovered candidate
 */
export class PluginMaterializeError extends PluginError {
  constructor(public readonly pluginName: string, cause: unknown) {
    super(
      `Could not load plugin ${pluginName}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.PLUGIN_MATERIALIZE_FAILED,
      { plugin: pluginName },
      { cause }
    );
    this.name = 'PluginMaterializeError';
  }
}

/**
 * A materialized implementation does not extend the engine's plugin class
 */
export class PluginContractError extends PluginError {
  constructor(public readonly pluginName: string, baseClassName: string) {
    super(
      `Plugin ${pluginName} does not inherit from ${baseClassName}`,
      ErrorCode.PLUGIN_CONTRACT_VIOLATION,
      { plugin: pluginName, baseClass: baseClassName }
    );
    this.name = 'PluginContractError';
  }
}

/**
 * The resolver cannot make progress: a required-dependency cycle, or a
 * required dependency that never became a candidate.
 */
export class UnresolvableDependencyGraphError extends PluginError {
  constructor(public readonly unresolved: Readonly<Record<string, readonly string[]>>) {
    const summary = Object.entries(unresolved)
      .map(([name, missing]) => `${name} (needs ${missing.join(', ')})`)
      .join('; ');
    super(
      `Could not resolve dependencies between plugins: ${summary}`,
      ErrorCode.DEPENDENCY_GRAPH_UNRESOLVABLE,
      { unresolved }
    );
    this.name = 'UnresolvableDependencyGraphError';
  }
}

export class PluginsAlreadyLoadedError extends PluginError {
  constructor() {
    super('Plugins already loaded', ErrorCode.PLUGINS_ALREADY_LOADED);
    this.name = 'PluginsAlreadyLoadedError';
  }
}

/**
 * A scoped pop returned something other than what the scope pushed
 */
export class ContextMismatchError extends PluginError {
  constructor(message: string = 'Popped wrong plugin', details?: Record<string, unknown>) {
    super(message, ErrorCode.CONTEXT_MISMATCH, details);
    this.name = 'ContextMismatchError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PluginError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Serialized error for logs and transport
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Check if an error is a PluginError
 */
export function isPluginError(error: unknown): error is PluginError {
  return error instanceof PluginError;
}

/**
 * Wrap any error as a PluginError
 */
export function wrapError(error: unknown, defaultCode: string = ErrorCode.INTERNAL_ERROR): PluginError {
  if (error instanceof PluginError) {
    return error;
  }

  if (error instanceof Error) {
    return new PluginError(
      error.message,
      defaultCode,
      {
        originalName: error.name,
        stack: error.stack,
      },
      { cause: error }
    );
  }

  return new PluginError(String(error), defaultCode);
}
