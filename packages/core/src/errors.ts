/**
 * @fileoverview Error taxonomy for the optimizer TCP client.
 *
 * Every failure the client raises is an {@link OptimizerError} subclass, so
 * callers can branch on `instanceof` or on the stable `code` string.
 *
 * @module @optcp/core/errors
 */

/**
 * Stable identifiers for each error class.
 */
export type OptimizerErrorCode =
  | 'CONFIG'
  | 'PORT_UNAVAILABLE'
  | 'CONNECTION'
  | 'TRANSPORT'
  | 'PROTOCOL'
  | 'USAGE'
  | 'LAUNCH';

/**
 * Base class for all optimizer client errors.
 */
export class OptimizerError extends Error {
  constructor(
    message: string,
    public readonly code: OptimizerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OptimizerError';
  }
}

/**
 * The descriptor file is missing or malformed, or the client was constructed
 * with an ambiguous set of arguments.
 */
export class ConfigError extends OptimizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', options);
    this.name = 'ConfigError';
  }
}

/**
 * The target port already accepts connections when `start()` is called.
 */
export class PortUnavailableError extends OptimizerError {
  constructor(public readonly port: number) {
    super(`Port ${port} not available`, 'PORT_UNAVAILABLE');
    this.name = 'PortUnavailableError';
  }
}

/**
 * Every connection attempt in the retry budget failed.
 */
export class ConnectionError extends OptimizerError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'CONNECTION', options);
    this.name = 'ConnectionError';
  }
}

/**
 * Socket I/O failed in the middle of a transaction.
 */
export class TransportError extends OptimizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT', options);
    this.name = 'TransportError';
  }
}

/**
 * The response bytes are not a single well-formed JSON document, or the
 * document does not have the shape the caller asked for.
 */
export class ProtocolError extends OptimizerError {
  constructor(
    message: string,
    public readonly truncated = false,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROTOCOL', options);
    this.name = 'ProtocolError';
  }
}

/**
 * An operation was invoked with invalid arguments or in a state that
 * forbids it.
 */
export class UsageError extends OptimizerError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

/**
 * The server process could not be spawned.
 */
export class LaunchError extends OptimizerError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cwd: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'LAUNCH', options);
    this.name = 'LaunchError';
  }
}
