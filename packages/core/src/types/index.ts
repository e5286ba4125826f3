// ============================================
// CONNECTION
// ============================================

/**
 * Build mode the server was generated with.
 */
export type BuildMode = 'debug' | 'release';

/**
 * Build metadata stamped into the descriptor of a locally generated server.
 */
export interface ServerBuildInfo {
  /** Name of the generated optimizer (`meta.optimizer_name`) */
  componentName: string;
  /** Cargo profile to launch with */
  buildMode: BuildMode;
  /** Generator version the server was built with */
  versionTag: string;
}

/**
 * Where the connection details came from.
 */
export type ConnectionSource =
  | { kind: 'local'; path: string }
  | { kind: 'remote' };

/**
 * Resolved endpoint of an optimizer server.
 */
export interface ConnectionDetails {
  readonly host: string;
  readonly port: number;
  readonly source: ConnectionSource;
  /** Present only when the details came from a descriptor file */
  readonly build?: ServerBuildInfo;
}

/**
 * Non-fatal finding produced while resolving connection details.
 */
export interface Advisory {
  kind: 'version-mismatch';
  message: string;
}

/**
 * Receives advisories instead of the logger when injected.
 */
export type DiagnosticsSink = (advisory: Advisory) => void;

// ============================================
// TRANSPORT
// ============================================

/**
 * How the end of a response is detected.
 *
 * - `close`: read until the peer ends the stream (the server's native mode)
 * - `delimited`: additionally stop at the first newline byte
 */
export type FramingMode = 'close' | 'delimited';

/**
 * Bounded retry policy for connection establishment.
 */
export interface RetryPolicy {
  /** Maximum number of connection attempts (default: 10) */
  attempts: number;
  /** Fixed delay between attempts in milliseconds (default: 1000) */
  delayMs: number;
  /** Upper bound for a single attempt in milliseconds (default: 5000) */
  connectTimeoutMs: number;
}

/**
 * Read limits for one transaction.
 */
export interface TransactOptions {
  /** Maximum bytes consumed per read round (default: 512) */
  bufferSize?: number;
  /** Expected upper bound of the response size (default: 1048576) */
  maxDataSize?: number;
  framing?: FramingMode;
}

/**
 * Outcome of one request/response exchange.
 */
export interface TransactionResult {
  data: Buffer;
  /** Number of read rounds consumed */
  rounds: number;
  /** True when reading stopped at the round cap rather than at the end of the stream */
  truncated: boolean;
}

// ============================================
// PROTOCOL
// ============================================

/**
 * Any value `JSON.parse` can produce.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Inputs of a `Run` request.
 */
export interface RunRequest {
  readonly parameters: readonly number[];
  readonly initialGuess?: readonly number[];
  readonly initialMultipliers?: readonly number[];
  readonly initialPenalty?: number;
}

// ============================================
// CLIENT
// ============================================

/**
 * Lifecycle of an {@link OptimizerClient}. `stopped` is terminal.
 */
export type ClientState = 'unstarted' | 'running' | 'stopped';

/**
 * Optional arguments of `OptimizerClient.call`.
 */
export interface CallOptions {
  initialGuess?: readonly number[];
  /** Initial vector of Lagrange multipliers */
  initialY?: readonly number[];
  initialPenalty?: number;
  /** Read buffer length in bytes (default: 4096) */
  bufferLength?: number;
  /** Largest response expected in bytes (default: 1048576) */
  maxDataSize?: number;
}
