/**
 * @fileoverview Public API for @optcp/core package.
 *
 * Client for the TCP interface of generated parametric optimizers: resolve
 * where the server is, launch it, ping it, call it and stop it.
 *
 * @module @optcp/core
 *
 * @example
 * ```typescript
 * import { OptimizerClient } from '@optcp/core';
 *
 * const client = new OptimizerClient({ path: 'python_build/rosenbrock' });
 * await client.start();
 * const response = await client.call([1.0, 2.0]);
 * await client.kill();
 * ```
 */

// ============================================
// CLIENT
// ============================================

export {
  OptimizerClient,
  type OptimizerClientOptions,
  type OptimizerTarget,
} from './client.js';

// ============================================
// BUILDING BLOCKS
// ============================================

export {
  resolveConnectionDetails,
  loadDescriptor,
  checkVersion,
  DescriptorSchema,
  DESCRIPTOR_FILENAME,
  type ConnectionInput,
  type Descriptor,
  type ResolvedConnection,
} from './connection/details.js';

export {
  ProcessSupervisor,
  cargoLaunchCommand,
  serverDirectory,
  TCP_IFACE_PREFIX,
  type LaunchCommand,
  type LaunchCommandBuilder,
  type LaunchHandle,
  type ProcessSupervisorOptions,
} from './process/supervisor.js';

export {
  RetryingConnector,
  DEFAULT_RETRY_POLICY,
  isPortAccepting,
  openSocket,
  sleep,
} from './transport/connector.js';

export {
  transact,
  maxReadRounds,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MAX_DATA_SIZE,
} from './transport/socket.js';

export {
  encodePing,
  encodeKill,
  encodeRun,
  decodeDocument,
  decodePing,
  decodeRun,
  formatFloat,
} from './protocol/codec.js';

export {
  SolverResponse,
  SolverStatusSchema,
  SolverErrorSchema,
  type SolverStatus,
  type SolverError,
} from './protocol/response.js';

// ============================================
// ERRORS
// ============================================

export {
  OptimizerError,
  ConfigError,
  PortUnavailableError,
  ConnectionError,
  TransportError,
  ProtocolError,
  UsageError,
  LaunchError,
  type OptimizerErrorCode,
} from './errors.js';

// ============================================
// LOGGING
// ============================================

export { logger, setLogLevel, getLogLevel, type LogLevel } from './utils/logger.js';

// ============================================
// TYPES
// ============================================

export type {
  Advisory,
  BuildMode,
  CallOptions,
  ClientState,
  ConnectionDetails,
  ConnectionSource,
  DiagnosticsSink,
  FramingMode,
  JsonValue,
  RetryPolicy,
  RunRequest,
  ServerBuildInfo,
  TransactOptions,
  TransactionResult,
} from './types/index.js';
