/**
 * @fileoverview Client for the TCP interface of generated parametric
 * optimizers.
 *
 * Starts a local server, checks that it is up, calls it with parameter
 * vectors and stops it. Every operation uses its own connection.
 *
 * @module @optcp/core/client
 */

import { resolveConnectionDetails } from './connection/details.js';
import { PortUnavailableError, UsageError } from './errors.js';
import { ProcessSupervisor } from './process/supervisor.js';
import { decodePing, decodeRun, encodeKill, encodePing, encodeRun } from './protocol/codec.js';
import type { SolverResponse } from './protocol/response.js';
import { isPortAccepting, RetryingConnector, sleep } from './transport/connector.js';
import { transact } from './transport/socket.js';
import { logger } from './utils/logger.js';
import type {
  Advisory,
  CallOptions,
  ClientState,
  ConnectionDetails,
  DiagnosticsSink,
  FramingMode,
  JsonValue,
  RetryPolicy,
  TransactOptions,
  TransactionResult,
} from './types/index.js';

/**
 * Where the server is: a local optimizer directory, or a remote endpoint.
 */
export type OptimizerTarget = { path: string } | { host: string; port: number };

/**
 * Optimizer client configuration options.
 */
export interface OptimizerClientOptions {
  /** Connection retry policy (default: 10 attempts, 1000ms apart) */
  retry?: Partial<RetryPolicy>;
  /** Wait between launching the server and the first ping (default: 2000) */
  settleDelayMs?: number;
  /** Caller's generator version, checked against the descriptor */
  currentVersion?: string;
  /** Receives advisories (default: logged as warnings) */
  diagnostics?: DiagnosticsSink;
  /** Response framing (default: 'close') */
  framing?: FramingMode;
  /** Launches local servers (default: a cargo supervisor) */
  supervisor?: ProcessSupervisor;
}

const DEFAULT_SETTLE_DELAY_MS = 2000;
const DEFAULT_CALL_BUFFER_LENGTH = 4096;
const DEFAULT_CALL_MAX_DATA_SIZE = 1048576;

/**
 * Client of an optimizer TCP server.
 *
 * @example
 * ```typescript
 * const client = new OptimizerClient({ path: 'python_build/my_optimizer' });
 * await client.start();
 *
 * const response = await client.call([1.0, 2.0, 3.0], { initialGuess: [0.5, 0.5] });
 * if (response.isOk()) {
 *   console.log(response.status().solution);
 * }
 *
 * await client.kill();
 * ```
 */
export class OptimizerClient {
  readonly details: ConnectionDetails;
  readonly advisories: readonly Advisory[];
  private readonly connector: RetryingConnector;
  private readonly supervisor: ProcessSupervisor;
  private readonly settleDelayMs: number;
  private readonly framing: FramingMode;
  private currentState: ClientState = 'unstarted';

  /**
   * @throws {ConfigError} If the target is ambiguous or the descriptor
   *   cannot be used
   */
  constructor(target: OptimizerTarget, options: OptimizerClientOptions = {}) {
    const { details, advisories } = resolveConnectionDetails({
      ...target,
      currentVersion: options.currentVersion,
    });
    this.details = details;
    this.advisories = advisories;
    this.connector = new RetryingConnector(options.retry);
    this.supervisor = options.supervisor ?? new ProcessSupervisor();
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.framing = options.framing ?? 'close';

    const sink: DiagnosticsSink =
      options.diagnostics ?? ((advisory) => logger.warn(advisory.message));
    for (const advisory of advisories) {
      sink(advisory);
    }
  }

  get state(): ClientState {
    return this.currentState;
  }

  /**
   * Launch the local server and wait until it answers a ping.
   *
   * @throws {UsageError} Without a local optimizer path, or if already
   *   started or stopped
   * @throws {PortUnavailableError} If the port already accepts connections
   * @throws {LaunchError} If the server process cannot be spawned
   * @throws {ConnectionError} If the server never answers
   */
  async start(): Promise<void> {
    if (this.details.source.kind !== 'local') {
      throw new UsageError('no local launch configuration');
    }
    if (this.currentState !== 'unstarted') {
      throw new UsageError(`cannot start a client that is ${this.currentState}`);
    }

    const { host, port } = this.details;
    if (await isPortAccepting(host, port)) {
      throw new PortUnavailableError(port);
    }

    const handle = this.supervisor.launch(this.details);
    await handle.spawned;

    logger.info('Waiting for server to start');
    await sleep(this.settleDelayMs);
    await this.ping();

    this.currentState = 'running';
  }

  /**
   * Ping the server.
   *
   * @returns The server's acknowledgement document
   */
  async ping(): Promise<JsonValue> {
    const result = await this.exchange(encodePing());
    return decodePing(result);
  }

  /**
   * Run the optimizer.
   *
   * @param parameters - Parameter vector, non-empty
   * @returns The decoded solver response
   * @throws {UsageError} If `parameters` is empty or holds non-finite values
   * @throws {ProtocolError} If the reply is not a complete JSON document
   */
  async call(parameters: readonly number[], options: CallOptions = {}): Promise<SolverResponse> {
    logger.debug('Sending request to TCP/IP server');
    const request = encodeRun({
      parameters,
      initialGuess: options.initialGuess,
      initialMultipliers: options.initialY,
      initialPenalty: options.initialPenalty,
    });
    const result = await this.exchange(request, {
      bufferSize: options.bufferLength ?? DEFAULT_CALL_BUFFER_LENGTH,
      maxDataSize: options.maxDataSize ?? DEFAULT_CALL_MAX_DATA_SIZE,
    });
    return decodeRun(result);
  }

  /**
   * Ask the server to shut down. Process exit is not awaited.
   */
  async kill(): Promise<void> {
    logger.info('Killing server');
    await this.exchange(encodeKill());
    this.currentState = 'stopped';
  }

  /**
   * One transaction on a fresh connection.
   */
  private async exchange(payload: string, options: TransactOptions = {}): Promise<TransactionResult> {
    const socket = await this.connector.connect(this.details.host, this.details.port);
    return transact(socket, payload, { ...options, framing: this.framing });
  }
}
