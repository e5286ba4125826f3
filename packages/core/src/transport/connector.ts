/**
 * @fileoverview TCP connection establishment with a fixed retry policy.
 *
 * A freshly launched server takes a while before it accepts connections, so
 * every transaction connects through {@link RetryingConnector}: a fixed
 * number of attempts with a fixed delay in between, no backoff and no jitter.
 *
 * @module @optcp/core/transport/connector
 */

import * as net from 'node:net';
import { ConnectionError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { RetryPolicy } from '../types/index.js';

/**
 * Default retry policy: 10 attempts, one second apart.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 10,
  delayMs: 1000,
  connectTimeoutMs: 5000,
};

/**
 * Wait for a specified time.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Open a single TCP connection.
 *
 * @param host - Server address
 * @param port - Server port
 * @param timeoutMs - Give up after this many milliseconds
 * @returns The connected socket
 */
export function openSocket(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const timeoutHandle = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timeoutHandle);
      socket.removeAllListeners('error');
      resolve(socket);
    });

    socket.once('error', (err) => {
      clearTimeout(timeoutHandle);
      socket.destroy();
      reject(err);
    });
  });
}

/**
 * Check whether something is already accepting connections on a port.
 *
 * @returns True if a connection could be opened
 */
export async function isPortAccepting(host: string, port: number, timeoutMs = 1000): Promise<boolean> {
  try {
    const socket = await openSocket(host, port, timeoutMs);
    socket.destroy();
    return true;
  } catch {
    return false;
  }
}

/**
 * Connects to an optimizer server, retrying on failure.
 *
 * @example
 * ```typescript
 * const connector = new RetryingConnector({ attempts: 5, delayMs: 200 });
 * const socket = await connector.connect('127.0.0.1', 8080);
 * ```
 */
export class RetryingConnector {
  readonly policy: RetryPolicy;

  constructor(policy: Partial<RetryPolicy> = {}) {
    this.policy = {
      attempts: policy.attempts ?? DEFAULT_RETRY_POLICY.attempts,
      delayMs: policy.delayMs ?? DEFAULT_RETRY_POLICY.delayMs,
      connectTimeoutMs: policy.connectTimeoutMs ?? DEFAULT_RETRY_POLICY.connectTimeoutMs,
    };
    if (!Number.isInteger(this.policy.attempts) || this.policy.attempts < 1) {
      throw new RangeError(`attempts must be a positive integer, got ${this.policy.attempts}`);
    }
  }

  /**
   * Connect to `host:port`.
   *
   * @throws {ConnectionError} When every attempt failed
   */
  async connect(host: string, port: number): Promise<net.Socket> {
    const { attempts, delayMs, connectTimeoutMs } = this.policy;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await openSocket(host, port, connectTimeoutMs);
      } catch (error) {
        lastError = error;
        const reason = error instanceof Error ? error.message : String(error);
        logger.debug(`Connection attempt ${attempt}/${attempts} to ${host}:${port} failed: ${reason}`);
      }
      // No delay after the final attempt
      if (attempt < attempts) {
        await sleep(delayMs);
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ConnectionError(
      `Could not connect to ${host}:${port} after ${attempts} attempts: ${reason}`,
      attempts,
      { cause: lastError }
    );
  }
}
