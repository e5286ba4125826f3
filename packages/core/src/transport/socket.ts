/**
 * @fileoverview One request/response exchange over a dedicated TCP socket.
 *
 * The request is written in full and the write side is half-closed, which is
 * how the server detects the end of a request. The response has no length
 * prefix: it ends when the server closes its side. Reading is bounded by a
 * round cap of `ceil(maxDataSize / bufferSize)` reads of at most
 * `bufferSize` bytes each; a response that has not ended by then is returned
 * as it stands with `truncated` set. A response that fills the cap exactly
 * and then ends is not truncated.
 *
 * @module @optcp/core/transport/socket
 */

import type * as net from 'node:net';
import { TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { TransactOptions, TransactionResult } from '../types/index.js';

export const DEFAULT_BUFFER_SIZE = 512;
export const DEFAULT_MAX_DATA_SIZE = 1048576;

const NEWLINE = 0x0a;

/**
 * How long to wait for the end of a stream whose last chunk filled the
 * round cap exactly.
 */
const END_GRACE_MS = 50;

/**
 * Number of read rounds allowed for a response.
 */
export function maxReadRounds(maxDataSize: number, bufferSize: number): number {
  if (!Number.isInteger(bufferSize) || bufferSize < 1) {
    throw new RangeError(`bufferSize must be a positive integer, got ${bufferSize}`);
  }
  if (!Number.isFinite(maxDataSize) || maxDataSize < 1) {
    throw new RangeError(`maxDataSize must be positive, got ${maxDataSize}`);
  }
  return Math.ceil(maxDataSize / bufferSize);
}

/**
 * Write `payload`, half-close, and read the response.
 *
 * The socket is destroyed before the returned promise settles, whatever the
 * outcome.
 *
 * @param socket - A connected socket, used for this exchange only
 * @param payload - Request document
 * @throws {TransportError} On a socket error or a premature close
 */
export function transact(
  socket: net.Socket,
  payload: string | Buffer,
  options: TransactOptions = {}
): Promise<TransactionResult> {
  const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  const maxDataSize = options.maxDataSize ?? DEFAULT_MAX_DATA_SIZE;
  const framing = options.framing ?? 'close';
  const roundCap = maxReadRounds(maxDataSize, bufferSize);

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let rounds = 0;
    let settled = false;
    let capTimer: NodeJS.Timeout | undefined;

    const finish = (truncated: boolean) => {
      if (settled) return;
      settled = true;
      clearTimeout(capTimer);
      socket.destroy();
      const data = Buffer.concat(chunks);
      logger.debug(`Read ${data.length} bytes in ${rounds} rounds${truncated ? ' (truncated)' : ''}`);
      resolve({ data, rounds, truncated });
    };

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(capTimer);
      socket.destroy();
      reject(new TransportError(`Transaction failed: ${error.message}`, { cause: error }));
    };

    // Each data event is consumed in slices of at most bufferSize bytes,
    // one slice per round.
    const onData = (chunk: Buffer) => {
      let offset = 0;
      while (offset < chunk.length) {
        if (rounds >= roundCap) {
          finish(true);
          return;
        }
        const slice = chunk.subarray(offset, offset + bufferSize);
        offset += slice.length;
        rounds++;

        if (framing === 'delimited') {
          const newline = slice.indexOf(NEWLINE);
          if (newline !== -1) {
            chunks.push(slice.subarray(0, newline));
            finish(false);
            return;
          }
        }
        chunks.push(slice);
      }
      if (rounds >= roundCap) {
        // The cap was hit exactly at a chunk boundary. A reply that fills it
        // completely is followed by the peer's end; more data, or silence,
        // means the read was cut short.
        capTimer = setTimeout(() => finish(true), END_GRACE_MS);
      }
    };

    socket.on('data', onData);
    socket.once('end', () => finish(false));
    socket.once('error', fail);
    socket.once('close', (hadError) => {
      if (!hadError) {
        finish(false);
      }
    });

    socket.end(payload);
  });
}
