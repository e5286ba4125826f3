/**
 * @fileoverview Request encoding and response decoding for the optimizer
 * wire protocol.
 *
 * Requests are single JSON documents:
 *
 * - `{"Ping":1}`
 * - `{"Kill":1}`
 * - `{"Run":{"parameter":[...],"initial_guess":[...],"initial_lagrange_multipliers":[...],"initial_penalty":x}}`
 *
 * The optional `Run` fields appear only when supplied, always in that order.
 *
 * @module @optcp/core/protocol/codec
 */

import { ProtocolError, UsageError } from '../errors.js';
import { SolverResponse } from './response.js';
import type { JsonValue, RunRequest, TransactionResult } from '../types/index.js';

/**
 * Render a float as JSON number text that always reads as a float,
 * e.g. `1` becomes `1.0`.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new UsageError(`Cannot encode non-finite value: ${value}`);
  }
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  const text = String(value);
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text;
}

function formatVector(name: string, values: readonly number[]): string {
  try {
    return `[${values.map(formatFloat).join(',')}]`;
  } catch (error) {
    if (error instanceof UsageError) {
      throw new UsageError(`${name}: ${error.message}`);
    }
    throw error;
  }
}

export function encodePing(): string {
  return '{"Ping":1}';
}

export function encodeKill(): string {
  return '{"Kill":1}';
}

/**
 * Encode a `Run` request.
 *
 * @throws {UsageError} If `parameters` is empty or any value is not finite
 */
export function encodeRun(request: RunRequest): string {
  if (request.parameters.length === 0) {
    throw new UsageError('parameters must not be empty');
  }

  const fields = [`"parameter":${formatVector('parameters', request.parameters)}`];

  if (request.initialGuess !== undefined) {
    fields.push(`"initial_guess":${formatVector('initialGuess', request.initialGuess)}`);
  }
  if (request.initialMultipliers !== undefined) {
    fields.push(
      `"initial_lagrange_multipliers":${formatVector('initialMultipliers', request.initialMultipliers)}`
    );
  }
  if (request.initialPenalty !== undefined) {
    fields.push(`"initial_penalty":${formatFloat(request.initialPenalty)}`);
  }

  return `{"Run":{${fields.join(',')}}}`;
}

/**
 * Parse the bytes of a transaction as one JSON document.
 *
 * @throws {ProtocolError} If the bytes are not a complete JSON document
 */
export function decodeDocument(result: TransactionResult): JsonValue {
  const text = result.data.toString('utf-8');
  try {
    const document: JsonValue = JSON.parse(text);
    return document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const detail = result.truncated
      ? `response truncated after ${result.rounds} read rounds (${result.data.length} bytes)`
      : `received ${result.data.length} bytes`;
    throw new ProtocolError(`Malformed response, ${detail}: ${reason}`, result.truncated, {
      cause: error,
    });
  }
}

/**
 * Decode the acknowledgement of a `Ping` request.
 */
export function decodePing(result: TransactionResult): JsonValue {
  return decodeDocument(result);
}

/**
 * Decode the reply to a `Run` request.
 */
export function decodeRun(result: TransactionResult): SolverResponse {
  return new SolverResponse(decodeDocument(result));
}
