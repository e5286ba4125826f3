/**
 * @fileoverview Model of the server's reply to a `Run` request.
 *
 * The server answers either with a solver status document or with an error
 * document tagged `"type": "Error"`. {@link SolverResponse} keeps the decoded
 * document as-is and validates the typed view on demand.
 *
 * @module @optcp/core/protocol/response
 */

import { z } from 'zod';
import { ProtocolError } from '../errors.js';
import type { JsonValue } from '../types/index.js';

/**
 * Status document of a finished solve.
 */
export const SolverStatusSchema = z.object({
  exit_status: z.string(),
  num_outer_iterations: z.number().int().nonnegative(),
  num_inner_iterations: z.number().int().nonnegative(),
  last_problem_norm_fpr: z.number(),
  f1_infeasibility: z.number().optional(),
  f2_norm: z.number().optional(),
  solve_time_ms: z.number(),
  penalty: z.number().optional(),
  solution: z.array(z.number()),
  lagrange_multipliers: z.array(z.number()).nullable().optional(),
  cost: z.number().optional(),
});

export type SolverStatus = z.infer<typeof SolverStatusSchema>;

/**
 * Error document returned when the server rejects a request.
 */
export const SolverErrorSchema = z.object({
  type: z.literal('Error'),
  code: z.number().int(),
  message: z.string(),
});

export type SolverError = z.infer<typeof SolverErrorSchema>;

function isErrorDocument(document: JsonValue): boolean {
  return (
    typeof document === 'object' &&
    document !== null &&
    !Array.isArray(document) &&
    document['type'] === 'Error'
  );
}

/**
 * Response of the optimizer to a `Run` request.
 *
 * @example
 * ```typescript
 * const response = await client.call([1.0, 2.0]);
 * if (response.isOk()) {
 *   console.log(response.status().solution);
 * } else {
 *   console.error(response.error().message);
 * }
 * ```
 */
export class SolverResponse {
  constructor(readonly raw: JsonValue) {}

  /**
   * True unless the server answered with an error document.
   */
  isOk(): boolean {
    return !isErrorDocument(this.raw);
  }

  /**
   * The typed view of the document: a status on success, an error otherwise.
   *
   * @throws {ProtocolError} If the document does not match either shape
   */
  get(): SolverStatus | SolverError {
    return this.isOk() ? this.status() : this.error();
  }

  /**
   * @throws {ProtocolError} If this is an error response or a malformed status
   */
  status(): SolverStatus {
    if (!this.isOk()) {
      throw new ProtocolError('Response is an error, not a solver status');
    }
    const result = SolverStatusSchema.safeParse(this.raw);
    if (!result.success) {
      throw new ProtocolError(`Malformed solver status: ${result.error.message}`, false, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * @throws {ProtocolError} If this is not an error response
   */
  error(): SolverError {
    const result = SolverErrorSchema.safeParse(this.raw);
    if (!result.success) {
      throw new ProtocolError('Response is not a solver error', false, { cause: result.error });
    }
    return result.data;
  }
}
