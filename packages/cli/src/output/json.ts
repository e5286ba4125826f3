/**
 * JSON formatter for machine-readable CLI output.
 *
 * @module output/json
 */

import type { ConnectionDetails, JsonValue, SolverResponse } from '@optcp/core';
import type { Formatter } from './formatter.js';

/**
 * Options for JsonFormatter.
 */
export interface JsonFormatterOptions {
  /** Indentation spaces for pretty-printing (default: 2, 0 for compact) */
  indent?: number;
}

/**
 * Convert Error object to a serializable format.
 */
export function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
  };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  return serialized;
}

/**
 * JSON formatter for machine-readable output.
 *
 * Solver responses and acknowledgements are printed as the server sent them.
 */
export class JsonFormatter implements Formatter {
  private readonly indent: number | undefined;

  constructor(options: JsonFormatterOptions = {}) {
    const indent = options.indent ?? 2;
    // If indent is 0, use undefined for compact output
    this.indent = indent === 0 ? undefined : indent;
  }

  formatResponse(response: SolverResponse): string {
    return JSON.stringify(response.raw, null, this.indent);
  }

  formatAck(ack: JsonValue): string {
    return JSON.stringify(ack, null, this.indent);
  }

  formatDetails(details: ConnectionDetails): string {
    return JSON.stringify(details, null, this.indent);
  }

  formatError(error: Error): string {
    return JSON.stringify({ error: serializeError(error) }, null, this.indent);
  }

  formatProgress(message: string): string {
    return JSON.stringify({ progress: message }, null, this.indent);
  }
}
