/**
 * Output formatter interface and types for the optcp CLI.
 *
 * @module output/formatter
 */

import type { ConnectionDetails, JsonValue, SolverResponse } from '@optcp/core';

/**
 * Supported output formats.
 */
export type OutputFormat = 'text' | 'json' | 'yaml';

/**
 * Formatter interface for converting client results to output strings.
 *
 * Implementations provide format-specific output for solver responses,
 * ping acknowledgements, connection details, errors and progress messages.
 */
export interface Formatter {
  /**
   * Format the reply to a `call`.
   *
   * @param response - The decoded solver response
   * @returns Formatted string representation
   */
  formatResponse(response: SolverResponse): string;

  /**
   * Format a ping acknowledgement.
   *
   * @param ack - The decoded acknowledgement document
   * @returns Formatted string representation
   */
  formatAck(ack: JsonValue): string;

  /**
   * Format resolved connection details.
   *
   * @param details - Details to show
   * @returns Formatted string representation
   */
  formatDetails(details: ConnectionDetails): string;

  /**
   * Format an error for output.
   *
   * @param error - The error to format
   * @returns Formatted error string
   */
  formatError(error: Error): string;

  /**
   * Format a progress message (optional).
   *
   * @param message - Progress message text
   * @returns Formatted progress string
   */
  formatProgress?(message: string): string;
}
