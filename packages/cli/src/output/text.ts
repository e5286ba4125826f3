/**
 * Text formatter for human-readable CLI output.
 *
 * @module output/text
 */

import pc from 'picocolors';
import type { ConnectionDetails, JsonValue, SolverResponse, SolverStatus } from '@optcp/core';
import type { Formatter } from './formatter.js';

/**
 * Options for TextFormatter.
 */
export interface TextFormatterOptions {
  /** Enable colored output (default: true) */
  colors?: boolean;
}

function formatVector(values: readonly number[]): string {
  return `[${values.join(', ')}]`;
}

/**
 * Text formatter for human-readable output.
 *
 * Produces formatted, colored output suitable for terminal display.
 */
export class TextFormatter implements Formatter {
  private readonly colors: boolean;

  constructor(options: TextFormatterOptions = {}) {
    this.colors = options.colors ?? true;
  }

  /**
   * Apply color function if colors are enabled.
   */
  private color(fn: (s: string) => string, text: string): string {
    return this.colors ? fn(text) : text;
  }

  private label(text: string): string {
    return this.color(pc.bold, text);
  }

  private formatStatus(status: SolverStatus): string {
    const lines: string[] = [];
    const exit = status.exit_status === 'Converged'
      ? this.color(pc.green, status.exit_status)
      : this.color(pc.yellow, status.exit_status);

    lines.push(`${this.label('Status:')}      ${exit}`);
    lines.push(`${this.label('Solution:')}    ${formatVector(status.solution)}`);
    if (status.cost !== undefined) {
      lines.push(`${this.label('Cost:')}        ${status.cost}`);
    }
    lines.push(
      `${this.label('Iterations:')}  ${status.num_outer_iterations} outer / ${status.num_inner_iterations} inner`
    );
    lines.push(`${this.label('FPR norm:')}    ${status.last_problem_norm_fpr}`);
    if (status.f1_infeasibility !== undefined || status.f2_norm !== undefined) {
      lines.push(
        `${this.label('Infeasibility:')} f1=${status.f1_infeasibility ?? '-'} f2=${status.f2_norm ?? '-'}`
      );
    }
    if (status.penalty !== undefined) {
      lines.push(`${this.label('Penalty:')}     ${status.penalty}`);
    }
    if (status.lagrange_multipliers && status.lagrange_multipliers.length > 0) {
      lines.push(`${this.label('Multipliers:')} ${formatVector(status.lagrange_multipliers)}`);
    }
    lines.push(`${this.label('Solve time:')}  ${status.solve_time_ms.toFixed(3)} ms`);

    return lines.join('\n');
  }

  /**
   * Format the reply to a `call`.
   */
  formatResponse(response: SolverResponse): string {
    if (response.isOk()) {
      return this.formatStatus(response.status());
    }
    const error = response.error();
    return this.color(pc.red, `Solver error ${error.code}: ${error.message}`);
  }

  formatAck(ack: JsonValue): string {
    return `${this.color(pc.green, 'Server is up')} ${this.color(pc.dim, JSON.stringify(ack))}`;
  }

  formatDetails(details: ConnectionDetails): string {
    const lines = [`${this.label('Endpoint:')}    ${details.host}:${details.port}`];

    if (details.source.kind === 'local') {
      lines.push(`${this.label('Path:')}        ${details.source.path}`);
    } else {
      lines.push(`${this.label('Source:')}      remote`);
    }
    if (details.build) {
      lines.push(`${this.label('Optimizer:')}   ${details.build.componentName}`);
      lines.push(`${this.label('Build mode:')}  ${details.build.buildMode}`);
      lines.push(`${this.label('Version:')}     ${details.build.versionTag}`);
    }

    return lines.join('\n');
  }

  /**
   * Format an error for output.
   */
  formatError(error: Error): string {
    const lines: string[] = [];

    lines.push(this.color(pc.red, this.color(pc.bold, 'Error:')));
    lines.push(this.color(pc.red, error.message || 'Unknown error'));

    return lines.join('\n');
  }

  /**
   * Format a progress message.
   */
  formatProgress(message: string): string {
    return `${this.color(pc.cyan, '...')} ${message}`;
  }
}
