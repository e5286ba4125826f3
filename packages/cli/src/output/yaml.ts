/**
 * YAML formatter for human-readable structured CLI output.
 *
 * @module output/yaml
 */

import { stringify } from 'yaml';
import type { ConnectionDetails, JsonValue, SolverResponse } from '@optcp/core';
import type { Formatter } from './formatter.js';
import { serializeError } from './json.js';

/**
 * Options for YamlFormatter.
 */
export interface YamlFormatterOptions {
  /** Indentation spaces (default: 2) */
  indent?: number;
}

/**
 * YAML formatter for human-readable structured output.
 */
export class YamlFormatter implements Formatter {
  private readonly indent: number;

  constructor(options: YamlFormatterOptions = {}) {
    this.indent = options.indent ?? 2;
  }

  formatResponse(response: SolverResponse): string {
    return stringify(response.raw, { indent: this.indent });
  }

  formatAck(ack: JsonValue): string {
    return stringify(ack, { indent: this.indent });
  }

  formatDetails(details: ConnectionDetails): string {
    return stringify(details, { indent: this.indent });
  }

  formatError(error: Error): string {
    return stringify({ error: serializeError(error) }, { indent: this.indent });
  }

  formatProgress(message: string): string {
    return stringify({ progress: message }, { indent: this.indent });
  }
}
