/**
 * @fileoverview Tests for the YAML formatter.
 */

import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { PortUnavailableError } from '@optcp/core';
import { YamlFormatter } from './yaml.js';
import {
  createErrorResponse,
  createStatusResponse,
  CONVERGED_STATUS,
  LOCAL_DETAILS,
} from '../../test/fixtures/output-test-fixtures.js';

describe('YamlFormatter', () => {
  const formatter = new YamlFormatter();

  it('prints solver errors as YAML', () => {
    expect(formatter.formatResponse(createErrorResponse())).toBe(
      'type: Error\ncode: 3003\nmessage: wrong number of parameters\n'
    );
  });

  it('prints the status document', () => {
    expect(parse(formatter.formatResponse(createStatusResponse()))).toEqual(CONVERGED_STATUS);
  });

  it('prints acknowledgements', () => {
    expect(formatter.formatAck({ Pong: 1 })).toBe('Pong: 1\n');
  });

  it('prints nested connection details', () => {
    const output = formatter.formatDetails(LOCAL_DETAILS);

    expect(output).toContain('source:\n  kind: local\n');
    expect(parse(output)).toEqual(LOCAL_DETAILS);
  });

  it('prints errors under an error key', () => {
    expect(formatter.formatError(new PortUnavailableError(8080))).toBe(
      'error:\n  name: PortUnavailableError\n  message: Port 8080 not available\n  code: PORT_UNAVAILABLE\n'
    );
  });

  it('prints progress messages', () => {
    expect(formatter.formatProgress('Starting')).toBe('progress: Starting\n');
  });
});
