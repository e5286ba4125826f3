/**
 * @fileoverview Tests for the JSON formatter.
 */

import { describe, it, expect } from 'vitest';
import { UsageError } from '@optcp/core';
import { JsonFormatter, serializeError } from './json.js';
import {
  CONVERGED_STATUS,
  SOLVER_ERROR,
  createErrorResponse,
  createStatusResponse,
  LOCAL_DETAILS,
} from '../../test/fixtures/output-test-fixtures.js';

describe('JsonFormatter', () => {
  it('prints the status document as the server sent it', () => {
    const formatter = new JsonFormatter();

    const output = formatter.formatResponse(createStatusResponse());

    expect(JSON.parse(output)).toEqual(CONVERGED_STATUS);
    expect(output).toBe(JSON.stringify(CONVERGED_STATUS, null, 2));
  });

  it('prints solver error documents', () => {
    const formatter = new JsonFormatter();

    expect(JSON.parse(formatter.formatResponse(createErrorResponse()))).toEqual(SOLVER_ERROR);
  });

  it('prints compact output with indent 0', () => {
    const formatter = new JsonFormatter({ indent: 0 });

    expect(formatter.formatAck({ Pong: 1 })).toBe('{"Pong":1}');
  });

  it('prints connection details', () => {
    const formatter = new JsonFormatter();

    expect(JSON.parse(formatter.formatDetails(LOCAL_DETAILS))).toEqual(LOCAL_DETAILS);
  });

  it('wraps errors with their name and code', () => {
    const formatter = new JsonFormatter({ indent: 0 });

    expect(formatter.formatError(new UsageError('parameters must not be empty'))).toBe(
      '{"error":{"name":"UsageError","message":"parameters must not be empty","code":"USAGE"}}'
    );
  });

  it('wraps progress messages', () => {
    const formatter = new JsonFormatter({ indent: 0 });

    expect(formatter.formatProgress('Starting')).toBe('{"progress":"Starting"}');
  });
});

describe('serializeError', () => {
  it('leaves out the code of plain errors', () => {
    expect(serializeError(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
  });
});
