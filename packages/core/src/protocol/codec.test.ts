/**
 * @fileoverview Tests for the wire protocol codec.
 */

import { describe, it, expect } from 'vitest';
import {
  encodePing,
  encodeKill,
  encodeRun,
  decodeDocument,
  decodePing,
  decodeRun,
  formatFloat,
} from './codec.js';
import { ProtocolError, UsageError } from '../errors.js';
import { SolverResponse } from './response.js';
import type { TransactionResult } from '../types/index.js';

function resultOf(text: string, truncated = false, rounds = 1): TransactionResult {
  return { data: Buffer.from(text, 'utf-8'), rounds, truncated };
}

describe('Protocol Codec', () => {
  describe('formatFloat', () => {
    it('renders integral values with a decimal point', () => {
      expect(formatFloat(1)).toBe('1.0');
      expect(formatFloat(-3)).toBe('-3.0');
      expect(formatFloat(0)).toBe('0.0');
    });

    it('renders fractional values as-is', () => {
      expect(formatFloat(2.5)).toBe('2.5');
      expect(formatFloat(-0.125)).toBe('-0.125');
    });

    it('keeps the sign of negative zero', () => {
      expect(formatFloat(-0)).toBe('-0.0');
      expect(encodeRun({ parameters: [-0, 0] })).toBe('{"Run":{"parameter":[-0.0,0.0]}}');
    });

    it('keeps exponent notation', () => {
      expect(formatFloat(1e-7)).toBe('1e-7');
      expect(formatFloat(1e21)).toBe('1e+21');
    });

    it('rejects non-finite values', () => {
      expect(() => formatFloat(Number.NaN)).toThrow(UsageError);
      expect(() => formatFloat(Number.POSITIVE_INFINITY)).toThrow('Cannot encode non-finite value: Infinity');
    });
  });

  describe('signals', () => {
    it('encodes ping and kill', () => {
      expect(encodePing()).toBe('{"Ping":1}');
      expect(encodeKill()).toBe('{"Kill":1}');
    });
  });

  describe('encodeRun', () => {
    it('encodes parameters only', () => {
      expect(encodeRun({ parameters: [1, 2.5, -3] })).toBe('{"Run":{"parameter":[1.0,2.5,-3.0]}}');
    });

    it('appends optional fields in fixed order', () => {
      const payload = encodeRun({
        parameters: [1],
        initialPenalty: 10,
        initialMultipliers: [0.5],
        initialGuess: [0, 0],
      });

      expect(payload).toBe(
        '{"Run":{"parameter":[1.0],"initial_guess":[0.0,0.0],' +
          '"initial_lagrange_multipliers":[0.5],"initial_penalty":10.0}}'
      );
    });

    it('omits fields that are not supplied', () => {
      const payload = encodeRun({ parameters: [1], initialPenalty: 2.5 });

      expect(payload).toBe('{"Run":{"parameter":[1.0],"initial_penalty":2.5}}');
    });

    it('produces valid JSON', () => {
      const payload = encodeRun({ parameters: [0.1, 0.2], initialGuess: [1e-9] });

      expect(JSON.parse(payload)).toEqual({
        Run: { parameter: [0.1, 0.2], initial_guess: [1e-9] },
      });
    });

    it('rejects empty parameters', () => {
      expect(() => encodeRun({ parameters: [] })).toThrow('parameters must not be empty');
    });

    it('names the vector holding a non-finite value', () => {
      expect(() => encodeRun({ parameters: [1], initialGuess: [Number.NaN] })).toThrow(
        'initialGuess: Cannot encode non-finite value: NaN'
      );
    });
  });

  describe('decoding', () => {
    it('returns the ping acknowledgement document', () => {
      expect(decodePing(resultOf('{"Pong":1}'))).toEqual({ Pong: 1 });
    });

    it('wraps run replies in a SolverResponse', () => {
      const response = decodeRun(resultOf('{"type":"Error","code":3003,"message":"wrong size"}'));

      expect(response).toBeInstanceOf(SolverResponse);
      expect(response.isOk()).toBe(false);
    });

    it('throws ProtocolError on malformed input', () => {
      expect(() => decodeDocument(resultOf('{"Pong":'))).toThrow(ProtocolError);
    });

    it('throws ProtocolError on an empty reply', () => {
      expect(() => decodeDocument(resultOf(''))).toThrow(/received 0 bytes/);
    });

    it('reports truncation', () => {
      try {
        decodeDocument(resultOf('{"solution":[1.0,', true, 4));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ProtocolError);
        if (error instanceof ProtocolError) {
          expect(error.truncated).toBe(true);
          expect(error.message).toContain('response truncated after 4 read rounds (17 bytes)');
        }
      }
    });
  });
});
