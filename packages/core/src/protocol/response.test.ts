import { describe, it, expect } from 'vitest';
import { SolverResponse } from './response.js';
import { ProtocolError } from '../errors.js';

const STATUS = {
  exit_status: 'Converged',
  num_outer_iterations: 3,
  num_inner_iterations: 41,
  last_problem_norm_fpr: 8.2e-6,
  f1_infeasibility: 0.0,
  f2_norm: 0.0,
  solve_time_ms: 1.25,
  penalty: 10.0,
  solution: [0.5, -1.5],
  lagrange_multipliers: [],
  cost: 0.75,
};

describe('SolverResponse', () => {
  it('exposes a solver status', () => {
    const response = new SolverResponse(STATUS);

    expect(response.isOk()).toBe(true);
    expect(response.status().solution).toEqual([0.5, -1.5]);
    expect(response.status().num_inner_iterations).toBe(41);
    expect(response.get()).toEqual(STATUS);
  });

  it('exposes a solver error', () => {
    const response = new SolverResponse({ type: 'Error', code: 3003, message: 'wrong number of parameters' });

    expect(response.isOk()).toBe(false);
    expect(response.error()).toEqual({ type: 'Error', code: 3003, message: 'wrong number of parameters' });
    expect(response.get()).toEqual(response.error());
  });

  it('keeps the raw document', () => {
    const raw = { ...STATUS, extra: 'kept' };

    expect(new SolverResponse(raw).raw).toBe(raw);
  });

  it('accepts a status without optional fields', () => {
    const { f1_infeasibility: _f1, f2_norm: _f2, penalty: _p, lagrange_multipliers: _y, cost: _c, ...minimal } = STATUS;

    expect(new SolverResponse(minimal).status().exit_status).toBe('Converged');
  });

  it('throws ProtocolError on a malformed status', () => {
    const response = new SolverResponse({ exit_status: 'Converged' });

    expect(() => response.status()).toThrow(ProtocolError);
    expect(() => response.status()).toThrow(/Malformed solver status/);
  });

  it('refuses a status view of an error response', () => {
    const response = new SolverResponse({ type: 'Error', code: 2000, message: 'bad request' });

    expect(() => response.status()).toThrow('Response is an error, not a solver status');
  });

  it('refuses an error view of a status response', () => {
    expect(() => new SolverResponse(STATUS).error()).toThrow('Response is not a solver error');
  });

  it('treats a non-object document as not an error', () => {
    const response = new SolverResponse([1, 2]);

    expect(response.isOk()).toBe(true);
    expect(() => response.status()).toThrow(ProtocolError);
  });
});
