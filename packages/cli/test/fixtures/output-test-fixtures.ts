/**
 * Shared test fixtures for output formatter tests.
 */
import { SolverResponse, type ConnectionDetails } from '@optcp/core';

/**
 * Status document of a converged solve.
 */
export const CONVERGED_STATUS = {
  exit_status: 'Converged',
  num_outer_iterations: 2,
  num_inner_iterations: 35,
  last_problem_norm_fpr: 0.001,
  solve_time_ms: 0.5,
  solution: [1, 2],
  cost: 3,
};

/**
 * Error document for a wrong parameter count.
 */
export const SOLVER_ERROR = {
  type: 'Error',
  code: 3003,
  message: 'wrong number of parameters',
};

export function createStatusResponse(overrides: Record<string, number | string | number[] | null> = {}): SolverResponse {
  return new SolverResponse({ ...CONVERGED_STATUS, ...overrides });
}

export function createErrorResponse(): SolverResponse {
  return new SolverResponse({ ...SOLVER_ERROR });
}

export const LOCAL_DETAILS: ConnectionDetails = {
  host: '127.0.0.1',
  port: 8080,
  source: { kind: 'local', path: '/opt/optimizers/foo' },
  build: { componentName: 'foo', buildMode: 'debug', versionTag: '0.9.4' },
};

export const REMOTE_DETAILS: ConnectionDetails = {
  host: '10.0.0.5',
  port: 3301,
  source: { kind: 'remote' },
};
