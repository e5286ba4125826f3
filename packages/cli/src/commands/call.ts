/**
 * @fileoverview Call command for the optcp CLI.
 *
 * Sends one parameter vector to an optimizer server and prints the solution.
 *
 * @module commands/call
 */

import { Command, InvalidArgumentError } from 'commander';
import { createFormatter } from '../output/index.js';
import {
  addTargetOptions,
  createClient,
  parseInteger,
  parseVector,
  resolveSettings,
  type TargetOptions,
} from './options.js';
import { reportError } from './server.js';

/**
 * Options for the call command.
 */
interface CallCommandOptions extends TargetOptions {
  guess?: number[];
  multipliers?: number[];
  penalty?: number;
  bufferLength?: number;
  maxDataSize?: number;
}

function parsePenalty(value: string): number {
  const [penalty, ...rest] = parseVector(value);
  if (penalty === undefined || rest.length > 0) {
    throw new InvalidArgumentError(`Expected a single number: ${value}`);
  }
  return penalty;
}

/**
 * Create the call command.
 *
 * @returns Command instance for calling an optimizer
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createCallCommand());
 * program.parse(['call', '1.0,2.0', '--path', 'python_build/rosenbrock']);
 * ```
 */
export function createCallCommand(): Command {
  return addTargetOptions(
    new Command('call')
      .description(
        'Call an optimizer server\n\n' +
          'Solves the parametric problem for the given parameter vector.\n\n' +
          'Examples:\n' +
          '  $ optcp call 1.0,2.0 --path python_build/rosenbrock\n' +
          '  $ optcp call 1.0,2.0 --guess 0.5,0.5,0.5 --penalty 1000\n' +
          '  $ optcp call 1.0,2.0 --host 10.0.0.5 --port 3301 --format json'
      )
      .argument('<parameters>', 'Comma-separated parameter vector', parseVector)
      .option('-g, --guess <values>', 'Initial guess (comma-separated)', parseVector)
      .option('-y, --multipliers <values>', 'Initial Lagrange multipliers (comma-separated)', parseVector)
      .option('--penalty <value>', 'Initial penalty parameter', parsePenalty)
      .option('--buffer-length <bytes>', 'Read buffer length (default: 4096)', parseInteger)
      .option('--max-data-size <bytes>', 'Largest expected response (default: 1048576)', parseInteger)
  ).action(async (parameters: number[], options: CallCommandOptions) => {
    let format = options.format;
    try {
      const config = await resolveSettings(options);
      format = config.output.format;
      const client = createClient(config);
      const formatter = createFormatter(format);

      const response = await client.call(parameters, {
        initialGuess: options.guess,
        initialY: options.multipliers,
        initialPenalty: options.penalty,
        bufferLength: options.bufferLength ?? config.bufferLength,
        maxDataSize: options.maxDataSize ?? config.maxDataSize,
      });

      console.log(formatter.formatResponse(response));
      process.exit(response.isOk() ? 0 : 1);
    } catch (error) {
      reportError(error, format);
    }
  });
}
