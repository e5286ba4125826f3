/**
 * @fileoverview Launch of a locally generated optimizer server.
 *
 * The server is a cargo project in `<optimizer path>/tcp_iface_<name>`. The
 * supervisor spawns it and reports whether the spawn itself succeeded; it
 * never signals the child. The server is stopped by a `Kill` request.
 *
 * @module @optcp/core/process/supervisor
 */

import { spawn, type ChildProcess, type StdioOptions } from 'node:child_process';
import { join } from 'node:path';
import { LaunchError, UsageError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { ConnectionDetails, ServerBuildInfo } from '../types/index.js';

/**
 * Prefix of the server's directory inside the optimizer directory.
 */
export const TCP_IFACE_PREFIX = 'tcp_iface';

/**
 * Executable and arguments used to start the server.
 */
export interface LaunchCommand {
  command: string;
  args: string[];
}

/**
 * Builds the launch command from the server's build metadata.
 */
export type LaunchCommandBuilder = (build: ServerBuildInfo) => LaunchCommand;

/**
 * `cargo run -q`, with `--release` for release builds.
 */
export const cargoLaunchCommand: LaunchCommandBuilder = (build) => ({
  command: 'cargo',
  args: build.buildMode === 'release' ? ['run', '-q', '--release'] : ['run', '-q'],
});

/**
 * Process supervisor configuration options.
 */
export interface ProcessSupervisorOptions {
  /** Launch command builder (default: {@link cargoLaunchCommand}) */
  commandBuilder?: LaunchCommandBuilder;
  /**
   * Run the server in its own process group with stdio ignored and let the
   * caller exit without waiting for it (default: false)
   */
  detached?: boolean;
  /** Child stdio when not detached (default: 'inherit') */
  stdio?: StdioOptions;
}

/**
 * A spawned server process.
 */
export interface LaunchHandle {
  readonly child: ChildProcess;
  readonly command: LaunchCommand;
  readonly cwd: string;
  /** Settles once the spawn succeeded or failed */
  readonly spawned: Promise<void>;
  /** Exit code, or null when the child was terminated by a signal */
  readonly exited: Promise<number | null>;
}

/**
 * Directory the server is launched in.
 */
export function serverDirectory(optimizerPath: string, build: ServerBuildInfo): string {
  return join(optimizerPath, `${TCP_IFACE_PREFIX}_${build.componentName}`);
}

/**
 * Spawns optimizer servers.
 *
 * @example
 * ```typescript
 * const supervisor = new ProcessSupervisor();
 * const handle = supervisor.launch(details);
 * await handle.spawned;
 * ```
 */
export class ProcessSupervisor {
  private readonly commandBuilder: LaunchCommandBuilder;
  private readonly detached: boolean;
  private readonly stdio: StdioOptions;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.commandBuilder = options.commandBuilder ?? cargoLaunchCommand;
    this.detached = options.detached ?? false;
    this.stdio = options.stdio ?? 'inherit';
  }

  /**
   * Spawn the server described by `details`. Returns without waiting for
   * the spawn; join `handle.spawned` for that.
   *
   * @throws {UsageError} If the details do not come from a local descriptor
   */
  launch(details: ConnectionDetails): LaunchHandle {
    if (details.source.kind !== 'local' || details.build === undefined) {
      throw new UsageError('no local launch configuration');
    }

    const command = this.commandBuilder(details.build);
    const cwd = serverDirectory(details.source.path, details.build);
    const commandLine = [command.command, ...command.args].join(' ');

    logger.info(`Starting TCP/IP server at ${details.host}:${details.port}`);
    logger.debug(`Launching '${commandLine}' in ${cwd}`);

    const child = spawn(command.command, command.args, {
      cwd,
      detached: this.detached,
      stdio: this.detached ? 'ignore' : this.stdio,
    });

    const spawned = new Promise<void>((resolve, reject) => {
      child.once('spawn', () => {
        logger.debug(`Server process started (PID: ${child.pid})`);
        if (this.detached) {
          child.unref();
        }
        resolve();
      });
      child.once('error', (err) => {
        reject(
          new LaunchError(`Failed to launch '${commandLine}' in ${cwd}: ${err.message}`, commandLine, cwd, {
            cause: err,
          })
        );
      });
    });

    const exited = new Promise<number | null>((resolve) => {
      child.once('exit', (code) => {
        logger.debug(`Server process exited with code ${code}`);
        resolve(code);
      });
      // A child that never spawned never exits
      child.once('error', () => resolve(null));
    });

    return { child, command, cwd, spawned, exited };
  }
}
