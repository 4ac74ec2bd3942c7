import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { CommandError } from './errors.js';

const execFileAsync = promisify(execFile);

// make package output can be large
const MAX_BUFFER = 64 * 1024 * 1024;

export interface RunCommandOptions {
  cwd?: string;
  /** Added on top of the current process environment. */
  env?: Record<string, string>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs external tools (git, make, go). Rejects with CommandError on a
 * non-zero exit or when the tool cannot be started.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunCommandOptions): Promise<CommandOutput>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

function describeFailure(error: unknown): { exitCode: number | null; stderr: string } {
  if (error !== null && typeof error === 'object') {
    const exitCode = 'code' in error && typeof error.code === 'number' ? error.code : null;
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
    const fallback = error instanceof Error ? error.message : '';
    return { exitCode, stderr: stderr.trim() ? stderr : fallback };
  }
  return { exitCode: null, stderr: String(error) };
}

export const execFileRunner: CommandRunner = {
  async run(command, args, options = {}) {
    const display = formatCommand(command, args);
    logger.debug(`Running: ${display}`, options.cwd ? { cwd: options.cwd } : undefined);
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8'
      });
      return { stdout, stderr };
    } catch (error) {
      const { exitCode, stderr } = describeFailure(error);
      throw new CommandError(display, exitCode, stderr);
    }
  }
};
