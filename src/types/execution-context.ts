/**
 * Execution Context Types
 */

import type { OutputPort } from '../core/ports/output.js';
import type { DiagnosticsPort } from '../core/ports/diagnostics.js';
import type { CommandRunner } from '../utils/command-runner.js';

/**
 * ExecutionContext - what a command needs beyond its own options.
 *
 * Carries the project root plus the ports core logic talks through, so the
 * same pipelines can be driven by the CLI, by CI, or by tests with fakes.
 */
export interface ExecutionContext {
  /**
   * Absolute path of the tools repository root: where config/ and
   * components/ live. Defaults to process.cwd(), overridden by --cwd.
   */
  projectRoot: string;

  /** Indicates an interactive (TTY) session. */
  interactive?: boolean;

  /**
   * Output port for all user-facing messages.
   * Defaults to consoleOutput when not provided.
   */
  output?: OutputPort;

  /**
   * Sink for non-fatal warnings. Defaults to loggerDiagnostics.
   */
  diagnostics?: DiagnosticsPort;

  /**
   * Runs external commands (git, make, go). Defaults to execFileRunner.
   */
  runner?: CommandRunner;
}

export interface ExecutionOptions {
  cwd?: string;
  interactive?: boolean;
}
