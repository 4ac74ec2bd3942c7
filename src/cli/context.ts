/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 * Command handlers use this so output, diagnostics and the command runner
 * are wired the same way for every command.
 */

import { resolve } from 'path';
import type { Command } from 'commander';

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createOutputDiagnostics } from '../core/ports/diagnostics.js';
import type { OutputPort } from '../core/ports/output.js';
import { execFileRunner } from '../utils/command-runner.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext for a CLI command.
 *
 * In interactive mode (TTY): Clack output. In CI or piped mode: plain
 * console output, so build logs read line by line.
 */
export function createCliExecutionContext(options: CliContextOptions = {}): ExecutionContext {
  const interactive = detectInteractive(options.interactive);
  const output = getCliOutput(interactive);

  return {
    projectRoot: resolve(process.cwd(), options.cwd ?? '.'),
    interactive,
    output,
    diagnostics: createOutputDiagnostics(output),
    runner: execFileRunner,
  };
}

type GlobalOptions = {
  cwd?: string;
};

/**
 * Context for a subcommand action, honoring the global --cwd option.
 */
export function createCommandContext(command: Command): ExecutionContext {
  const { cwd } = command.optsWithGlobals<GlobalOptions>();
  return createCliExecutionContext({ cwd });
}
