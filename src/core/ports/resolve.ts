/**
 * Port Resolution Helpers
 *
 * Resolve ports from an ExecutionContext, falling back to safe defaults
 * when they are not explicitly provided.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';
import type { CommandRunner } from '../../utils/command-runner.js';
import { execFileRunner } from '../../utils/command-runner.js';

/**
 * Resolve the OutputPort from an ExecutionContext.
 * Falls back to consoleOutput (plain console.log) if not provided.
 */
export function resolveOutput(ctx?: ExecutionContext | { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/**
 * Resolve the CommandRunner from an ExecutionContext.
 * Falls back to the child_process-backed runner.
 */
export function resolveRunner(ctx?: ExecutionContext | { runner?: CommandRunner }): CommandRunner {
  return ctx?.runner ?? execFileRunner;
}
