import { WarningCodes } from '../../types/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { CommandRunner } from '../../utils/command-runner.js';
import { type DiagnosticsPort, loggerDiagnostics } from '../ports/diagnostics.js';

export interface AddGoDependenciesOptions {
  /** collector/ inside the upstream clone (holds go.mod). */
  collectorDir: string;
  modules: readonly string[];
  upstreamVersion: string;
  runner: CommandRunner;
  diagnostics?: DiagnosticsPort;
}

export interface AddGoDependenciesResult {
  /** `module@version` entries that were required successfully. */
  added: string[];
  failed: string[];
  tidied: boolean;
}

/**
 * Go module versions carry a leading `v`.
 */
export function toModuleVersion(version: string): string {
  return version.startsWith('v') ? version : `v${version}`;
}

/**
 * Require each module at the upstream version with `go mod edit`, then run
 * `go mod tidy` once if anything was added. Individual failures are reported
 * and counted; the build carries on and may still succeed.
 */
export async function addGoDependencies(options: AddGoDependenciesOptions): Promise<AddGoDependenciesResult> {
  const { collectorDir, modules, upstreamVersion, runner } = options;
  const diagnostics = options.diagnostics ?? loggerDiagnostics;
  const result: AddGoDependenciesResult = { added: [], failed: [], tidied: false };

  if (modules.length === 0) {
    logger.debug('No custom component dependencies required');
    return result;
  }

  const versionTag = toModuleVersion(upstreamVersion);

  for (const modulePath of modules) {
    const versioned = `${modulePath}@${versionTag}`;
    try {
      await runner.run('go', ['mod', 'edit', `-require=${versioned}`], { cwd: collectorDir });
      result.added.push(versioned);
    } catch (error) {
      diagnostics.warn(
        WarningCodes.DEPENDENCY_NOT_ADDED,
        `Failed to add dependency ${versioned}: ${getErrorMessage(error)}`,
        { module: versioned }
      );
      result.failed.push(versioned);
    }
  }

  if (result.added.length === 0) {
    logger.debug("No dependencies were added; skipping 'go mod tidy'");
    return result;
  }

  try {
    await runner.run('go', ['mod', 'tidy'], { cwd: collectorDir });
    result.tidied = true;
  } catch (error) {
    diagnostics.warn(
      WarningCodes.DEPENDENCY_NOT_ADDED,
      `Failed running 'go mod tidy': ${getErrorMessage(error)}`,
      { collectorDir }
    );
  }

  return result;
}
