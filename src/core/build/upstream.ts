import { join } from 'path';

import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import type { Architecture } from '../../types/index.js';
import type { CommandRunner } from '../../utils/command-runner.js';
import { ValidationError } from '../../utils/errors.js';
import { isFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface CloneUpstreamOptions {
  /** `owner/name` on GitHub. */
  repo: string;
  /** Branch or tag. */
  ref: string;
  targetDir: string;
  runner: CommandRunner;
}

export function upstreamRepoUrl(repo: string): string {
  return `https://github.com/${repo}.git`;
}

/**
 * Shallow-clone the upstream repository at `ref` into `targetDir`.
 */
export async function cloneUpstream(options: CloneUpstreamOptions): Promise<void> {
  const { repo, ref, targetDir, runner } = options;
  const url = upstreamRepoUrl(repo);
  await runner.run('git', ['clone', '--depth', '1', '--branch', ref, url, targetDir]);
  logger.debug(`Cloned ${url}#${ref} to ${targetDir}`);
}

/**
 * Ask the upstream Makefile for the collector version it builds
 * (`make set-otelcol-version` writes collector/VERSION) and read it back.
 */
export async function determineUpstreamVersion(upstreamDir: string, runner: CommandRunner): Promise<string> {
  const collectorDir = join(upstreamDir, DIR_PATTERNS.COLLECTOR);
  const makefile = join(collectorDir, FILE_PATTERNS.MAKEFILE);
  const versionFile = join(collectorDir, FILE_PATTERNS.VERSION);

  if (!(await isFile(makefile))) {
    throw new ValidationError(`Makefile not found: ${makefile}`);
  }

  await runner.run('make', ['set-otelcol-version'], { cwd: collectorDir });

  if (!(await isFile(versionFile))) {
    throw new ValidationError(`VERSION file not created: ${versionFile}`);
  }

  const version = (await readTextFile(versionFile)).trim();
  if (!version) {
    throw new ValidationError(`VERSION file is empty: ${versionFile}`);
  }
  return version;
}

/**
 * Name of the zip `make package` produces.
 */
export function upstreamLayerFileName(architecture: Architecture): string {
  return `opentelemetry-collector-layer-${architecture}.zip`;
}

/**
 * Name the layer is published under; always carries the distribution.
 */
export function layerFileName(architecture: Architecture, distribution: string): string {
  return `collector-${architecture}-${distribution}.zip`;
}
