import { Command, Option } from 'commander';

import { ARCHITECTURES, BUILD_DEFAULTS, ENV_VARS } from '../constants/index.js';
import { createCommandContext } from '../cli/context.js';
import { runBuildPipeline } from '../core/build/build-pipeline.js';
import { BUILD_STEPS, type BuildOptions, type BuildStepName, isBuildStepName } from '../core/build/build-types.js';
import { parseBuildTagsString } from '../core/distributions/build-tags.js';
import { isArchitecture } from '../core/matrices/matrix-builder.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatFileSize, formatPathForDisplay, formatPropertyList } from '../utils/formatters.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface BuildCommandOptions {
  distribution: string;
  architecture: string;
  upstreamRepo: string;
  upstreamRef: string;
  outputDir?: string;
  upstreamVersion?: string;
  buildTags?: string;
  configFile?: string;
  keepTemp?: boolean;
}

function nonEmptyEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function resolveInjectedStep(): BuildStepName | undefined {
  const value = nonEmptyEnv(ENV_VARS.INJECT_ERROR);
  if (value === undefined) {
    return undefined;
  }
  if (!isBuildStepName(value)) {
    throw new ValidationError(`${ENV_VARS.INJECT_ERROR} must name a build step (${BUILD_STEPS.join(', ')}), got '${value}'`);
  }
  return value;
}

/**
 * Translate CLI flags (with their environment fallbacks) into pipeline options.
 */
export function toBuildOptions(options: BuildCommandOptions): BuildOptions {
  if (!isArchitecture(options.architecture)) {
    throw new ValidationError(`Unsupported architecture '${options.architecture}'. Expected one of: ${ARCHITECTURES.join(', ')}`);
  }

  const buildOptions: BuildOptions = {
    distribution: options.distribution,
    architecture: options.architecture,
    upstreamRepo: options.upstreamRepo,
    upstreamRef: options.upstreamRef,
    keepTemp: options.keepTemp === true
  };

  if (options.outputDir) buildOptions.outputDir = options.outputDir;
  if (options.configFile) buildOptions.configFile = options.configFile;

  const upstreamVersion = options.upstreamVersion ?? nonEmptyEnv(ENV_VARS.UPSTREAM_VERSION);
  if (upstreamVersion) buildOptions.upstreamVersion = upstreamVersion;

  const buildTags = options.buildTags ?? nonEmptyEnv(ENV_VARS.BUILD_TAGS);
  if (buildTags !== undefined) {
    buildOptions.buildTags = parseBuildTagsString(buildTags);
  }

  const injectErrorAt = resolveInjectedStep();
  if (injectErrorAt) buildOptions.injectErrorAt = injectErrorAt;

  return buildOptions;
}

async function buildCommand(options: BuildCommandOptions, command: Command): Promise<void> {
  const ctx = createCommandContext(command);
  const out = resolveOutput(ctx);
  const buildOptions = toBuildOptions(options);

  logger.debug('Build options', buildOptions);
  out.info(`Building distribution '${buildOptions.distribution}' for ${buildOptions.architecture}`);

  const result = await runBuildPipeline(buildOptions, ctx);

  const summary: Record<string, string> = {
    Distribution: result.distribution,
    Architecture: result.architecture,
    'Upstream version': result.upstreamVersion,
    'Build tags': result.buildTags.join(',') || '[none]',
    Components: result.includedComponents.join(', ') || '[none]',
    Layer: `${formatPathForDisplay(result.layerFile, ctx.projectRoot)} (${formatFileSize(result.layerFileSize)})`
  };
  if (result.configFile) {
    summary['Collector config'] = result.configFile;
  }
  if (result.tempDir) {
    summary['Temporary directory'] = result.tempDir;
  }
  out.note(formatPropertyList(summary), 'Build complete');
}

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build a custom collector layer zip for a distribution')
    .option('-d, --distribution <name>', 'distribution to build', BUILD_DEFAULTS.DISTRIBUTION)
    .addOption(
      new Option('-a, --architecture <arch>', 'target architecture')
        .choices(ARCHITECTURES)
        .default(BUILD_DEFAULTS.ARCHITECTURE)
    )
    .option('-r, --upstream-repo <owner/name>', 'upstream repository on GitHub', BUILD_DEFAULTS.UPSTREAM_REPO)
    .option('-b, --upstream-ref <ref>', 'upstream branch or tag', BUILD_DEFAULTS.UPSTREAM_REF)
    .option('-o, --output-dir <dir>', 'directory for the finished layer (default: build)')
    .option('-v, --upstream-version <version>', `collector version for added modules (env: ${ENV_VARS.UPSTREAM_VERSION})`)
    .option('-t, --build-tags <tags>', `comma-separated build tags, overrides the distribution (env: ${ENV_VARS.BUILD_TAGS})`)
    .option('--config-file <file>', 'collector config from config/collector-configs to bundle')
    .option('-k, --keep-temp', 'keep the temporary upstream clone')
    .action(withErrorHandling(async (options: BuildCommandOptions, command: Command) => {
      await buildCommand(options, command);
    }));
}
