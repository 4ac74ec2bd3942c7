import { tmpdir } from 'os';
import { join, resolve } from 'path';

import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import type { DependencyMapping } from '../../types/distribution.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { WarningCodes } from '../../types/index.js';
import { getErrorMessage, ValidationError } from '../../utils/errors.js';
import {
  copyFile,
  ensureDir,
  getStats,
  isDirectory,
  isFile,
  listFiles,
  makeTempDir,
  remove,
  renameFile
} from '../../utils/fs.js';
import { formatCount, formatFileSize, formatPathForDisplay } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import { collectModules, resolveComponentsByTags } from '../components/component-selector.js';
import { loadComponentDependencies } from '../components/dependency-loader.js';
import { addGoDependencies } from '../components/go-dependencies.js';
import { applyOverlay, planOverlay } from '../components/overlay.js';
import { formatBuildTagsString, resolveBuildTags } from '../distributions/build-tags.js';
import { loadDistributions } from '../distributions/distribution-loader.js';
import { resolveDiagnostics } from '../ports/diagnostics.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput, resolveRunner } from '../ports/resolve.js';
import { type ProjectPaths, resolveProjectPaths } from '../project-paths.js';
import { BuildStepError } from './build-errors.js';
import { BUILD_STEP_TITLES, type BuildOptions, type BuildResult, type BuildStepName } from './build-types.js';
import {
  cloneUpstream,
  determineUpstreamVersion,
  layerFileName,
  upstreamLayerFileName,
  upstreamRepoUrl
} from './upstream.js';

interface BuildSelection {
  buildTags: string[];
  configFile?: string;
}

/**
 * Tags come from --build-tags when given, otherwise from the distribution's
 * resolved inheritance chain. The distribution's config-file applies unless
 * --config-file overrides it.
 */
async function resolveBuildSelection(options: BuildOptions, paths: ProjectPaths): Promise<BuildSelection> {
  if (options.buildTags) {
    return {
      buildTags: [...new Set(options.buildTags.filter(Boolean))],
      configFile: options.configFile
    };
  }

  const table = await loadDistributions(paths.distributionsFile);
  const buildTags = resolveBuildTags(options.distribution, table);
  return {
    buildTags,
    configFile: options.configFile ?? table[options.distribution].configFile
  };
}

/**
 * Build a custom collector layer:
 * clone upstream, overlay the selected components, add their Go modules,
 * run `make package` and copy the renamed zip to the output directory.
 *
 * The component selection is computed once and drives both the overlay and
 * the dependency injection, so files and modules always agree.
 */
export async function runBuildPipeline(options: BuildOptions, ctx: ExecutionContext): Promise<BuildResult> {
  const out = resolveOutput(ctx);
  const diagnostics = resolveDiagnostics(ctx);
  const runner = resolveRunner(ctx);
  const paths = resolveProjectPaths(ctx.projectRoot);
  const outputDir = resolve(paths.root, options.outputDir ?? DIR_PATTERNS.BUILD);

  const runStep = async <T>(step: BuildStepName, fn: () => Promise<T>): Promise<T> => {
    out.step(BUILD_STEP_TITLES[step]);
    if (options.injectErrorAt === step) {
      out.warn(`Injecting simulated error in '${step}'`);
      throw new BuildStepError(step, `SIMULATED ERROR: Injected test failure in '${step}'`);
    }
    try {
      return await fn();
    } catch (error) {
      if (error instanceof BuildStepError) {
        throw error;
      }
      throw new BuildStepError(step, `${BUILD_STEP_TITLES[step]} failed: ${getErrorMessage(error)}`, { cause: error });
    }
  };

  const selection = await runStep('resolve-build-tags', () => resolveBuildSelection(options, paths));
  const buildTagsString = formatBuildTagsString(selection.buildTags);
  out.success(`Build tags: ${buildTagsString || '[none]'}`);

  const dependencyMapping: DependencyMapping = await loadComponentDependencies(paths.dependenciesFile, diagnostics);
  const includedComponents = resolveComponentsByTags(selection.buildTags, dependencyMapping, diagnostics);
  const modules = collectModules(includedComponents, dependencyMapping);

  const tempDir = await makeTempDir(options.tempParent ?? tmpdir(), 'otel-upstream-');
  const upstreamDir = join(tempDir, 'upstream');
  const collectorDir = join(upstreamDir, DIR_PATTERNS.COLLECTOR);
  logger.debug(`Temporary directory: ${tempDir}`);

  try {
    await runStep('clone-upstream', async () => {
      const spinner = out.spinner();
      spinner.start(`Cloning ${options.upstreamRepo}@${options.upstreamRef}`);
      try {
        await cloneUpstream({
          repo: options.upstreamRepo,
          ref: options.upstreamRef,
          targetDir: upstreamDir,
          runner
        });
      } catch (error) {
        spinner.stop(`Clone of ${upstreamRepoUrl(options.upstreamRepo)} failed`);
        throw error;
      }
      spinner.stop(`Cloned ${upstreamRepoUrl(options.upstreamRepo)}`);
    });

    const upstreamVersion = await runStep('determine-upstream-version', async () => {
      const version = options.upstreamVersion ?? await determineUpstreamVersion(upstreamDir, runner);
      out.success(`Upstream version: ${version}`);
      return version;
    });

    await runStep('overlay-components', async () => {
      if (includedComponents.length === 0) {
        out.info('No custom components to overlay');
        return;
      }
      const plan = planOverlay(includedComponents, diagnostics);
      const overlay = await applyOverlay({
        componentDir: paths.componentDir,
        upstreamDir,
        plan,
        diagnostics
      });
      out.success(`Included ${formatCount(overlay.copied.length, 'component')}`);
    });

    await runStep('copy-collector-config', async () => {
      if (!selection.configFile) {
        return;
      }
      const source = join(paths.collectorConfigsDir, selection.configFile);
      if (!(await isFile(source))) {
        diagnostics.warn(
          WarningCodes.CONFIG_FILE_MISSING,
          `Custom config file not found: ${source}; using default upstream config.yaml`,
          { path: source }
        );
        return;
      }
      await copyFile(source, join(collectorDir, FILE_PATTERNS.COLLECTOR_CONFIG_YAML));
      out.success(`Custom collector config copied: ${selection.configFile}`);
    });

    await runStep('add-dependencies', async () => {
      if (!(await isDirectory(collectorDir))) {
        throw new ValidationError(`Collector directory not found in upstream repo: ${collectorDir}`);
      }
      const deps = await addGoDependencies({ collectorDir, modules, upstreamVersion, runner, diagnostics });
      if (deps.added.length > 0) {
        out.success(`Added ${formatCount(deps.added.length, 'dependency', 'dependencies')}`);
      }
    });

    await runStep('package-layer', async () => {
      const makefile = join(collectorDir, FILE_PATTERNS.MAKEFILE);
      if (!(await isFile(makefile))) {
        throw new ValidationError(`Makefile not found: ${makefile}`);
      }
      const env: Record<string, string> = { GOARCH: options.architecture };
      if (buildTagsString) {
        env.BUILDTAGS = buildTagsString;
      }
      const spinner = out.spinner();
      spinner.start('Running make package');
      try {
        await runner.run('make', ['package'], { cwd: collectorDir, env });
      } catch (error) {
        spinner.stop('make package failed');
        throw error;
      }
      spinner.stop('make package finished');
    });

    const layer = await runStep('collect-output', async () => {
      const buildOutputDir = join(collectorDir, DIR_PATTERNS.BUILD);
      const builtFile = join(buildOutputDir, upstreamLayerFileName(options.architecture));
      if (!(await isFile(builtFile))) {
        const contents = (await isDirectory(buildOutputDir)) ? await listFiles(buildOutputDir) : [];
        logger.error('Build output directory contents', { buildOutputDir, contents });
        throw new ValidationError(`Build file not found: ${builtFile}`);
      }

      const finalName = layerFileName(options.architecture, options.distribution);
      const renamed = join(buildOutputDir, finalName);
      await renameFile(builtFile, renamed);

      await ensureDir(outputDir);
      const target = join(outputDir, finalName);
      await copyFile(renamed, target);
      const { size } = await getStats(target);
      out.success(`Layer available at ${formatPathForDisplay(target, paths.root)} (${formatFileSize(size)})`);
      return { target, size };
    });

    const result: BuildResult = {
      distribution: options.distribution,
      architecture: options.architecture,
      upstreamVersion,
      buildTags: selection.buildTags,
      includedComponents,
      modules,
      layerFile: layer.target,
      layerFileSize: layer.size
    };
    if (selection.configFile) {
      result.configFile = selection.configFile;
    }
    if (options.keepTemp) {
      result.tempDir = tempDir;
    }
    return result;
  } finally {
    await cleanupTempDir(tempDir, options.keepTemp === true, out);
  }
}

async function cleanupTempDir(tempDir: string, keep: boolean, out: OutputPort): Promise<void> {
  if (keep) {
    out.info(`Keeping temporary directory: ${tempDir}`);
    return;
  }
  try {
    await remove(tempDir);
  } catch (error) {
    // A failed build keeps its own error as the one reported
    logger.warn(`Failed to remove temporary directory ${tempDir}`, { error: getErrorMessage(error) });
  }
}
