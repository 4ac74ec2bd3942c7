import { Command } from 'commander';

import { BUILD_DEFAULTS } from '../constants/index.js';
import { createCommandContext } from '../cli/context.js';
import { collectModules, resolveComponentsByTags } from '../core/components/component-selector.js';
import { loadComponentDependencies } from '../core/components/dependency-loader.js';
import { parseBuildTagsString, resolveBuildTags } from '../core/distributions/build-tags.js';
import { loadDistributions } from '../core/distributions/distribution-loader.js';
import { resolveDiagnostics } from '../core/ports/diagnostics.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { resolveProjectPaths } from '../core/project-paths.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { formatCount, getTreeConnector } from '../utils/formatters.js';

interface ComponentsOptions {
  distribution?: string;
  buildTags?: string;
  json?: boolean;
}

function renderList(items: readonly string[]): string[] {
  return items.map((item, index) => `${getTreeConnector(index === items.length - 1)}${item}`);
}

/**
 * Show which custom components a build would overlay and which Go modules
 * it would add, without cloning anything.
 */
async function componentsCommand(options: ComponentsOptions, command: Command): Promise<void> {
  if (options.distribution && options.buildTags !== undefined) {
    throw new ValidationError('Use either --distribution or --build-tags, not both');
  }

  const ctx = createCommandContext(command);
  const out = resolveOutput(ctx);
  const diagnostics = resolveDiagnostics(ctx);
  const paths = resolveProjectPaths(ctx.projectRoot);

  let buildTags: string[];
  if (options.buildTags !== undefined) {
    buildTags = parseBuildTagsString(options.buildTags);
  } else {
    const table = await loadDistributions(paths.distributionsFile);
    buildTags = resolveBuildTags(options.distribution ?? BUILD_DEFAULTS.DISTRIBUTION, table);
  }

  const mapping = await loadComponentDependencies(paths.dependenciesFile, diagnostics);
  const components = resolveComponentsByTags(buildTags, mapping, diagnostics);
  const modules = collectModules(components, mapping);

  if (options.json) {
    console.log(JSON.stringify({ buildTags, components, modules }, null, 2));
    return;
  }

  out.message(`Components (${formatCount(components.length, 'component')}):`);
  for (const line of renderList(components)) {
    out.message(line);
  }
  out.message(`Modules (${formatCount(modules.length, 'module')}):`);
  for (const line of renderList(modules)) {
    out.message(line);
  }
}

export function setupComponentsCommand(program: Command): void {
  program
    .command('components')
    .description('Show the custom components and Go modules selected by build tags')
    .option('-d, --distribution <name>', `distribution whose tags to use (default: ${BUILD_DEFAULTS.DISTRIBUTION})`)
    .option('-t, --build-tags <tags>', 'comma-separated build tags to use instead of a distribution')
    .option('--json', 'print the selection as JSON')
    .action(withErrorHandling(async (options: ComponentsOptions, command: Command) => {
      await componentsCommand(options, command);
    }));
}
