import { Command } from 'commander';

import { createCommandContext } from '../cli/context.js';
import { formatBuildTagsString, resolveBuildTags } from '../core/distributions/build-tags.js';
import { loadDistributions } from '../core/distributions/distribution-loader.js';
import { resolveProjectPaths } from '../core/project-paths.js';
import { withErrorHandling } from '../utils/errors.js';

interface TagsOptions {
  json?: boolean;
}

/**
 * Print the resolved build tags of one distribution on stdout, as the
 * comma-joined BUILDTAGS value or, with --json, as a JSON list.
 */
async function tagsCommand(distribution: string, options: TagsOptions, command: Command): Promise<void> {
  const ctx = createCommandContext(command);
  const { distributionsFile } = resolveProjectPaths(ctx.projectRoot);
  const table = await loadDistributions(distributionsFile);
  const tags = resolveBuildTags(distribution, table);

  console.log(options.json ? JSON.stringify(tags) : formatBuildTagsString(tags));
}

export function setupTagsCommand(program: Command): void {
  program
    .command('tags')
    .description('Print the resolved build tags of a distribution')
    .argument('<distribution>', 'distribution name')
    .option('--json', 'print the tags as a JSON list')
    .action(withErrorHandling(async (distribution: string, options: TagsOptions, command: Command) => {
      await tagsCommand(distribution, options, command);
    }));
}
