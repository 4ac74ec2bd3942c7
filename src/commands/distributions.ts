import { Command } from 'commander';

import { createCommandContext } from '../cli/context.js';
import { describeDistribution, getDistributionChoices } from '../core/distributions/build-tags.js';
import { loadDistributions } from '../core/distributions/distribution-loader.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPathForDisplay, displayCustomTable } from '../utils/formatters.js';
import { resolveProjectPaths } from '../core/project-paths.js';
import { withErrorHandling } from '../utils/errors.js';
import type { DistributionSummary } from '../types/index.js';

async function distributionsCommand(command: Command): Promise<void> {
  const ctx = createCommandContext(command);
  const out = resolveOutput(ctx);
  const { distributionsFile } = resolveProjectPaths(ctx.projectRoot);
  const table = await loadDistributions(distributionsFile);

  // Resolving every entry up front surfaces a broken chain before anything is printed
  const summaries = getDistributionChoices(table).map(name => describeDistribution(name, table));

  displayCustomTable<DistributionSummary>(
    summaries,
    [
      { header: 'NAME', width: 24, accessor: d => d.name },
      { header: 'BASE', width: 16, accessor: d => d.base ?? '-' },
      { header: 'TAGS', width: 8, accessor: d => String(d.buildTags.length) },
      { header: 'DESCRIPTION', width: 0, accessor: d => d.description ?? '' }
    ],
    `Distributions (${formatPathForDisplay(distributionsFile, ctx.projectRoot)}):`,
    out
  );
}

export function setupDistributionsCommand(program: Command): void {
  program
    .command('distributions')
    .alias('dists')
    .description('List the configured distributions')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await distributionsCommand(command);
    }));
}
