import { Command } from 'commander';

import { parseArchitectureSelection, prepareMatrices } from '../core/matrices/matrix-builder.js';
import { withErrorHandling } from '../utils/errors.js';

interface MatricesOptions {
  architecture: string;
  awsRegion: string;
}

export function setupMatricesCommand(program: Command): void {
  program
    .command('matrices')
    .description('Print the build and release job matrices for CI as JSON')
    .option('--architecture <arch>', 'amd64, arm64 or all', 'all')
    .option('--aws-region <region>', 'a single region or all', 'all')
    .action(withErrorHandling(async (options: MatricesOptions) => {
      const matrices = prepareMatrices(parseArchitectureSelection(options.architecture), options.awsRegion);
      console.log(JSON.stringify(matrices, null, 2));
    }));
}
