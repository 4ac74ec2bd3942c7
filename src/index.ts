#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';

import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupBuildCommand } from './commands/build.js';
import { setupTagsCommand } from './commands/tags.js';
import { setupDistributionsCommand } from './commands/distributions.js';
import { setupComponentsCommand } from './commands/components.js';
import { setupMatricesCommand } from './commands/matrices.js';

/**
 * otel-layer - builds custom OpenTelemetry Collector Lambda layers from
 * distribution definitions and custom component overlays.
 */

type GlobalOptions = {
  cwd?: string;
  verbose?: boolean;
};

const program = new Command();

program
  .name('otel-layer')
  .description('Build custom OpenTelemetry Collector Lambda layers')
  .version(getVersion())
  .option('--cwd <dir>', 'set the tools repository root')
  .option('--verbose', 'enable debug logging')
  .configureHelp({ sortSubcommands: true });

// === LAYER BUILD ===
setupBuildCommand(program);

// === CONFIGURATION QUERIES ===
setupTagsCommand(program);
setupDistributionsCommand(program);
setupComponentsCommand(program);

// === CI ===
setupMatricesCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<GlobalOptions>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK);
      logger.debug(`Project root: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist and be readable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Project root: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// bin/otel-layer.js calls run() itself; this covers `tsx src/index.ts`
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error: String(error) });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
