#!/usr/bin/env tsx

/**
 * FlexReport CLI - Entry Point
 * Built with Gunshi; each command group runs its own cli() for nested help
 */

import * as path from 'node:path';
import dotenv from 'dotenv';
import { cli, define } from 'gunshi';
import { CLI_DESCRIPTION, CLI_NAME, CLI_VERSION } from './utils/constants.js';
import { CLIError, formatErrorMessage } from './utils/error-handling.js';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const mainCommand = define({
  name: CLI_NAME,
  description: CLI_DESCRIPTION,
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

// Placeholders so top-level --help lists the groups
const reportHelp = define({
  name: 'report',
  description: 'Report operations - run, trigger, status, create',
  run: (ctx) => {
    ctx.log(`Use "${CLI_NAME} report --help" for more information`);
  },
});

const perspectivesHelp = define({
  name: 'perspectives',
  description: 'Perspective operations - list',
  run: (ctx) => {
    ctx.log(`Use "${CLI_NAME} perspectives --help" for more information`);
  },
});

const args = process.argv.slice(2);
const subCommand = args[0];

async function main(): Promise<void> {
  if (subCommand === 'report') {
    const reportRunner = (await import('./commands/report/index.js')).default;
    await reportRunner(args.slice(1));
    return;
  }

  if (subCommand === 'perspectives') {
    const perspectivesRunner = (await import('./commands/perspectives/index.js')).default;
    await perspectivesRunner(args.slice(1));
    return;
  }

  await cli(args, mainCommand, {
    name: CLI_NAME,
    version: CLI_VERSION,
    description: CLI_DESCRIPTION,
    subCommands: {
      report: reportHelp,
      perspectives: perspectivesHelp,
    },
  });
}

main().catch((error: unknown) => {
  if (error instanceof CLIError) {
    if (!error.silent) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error('CLI Error:', formatErrorMessage(error));
  process.exitCode = 1;
});
