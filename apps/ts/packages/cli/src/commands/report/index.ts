/**
 * Report Commands - Entry Point
 * Report execution and definition management with direct imports for full help display
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { createCommand } from './create.js';
import { runCommand } from './run.js';
import { statusCommand } from './status.js';
import { triggerCommand } from './trigger.js';

export const reportCommand = define({
  name: 'report',
  description: 'Run, trigger, inspect and create FlexReports',
  run: (ctx) => {
    ctx.log('Available commands: run, trigger, status, create');
    ctx.log(`Use "${CLI_NAME} report <command> --help" for more information`);
  },
});

const subCommands = {
  run: runCommand,
  trigger: triggerCommand,
  status: statusCommand,
  create: createCommand,
};

export default async function reportCommandRunner(args: string[]): Promise<void> {
  await cli(args, reportCommand, {
    name: `${CLI_NAME} report`,
    version: CLI_VERSION,
    description: 'Run, trigger, inspect and create FlexReports',
    subCommands,
  });
}
