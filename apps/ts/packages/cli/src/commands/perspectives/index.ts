/**
 * Perspectives Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { listCommand } from './list.js';

export const perspectivesCommand = define({
  name: 'perspectives',
  description: 'Export perspectives and their groups',
  run: (ctx) => {
    ctx.log('Available commands: list');
    ctx.log(`Use "${CLI_NAME} perspectives <command> --help" for more information`);
  },
});

const subCommands = {
  list: listCommand,
};

export default async function perspectivesCommandRunner(args: string[]): Promise<void> {
  await cli(args, perspectivesCommand, {
    name: `${CLI_NAME} perspectives`,
    version: CLI_VERSION,
    description: 'Export perspectives and their groups',
    subCommands,
  });
}
