/**
 * Perspectives - List Command
 * Export every active perspective and its groups to CSV
 */

import * as path from 'node:path';
import { PerspectiveClient } from '@flexreport/clients-ts';
import { type PerspectiveSummary, sanitizeFilename } from '@flexreport/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { commonArgs, resolveApiKey } from '../../utils/api-key.js';
import { CLI_NAME, PERSPECTIVES_FILE } from '../../utils/constants.js';
import { CsvExporter } from '../../utils/csv-exporter.js';
import { handleCommandError, PERSPECTIVE_TIPS } from '../../utils/error-handling.js';
import { applyDebugFlag, formatCount, logDebug } from '../../utils/format-helpers.js';

export interface PerspectiveExport {
  perspective: PerspectiveSummary;
  groups: number;
  file: string;
  /** Set when the perspective's own file name was taken and a suffix was added */
  renamed: boolean;
}

export interface PerspectivesExportResult {
  perspectivesFile: string;
  exports: PerspectiveExport[];
}

export interface ExportHooks {
  onPerspectives?: (perspectives: PerspectiveSummary[]) => void;
  onExported?: (exported: PerspectiveExport) => void;
}

/**
 * Write Perspectives.csv, then one group file per perspective in name order
 */
export async function exportPerspectives(
  client: PerspectiveClient,
  exporter: CsvExporter,
  hooks: ExportHooks = {}
): Promise<PerspectivesExportResult> {
  const perspectives = await client.listPerspectives();
  const perspectivesFile = await exporter.exportPerspectives(perspectives);
  hooks.onPerspectives?.(perspectives);

  const exports: PerspectiveExport[] = [];
  for (const perspective of perspectives) {
    const groups = await client.listGroups(perspective.id);
    const file = await exporter.exportGroups(perspective, groups);
    const renamed = path.basename(file) !== `${sanitizeFilename(perspective.name)}.csv`;
    const exported = { perspective, groups: groups.length, file, renamed };
    exports.push(exported);
    hooks.onExported?.(exported);
  }

  return { perspectivesFile, exports };
}

export const listCommand = define({
  name: 'list',
  description: `Export active perspectives to ${PERSPECTIVES_FILE} and their groups to <perspective>.csv`,
  args: {
    'out-dir': {
      type: 'string',
      description: 'Directory for the CSV files',
      default: '.',
    },
    ...commonArgs,
  },
  examples: `
EXAMPLES:
  ${CLI_NAME} perspectives list
  ${CLI_NAME} perspectives list --out-dir ./perspectives
  `.trim(),
  run: async (ctx) => {
    const debug = ctx.values.debug ?? false;
    applyDebugFlag(debug);
    const outDir = ctx.values['out-dir'] ?? '.';
    const apiKey = resolveApiKey(ctx.values['api-key']);
    logDebug(debug, `Output directory: ${outDir}`);

    const spinner = ora('Generating perspective list...').start();
    try {
      await exportPerspectives(new PerspectiveClient({ apiKey }), new CsvExporter(outDir), {
        onPerspectives: (perspectives) => {
          spinner.info(`Count of Perspectives: ${perspectives.length}`);
          spinner.start('Exporting groups...');
        },
        onExported: ({ perspective, groups, file, renamed }) => {
          if (renamed) {
            spinner.warn(chalk.yellow(`"${perspective.name}" clashes with another file name; wrote ${file}`));
          }
          spinner.info(`${chalk.cyan(perspective.name)}: ${formatCount(groups, 'group')}`);
          spinner.start('Exporting groups...');
        },
      });
      spinner.succeed(`Perspective export written to ${chalk.cyan(outDir)}`);
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: 'Perspective export failed',
        debug,
        tips: PERSPECTIVE_TIPS.list,
      });
    }
  },
});
