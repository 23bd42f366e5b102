/**
 * sample-share samples: list the sample ids in the source bucket
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createShareContext } from '../context.js';

export function registerSamplesCommand(program: Command): void {
  program
    .command('samples')
    .description('List sample ids available in the source bucket')
    .option('--source <bucket>', 'Source bucket (defaults to SOURCE_BUCKET)')
    .action(async (options: { source?: string }) => {
      try {
        const { config, manager } = createShareContext({ requireSource: !options.source });
        const source = options.source ?? config.sourceContainer;
        const samples = await manager.listSamples(source);

        if (samples.length === 0) {
          console.log(chalk.yellow(`No samples found in ${source}/${config.sourcePrefix}`));
          return;
        }
        for (const sampleId of samples) {
          console.log(sampleId);
        }
        console.log(chalk.dim(`${samples.length} sample${samples.length !== 1 ? 's' : ''}`));
      } catch (error) {
        console.error(chalk.red('Listing samples failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
