/**
 * sample-share share / share-many
 *
 *   share <sampleId>          Zip one sample into a new bucket, email a link
 *   share-many [sampleIds...] Copy samples into one bucket, grant read access
 */

import { readFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { parseSampleList, multiContainerName, randomSuffix } from '../../samples/sample-paths.js';
import { normalizeSampleIds } from '../../sharing/validation.js';
import type { ShareResult } from '../../sharing/types.js';
import { createShareContext } from '../context.js';
import { describeCopyCount, describeDestination, describeFailure, describeWarning } from '../format.js';

export function parseDays(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a whole number of days (1 or more).');
  }
  return parsed;
}

/**
 * Sample ids from the command line plus an optional list file, in that
 * order, trimmed and de-duplicated.
 */
export async function collectSampleIds(
  args: string[],
  file: string | undefined,
  hasHeader: boolean
): Promise<string[]> {
  const fromFile = file ? parseSampleList(await readFile(file, 'utf-8'), hasHeader) : [];
  return normalizeSampleIds([...args, ...fromFile]);
}

/** Print warnings or the failure; returns false for a failed result */
function reportOutcome<T>(result: ShareResult<T>): boolean {
  if (result.outcome === 'failure') {
    for (const line of describeFailure(result.error, result.partiallyApplied)) {
      console.error(chalk.red(line));
    }
    return false;
  }
  if (result.outcome === 'warning') {
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`Warning: ${describeWarning(warning)}`));
    }
  }
  return true;
}

export function registerShareCommands(program: Command): void {
  // ── share ───────────────────────────────────────────────────────────

  program
    .command('share <sampleId>')
    .description('Zip one sample into a new bucket and email the recipient a download link')
    .requiredOption('--to <email>', 'Recipient email address')
    .option('--ttl <days>', 'Days until the link and bucket expire', parseDays)
    .option('--source <bucket>', 'Source bucket (defaults to SOURCE_BUCKET)')
    .action(async (sampleId: string, options: { to: string; ttl?: number; source?: string }) => {
      try {
        const { config, manager } = createShareContext({
          requireSource: !options.source,
          requireGrants: true,
          requireEmail: true,
          showProgress: true,
        });
        const ttlDays = options.ttl ?? config.defaultSingleTtlDays;

        console.log(chalk.blue(`Sharing sample ${sampleId} with ${options.to} for ${ttlDays} day(s)...`));
        const result = await manager.shareSingle({
          sourceContainer: options.source ?? config.sourceContainer,
          sampleId,
          recipient: options.to,
          ttlDays,
        });

        if (!reportOutcome(result)) {
          process.exit(1);
        }
        if (result.outcome !== 'failure') {
          const { record, url, accessMode } = result.value;
          console.log(chalk.green(`Shared sample ${sampleId}.`));
          console.log(`  Share ID: ${record.id}`);
          console.log(`  Archive: ${describeDestination(record.destination)}`);
          console.log(`  Link (${accessMode}): ${url}`);
          console.log(`  Expires: ${record.expiresAt.toISOString()}`);
        }
      } catch (error) {
        console.error(chalk.red('Share failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // ── share-many ──────────────────────────────────────────────────────

  program
    .command('share-many [sampleIds...]')
    .description('Copy several samples into one bucket and grant the recipient read access')
    .requiredOption('--to <email>', 'Recipient email address')
    .option('--file <path>', 'CSV (first column) or text file (one id per line) of sample ids')
    .option('--header', 'The list file has a header row', false)
    .option('--bucket <name>', 'Destination bucket (default: shared-samples-<count>-<random>)')
    .option('--existing', 'Reuse an existing destination bucket instead of creating one', false)
    .option('--ttl <days>', 'Days until the bucket contents expire', parseDays)
    .option('--source <bucket>', 'Source bucket (defaults to SOURCE_BUCKET)')
    .action(
      async (
        sampleIdArgs: string[],
        options: {
          to: string;
          file?: string;
          header: boolean;
          bucket?: string;
          existing: boolean;
          ttl?: number;
          source?: string;
        }
      ) => {
        try {
          const sampleIds = await collectSampleIds(sampleIdArgs, options.file, options.header);
          if (sampleIds.length === 0) {
            console.error(chalk.red('Error: no sample ids given. Pass ids as arguments or use --file.'));
            process.exit(1);
          }
          if (options.existing && !options.bucket) {
            console.error(chalk.red('Error: --existing needs --bucket.'));
            process.exit(1);
          }

          const { config, manager } = createShareContext({
            requireSource: !options.source,
            requireGrants: true,
            requireEmail: true,
            showProgress: true,
          });
          const ttlDays = options.ttl ?? config.defaultMultiTtlDays;
          const bucket = options.bucket ?? multiContainerName(sampleIds.length, randomSuffix());

          console.log(
            chalk.blue(`Sharing ${sampleIds.length} sample(s) with ${options.to} in ${bucket}...`)
          );
          const result = await manager.shareMultiple({
            sourceContainer: options.source ?? config.sourceContainer,
            sampleIds,
            recipient: options.to,
            destinationContainer: bucket,
            ttlDays,
            createNew: !options.existing,
          });

          if (!reportOutcome(result)) {
            process.exit(1);
          }
          if (result.outcome !== 'failure') {
            const { record, results, succeeded } = result.value;
            console.log(chalk.green(`Shared ${succeeded.length} of ${sampleIds.length} sample(s).`));
            console.log(`  Share ID: ${record.id}`);
            console.log(`  Bucket: ${describeDestination(record.destination)}`);
            for (const sampleId of sampleIds) {
              const count = results[sampleId] ?? 0;
              const line = `    ${sampleId}: ${describeCopyCount(count)}`;
              console.log(count > 0 ? line : chalk.red(line));
            }
          }
        } catch (error) {
          console.error(chalk.red('Share failed:'), error instanceof Error ? error.message : error);
          process.exit(1);
        }
      }
    );
}
