/**
 * sample-share shares commands: inspect and maintain share records
 *
 *   shares list [--all]          Show active (or all) shares, filtered and sorted
 *   shares expire                Mark shares past their expiry inactive
 *   shares deactivate <ids...>   Mark shares inactive
 *   shares delete <ids...>       Remove share records and their archives
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { ShareKind, ShareSortKey } from '../../sharing/types.js';
import { createShareContext } from '../context.js';
import { describeBatch, describeCleanup, formatShareRow } from '../format.js';

export function registerSharesCommands(program: Command): void {
  // ── shares list ─────────────────────────────────────────────────────

  program
    .command('list')
    .description('List shares with days remaining')
    .option('--all', 'Include expired and deactivated shares', false)
    .option('--recipient <email>', 'Only shares sent to this recipient')
    .addOption(new Option('--kind <kind>', 'Only shares of this kind').choices(['single', 'multi']))
    .addOption(new Option('--sort <field>', 'Order by creation or expiry time').choices(['created', 'expires']))
    .option('--desc', 'Newest or latest first', false)
    .action(
      async (options: {
        all: boolean;
        recipient?: string;
        kind?: ShareKind;
        sort?: ShareSortKey;
        desc: boolean;
      }) => {
        try {
          const { manager } = createShareContext();
          const shares = await manager.listShares({
            includeInactive: options.all,
            recipient: options.recipient,
            kind: options.kind,
            sortBy: options.sort,
            descending: options.desc,
          });

          if (shares.length === 0) {
            console.log(chalk.dim(options.all ? 'No shares recorded.' : 'No active shares.'));
            return;
          }
          for (const share of shares) {
            const row = formatShareRow(share);
            console.log(share.active ? row : chalk.dim(row));
          }
        } catch (error) {
          console.error(chalk.red('Listing shares failed:'), error instanceof Error ? error.message : error);
          process.exit(1);
        }
      }
    );

  // ── shares expire ───────────────────────────────────────────────────

  program
    .command('expire')
    .description('Mark every share past its expiry as inactive')
    .action(async () => {
      try {
        const { manager } = createShareContext();
        const expired = await manager.expire();

        if (expired.length === 0) {
          console.log(chalk.green('No shares to expire.'));
          return;
        }
        console.log(chalk.green(`Expired ${expired.length} share${expired.length !== 1 ? 's' : ''}:`));
        for (const id of expired) {
          console.log(chalk.dim(`  ${id}`));
        }
      } catch (error) {
        console.error(chalk.red('Expire failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // ── shares deactivate ───────────────────────────────────────────────

  program
    .command('deactivate <ids...>')
    .description('Mark shares inactive without deleting anything')
    .action(async (ids: string[]) => {
      try {
        const { manager } = createShareContext();
        const outcome = await manager.deactivateShares(ids);

        for (const id of outcome.failed) {
          console.error(chalk.red(`  Share ${id} not found or not updated.`));
        }
        const summary = describeBatch('Deactivated', outcome);
        if (outcome.failed.length > 0) {
          console.error(chalk.yellow(summary));
          process.exit(1);
        }
        console.log(chalk.green(summary));
      } catch (error) {
        console.error(chalk.red('Deactivate failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // ── shares delete ───────────────────────────────────────────────────

  program
    .command('delete <ids...>')
    .description('Delete share records; single-sample archives are removed from the bucket')
    .action(async (ids: string[]) => {
      try {
        const { manager } = createShareContext();
        const outcome = await manager.deleteShares(ids);

        for (const id of outcome.succeeded) {
          const cleanup = outcome.cleanup[id] ?? 'not_attempted';
          const line = `  Share ${id} deleted; ${describeCleanup(cleanup)}.`;
          console.log(cleanup === 'failed' ? chalk.yellow(line) : chalk.dim(line));
        }
        for (const id of outcome.failed) {
          console.error(chalk.red(`  Share ${id} not found or not deleted.`));
        }
        const summary = describeBatch('Deleted', outcome);
        if (outcome.failed.length > 0) {
          console.error(chalk.yellow(summary));
          process.exit(1);
        }
        console.log(chalk.green(summary));
      } catch (error) {
        console.error(chalk.red('Delete failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
