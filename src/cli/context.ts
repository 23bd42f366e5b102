/**
 * Wiring for CLI commands: config, logger, gateways and the lifecycle
 * manager, built fresh for each command.
 */

import chalk from 'chalk';
import type { Logger } from 'pino';
import { ZipArchiver } from '../archive/zip-archiver.js';
import { buildShareConfig, validateShareConfig, validateSmtpConfig } from '../config.js';
import type { ShareConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { SmtpNotifier } from '../notify/smtp-notifier.js';
import { JsonFileShareRecordStore } from '../records/record-store.js';
import { ShareLifecycleManager } from '../sharing/lifecycle-manager.js';
import type { ShareProgress } from '../sharing/types.js';
import { S3ObjectStore } from '../storage/s3-object-store.js';

export interface ShareContext {
  config: ShareConfig;
  logger: Logger;
  manager: ShareLifecycleManager;
}

export interface ShareContextOptions {
  /** Require SOURCE_BUCKET (commands that read samples) */
  requireSource?: boolean;
  /** Require a usable principal template (commands that grant access) */
  requireGrants?: boolean;
  /** Require SMTP settings (commands that notify recipients) */
  requireEmail?: boolean;
  /** Print progress events to stdout */
  showProgress?: boolean;
}

function printProgress(progress: ShareProgress): void {
  if (progress.status === 'failed') return;
  console.log(chalk.dim(`  [${progress.status}] ${progress.detail}`));
}

/**
 * Build the command context. Throws when the configuration is incomplete.
 */
export function createShareContext(options?: ShareContextOptions): ShareContext {
  const config = buildShareConfig();
  const errors = validateShareConfig(config, {
    requireSource: options?.requireSource ?? false,
    requireGrants: options?.requireGrants ?? false,
  });
  if (options?.requireEmail) {
    errors.push(...validateSmtpConfig(config.smtp));
  }
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });

  const manager = new ShareLifecycleManager(
    {
      store: new S3ObjectStore({ region: config.region, principalTemplate: config.principalTemplate }, logger),
      notifier: new SmtpNotifier(config.smtp, logger),
      records: new JsonFileShareRecordStore(config.recordsPath, logger),
      archiver: new ZipArchiver(),
      config,
      logger,
    },
    { onProgress: options?.showProgress ? printProgress : undefined }
  );

  return { config, logger, manager };
}
