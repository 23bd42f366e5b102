#!/usr/bin/env node

/**
 * sample-share CLI - share sample data from S3 and track the shares
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerSamplesCommand } from './commands/samples.js';
import { registerShareCommands } from './commands/share.js';
import { registerSharesCommands } from './commands/shares.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('sample-share')
  .description('Share sample files from S3 with recipients and track the shares')
  .version(pkg.version);

registerShareCommands(program);
registerSamplesCommand(program);

// Share record maintenance (sample-share shares list|expire|deactivate|delete)
const sharesCmd = program
  .command('shares')
  .description('Inspect and maintain recorded shares');

registerSharesCommands(sharesCmd);

await program.parseAsync();
