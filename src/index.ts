#!/usr/bin/env node

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { deployCommand } from './commands/deploy.js';
import { serveCommand } from './commands/serve.js';
import { statusCommand } from './commands/status.js';
import { toErrorMessage } from './utils/errors.js';

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
  process.exit(1);
}

const program = new Command();

program
  .name('wcd')
  .description('Webhook-triggered deployment chains: git pull + docker compose across local and SSH targets')
  .version('1.0.0');

program
  .command('serve')
  .description('Start the webhook and manual deploy HTTP server')
  .option('-c, --config <path>', 'Path to .chain-deploy.json')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .option('-H, --host <host>', 'Interface to bind')
  .action((options: { config?: string; port?: number; host?: string }) =>
    serveCommand(options).catch(fail)
  );

program
  .command('deploy <repository> [branch]')
  .description('Run the deployment chain for a repository in the foreground')
  .option('-c, --config <path>', 'Path to .chain-deploy.json')
  .option('--abort-on-error', 'Stop the chain at the first failed target')
  .option('--dry-run', 'Print the ordered plan without executing anything')
  .action(async (repository: string, branch: string | undefined, options: { config?: string; abortOnError?: boolean; dryRun?: boolean }) => {
    try {
      await deployCommand(repository, branch, {
        config: options.config,
        abortOnError: options.abortOnError,
        dryRun: options.dryRun,
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('status')
  .description('Show configured repositories and their targets in chain order')
  .option('-c, --config <path>', 'Path to .chain-deploy.json')
  .action((options: { config?: string }) => statusCommand(options).catch(fail));

program.parseAsync().catch(fail);
