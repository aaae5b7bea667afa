import chalk from 'chalk';
import { loadConfig } from '../config/loader.js';
import type { ChainDeployConfig } from '../config/schema.js';
import { getRepositoryTargets } from '../config/topology.js';
import type { ServerTarget } from '../config/types.js';
import type { ChainResult } from '../deploy/chain.js';
import type { ExecutorFactory } from '../deploy/executors.js';
import { describeTargetPlan, type TargetStatus } from '../deploy/server-deployer.js';
import { DeploymentService } from '../deploy/service.js';
import { createLogger, resolveLogLevel, type Logger } from '../utils/logger.js';
import { ChannelNotifier, type Notifier } from '../utils/notifications.js';

export interface DeployOptions {
  config?: string;
  abortOnError?: boolean;
  dryRun?: boolean;
}

/**
 * Overrides for running the command in process
 */
export interface DeployDependencies {
  config?: ChainDeployConfig;
  executorFactory?: ExecutorFactory;
  notifier?: Notifier;
  logger?: Logger;
}

const STATUS_LABEL: Record<TargetStatus, string> = {
  succeeded: chalk.green('deployed'),
  failed: chalk.red('failed'),
  'skipped-branch-mismatch': chalk.gray('skipped (branch)'),
  'skipped-unknown-mode': chalk.yellow('unknown target'),
};

/**
 * Plan lines for --dry-run
 */
export function formatPlan(repository: string, branch: string, targets: ServerTarget[]): string[] {
  const lines = [`Plan for ${repository}@${branch} (${targets.length} target(s))`];
  for (const target of targets) {
    const plan = describeTargetPlan(target, branch);
    lines.push(`  ${plan.key} [${plan.action}] ${plan.detail}`);
    for (const step of plan.steps) {
      lines.push(`    - ${step}`);
    }
  }
  return lines;
}

export function formatChainSummary(result: ChainResult): string[] {
  const lines = result.outcomes.map(outcome =>
    `  ${outcome.key.padEnd(10)} ${STATUS_LABEL[outcome.status]}  ${chalk.gray(outcome.detail)}`
  );
  lines.push(`Chain ${result.status}: ${result.detail}`);
  return lines;
}

export function chainSucceeded(result: ChainResult): boolean {
  return result.status === 'successful' || result.status === 'ignored';
}

/**
 * Deploy command - run a repository's chain in the foreground
 */
export async function deployCommand(
  repository: string,
  branch: string | undefined,
  options: DeployOptions = {},
  deps: DeployDependencies = {}
): Promise<ChainResult | null> {
  const loaded = deps.config ?? loadConfig(options.config, createLogger({ scope: 'config' }));
  const config: ChainDeployConfig = options.abortOnError
    ? { ...loaded, chain: { ...loaded.chain, continueOnError: false } }
    : loaded;
  const logger = deps.logger ?? createLogger({ scope: 'deploy', level: resolveLogLevel(config.debug) });
  const targetBranch = branch ?? config.defaultBranch;
  const targets = getRepositoryTargets(config, repository, logger);

  if (options.dryRun) {
    console.log(chalk.yellow('[DRY RUN] Nothing will be executed'));
    for (const line of formatPlan(repository, targetBranch, targets)) {
      console.log(line);
    }
    return null;
  }

  const notifier = deps.notifier ?? new ChannelNotifier(config.notifications, logger.child('notify'));
  const service = new DeploymentService({
    config,
    notifier,
    executorFactory: deps.executorFactory,
    logger,
  });

  const run = service.startChain(repository, targetBranch, targets);
  const cancel = () => {
    logger.warn('Interrupted, stopping after the current step.');
    run.cancel();
  };
  process.once('SIGINT', cancel);

  try {
    const result = await run.result;
    console.log('');
    for (const line of formatChainSummary(result)) {
      console.log(line);
    }
    if (!chainSucceeded(result)) {
      process.exitCode = 1;
    }
    return result;
  } finally {
    process.removeListener('SIGINT', cancel);
  }
}
