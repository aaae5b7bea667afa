import { DEFAULT_CHAIN_POLICY, type ChainPolicy, type DeployEventStatus, type ServerTarget } from '../config/types.js';
import { RunCancelledError, toErrorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Notifier } from '../utils/notifications.js';
import type { ExecutorFactory } from './executors.js';
import { ServerDeployer, type DeployOutcome } from './server-deployer.js';

/**
 * Terminal classification of one chain run
 */
export type ChainStatus = 'successful' | 'failed' | 'unknown-target' | 'ignored' | 'cancelled';

export interface ChainResult {
  repository: string;
  branch: string;
  status: ChainStatus;
  /** One entry per target attempted, in chain order */
  outcomes: DeployOutcome[];
  detail: string;
  startedAt: string;
  finishedAt: string;
}

export interface DeploymentChainOptions {
  executorFactory: ExecutorFactory;
  notifier: Notifier;
  policy?: Partial<ChainPolicy>;
  logger?: Logger;
}

export const ALL_DEPLOYED_DETAIL = 'All servers deployed.';
export const SUPERSEDED_DETAIL = new RunCancelledError().message;

const TERMINAL_NOTIFICATION: Record<Exclude<ChainStatus, 'cancelled'>, DeployEventStatus> = {
  successful: 'successful',
  failed: 'failed',
  'unknown-target': 'failed',
  ignored: 'ignored',
};

function isFailure(outcome: DeployOutcome): boolean {
  return outcome.status === 'failed' || outcome.status === 'skipped-unknown-mode';
}

/**
 * Precedence: cancelled > failed > unknown-target > successful > ignored
 */
export function classifyChain(
  outcomes: DeployOutcome[],
  cancelled: boolean,
  context: { repository: string; branch: string; targetCount: number }
): { status: ChainStatus; detail: string } {
  if (cancelled) {
    return { status: 'cancelled', detail: SUPERSEDED_DETAIL };
  }

  const failed = outcomes.find(o => o.status === 'failed');
  if (failed) {
    return { status: 'failed', detail: `Deployment failed on ${failed.key}: ${failed.detail}` };
  }

  const unknown = outcomes.find(o => o.status === 'skipped-unknown-mode');
  if (unknown) {
    return { status: 'unknown-target', detail: unknown.detail };
  }

  if (outcomes.some(o => o.status === 'succeeded')) {
    return { status: 'successful', detail: ALL_DEPLOYED_DETAIL };
  }

  return {
    status: 'ignored',
    detail: context.targetCount === 0
      ? `No server targets configured for ${context.repository}.`
      : `No targets deploy branch '${context.branch}'.`,
  };
}

/**
 * Walks a repository's targets strictly in order, one at a time
 */
export class DeploymentChain {
  private readonly executorFactory: ExecutorFactory;
  private readonly notifier: Notifier;
  private readonly policy: ChainPolicy;
  private readonly logger: Logger;

  constructor(options: DeploymentChainOptions) {
    this.executorFactory = options.executorFactory;
    this.notifier = options.notifier;
    this.policy = { ...DEFAULT_CHAIN_POLICY, ...options.policy };
    this.logger = options.logger ?? silentLogger;
  }

  async run(repository: string, branch: string, targets: ServerTarget[], signal?: AbortSignal): Promise<ChainResult> {
    const startedAt = new Date().toISOString();
    const log = this.logger.child(`${repository}@${branch}`);
    const deployer = new ServerDeployer({
      repository,
      branch,
      executorFactory: this.executorFactory,
      logger: log,
      signal,
    });

    const outcomes: DeployOutcome[] = [];
    let cancelled = false;

    log.info(`Starting chain over ${targets.length} target(s): ${targets.map(t => t.key).join(', ') || 'none'}`);

    for (const target of targets) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      let outcome: DeployOutcome;
      try {
        outcome = await deployer.deploy(target);
      } catch (error) {
        if (error instanceof RunCancelledError) {
          cancelled = true;
          break;
        }
        throw error;
      }

      outcomes.push(outcome);
      await this.notifyTarget(repository, branch, outcome);

      if (isFailure(outcome) && !this.policy.continueOnError) {
        log.warn(`Stopping chain after ${target.key}: continueOnError is disabled.`);
        break;
      }
    }

    // A run superseded while it finished its last step is still superseded
    if (signal?.aborted) {
      cancelled = true;
    }

    const { status, detail } = classifyChain(outcomes, cancelled, {
      repository,
      branch,
      targetCount: targets.length,
    });

    const result: ChainResult = {
      repository,
      branch,
      status,
      outcomes,
      detail,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    if (status === 'successful') log.success(detail);
    else if (status === 'failed' || status === 'unknown-target') log.error(detail);
    else log.info(detail);

    await this.notifyTerminal(result);
    return result;
  }

  private async notifyTarget(repository: string, branch: string, outcome: DeployOutcome): Promise<void> {
    if (!this.policy.notifyTargets) return;

    switch (outcome.status) {
      case 'skipped-branch-mismatch':
        await this.notify(repository, branch, 'ignored', outcome.detail);
        break;
      case 'skipped-unknown-mode':
        await this.notify(repository, branch, 'failed', outcome.detail);
        break;
      case 'failed':
        await this.notify(repository, branch, 'failed', `${outcome.key}: ${outcome.detail}`);
        break;
      case 'succeeded':
        await this.notify(repository, branch, 'successful', `${outcome.key}: ${outcome.detail}`);
        break;
    }
  }

  private async notifyTerminal(result: ChainResult): Promise<void> {
    if (result.status === 'cancelled') {
      if (this.policy.notifyCancelled) {
        await this.notify(result.repository, result.branch, 'failed', result.detail);
      }
      return;
    }
    await this.notify(result.repository, result.branch, TERMINAL_NOTIFICATION[result.status], result.detail);
  }

  private async notify(repository: string, branch: string, status: DeployEventStatus, detail: string): Promise<void> {
    try {
      await this.notifier.notifyDeployEvent(repository, branch, status, detail);
    } catch (error) {
      this.logger.warn(`Notification failed: ${toErrorMessage(error)}`);
    }
  }
}
