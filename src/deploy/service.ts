import type { ChainDeployConfig } from '../config/schema.js';
import { getRepositoryTargets } from '../config/topology.js';
import type { ServerTarget } from '../config/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Notifier } from '../utils/notifications.js';
import { DeploymentChain, type ChainResult } from './chain.js';
import { createExecutorFactory, type ExecutorFactory } from './executors.js';
import { RunSupersessionRegistry, type RunHandle, type RunSummary } from './registry.js';

export interface DeploymentServiceOptions {
  config: ChainDeployConfig;
  notifier: Notifier;
  /** Defaults to real local/SSH executors built from the config's timeouts */
  executorFactory?: ExecutorFactory;
  logger?: Logger;
}

/**
 * Owns the run registry and wires config, notifier and executors into chains.
 * Both the webhook and the manual deploy path start runs here.
 */
export class DeploymentService {
  private readonly config: ChainDeployConfig;
  private readonly chain: DeploymentChain;
  private readonly registry: RunSupersessionRegistry<ChainResult>;
  private readonly logger: Logger;

  constructor(options: DeploymentServiceOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;

    const executorFactory = options.executorFactory ?? createExecutorFactory({
      connectTimeout: this.config.timeouts.connect,
      commandTimeout: this.config.timeouts.command,
      benignMarkers: this.config.benignErrorMarkers,
      logger: this.logger.child('exec'),
    });

    this.chain = new DeploymentChain({
      executorFactory,
      notifier: options.notifier,
      policy: this.config.chain,
      logger: this.logger.child('chain'),
    });
    this.registry = new RunSupersessionRegistry<ChainResult>(this.logger.child('runs'));
  }

  hasRepository(repository: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.config.repositories, repository);
  }

  /**
   * Ordered targets for a repository
   * @throws ConfigurationError for unknown repositories
   */
  targetsFor(repository: string): ServerTarget[] {
    return getRepositoryTargets(this.config, repository, this.logger);
  }

  /**
   * Supersede any run for (repository, branch) and start a new one
   */
  start(repository: string, branch: string): RunHandle<ChainResult> {
    return this.startChain(repository, branch, this.targetsFor(repository));
  }

  startChain(repository: string, branch: string, targets: ServerTarget[]): RunHandle<ChainResult> {
    return this.registry.submit(repository, branch, signal =>
      this.chain.run(repository, branch, targets, signal)
    );
  }

  activeRuns(): RunSummary[] {
    return this.registry.summaries();
  }

  /**
   * Cancel every active run; commands already issued finish on their own
   */
  shutdown(): number {
    const cancelled = this.registry.cancelAll();
    if (cancelled > 0) {
      this.logger.info(`Cancelled ${cancelled} active run(s).`);
    }
    return cancelled;
  }
}
