import type { ExecutionMode, ServerTarget } from '../config/types.js';
import { ComposeStack } from '../utils/compose.js';
import { DeployError, RunCancelledError, toErrorMessage } from '../utils/errors.js';
import type { CommandExecutor } from '../utils/executor.js';
import { ensureRepository, pullRepository } from '../utils/git.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withExecutor, type ExecutorFactory } from './executors.js';
import { throwIfCancelled } from './registry.js';

export type TargetStatus =
  | 'succeeded'
  | 'failed'
  | 'skipped-branch-mismatch'
  | 'skipped-unknown-mode';

export interface DeployOutcome {
  key: string;
  /**
   * `skipped-unknown-mode` is a failure for the chain: it stops a chain
   * without continueOnError and is notified as `failed`
   */
  status: TargetStatus;
  /** Human-readable, ready for a notification */
  detail: string;
  /** Whether images were rebuilt; undefined when no converge ran */
  rebuilt?: boolean;
  durationMs: number;
}

export interface ServerDeployerOptions {
  repository: string;
  /** Branch that was pushed */
  branch: string;
  executorFactory: ExecutorFactory;
  logger?: Logger;
  signal?: AbortSignal;
}

const SUPPORTED_MODES: readonly string[] = ['local', 'remote'] satisfies ExecutionMode[];

export function isSupportedMode(mode: string): mode is ExecutionMode {
  return SUPPORTED_MODES.includes(mode);
}

export function branchMismatchDetail(branch: string, target: ServerTarget): string {
  return `Push branch '${branch}' does not match '${target.branchFilter}'. Skipping ${target.key}.`;
}

export function unknownModeDetail(target: ServerTarget): string {
  return `Unknown target '${target.executionMode}' for ${target.key}. Skipping.`;
}

interface Applied {
  detail: string;
  rebuilt?: boolean;
}

/**
 * Deploys one target: branch gate, mode dispatch, sync, converge, tasks.
 * Failures become a `failed` outcome; only cancellation is thrown.
 */
export class ServerDeployer {
  private readonly repository: string;
  private readonly branch: string;
  private readonly executorFactory: ExecutorFactory;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: ServerDeployerOptions) {
    this.repository = options.repository;
    this.branch = options.branch;
    this.executorFactory = options.executorFactory;
    this.logger = options.logger ?? silentLogger;
    this.signal = options.signal;
  }

  async deploy(target: ServerTarget): Promise<DeployOutcome> {
    const startedAt = Date.now();
    const log = this.logger.child(target.key);
    const outcome = (status: TargetStatus, detail: string, rebuilt?: boolean): DeployOutcome => ({
      key: target.key,
      status,
      detail,
      rebuilt,
      durationMs: Date.now() - startedAt,
    });

    if (target.branchFilter !== this.branch) {
      const detail = branchMismatchDetail(this.branch, target);
      log.info(detail);
      return outcome('skipped-branch-mismatch', detail);
    }

    if (!isSupportedMode(target.executionMode)) {
      const detail = unknownModeDetail(target);
      log.warn(detail);
      return outcome('skipped-unknown-mode', detail);
    }

    throwIfCancelled(this.signal);
    log.info(`Deploying ${this.repository}@${this.branch} to ${target.key} (${target.executionMode})`);

    try {
      const applied = await withExecutor(this.executorFactory, target, executor =>
        this.apply(target, executor, log)
      );
      log.success(applied.detail);
      return outcome('succeeded', applied.detail, applied.rebuilt);
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      const detail = toErrorMessage(error);
      log.error(`Deployment to ${target.key} failed: ${detail}`);
      return outcome('failed', detail);
    }
  }

  private async apply(target: ServerTarget, executor: CommandExecutor, log: Logger): Promise<Applied> {
    // Opening an SSH session suspends; the run may have been superseded meanwhile
    throwIfCancelled(this.signal);
    let rebuilt: boolean | undefined;

    if (target.tasksOnly) {
      log.info('tasksOnly is set, skipping sync and container converge.');
    } else {
      await ensureRepository(executor, {
        workingDir: target.workingDirectory,
        sourceUrl: target.sourceUrl,
        allowCreate: target.allowDirectoryCreation,
        branch: target.branchFilter,
      }, log);
      throwIfCancelled(this.signal);

      const pull = await pullRepository(executor, target.workingDirectory, this.branch, log);
      throwIfCancelled(this.signal);

      rebuilt = target.forceRebuildAlways || pull.changed;
      if (!pull.changed) {
        log.info(target.forceRebuildAlways
          ? 'No new commits, rebuilding anyway (forceRebuild).'
          : 'No new commits, ensuring containers are running.');
      }

      await new ComposeStack(executor, target.workingDirectory, log).converge({
        rebuild: rebuilt,
        useElevated: target.useElevatedPrivileges,
      });
    }

    await this.runTasks(target, executor, log);

    return {
      detail: executor.mode === 'local'
        ? 'Local deployment completed.'
        : `Remote server ${executor.label} updated.`,
      rebuilt,
    };
  }

  /**
   * Post-deploy tasks in order; the first failure stops the rest
   */
  private async runTasks(target: ServerTarget, executor: CommandExecutor, log: Logger): Promise<void> {
    for (const task of target.postDeployTasks) {
      throwIfCancelled(this.signal);
      log.info(`Running task: ${task}`);
      try {
        const result = await executor.run(task, { cwd: target.workingDirectory });
        if (result.stdout) log.debug(result.stdout);
      } catch (error) {
        throw new DeployError(`Task '${task}' failed: ${toErrorMessage(error)}`, 'TASK_FAILED', { task });
      }
    }
  }
}

export interface TargetPlan {
  key: string;
  action: 'deploy' | 'skip-branch' | 'unknown-mode';
  detail: string;
  steps: string[];
}

/**
 * What deploy() would do for the target, without touching anything
 */
export function describeTargetPlan(target: ServerTarget, branch: string): TargetPlan {
  if (target.branchFilter !== branch) {
    return { key: target.key, action: 'skip-branch', detail: branchMismatchDetail(branch, target), steps: [] };
  }
  if (!isSupportedMode(target.executionMode)) {
    return { key: target.key, action: 'unknown-mode', detail: unknownModeDetail(target), steps: [] };
  }

  const where = target.remoteConnection
    ? `${target.remoteConnection.user}@${target.remoteConnection.host}:${target.remoteConnection.port}`
    : 'local';
  const steps: string[] = [];

  if (!target.tasksOnly) {
    steps.push(target.allowDirectoryCreation && target.sourceUrl
      ? `ensure ${target.workingDirectory} (clone ${target.sourceUrl} if missing)`
      : `ensure ${target.workingDirectory} exists`);
    steps.push(`git pull origin ${branch}`);
    steps.push(target.forceRebuildAlways
      ? 'compose down, then up --build (forced)'
      : 'compose up, with --build when the pull brought new commits');
  }
  for (const task of target.postDeployTasks) {
    steps.push(`task: ${task}`);
  }

  return { key: target.key, action: 'deploy', detail: `Deploy to ${where} in ${target.workingDirectory}`, steps };
}
