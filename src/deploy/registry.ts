import { randomUUID } from 'crypto';
import { RunCancelledError, toErrorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Work started for one (repository, branch); it must check the signal
 * at its own suspension points
 */
export type RunWork<T> = (signal: AbortSignal) => Promise<T>;

export interface RunHandle<T> {
  readonly id: string;
  readonly repository: string;
  readonly branch: string;
  readonly startedAt: Date;
  readonly signal: AbortSignal;
  /** Settles with whatever the work returns (or throws) */
  readonly result: Promise<T>;
  readonly cancelled: boolean;
  cancel(): void;
}

export interface RunSummary {
  runId: string;
  repository: string;
  branch: string;
  startedAt: string;
}

/**
 * Throw RunCancelledError at a suspension point once the run is superseded
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

function runKey(repository: string, branch: string): string {
  return JSON.stringify([repository, branch]);
}

/**
 * At most one active run per (repository, branch).
 * Submitting a new run cancels the previous one for the same key; other
 * keys run side by side. All mutation happens synchronously on the event
 * loop, so two submits for one key cannot interleave.
 */
export class RunSupersessionRegistry<T> {
  private readonly runs = new Map<string, RunHandle<T>>();

  constructor(private readonly logger: Logger = silentLogger) {}

  submit(repository: string, branch: string, work: RunWork<T>): RunHandle<T> {
    this.cancelExisting(repository, branch);

    const key = runKey(repository, branch);
    const controller = new AbortController();
    const id = randomUUID();

    // Deferred so the caller gets the handle before any work starts
    const result = Promise.resolve().then(() => work(controller.signal));

    const handle: RunHandle<T> = {
      id,
      repository,
      branch,
      startedAt: new Date(),
      signal: controller.signal,
      result,
      get cancelled() {
        return controller.signal.aborted;
      },
      cancel: () => controller.abort(),
    };

    this.runs.set(key, handle);
    this.logger.debug(`Run ${id} started for ${repository}@${branch}`);

    const release = () => {
      if (this.runs.get(key) === handle) {
        this.runs.delete(key);
      }
    };
    result.then(release, (error: unknown) => {
      release();
      this.logger.error(`Run ${id} for ${repository}@${branch} failed: ${toErrorMessage(error)}`);
    });

    return handle;
  }

  /**
   * Cancel the active run for the key, if any
   * @returns true when a run was cancelled
   */
  cancelExisting(repository: string, branch: string): boolean {
    const key = runKey(repository, branch);
    const existing = this.runs.get(key);
    if (!existing) {
      return false;
    }
    this.runs.delete(key);
    existing.cancel();
    this.logger.info(`Superseding run ${existing.id} for ${repository}@${branch}`);
    return true;
  }

  get(repository: string, branch: string): RunHandle<T> | undefined {
    return this.runs.get(runKey(repository, branch));
  }

  active(): RunHandle<T>[] {
    return [...this.runs.values()];
  }

  summaries(): RunSummary[] {
    return this.active().map(run => ({
      runId: run.id,
      repository: run.repository,
      branch: run.branch,
      startedAt: run.startedAt.toISOString(),
    }));
  }

  /**
   * Cancel every active run (shutdown)
   * @returns number of runs cancelled
   */
  cancelAll(): number {
    const runs = this.active();
    this.runs.clear();
    for (const run of runs) {
      run.cancel();
    }
    return runs.length;
  }
}
