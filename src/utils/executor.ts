import { type } from 'os';
import { ConfigurationError, toErrorMessage } from './errors.js';
import { ensureDir, exists } from './files.js';
import { silentLogger, type Logger } from './logger.js';
import { DEFAULT_BENIGN_MARKERS, runCommand, type CommandResult } from './shell.js';

/**
 * The two compose front ends we know how to drive
 */
export type ComposeBinary = 'docker compose' | 'docker-compose';

/**
 * What a host offers for container orchestration
 */
export interface Toolchain {
  composeBinary: ComposeBinary;
  /** `uname -s` style OS name, e.g. "Linux" or "Darwin" */
  osType: string;
}

export interface ExecOptions {
  cwd?: string;
  /** Overrides the executor's default command timeout */
  timeout?: number;
  allowBenign?: boolean;
}

export interface ExecutorOptions {
  /** Default per-command timeout in ms (0: none) */
  commandTimeout?: number;
  benignMarkers?: readonly string[];
  logger?: Logger;
}

/**
 * Where a target's commands run: this machine or a remote host.
 * Both sides share one CommandResult contract and one benign-error rule.
 */
export interface CommandExecutor {
  readonly mode: 'local' | 'remote';
  /** Human label for logs and messages (hostname or "local") */
  readonly label: string;

  run(command: string, options?: ExecOptions): Promise<CommandResult>;

  directoryExists(path: string): Promise<boolean>;

  /** mkdir -p */
  makeDirectory(path: string): Promise<void>;

  /** Compose binary and OS type, detected once per executor */
  toolchain(): Promise<Toolchain>;

  /** Release the executor. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Shared plumbing: options, and the memoised toolchain detection
 */
export abstract class BaseExecutor implements CommandExecutor {
  abstract readonly mode: 'local' | 'remote';
  abstract readonly label: string;

  protected readonly commandTimeout: number;
  protected readonly benignMarkers: readonly string[];
  protected readonly logger: Logger;

  private toolchainProbe: Promise<Toolchain> | null = null;

  constructor(options: ExecutorOptions = {}) {
    this.commandTimeout = options.commandTimeout ?? 0;
    this.benignMarkers = options.benignMarkers ?? DEFAULT_BENIGN_MARKERS;
    this.logger = options.logger ?? silentLogger;
  }

  abstract run(command: string, options?: ExecOptions): Promise<CommandResult>;
  abstract directoryExists(path: string): Promise<boolean>;
  abstract makeDirectory(path: string): Promise<void>;
  abstract close(): Promise<void>;

  protected abstract detectOsType(): Promise<string>;

  toolchain(): Promise<Toolchain> {
    if (!this.toolchainProbe) {
      this.toolchainProbe = this.detectToolchain();
    }
    return this.toolchainProbe;
  }

  private async detectToolchain(): Promise<Toolchain> {
    const composeBinary = await this.detectComposeBinary();
    const osType = await this.detectOsType();
    this.logger.debug(`Toolchain on ${this.label}: ${composeBinary}, ${osType}`);
    return { composeBinary, osType };
  }

  /**
   * Prefer the `docker compose` plugin, fall back to standalone `docker-compose`
   */
  private async detectComposeBinary(): Promise<ComposeBinary> {
    try {
      await this.run('which docker', { timeout: 5000 });
      const version = await this.run('docker compose version', { timeout: 5000 });
      if (version.stdout.includes('Docker Compose version')) {
        return 'docker compose';
      }
    } catch (error) {
      this.logger.debug(`'docker compose' not available on ${this.label}: ${toErrorMessage(error)}`);
    }

    try {
      await this.run('which docker-compose', { timeout: 5000 });
      return 'docker-compose';
    } catch {
      throw new ConfigurationError(
        `Neither 'docker compose' nor 'docker-compose' found on ${this.label}.`
      );
    }
  }
}

/**
 * Runs commands as child processes of this process
 */
export class LocalExecutor extends BaseExecutor {
  readonly mode = 'local';
  readonly label = 'local';

  run(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    return runCommand(command, {
      cwd: options.cwd,
      timeout: options.timeout ?? this.commandTimeout,
      allowBenign: options.allowBenign,
      benignMarkers: this.benignMarkers,
      logger: this.logger,
    });
  }

  async directoryExists(path: string): Promise<boolean> {
    return exists(path, 'directory');
  }

  async makeDirectory(path: string): Promise<void> {
    ensureDir(path);
  }

  async close(): Promise<void> {
    // Nothing held open between commands
  }

  protected async detectOsType(): Promise<string> {
    return type();
  }
}
