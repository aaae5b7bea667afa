import { spawn } from 'child_process';
import { CommandError, CommandTimeoutError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * stderr fragments of harmless teardown failures
 * (nothing to stop, network still has containers attached)
 */
export const DEFAULT_BENIGN_MARKERS: readonly string[] = [
  'No container found',
  'No containers to remove',
  'has active endpoints',
];

/**
 * Outcome of one executed command
 */
export interface CommandResult {
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Non-zero exit tolerated because stderr matched a benign marker */
  benign: boolean;
}

export interface RunOptions {
  /** Working directory */
  cwd?: string;
  /** Kill the command after this many milliseconds (0 or unset: no limit) */
  timeout?: number;
  /** Tolerate non-zero exits whose stderr matches a benign marker */
  allowBenign?: boolean;
  benignMarkers?: readonly string[];
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export type BenignErrorPredicate = (stderr: string) => boolean;

/**
 * One substring predicate per marker
 */
export function benignPredicates(markers: readonly string[] = DEFAULT_BENIGN_MARKERS): BenignErrorPredicate[] {
  return markers.map(marker => (stderr: string) => stderr.includes(marker));
}

export function isBenignError(stderr: string, markers: readonly string[] = DEFAULT_BENIGN_MARKERS): boolean {
  return benignPredicates(markers).some(matches => matches(stderr));
}

/**
 * Turn a finished command into a result, or throw when the exit is a real failure.
 * Shared by local and remote execution so both apply the same benign rule.
 */
export function settleCommand(
  command: string,
  output: { stdout: string; stderr: string; exitCode: number },
  options: Pick<RunOptions, 'allowBenign' | 'benignMarkers' | 'logger'> = {}
): CommandResult {
  const stdout = output.stdout.trim();
  const stderr = output.stderr.trim();

  if (output.exitCode === 0) {
    return { command, stdout, stderr, exitCode: 0, benign: false };
  }

  if (options.allowBenign && isBenignError(stderr, options.benignMarkers)) {
    (options.logger ?? silentLogger).warn(`Ignoring benign error while running '${command}': ${stderr}`);
    return { command, stdout, stderr, exitCode: output.exitCode, benign: true };
  }

  throw new CommandError(command, output.exitCode, stderr);
}

/**
 * Execute a shell command and capture its output.
 * Resolves once the process has exited and both streams are drained.
 */
export function runCommand(command: string, options: RunOptions = {}): Promise<CommandResult> {
  const logger = options.logger ?? silentLogger;
  logger.debug(`$ ${command}${options.cwd ? ` (in ${options.cwd})` : ''}`);

  return new Promise((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: true,
      // Own process group so a timeout kills the whole pipeline, not just the shell
      detached: process.platform !== 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = options.timeout && options.timeout > 0
      ? setTimeout(() => {
        timedOut = true;
        killTree(child.pid, () => child.kill('SIGKILL'));
      }, options.timeout)
      : undefined;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      fn();
    };

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    child.on('error', (error) => {
      finish(() => reject(new CommandError(command, null, error.message)));
    });

    child.on('close', (code, signal) => {
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');

      finish(() => {
        if (timedOut) {
          reject(new CommandTimeoutError(command, options.timeout ?? 0, stderr.trim()));
          return;
        }
        if (stdout.trim()) logger.debug(stdout.trim());
        try {
          resolve(settleCommand(command, { stdout, stderr, exitCode: code ?? signalExitCode(signal) }, options));
        } catch (error) {
          reject(error);
        }
      });
    });
  });
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  // Shell convention: 128 + signal number; SIGTERM when unknown
  return signal === 'SIGKILL' ? 137 : 143;
}

function killTree(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || process.platform === 'win32') {
    fallback();
    return;
  }
  try {
    process.kill(-pid, 'SIGKILL');
  } catch {
    fallback();
  }
}
