import { ConfigurationError } from './errors.js';
import type { CommandExecutor } from './executor.js';
import { parentDir, shellQuote } from './files.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * git's message when a pull fetched nothing new.
 * Older releases hyphenate it ("Already up-to-date.").
 */
const NO_CHANGE_PATTERN = /already up[ -]to[ -]date/i;

/**
 * Whether pull output says the checkout was already current.
 * This is a string check on git's output, so it depends on git's language
 * and version; a commit-hash comparison would not.
 */
export function pullIndicatesNoChange(rawOutput: string): boolean {
  return NO_CHANGE_PATTERN.test(rawOutput);
}

export interface EnsureRepositoryOptions {
  workingDir: string;
  sourceUrl?: string;
  allowCreate: boolean;
  branch: string;
}

export interface PullResult {
  /** False only when git reported the branch was already up to date */
  changed: boolean;
  rawOutput: string;
}

/**
 * Make sure the checkout exists, cloning it when allowed
 * @returns 'present' if the directory was already there, 'cloned' otherwise
 */
export async function ensureRepository(
  executor: CommandExecutor,
  options: EnsureRepositoryOptions,
  logger: Logger = silentLogger
): Promise<'present' | 'cloned'> {
  const { workingDir, sourceUrl, allowCreate, branch } = options;
  const where = executor.mode === 'local' ? 'locally' : `on ${executor.label}`;

  if (await executor.directoryExists(workingDir)) {
    logger.debug(`Directory '${workingDir}' already exists ${where}.`);
    return 'present';
  }

  if (!allowCreate) {
    throw new ConfigurationError(
      `Directory '${workingDir}' does not exist ${where}. ` +
      `Set 'createDir: true' if you want to attempt creating and cloning the repository.`
    );
  }

  if (!sourceUrl) {
    throw new ConfigurationError(`'cloneUrl' is not specified, cannot clone into '${workingDir}'.`);
  }

  const parent = parentDir(workingDir);
  if (parent && !(await executor.directoryExists(parent))) {
    logger.info(`Creating parent directory ${parent} ${where}`);
    await executor.makeDirectory(parent);
  }

  logger.info(`Directory '${workingDir}' not found ${where}. Cloning branch ${branch}...`);
  await executor.run(
    `git clone --branch ${branch} ${shellQuote(sourceUrl)} ${shellQuote(workingDir)}`,
    { cwd: parent ?? undefined }
  );
  return 'cloned';
}

/**
 * git pull for one branch inside the checkout
 */
export async function pullRepository(
  executor: CommandExecutor,
  workingDir: string,
  branch: string,
  logger: Logger = silentLogger
): Promise<PullResult> {
  const result = await executor.run(`git pull origin ${branch}`, { cwd: workingDir });
  const changed = !pullIndicatesNoChange(result.stdout);
  logger.debug(`Pull output: ${result.stdout}`);
  return { changed, rawOutput: result.stdout };
}
