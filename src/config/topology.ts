import { ConfigurationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { ChainDeployConfig, RepositoryConfig, TargetConfig } from './schema.js';
import type { ServerTarget } from './types.js';

const keyCollator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/**
 * Ascending ordinal order: server2 before server10
 */
export function compareTargetKeys(a: string, b: string): number {
  return keyCollator.compare(a, b);
}

export function toServerTarget(key: string, config: TargetConfig): ServerTarget {
  const target: ServerTarget = {
    key,
    executionMode: config.target,
    branchFilter: config.branch,
    workingDirectory: config.deployDir,
    sourceUrl: config.cloneUrl,
    allowDirectoryCreation: config.createDir,
    forceRebuildAlways: config.forceRebuild,
    useElevatedPrivileges: config.sudo,
    postDeployTasks: [...config.tasks],
    tasksOnly: config.tasksOnly,
  };

  if (config.target === 'remote' && config.host && config.user && config.keyPath) {
    target.remoteConnection = {
      host: config.host,
      port: config.port,
      user: config.user,
      keyType: config.keyType,
      keyPath: config.keyPath,
    };
  }

  return target;
}

/**
 * Ordered ServerTarget list for one repository's topology
 */
export function resolveTargets(repository: RepositoryConfig, logger: Logger = silentLogger): ServerTarget[] {
  for (const key of repository.ignoredKeys) {
    logger.info(`Skipping '${key}' as it's not recognized as a server definition.`);
  }

  return Object.keys(repository.targets)
    .sort(compareTargetKeys)
    .map(key => toServerTarget(key, repository.targets[key]));
}

/**
 * Look up a repository by full name (owner/name)
 * @throws ConfigurationError when the repository is not configured
 */
export function getRepositoryTargets(
  config: ChainDeployConfig,
  repository: string,
  logger: Logger = silentLogger
): ServerTarget[] {
  const topology = config.repositories[repository];
  if (!topology) {
    throw new ConfigurationError(`Repository '${repository}' not configured for deployment.`);
  }
  return resolveTargets(topology, logger);
}
