import { isRemoteTarget, type ServerTarget } from '../config/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { LocalExecutor, type CommandExecutor } from '../utils/executor.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { loadPrivateKey, RemoteSession } from '../utils/ssh.js';

/**
 * Opens the executor a target's commands should go through
 */
export type ExecutorFactory = (target: ServerTarget) => Promise<CommandExecutor>;

export interface ExecutorFactoryOptions {
  connectTimeout?: number;
  commandTimeout?: number;
  benignMarkers?: readonly string[];
  logger?: Logger;
}

export function createExecutorFactory(options: ExecutorFactoryOptions = {}): ExecutorFactory {
  const logger = options.logger ?? silentLogger;

  return async (target) => {
    const executorOptions = {
      commandTimeout: options.commandTimeout,
      benignMarkers: options.benignMarkers,
    };

    if (target.executionMode === 'local') {
      return new LocalExecutor({ ...executorOptions, logger: logger.child('local') });
    }

    if (target.executionMode === 'remote') {
      if (!isRemoteTarget(target)) {
        throw new ConfigurationError(`Target '${target.key}' is remote but has no host, user or keyPath.`);
      }
      const { remoteConnection } = target;
      const credential = loadPrivateKey(remoteConnection.keyType, remoteConnection.keyPath, logger);
      return RemoteSession.open(remoteConnection, credential, {
        ...executorOptions,
        connectTimeout: options.connectTimeout,
        logger: logger.child(`ssh:${remoteConnection.host}`),
      });
    }

    throw new ConfigurationError(`Unknown target '${target.executionMode}' for ${target.key}.`);
  };
}

/**
 * Open an executor for the target, run `fn`, and always close it once
 */
export async function withExecutor<T>(
  factory: ExecutorFactory,
  target: ServerTarget,
  fn: (executor: CommandExecutor) => Promise<T>
): Promise<T> {
  const executor = await factory(target);
  try {
    return await fn(executor);
  } finally {
    await executor.close();
  }
}
