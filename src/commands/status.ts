import chalk from 'chalk';
import { listRepositories, loadConfig } from '../config/loader.js';
import type { ChainDeployConfig } from '../config/schema.js';
import { resolveTargets } from '../config/topology.js';
import { createLogger } from '../utils/logger.js';

export interface StatusOptions {
  config?: string;
}

/**
 * Repositories and their targets in chain order
 */
export function formatStatus(config: ChainDeployConfig): string[] {
  const repositories = listRepositories(config);
  if (repositories.length === 0) {
    return ['No repositories configured.'];
  }

  const lines: string[] = [];
  for (const name of repositories) {
    const targets = resolveTargets(config.repositories[name]);
    lines.push(name);
    for (const target of targets) {
      const where = target.remoteConnection
        ? `${target.remoteConnection.user}@${target.remoteConnection.host}:${target.remoteConnection.port}`
        : target.executionMode;
      const flags = [
        target.forceRebuildAlways ? 'forceRebuild' : '',
        target.tasksOnly ? 'tasksOnly' : '',
        target.postDeployTasks.length > 0 ? `${target.postDeployTasks.length} task(s)` : '',
      ].filter(Boolean);
      lines.push(
        `  ${target.key}: ${where} ${target.workingDirectory} (branch ${target.branchFilter})` +
        (flags.length > 0 ? ` [${flags.join(', ')}]` : '')
      );
    }
  }
  return lines;
}

/**
 * Status command - show configured repositories and targets
 */
export async function statusCommand(options: StatusOptions = {}): Promise<void> {
  const config = loadConfig(options.config, createLogger({ scope: 'config', level: 'warn' }));
  console.log(chalk.blue('Deployment Chains'));
  console.log('');
  for (const line of formatStatus(config)) {
    console.log(line.startsWith('  ') ? chalk.gray(line) : chalk.white(line));
  }
  console.log('');
}
