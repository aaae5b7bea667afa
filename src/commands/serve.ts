import chalk from 'chalk';
import { loadConfig } from '../config/loader.js';
import { DeploymentService } from '../deploy/service.js';
import { createApp } from '../server/app.js';
import { LocalExecutor } from '../utils/executor.js';
import { createLogger, resolveLogLevel } from '../utils/logger.js';
import { ChannelNotifier } from '../utils/notifications.js';

export interface ServeOptions {
  config?: string;
  port?: number;
  host?: string;
}

const DIAGNOSTICS_TIMEOUT = 30000;

/**
 * Serve command - run the webhook/deploy HTTP server until SIGINT/SIGTERM
 */
export async function serveCommand(options: ServeOptions = {}): Promise<void> {
  const bootLogger = createLogger({ scope: 'config' });
  const config = loadConfig(options.config, bootLogger);
  const logger = createLogger({ scope: 'server', level: resolveLogLevel(config.debug) });

  const notifier = new ChannelNotifier(config.notifications, logger.child('notify'));
  const service = new DeploymentService({ config, notifier, logger });
  const app = createApp({
    config,
    service,
    notifier,
    diagnosticsExecutor: new LocalExecutor({
      commandTimeout: DIAGNOSTICS_TIMEOUT,
      benignMarkers: config.benignErrorMarkers,
      logger: logger.child('diagnostics'),
    }),
    logger: logger.child('http'),
  });

  if (!config.webhookSecret) {
    logger.warn('webhookSecret is empty: webhook signatures are not verified.');
  }

  const port = options.port ?? config.server.port;
  const host = options.host ?? config.server.host;

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.success(`Listening on ${chalk.bold(`http://${host}:${port}`)}`);
      logger.info(`Repositories: ${Object.keys(config.repositories).join(', ') || 'none'}`);
    });
    server.once('error', reject);

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received, shutting down.`);
      service.shutdown();
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
