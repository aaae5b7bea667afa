import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { ChainDeployConfig } from '../config/schema.js';
import type { ChainResult } from '../deploy/chain.js';
import type { DeploymentService } from '../deploy/service.js';
import { ConfigurationError, DeployError, toErrorMessage } from '../utils/errors.js';
import type { CommandExecutor } from '../utils/executor.js';
import { shellQuote } from '../utils/files.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Notifier } from '../utils/notifications.js';
import { branchFromRef, deployRequestSchema, listFilesQuerySchema, pushPayloadSchema } from './schemas.js';
import { safeEqual, verifySignature } from './signature.js';

export interface AppOptions {
  config: ChainDeployConfig;
  service: DeploymentService;
  notifier: Notifier;
  /** Where /test-command and /list-files run; the local machine in production */
  diagnosticsExecutor: CommandExecutor;
  logger?: Logger;
}

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Express 4 does not forward rejected promises to the error handler
 */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a webhook body: JSON, or a form field named `payload` holding JSON
 */
export function decodeWebhookBody(body: Buffer, contentType: string): unknown {
  const text = body.toString('utf-8');
  if (contentType.includes('application/json')) {
    return JSON.parse(text);
  }
  if (contentType.includes('application/x-www-form-urlencoded')) {
    const payload = new URLSearchParams(text).get('payload');
    if (payload === null) {
      throw new Error('No payload parameter in form data');
    }
    return JSON.parse(payload);
  }
  throw new Error(`Unsupported Content-Type: ${contentType || 'none'}`);
}

function chainFailed(result: ChainResult): boolean {
  return result.status === 'failed' || result.status === 'unknown-target';
}

export function createApp(options: AppOptions): Express {
  const { config, service, notifier, diagnosticsExecutor } = options;
  const logger = options.logger ?? silentLogger;
  const app = express();

  const requireApiKey: RequestHandler = (req, _res, next) => {
    if (!config.deployApiKey) {
      next(new HttpError(403, 'No deployApiKey configured; this endpoint is disabled.'));
      return;
    }
    const provided = req.get('X-API-Key');
    if (!provided || !safeEqual(provided, config.deployApiKey)) {
      next(new HttpError(401, 'Invalid or missing API key.'));
      return;
    }
    next();
  };

  app.get('/health', (_req, res) => {
    res.json({ status: 'OK' });
  });

  app.post('/webhook', express.raw({ type: () => true, limit: '5mb' }), asyncHandler(async (req, res) => {
    logger.info('Webhook endpoint was called.');
    const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const signature = req.get('X-Hub-Signature-256');

    if (!signature) {
      logger.error('Missing X-Hub-Signature-256 header.');
      throw new HttpError(400, 'Missing signature header');
    }
    if (!config.webhookSecret) {
      logger.debug('webhookSecret is empty, skipping signature verification.');
    }
    if (!verifySignature(body, signature, config.webhookSecret)) {
      logger.warn('Invalid signature.');
      await notifier.notifyDeployEvent('unknown', 'unknown', 'failed', 'Invalid signature.');
      throw new HttpError(403, 'Invalid signature');
    }

    let payload: unknown;
    try {
      payload = decodeWebhookBody(body, req.get('Content-Type') ?? '');
    } catch (error) {
      logger.error(`Could not decode JSON payload: ${toErrorMessage(error)}`);
      await notifier.notifyDeployEvent('unknown', 'unknown', 'failed', 'Invalid JSON payload.');
      throw new HttpError(400, 'Invalid JSON payload');
    }

    const event = req.get('X-GitHub-Event');
    if (event === 'ping' || (isRecord(payload) && 'zen' in payload)) {
      logger.info('Received ping event from GitHub.');
      const zen = isRecord(payload) ? payload.zen : undefined;
      res.json({ message: 'Ping successful.', zen });
      return;
    }

    if (event && event !== 'push') {
      logger.info(`Ignoring '${event}' event.`);
      res.status(202).json({ message: `Event '${event}' ignored.` });
      return;
    }

    const parsed = pushPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      logger.error(`Invalid payload: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      await notifier.notifyDeployEvent('unknown', 'unknown', 'failed', 'Invalid payload.');
      throw new HttpError(400, 'Invalid payload');
    }

    const repository = parsed.data.repository.full_name;
    const branch = branchFromRef(parsed.data.ref);
    logger.info(`Received webhook for repo: ${repository}, branch: ${branch}`);

    if (!service.hasRepository(repository)) {
      const message = `Repository '${repository}' not configured for deployment.`;
      logger.warn(message);
      await notifier.notifyDeployEvent(repository, branch, 'failed', message);
      throw new HttpError(400, message);
    }

    const run = service.start(repository, branch);
    res.status(202).json({
      message: `Deployment chain started for ${repository} on branch ${branch}.`,
      runId: run.id,
    });
  }));

  app.post('/deploy', requireApiKey, express.json(), asyncHandler(async (req, res) => {
    const parsed = deployRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
    }

    const { repository_full_name: repository, wait } = parsed.data;
    const branch = parsed.data.branch ?? config.defaultBranch;
    logger.info(`Manual deployment triggered for repo: ${repository}, branch: ${branch}`);

    if (!service.hasRepository(repository)) {
      const message = `Repository '${repository}' not configured for deployment.`;
      await notifier.notifyDeployEvent(repository, branch, 'failed', message);
      throw new HttpError(400, message);
    }

    const run = service.start(repository, branch);
    if (!wait) {
      res.status(202).json({ message: `Deployment chain started for ${repository}, branch: ${branch}.`, runId: run.id });
      return;
    }

    const result = await run.result;
    if (result.status === 'cancelled') {
      res.status(409).json({ detail: result.detail, result });
    } else if (chainFailed(result)) {
      res.status(500).json({ detail: result.detail, result });
    } else {
      res.json({
        message: `Deployment chain completed for ${repository}, branch: ${branch}.`,
        runId: run.id,
        result,
      });
    }
  }));

  app.get('/runs', requireApiKey, (_req, res) => {
    res.json({ runs: service.activeRuns() });
  });

  app.get('/test-command', requireApiKey, asyncHandler(async (_req, res) => {
    logger.info('Test command endpoint was called.');
    const git = await diagnosticsExecutor.run('git --version');
    const { composeBinary } = await diagnosticsExecutor.toolchain();
    const compose = await diagnosticsExecutor.run(`${composeBinary} version`);
    res.json({
      git_version: git.stdout || 'No output',
      compose_binary: composeBinary,
      docker_compose_version: compose.stdout || 'No output',
    });
  }));

  app.get('/list-files', requireApiKey, asyncHandler(async (req, res) => {
    const parsed = listFilesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues.map(i => `${i.path.join('.') || 'query'}: ${i.message}`).join('; '));
    }

    const { repository_full_name: repository, branch } = parsed.data;
    logger.info(`Listing files for repository: ${repository}, branch: ${branch ?? 'default'}`);

    if (!service.hasRepository(repository)) {
      throw new HttpError(400, `Repository '${repository}' not configured for deployment.`);
    }

    const localTargets = service.targetsFor(repository).filter(t => t.executionMode === 'local');
    const [first] = localTargets;
    if (!first) {
      throw new HttpError(400, `Repository '${repository}' has no local target.`);
    }

    const target = branch === undefined ? first : localTargets.find(t => t.branchFilter === branch);
    if (!target) {
      logger.info(`Listing files for branch '${branch}' ignored (expected '${first.branchFilter}')`);
      res.json({ message: `Listing files for branch '${branch}' ignored. Expected branch '${first.branchFilter}'.` });
      return;
    }

    const directory = target.workingDirectory;
    if (!(await diagnosticsExecutor.directoryExists(directory))) {
      throw new HttpError(500, `Deploy directory '${directory}' does not exist.`);
    }

    const listing = await diagnosticsExecutor.run(`ls -A ${shellQuote(directory)}`);
    res.json({
      repository,
      branch: target.branchFilter,
      target: target.key,
      directory,
      files: listing.stdout.split('\n').filter(Boolean),
    });
  }));

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ detail: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ detail: 'Invalid JSON body' });
      return;
    }
    if (err instanceof ConfigurationError) {
      res.status(400).json({ detail: err.message, code: err.code });
      return;
    }
    logger.error(`Request failed: ${toErrorMessage(err)}`);
    res.status(500).json({
      detail: toErrorMessage(err),
      code: err instanceof DeployError ? err.code : 'INTERNAL_ERROR',
    });
  });

  return app;
}
