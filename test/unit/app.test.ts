import { describe, test, expect, afterEach, vi } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { parseConfig } from '../../src/config/loader.js';
import { DeploymentService } from '../../src/deploy/service.js';
import { createApp, decodeWebhookBody } from '../../src/server/app.js';
import { signPayload } from '../../src/server/signature.js';
import { deferred, fakeFactory, FakeExecutor, RecordingNotifier, type Responder } from '../helpers/fakes.js';

const SECRET = 'test-secret';
const API_KEY = 'test-key';

const servers: Server[] = [];

afterEach(() => {
  for (const server of servers.splice(0)) {
    server.closeAllConnections();
    server.close();
  }
});

interface StartOptions {
  respond?: Responder;
  deployApiKey?: string;
  /** Directories that exist on the diagnostics host */
  localDirectories?: string[];
}

async function start(options: StartOptions = {}) {
  const config = parseConfig({
    webhookSecret: SECRET,
    deployApiKey: options.deployApiKey ?? API_KEY,
    repositories: {
      'acme/app': { server1: { target: 'local', deployDir: '/srv/app' } },
      'acme/api': {
        server1: { target: 'remote', host: '10.0.0.5', user: 'deploy', keyPath: '/keys/deploy.pem', deployDir: '/srv/api' },
        server2: { target: 'local', branch: 'main', deployDir: '/srv/api' },
        server3: { target: 'local', branch: 'staging', deployDir: '/srv/api-staging' },
      },
      'acme/remote': {
        server1: { target: 'remote', host: '10.0.0.6', user: 'deploy', keyPath: '/keys/deploy.pem', deployDir: '/srv/remote' },
      },
    },
  });
  const notifier = new RecordingNotifier();
  const { factory } = fakeFactory(() => new FakeExecutor({
    directories: ['/srv/app'],
    respond: options.respond ?? ((command) => command.startsWith('git pull') ? { stdout: 'Already up to date.' } : undefined),
  }));
  const service = new DeploymentService({ config, notifier, executorFactory: factory });
  const diagnosticsExecutor = new FakeExecutor({
    directories: options.localDirectories ?? [],
    respond: (command) => {
      if (command === 'ls -A "/srv/app"') return { stdout: '.env\ndocker-compose.yml\nsrc\n' };
      if (command === 'ls -A "/srv/api-staging"') return { stdout: 'docker-compose.yml' };
      if (command === 'git --version') return { stdout: 'git version 2.43.0\n' };
      if (command === 'docker compose version') return { stdout: 'Docker Compose version v2.27.0' };
      return undefined;
    },
  });

  const server = createApp({ config, service, notifier, diagnosticsExecutor }).listen(0, '127.0.0.1');
  servers.push(server);
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  return { base: `http://127.0.0.1:${address.port}`, notifier, service };
}

const pushBody = (repository = 'acme/app', ref = 'refs/heads/main') =>
  JSON.stringify({ ref, repository: { full_name: repository } });

function postWebhook(
  base: string,
  body: string,
  options: { event?: string; signature?: string | null; contentType?: string } = {}
) {
  const headers: Record<string, string> = {
    'Content-Type': options.contentType ?? 'application/json',
    'X-GitHub-Event': options.event ?? 'push',
  };
  const signature = options.signature === undefined ? signPayload(body, SECRET) : options.signature;
  if (signature !== null) {
    headers['X-Hub-Signature-256'] = signature;
  }
  return fetch(`${base}/webhook`, { method: 'POST', headers, body });
}

function postDeploy(base: string, body: unknown, apiKey: string | null = API_KEY) {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (apiKey !== null) {
    headers['X-API-Key'] = apiKey;
  }
  return fetch(`${base}/deploy`, { method: 'POST', headers, body: JSON.stringify(body) });
}

describe('decodeWebhookBody', () => {
  test('reads JSON and form payloads', () => {
    expect(decodeWebhookBody(Buffer.from('{"a":1}'), 'application/json; charset=utf-8')).toEqual({ a: 1 });
    expect(decodeWebhookBody(Buffer.from('payload=%7B%22a%22%3A1%7D'), 'application/x-www-form-urlencoded')).toEqual({ a: 1 });
  });

  test('rejects a form without payload and unknown content types', () => {
    expect(() => decodeWebhookBody(Buffer.from('other=1'), 'application/x-www-form-urlencoded'))
      .toThrow('No payload parameter in form data');
    expect(() => decodeWebhookBody(Buffer.from('x'), 'text/plain')).toThrow('Unsupported Content-Type: text/plain');
  });
});

describe('GET /health', () => {
  test('answers OK', async () => {
    const { base } = await start();
    const response = await fetch(`${base}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'OK' });
  });
});

describe('POST /webhook', () => {
  test('a missing signature header is a bad request', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, pushBody(), { signature: null });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Missing signature header' });
    expect(notifier.events).toEqual([]);
  });

  test('a wrong signature is forbidden and reported', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, pushBody(), { signature: signPayload(pushBody(), 'other-secret') });
    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({ detail: 'Invalid signature' });
    expect(notifier.events).toEqual([
      { repository: 'unknown', branch: 'unknown', status: 'failed', details: 'Invalid signature.' },
    ]);
  });

  test('an undecodable body is reported', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, 'not json');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Invalid JSON payload' });
    expect(notifier.events.map(e => e.details)).toEqual(['Invalid JSON payload.']);
  });

  test('answers a ping with its zen', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, JSON.stringify({ zen: 'Keep it simple.' }), { event: 'ping' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: 'Ping successful.', zen: 'Keep it simple.' });
    expect(notifier.events).toEqual([]);
  });

  test('ignores events other than push', async () => {
    const { base } = await start();
    const response = await postWebhook(base, pushBody(), { event: 'issues' });
    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ message: "Event 'issues' ignored." });
  });

  test('a payload without ref is invalid', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, JSON.stringify({ repository: { full_name: 'acme/app' } }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Invalid payload' });
    expect(notifier.events.map(e => e.details)).toEqual(['Invalid payload.']);
  });

  test('an unconfigured repository is rejected and reported', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, pushBody('acme/other'));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Repository 'acme/other' not configured for deployment." });
    expect(notifier.events).toEqual([{
      repository: 'acme/other',
      branch: 'main',
      status: 'failed',
      details: "Repository 'acme/other' not configured for deployment.",
    }]);
  });

  test('a signed push starts the chain in the background', async () => {
    const { base, notifier } = await start();
    const response = await postWebhook(base, pushBody());
    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      message: 'Deployment chain started for acme/app on branch main.',
      runId: expect.any(String),
    });

    await vi.waitFor(() => {
      expect(notifier.events.map(e => e.details)).toContain('All servers deployed.');
    });
  });

  test('accepts a form-encoded payload', async () => {
    const { base, notifier } = await start();
    const body = `payload=${encodeURIComponent(pushBody())}`;
    const response = await postWebhook(base, body, { contentType: 'application/x-www-form-urlencoded' });
    expect(response.status).toBe(202);

    await vi.waitFor(() => {
      expect(notifier.events.map(e => e.details)).toContain('All servers deployed.');
    });
  });
});

describe('POST /deploy', () => {
  test('requires the API key', async () => {
    const { base } = await start();
    for (const key of [null, 'wrong-key']) {
      const response = await postDeploy(base, { repository_full_name: 'acme/app' }, key);
      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: 'Invalid or missing API key.' });
    }
  });

  test('is disabled without a configured key', async () => {
    const { base } = await start({ deployApiKey: '' });
    const response = await postDeploy(base, { repository_full_name: 'acme/app' });
    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({ detail: 'No deployApiKey configured; this endpoint is disabled.' });
  });

  test('validates the body', async () => {
    const { base } = await start();
    const response = await postDeploy(base, { branch: 'main' });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'repository_full_name: Required' });
  });

  test('rejects malformed JSON', async () => {
    const { base } = await start();
    const response = await fetch(`${base}/deploy`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-API-Key': API_KEY },
      body: '{"repository_full_name":',
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Invalid JSON body' });
  });

  test('an unconfigured repository is rejected', async () => {
    const { base } = await start();
    const response = await postDeploy(base, { repository_full_name: 'acme/other' });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Repository 'acme/other' not configured for deployment." });
  });

  test('starts on the default branch without waiting', async () => {
    const { base, notifier } = await start();
    const response = await postDeploy(base, { repository_full_name: 'acme/app' });
    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      message: 'Deployment chain started for acme/app, branch: main.',
      runId: expect.any(String),
    });

    await vi.waitFor(() => {
      expect(notifier.events.map(e => e.details)).toContain('All servers deployed.');
    });
  });

  test('wait answers with the chain result', async () => {
    const { base } = await start();
    const response = await postDeploy(base, { repository_full_name: 'acme/app', branch: 'main', wait: true });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      message: 'Deployment chain completed for acme/app, branch: main.',
      result: {
        repository: 'acme/app',
        branch: 'main',
        status: 'successful',
        detail: 'All servers deployed.',
        outcomes: [{ key: 'server1', status: 'succeeded', detail: 'Local deployment completed.', rebuilt: false }],
      },
    });
  });

  test('wait turns a failed chain into a server error', async () => {
    const { base } = await start({
      respond: (command) => command.startsWith('git pull') ? { stderr: 'boom', exitCode: 1 } : undefined,
    });
    const response = await postDeploy(base, { repository_full_name: 'acme/app', wait: true });
    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({
      detail: "Deployment failed on server1: Command 'git pull origin main' failed with exit code 1. Error: boom",
      result: { status: 'failed' },
    });
  });

  test('wait reports a superseded run as a conflict', async () => {
    const gate = deferred();
    let pulls = 0;
    const { base } = await start({
      respond: async (command) => {
        if (!command.startsWith('git pull')) return undefined;
        pulls += 1;
        if (pulls === 1) await gate.promise;
        return { stdout: 'Already up to date.' };
      },
    });

    const waiting = postDeploy(base, { repository_full_name: 'acme/app', wait: true });
    await vi.waitFor(() => expect(pulls).toBe(1));
    const second = await postDeploy(base, { repository_full_name: 'acme/app', wait: true });
    expect(second.status).toBe(200);
    gate.resolve();

    const first = await waiting;
    expect(first.status).toBe(409);
    expect(await first.json()).toMatchObject({
      detail: 'Deployment superseded by a newer push.',
      result: { status: 'cancelled', outcomes: [] },
    });
  });
});

describe('GET /runs', () => {
  test('lists the active runs', async () => {
    const gate = deferred();
    const { base } = await start({
      respond: async (command) => {
        if (command.startsWith('git pull')) await gate.promise;
        return undefined;
      },
    });
    const headers = { 'X-API-Key': API_KEY };

    expect(await (await fetch(`${base}/runs`, { headers })).json()).toEqual({ runs: [] });

    const started = await postDeploy(base, { repository_full_name: 'acme/app', branch: 'main' });
    expect(started.status).toBe(202);
    const response = await fetch(`${base}/runs`, { headers });
    expect(await response.json()).toEqual({
      runs: [{ runId: expect.any(String), repository: 'acme/app', branch: 'main', startedAt: expect.any(String) }],
    });
    gate.resolve();
  });
});

describe('GET /test-command', () => {
  test('reports the git and compose versions', async () => {
    const { base } = await start();
    const response = await fetch(`${base}/test-command`, { headers: { 'X-API-Key': API_KEY } });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      git_version: 'git version 2.43.0',
      compose_binary: 'docker compose',
      docker_compose_version: 'Docker Compose version v2.27.0',
    });
  });
});

describe('GET /list-files', () => {
  const listFiles = (base: string, query: string, apiKey: string | null = API_KEY) =>
    fetch(`${base}/list-files?${query}`, { headers: apiKey === null ? {} : { 'X-API-Key': apiKey } });

  test('requires the API key', async () => {
    const { base } = await start({ localDirectories: ['/srv/app'] });
    const response = await listFiles(base, 'repository_full_name=acme/app', null);
    expect(response.status).toBe(401);
  });

  test('requires a repository', async () => {
    const { base } = await start();
    const response = await listFiles(base, 'branch=main');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'repository_full_name: Required' });
  });

  test('an unconfigured repository is a bad request', async () => {
    const { base } = await start();
    const response = await listFiles(base, 'repository_full_name=acme/other');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Repository 'acme/other' not configured for deployment." });
  });

  test('a repository without local targets is a bad request', async () => {
    const { base } = await start();
    const response = await listFiles(base, 'repository_full_name=acme/remote');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: "Repository 'acme/remote' has no local target." });
  });

  test('lists the deploy directory of the first local target', async () => {
    const { base } = await start({ localDirectories: ['/srv/app'] });
    const response = await listFiles(base, 'repository_full_name=acme/app');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      repository: 'acme/app',
      branch: 'main',
      target: 'server1',
      directory: '/srv/app',
      files: ['.env', 'docker-compose.yml', 'src'],
    });
  });

  test('picks the local target deploying the requested branch', async () => {
    const { base } = await start({ localDirectories: ['/srv/api', '/srv/api-staging'] });
    const response = await listFiles(base, 'repository_full_name=acme/api&branch=staging');
    expect(await response.json()).toEqual({
      repository: 'acme/api',
      branch: 'staging',
      target: 'server3',
      directory: '/srv/api-staging',
      files: ['docker-compose.yml'],
    });
  });

  test('a branch no local target deploys is ignored', async () => {
    const { base } = await start({ localDirectories: ['/srv/app'] });
    const response = await listFiles(base, 'repository_full_name=acme/app&branch=dev');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: "Listing files for branch 'dev' ignored. Expected branch 'main'." });
  });

  test('a missing deploy directory is a server error', async () => {
    const { base } = await start();
    const response = await listFiles(base, 'repository_full_name=acme/app');
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Deploy directory '/srv/app' does not exist." });
  });
});

describe('unknown routes', () => {
  test('answer 404', async () => {
    const { base } = await start();
    const response = await fetch(`${base}/nope`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Not Found' });
  });
});
