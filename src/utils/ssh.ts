import ssh2 from 'ssh2';
import type { Client, ClientChannel } from 'ssh2';
import { readFileSync, statSync } from 'fs';
import { platform } from 'os';
import type { KeyType, RemoteConnection } from '../config/types.js';
import { CommandError, CommandTimeoutError, ConfigurationError, ConnectivityError } from './errors.js';
import { BaseExecutor, type ExecOptions, type ExecutorOptions } from './executor.js';
import { exists, shellQuote } from './files.js';
import { silentLogger, type Logger } from './logger.js';
import { settleCommand, type CommandResult } from './shell.js';

const SUPPORTED_KEY_TYPES: readonly KeyType[] = ['pem', 'ppk'];

/**
 * A private key read from disk and checked by the ssh2 key parser
 */
export interface Credential {
  keyType: KeyType;
  path: string;
  privateKey: Buffer;
}

function isKeyType(value: string): value is KeyType {
  return SUPPORTED_KEY_TYPES.some(type => type === value);
}

/**
 * Warn when a private key is readable by group or others (Unix only)
 */
export function checkKeyPermissions(keyPath: string, logger: Logger = silentLogger): boolean {
  if (platform() === 'win32') {
    return true;
  }

  const mode = statSync(keyPath).mode & 0o777;
  if (mode & 0o077) {
    const octal = mode.toString(8).padStart(3, '0');
    logger.warn(`SSH private key ${keyPath} has insecure permissions ${octal} (should be 600 or 400). Fix with: chmod 600 ${keyPath}`);
    return false;
  }
  return true;
}

/**
 * Load a private key for SSH authentication.
 * The type is checked before the file is touched.
 */
export function loadPrivateKey(keyType: string, path: string, logger: Logger = silentLogger): Credential {
  const normalized = keyType.toLowerCase();
  if (!isKeyType(normalized)) {
    throw new ConfigurationError(`Unsupported key type '${keyType}'. Use 'pem' or 'ppk'.`, { keyType });
  }

  if (!exists(path, 'file')) {
    throw new ConfigurationError(`Private key file not found: ${path}`, { path });
  }

  checkKeyPermissions(path, logger);

  const privateKey = readFileSync(path);
  const parsed = ssh2.utils.parseKey(privateKey);
  if (parsed instanceof Error) {
    throw new ConfigurationError(`Cannot use private key ${path}: ${parsed.message}`, { path });
  }

  return { keyType: normalized, path, privateKey };
}

export interface RemoteSessionOptions extends ExecutorOptions {
  /** Connect/handshake timeout in ms */
  connectTimeout?: number;
}

interface RawOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * One SSH connection to a target host; commands run serially over it
 */
export class RemoteSession extends BaseExecutor {
  readonly mode = 'remote';
  readonly label: string;

  private closed = false;

  private constructor(
    private readonly client: Client,
    private readonly connection: RemoteConnection,
    options: RemoteSessionOptions
  ) {
    super(options);
    this.label = connection.host;
  }

  /**
   * Connect and authenticate. Connection problems are not retried.
   */
  static async open(
    connection: RemoteConnection,
    credential: Credential,
    options: RemoteSessionOptions = {}
  ): Promise<RemoteSession> {
    const logger = options.logger ?? silentLogger;
    const { host, port, user } = connection;
    const client = new ssh2.Client();

    await new Promise<void>((resolve, reject) => {
      const onReady = () => {
        client.removeListener('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        client.removeListener('ready', onReady);
        client.end();
        reject(new ConnectivityError(
          `SSH connection to ${user}@${host}:${port} failed: ${error.message}`,
          { host, port, user }
        ));
      };

      client.once('ready', onReady);
      client.once('error', onError);
      client.connect({
        host,
        port,
        username: user,
        privateKey: credential.privateKey,
        readyTimeout: options.connectTimeout ?? 15000,
      });
    });

    // Late socket errors must not crash the process; the pending command fails instead
    client.on('error', (error: Error) => logger.warn(`SSH error on ${host}: ${error.message}`));
    logger.info(`SSH connected to ${host} as ${user}`);

    return new RemoteSession(client, connection, options);
  }

  async run(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    if (this.closed) {
      throw new ConnectivityError(`SSH session to ${this.label} is closed.`);
    }

    const fullCommand = options.cwd ? `cd ${shellQuote(options.cwd)} && ${command}` : command;
    this.logger.debug(`[${this.label}] $ ${fullCommand}`);

    const output = await this.exec(fullCommand, options.timeout ?? this.commandTimeout);
    if (output.stdout.trim()) this.logger.debug(`[SSH STDOUT] ${output.stdout.trim()}`);
    if (output.stderr.trim()) this.logger.debug(`[SSH STDERR] ${output.stderr.trim()}`);

    return settleCommand(fullCommand, output, {
      allowBenign: options.allowBenign,
      benignMarkers: this.benignMarkers,
      logger: this.logger,
    });
  }

  async directoryExists(path: string): Promise<boolean> {
    const result = await this.run(`[ -d ${shellQuote(path)} ] && echo "EXISTS" || echo "NOT_EXISTS"`);
    return result.stdout === 'EXISTS';
  }

  async makeDirectory(path: string): Promise<void> {
    await this.run(`mkdir -p ${shellQuote(path)}`);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
    this.logger.info(`SSH disconnected from ${this.connection.host}`);
  }

  protected async detectOsType(): Promise<string> {
    const result = await this.run('uname -s');
    return result.stdout;
  }

  /**
   * Run one command and wait for the channel to close
   */
  private exec(command: string, timeout: number): Promise<RawOutput> {
    return new Promise((resolve, reject) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let channel: ClientChannel | null = null;
      let exitCode: number | null = null;
      let settled = false;

      const timer = timeout > 0
        ? setTimeout(() => {
          settled = true;
          channel?.close();
          reject(new CommandTimeoutError(command, timeout, Buffer.concat(stderrChunks).toString('utf-8').trim()));
        }, timeout)
        : undefined;

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        reject(new CommandError(command, null, error.message));
      };

      this.client.exec(command, (error, stream) => {
        if (error) {
          fail(error);
          return;
        }
        if (settled) {
          stream.close();
          return;
        }

        channel = stream;
        stream.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
        stream.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));
        stream.on('exit', (code: number | null) => {
          exitCode = code;
        });
        stream.on('error', fail);
        stream.on('close', () => {
          if (settled) return;
          settled = true;
          if (timer) clearTimeout(timer);
          resolve({
            stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
            stderr: Buffer.concat(stderrChunks).toString('utf-8'),
            // Killed by a signal: report like ssh(1) does
            exitCode: exitCode ?? 255,
          });
        });
      });
    });
  }
}
