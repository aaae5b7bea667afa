import { EventEmitter } from 'events';

/**
 * In-process stand-in for the ssh2 client, loaded through vi.mock('ssh2')
 */

export interface ScriptedReply {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  /** Never finish the command */
  hang?: boolean;
}

export interface FakeSshState {
  connectError: Error | null;
  connectConfigs: Record<string, unknown>[];
  commands: string[];
  ended: number;
  respond: (command: string) => ScriptedReply;
}

export const sshState: FakeSshState = {
  connectError: null,
  connectConfigs: [],
  commands: [],
  ended: 0,
  respond: () => ({}),
};

export function resetSshState(): void {
  sshState.connectError = null;
  sshState.connectConfigs = [];
  sshState.commands = [];
  sshState.ended = 0;
  sshState.respond = () => ({});
}

export class FakeChannel extends EventEmitter {
  readonly stderr = new EventEmitter();
  closed = false;

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close');
  }
}

export class FakeClient extends EventEmitter {
  connect(config: Record<string, unknown>): this {
    sshState.connectConfigs.push(config);
    setImmediate(() => {
      if (sshState.connectError) {
        this.emit('error', sshState.connectError);
      } else {
        this.emit('ready');
      }
    });
    return this;
  }

  exec(command: string, callback: (error: Error | undefined, channel: FakeChannel) => void): boolean {
    sshState.commands.push(command);
    const reply = sshState.respond(command);
    const channel = new FakeChannel();

    setImmediate(() => {
      callback(undefined, channel);
      if (reply.hang) return;
      if (reply.stdout) channel.emit('data', Buffer.from(reply.stdout));
      if (reply.stderr) channel.stderr.emit('data', Buffer.from(reply.stderr));
      channel.emit('exit', reply.exitCode ?? 0);
      channel.close();
    });
    return true;
  }

  end(): this {
    sshState.ended += 1;
    return this;
  }
}

export function parseKey(data: Buffer): { type: string } | Error {
  return data.toString('utf-8').includes('PRIVATE KEY')
    ? { type: 'ssh-ed25519' }
    : new Error('Unsupported key format');
}
