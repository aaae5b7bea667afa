import type { CommandExecutor, ComposeBinary } from './executor.js';
import { silentLogger, type Logger } from './logger.js';

export interface ConvergeOptions {
  /** Tear the stack down and rebuild images, instead of just ensuring it runs */
  rebuild: boolean;
  /** Explicit sudo flag; undefined means infer from the host OS */
  useElevated?: boolean;
}

/**
 * sudo when asked for, or when not specified and the host runs Linux
 */
export function elevationPrefix(useElevated: boolean | undefined, osType: string): string {
  if (useElevated !== undefined) {
    return useElevated ? 'sudo ' : '';
  }
  return osType.includes('Linux') ? 'sudo ' : '';
}

export interface ComposeCommands {
  down?: string;
  up: string;
}

export function composeCommands(binary: ComposeBinary, prefix: string, rebuild: boolean): ComposeCommands {
  const compose = `${prefix}${binary}`;
  if (!rebuild) {
    return { up: `${compose} up -d` };
  }
  return {
    down: `${compose} down --remove-orphans`,
    up: `${compose} up -d --build --remove-orphans`,
  };
}

/**
 * Docker Compose stack in a checkout, driven through a CommandExecutor
 */
export class ComposeStack {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly workingDir: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Bring the stack to the running state, rebuilding if asked.
   * A failed `down` aborts before `up` is attempted.
   */
  async converge(options: ConvergeOptions): Promise<void> {
    const { composeBinary, osType } = await this.executor.toolchain();
    const prefix = elevationPrefix(options.useElevated, osType);
    const commands = composeCommands(composeBinary, prefix, options.rebuild);

    if (commands.down) {
      this.logger.info(`Taking down containers on ${this.executor.label}: ${commands.down}`);
      const down = await this.executor.run(commands.down, { cwd: this.workingDir, allowBenign: true });
      if (down.benign) {
        this.logger.warn(`Teardown reported a benign error on ${this.executor.label}: ${down.stderr}`);
      }
    }

    this.logger.info(`${options.rebuild ? 'Rebuilding' : 'Ensuring'} containers on ${this.executor.label}: ${commands.up}`);
    await this.executor.run(commands.up, { cwd: this.workingDir });
  }
}
