import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';

type Step = readonly [name: string, run: () => Promise<void>];

/**
 * Ordered startup steps and reverse-ordered teardown steps for the server.
 * Startup stops at the first failing step; teardown runs every step and
 * exits non-zero if any of them failed.
 */
export class LifecycleManager {
  private readonly starting: Step[] = [];
  private readonly stopping: Step[] = [];
  private stopped: Promise<void> | null = null;

  constructor(
    private readonly logger: Pick<Logger, 'debug' | 'info' | 'error'>,
    private readonly exit: (code: number) => void = (code) => process.exit(code)
  ) {}

  onStartup(name: string, run: () => Promise<void>): void {
    this.starting.push([name, run]);
  }

  onShutdown(name: string, run: () => Promise<void>): void {
    this.stopping.unshift([name, run]);
  }

  async startup(): Promise<void> {
    for (const [name, run] of this.starting) {
      this.logger.debug(`Startup step: ${name}`);
      try {
        await run();
      } catch (error) {
        this.logger.error(`Startup step '${name}' failed`, toError(error));
        throw error;
      }
    }
    this.logger.info('Startup complete');
  }

  /**
   * Later calls share the first call's teardown
   */
  shutdown(signal?: string): Promise<void> {
    this.stopped ??= this.teardown(signal);
    return this.stopped;
  }

  installSignalHandlers(): void {
    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      process.once(signal, () => {
        void this.shutdown(signal);
      });
    }
  }

  private async teardown(signal?: string): Promise<void> {
    this.logger.info(signal ? `Shutting down on ${signal}` : 'Shutting down');

    let failures = 0;
    for (const [name, run] of this.stopping) {
      this.logger.debug(`Shutdown step: ${name}`);
      try {
        await run();
      } catch (error) {
        failures++;
        this.logger.error(`Shutdown step '${name}' failed`, toError(error));
      }
    }

    this.exit(failures === 0 ? 0 : 1);
  }
}
