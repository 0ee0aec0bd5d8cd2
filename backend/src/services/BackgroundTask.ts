import { LoggerService } from './LoggerService';

/**
 * Resolves after `ms`, or as soon as the signal aborts. Never rejects.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LoopOptions {
  name: string;
  // Delay before each run
  nextDelayMs: () => number;
  // Delay after a failed run before the loop resumes
  backoffMs: number;
  run: (signal: AbortSignal) => Promise<void>;
}

/**
 * A supervised, cancellable loop: wait, run, repeat. Failures are logged and
 * followed by a back-off; only stop() ends the loop.
 */
export class BackgroundTask {
  private options: LoopOptions;
  private logger: LoggerService;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: LoopOptions, logger: LoggerService) {
    this.options = options;
    this.logger = logger;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal);
    this.logger.info(`Started ${this.options.name}`);
  }

  /**
   * Abort the pending wait and let the current run finish
   */
  async stop(): Promise<void> {
    if (!this.controller || !this.loop) return;
    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    this.logger.info(`Stopped ${this.options.name}`);
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.nextDelayMs(), signal);
      if (signal.aborted) break;

      try {
        await this.options.run(signal);
      } catch (error) {
        if (signal.aborted) break;
        this.logger.error(`Error in ${this.options.name}`, error);
        await sleep(this.options.backoffMs, signal);
      }
    }
  }
}
