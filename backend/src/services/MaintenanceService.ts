import type { ChatStore } from './ChatStore';
import type { ConnectionRegistry } from './ConnectionRegistry';
import { BackgroundTask } from './BackgroundTask';
import { LoggerService } from './LoggerService';

export interface SweepReport {
  staleConnections: number;
  expiredSessions: number;
  expiredMutes: number;
}

export interface MaintenanceOptions {
  cleanupIntervalSecs: number;
  cleanupRetrySecs: number;
}

export interface MaintenanceServiceDeps {
  store: ChatStore;
  registry: ConnectionRegistry;
  logger: LoggerService;
  options: MaintenanceOptions;
  now?: () => Date;
}

/**
 * Stale-connection reaper and session/mute expiry sweep on one cadence
 */
export class MaintenanceService {
  private store: ChatStore;
  private registry: ConnectionRegistry;
  private logger: LoggerService;
  private now: () => Date;
  private task: BackgroundTask;

  constructor(deps: MaintenanceServiceDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());

    this.task = new BackgroundTask(
      {
        name: 'connection cleanup',
        nextDelayMs: () => deps.options.cleanupIntervalSecs * 1000,
        backoffMs: deps.options.cleanupRetrySecs * 1000,
        run: () => this.sweep().then(() => undefined),
      },
      this.logger
    );
  }

  /**
   * Probe every live connection; a probe that fails or throws evicts only
   * that connection.
   */
  async reapStaleConnections(): Promise<number> {
    const connections = this.registry.snapshot();
    const alive = await Promise.all(
      connections.map((connection) =>
        connection.probe().catch((error: unknown) => {
          this.logger.debug(`Probe failed for ${connection.identity}`, {
            reason: error instanceof Error ? error.message : String(error),
          });
          return false;
        })
      )
    );

    let removed = 0;
    alive.forEach((isAlive, index) => {
      if (isAlive) return;
      const connection = connections[index];
      if (this.registry.unregister(connection, 'stale')) {
        removed += 1;
        this.logger.info(`Removed stale connection: ${connection.identity}`);
      }
    });
    return removed;
  }

  async sweep(): Promise<SweepReport> {
    const staleConnections = await this.reapStaleConnections();

    const now = this.now();
    const expiredSessions = await this.store.cleanupExpiredSessions(now);
    const expiredMutes = await this.store.cleanupExpiredMutes(now);

    if (expiredSessions > 0) {
      this.logger.info(`Cleaned up ${expiredSessions} expired sessions`);
    }
    if (expiredMutes > 0) {
      this.logger.info(`Cleared ${expiredMutes} expired mutes`);
    }
    return { staleConnections, expiredSessions, expiredMutes };
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  isRunning(): boolean {
    return this.task.isRunning();
  }
}
