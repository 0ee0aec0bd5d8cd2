import type { AdminActionRecord, SystemNotice } from '../models/ChatMessage';
import type { ChatStore } from './ChatStore';
import { isValidThreshold } from './ChatStore';
import type { ConnectionRegistry } from './ConnectionRegistry';
import type { MetricsService } from './MetricsService';
import { LoggerService } from './LoggerService';

export type KickResult =
  | { success: true; connectionsClosed: number; userDeleted: boolean }
  | { success: false; error: 'not_found'; connectionsClosed: number };

export type MuteResult =
  | { success: true; mutedUntil: Date; notificationsSent: number }
  | { success: false; error: 'not_found' };

export type UnmuteResult =
  | { success: true; wasMuted: boolean }
  | { success: false; error: 'not_found' };

export type ThresholdResult =
  | { success: true; previous: number; threshold: number }
  | { success: false; error: 'out_of_range'; threshold: number };

export interface AdminServiceDeps {
  store: ChatStore;
  registry: ConnectionRegistry;
  metrics: MetricsService;
  logger: LoggerService;
  muteDurationSecs: number;
  now?: () => Date;
}

/**
 * Moderator actions against live connections and durable state. Every
 * action that takes effect leaves one audit record.
 */
export class AdminService {
  private store: ChatStore;
  private registry: ConnectionRegistry;
  private metrics: MetricsService;
  private logger: LoggerService;
  private muteDurationMs: number;
  private now: () => Date;

  constructor(deps: AdminServiceDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.muteDurationMs = deps.muteDurationSecs * 1000;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Close the target's connections, then revoke sessions and delete the
   * record. Live connections are closed even when no record exists.
   */
  async kick(actor: string, target: string): Promise<KickResult> {
    const admin = await this.store.ensureUser(actor);
    const connectionsClosed = this.registry.evict(target, 'kicked');

    const targetUser = await this.store.getUserByUsername(target);
    if (!targetUser) {
      this.logger.warn(`Admin ${actor} tried to kick unknown user ${target}; closed ${connectionsClosed} connections`);
      return { success: false, error: 'not_found', connectionsClosed };
    }

    const sessions = await this.store.invalidateUserSessions(targetUser.id);
    const userDeleted = await this.store.deleteUser(targetUser.id);

    // The actor may have kicked themselves, taking their own record with them
    if (admin.id !== targetUser.id) {
      await this.store.logAdminAction({
        adminUserId: admin.id,
        action: 'kick',
        targetUsername: target,
        details: `Kicked user: ${target} (${connectionsClosed} connections, ${sessions} sessions)`,
      });
    }

    this.logger.info(`Admin ${actor} kicked user ${target}. Closed ${connectionsClosed} connections.`);
    return { success: true, connectionsClosed, userDeleted };
  }

  async mute(actor: string, target: string): Promise<MuteResult> {
    const admin = await this.store.ensureUser(actor);
    const targetUser = await this.store.getUserByUsername(target);
    if (!targetUser) {
      return { success: false, error: 'not_found' };
    }

    const now = this.now();
    const mutedUntil = new Date(now.getTime() + this.muteDurationMs);
    await this.store.setUserMute(targetUser.id, mutedUntil);
    await this.store.logAdminAction({
      adminUserId: admin.id,
      action: 'mute',
      targetUsername: target,
      details: `Muted user: ${target} until ${mutedUntil.toISOString()}`,
    });

    const notice: SystemNotice = {
      type: 'system',
      message: `You have been muted by an admin until ${mutedUntil.toISOString()}`,
      muted_until: mutedUntil.toISOString(),
      timestamp: now.toISOString(),
    };

    // The mute is already durable; a failed notice only costs the notice
    let notificationsSent = 0;
    for (const connection of this.registry.lookupAll(target)) {
      const result = await connection.send('system', notice);
      if (result.status === 'delivered') {
        notificationsSent += 1;
      } else {
        this.logger.warn(`Mute notice to ${target} failed: ${result.reason}`);
      }
    }

    this.logger.info(`Admin ${actor} muted user ${target} until ${mutedUntil.toISOString()}`);
    return { success: true, mutedUntil, notificationsSent };
  }

  async unmute(actor: string, target: string): Promise<UnmuteResult> {
    const admin = await this.store.ensureUser(actor);
    const targetUser = await this.store.getUserByUsername(target);
    if (!targetUser) {
      return { success: false, error: 'not_found' };
    }

    const wasMuted = await this.store.clearUserMute(targetUser.id);
    await this.store.logAdminAction({
      adminUserId: admin.id,
      action: 'unmute',
      targetUsername: target,
      details: `Unmuted user: ${target}`,
    });
    return { success: true, wasMuted };
  }

  async getThreshold(): Promise<number> {
    return this.store.getToxicityThreshold();
  }

  async setThreshold(actor: string, value: number): Promise<ThresholdResult> {
    if (!isValidThreshold(value)) {
      return { success: false, error: 'out_of_range', threshold: value };
    }

    const admin = await this.store.ensureUser(actor);
    const previous = await this.store.getToxicityThreshold();
    await this.store.setToxicityThreshold(value);
    await this.store.logAdminAction({
      adminUserId: admin.id,
      action: 'set_threshold',
      details: `Changed toxicity threshold from ${previous} to ${value}`,
    });

    this.logger.info(`Admin ${actor} set toxicity threshold ${previous} -> ${value}`);
    return { success: true, previous, threshold: value };
  }

  async resetMetrics(actor: string): Promise<void> {
    const admin = await this.store.ensureUser(actor);
    this.metrics.reset();
    await this.store.logAdminAction({
      adminUserId: admin.id,
      action: 'reset_metrics',
      details: 'Reset system metrics',
    });
  }

  listActions(limit: number): Promise<AdminActionRecord[]> {
    return this.store.listAdminActions(limit);
  }
}
