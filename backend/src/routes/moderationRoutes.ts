import express, { RequestHandler } from 'express';
import type { AdminService } from '../services/AdminService';
import type { GiftService } from '../services/GiftService';
import type { ChatStore } from '../services/ChatStore';
import type { ConnectionRegistry } from '../services/ConnectionRegistry';
import type { MetricsService } from '../services/MetricsService';
import { LoggerService } from '../services/LoggerService';
import { requireUser } from '../middleware/authMiddleware';
import { describeIssues, giftEventInSchema, thresholdUpdateSchema } from '../models/schemas';

const RECENT_MESSAGE_LIMIT = 50;

export interface ModerationRouteDeps {
  adminService: AdminService;
  giftService: GiftService;
  store: ChatStore;
  registry: ConnectionRegistry;
  metrics: MetricsService;
  authenticate: RequestHandler;
  logger: LoggerService;
}

/**
 * Health, live metrics, threshold control, gift intake and message history
 */
export function createModerationRoutes(deps: ModerationRouteDeps) {
  const { adminService, giftService, store, registry, metrics, authenticate, logger } = deps;
  const router = express.Router();

  router.get('/healthz', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  router.get('/metrics', (_req, res) => {
    res.json(metrics.snapshot(registry.countLive()));
  });

  router.get('/api/mod/threshold', async (_req, res) => {
    try {
      const threshold = await adminService.getThreshold();
      return res.json({ threshold });
    } catch (error) {
      logger.error('Reading threshold failed', error);
      return res.status(500).json({ error: 'Failed to read threshold' });
    }
  });

  router.patch('/api/mod/threshold', authenticate, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;
    const parsed = thresholdUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid threshold', detail: describeIssues(parsed.error) });
    }

    try {
      const result = await adminService.setThreshold(user.username, parsed.data.threshold);
      if (!result.success) {
        return res.status(400).json({ error: 'Threshold must be between 0 and 1' });
      }
      return res.json({ threshold: result.threshold, status: 'updated' });
    } catch (error) {
      logger.error('Updating threshold failed', error);
      return res.status(500).json({ error: 'Failed to update threshold' });
    }
  });

  // Accepted now, persisted and broadcast in the background
  router.post('/api/gift', (req, res) => {
    const parsed = giftEventInSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid gift', detail: describeIssues(parsed.error) });
      return;
    }

    const { from, gift_id: giftId, amount } = parsed.data;
    giftService.emitGift(from, giftId, amount).then(
      (gift) => logger.debug(`Gift ${giftId} x${amount} from ${from} reached ${gift.broadcast.delivered} clients`),
      (error: unknown) => logger.error(`Processing gift from ${from} failed`, error)
    );
    res.status(202).json({ status: 'queued' });
  });

  router.get('/api/messages', authenticate, async (_req, res) => {
    try {
      const recent = await store.getRecentMessages(RECENT_MESSAGE_LIMIT);
      const messages = recent.map((message) => ({
        id: message.id,
        user: message.username,
        message: message.text,
        toxic: message.toxic,
        score: message.score,
        type: message.type,
        ts: message.timestamp,
      }));
      return res.json({ messages });
    } catch (error) {
      logger.error('Reading message history failed', error);
      return res.status(500).json({ error: 'Failed to read messages' });
    }
  });

  return router;
}
