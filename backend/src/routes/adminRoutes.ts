import express, { RequestHandler } from 'express';
import type { AdminService } from '../services/AdminService';
import { LoggerService } from '../services/LoggerService';
import { requireUser } from '../middleware/authMiddleware';
import { adminTargetSchema, describeIssues } from '../models/schemas';

const DEFAULT_ACTION_LIMIT = 50;

/**
 * Moderator actions. Any authenticated user may perform them.
 */
export function createAdminRoutes(adminService: AdminService, authenticate: RequestHandler, logger: LoggerService) {
  const router = express.Router();
  router.use(authenticate);

  router.post('/kick', async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;
    const parsed = adminTargetSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', detail: describeIssues(parsed.error) });
    }

    const target = parsed.data.username;
    try {
      const result = await adminService.kick(user.username, target);
      if (!result.success) {
        return res.status(404).json({ error: 'User not found', detail: `${result.connectionsClosed} connections closed` });
      }
      return res.json({
        status: 'success',
        message: `User ${target} has been kicked`,
        connections_closed: result.connectionsClosed,
        user_deleted: result.userDeleted,
      });
    } catch (error) {
      logger.error(`Kick of ${target} failed`, error);
      return res.status(500).json({ error: 'Failed to kick user' });
    }
  });

  router.post('/mute', async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;
    const parsed = adminTargetSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', detail: describeIssues(parsed.error) });
    }

    const target = parsed.data.username;
    try {
      const result = await adminService.mute(user.username, target);
      if (!result.success) {
        return res.status(404).json({ error: 'User not found' });
      }
      return res.json({
        status: 'success',
        message: `User ${target} has been muted`,
        muted_until: result.mutedUntil.toISOString(),
        notifications_sent: result.notificationsSent,
      });
    } catch (error) {
      logger.error(`Mute of ${target} failed`, error);
      return res.status(500).json({ error: 'Failed to mute user' });
    }
  });

  router.post('/unmute', async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;
    const parsed = adminTargetSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', detail: describeIssues(parsed.error) });
    }

    const target = parsed.data.username;
    try {
      const result = await adminService.unmute(user.username, target);
      if (!result.success) {
        return res.status(404).json({ error: 'User not found' });
      }
      return res.json({
        status: 'success',
        message: result.wasMuted ? `User ${target} has been unmuted` : `User ${target} was not muted`,
      });
    } catch (error) {
      logger.error(`Unmute of ${target} failed`, error);
      return res.status(500).json({ error: 'Failed to unmute user' });
    }
  });

  router.post('/reset_metrics', async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    try {
      await adminService.resetMetrics(user.username);
      return res.json({ status: 'metrics reset' });
    } catch (error) {
      logger.error('Metrics reset failed', error);
      return res.status(500).json({ error: 'Failed to reset metrics' });
    }
  });

  router.get('/actions', async (req, res) => {
    const requested = Number(req.query.limit);
    const limit = Number.isInteger(requested) && requested > 0 ? requested : DEFAULT_ACTION_LIMIT;

    try {
      const actions = await adminService.listActions(limit);
      return res.json({ actions });
    } catch (error) {
      logger.error('Listing admin actions failed', error);
      return res.status(500).json({ error: 'Failed to list admin actions' });
    }
  });

  return router;
}
