import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { AuthService } from './services/AuthService';
import type { AdminService } from './services/AdminService';
import type { GiftService } from './services/GiftService';
import type { ChatStore } from './services/ChatStore';
import type { ConnectionRegistry } from './services/ConnectionRegistry';
import type { MetricsService } from './services/MetricsService';
import { LoggerService } from './services/LoggerService';
import { createAuthMiddleware } from './middleware/authMiddleware';
import { createAuthRoutes } from './routes/authRoutes';
import { createAdminRoutes } from './routes/adminRoutes';
import { createModerationRoutes } from './routes/moderationRoutes';

export interface AppDeps {
  authService: AuthService;
  adminService: AdminService;
  giftService: GiftService;
  store: ChatStore;
  registry: ConnectionRegistry;
  metrics: MetricsService;
  logger: LoggerService;
  corsOrigin: string;
}

export function createApp(deps: AppDeps) {
  const { logger } = deps;
  const app = express();
  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json());
  // Login also takes the classic form-encoded username/password body
  app.use(express.urlencoded({ extended: false }));

  const authenticate = createAuthMiddleware(deps.authService, logger.child('Auth'));

  app.use('/auth', createAuthRoutes(deps.authService, authenticate, logger.child('AuthRoutes')));
  app.use('/api/admin', createAdminRoutes(deps.adminService, authenticate, logger.child('AdminRoutes')));
  app.use(
    createModerationRoutes({
      adminService: deps.adminService,
      giftService: deps.giftService,
      store: deps.store,
      registry: deps.registry,
      metrics: deps.metrics,
      authenticate,
      logger: logger.child('Routes'),
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed request body', detail: error.message });
      return;
    }
    logger.error('Unhandled request error', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
