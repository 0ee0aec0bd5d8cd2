import http from 'http';
import appConfig from './config/appConfig';
import { logger } from './services/LoggerService';
import { SqliteChatStore } from './services/SqliteChatStore';
import { SentimentToxicityScorer } from './services/ToxicityScorer';
import { AuthService } from './services/AuthService';
import { ConnectionRegistry } from './services/ConnectionRegistry';
import { MetricsService } from './services/MetricsService';
import { ModerationGate } from './services/ModerationGate';
import { AdminService } from './services/AdminService';
import { GiftService } from './services/GiftService';
import { MaintenanceService } from './services/MaintenanceService';
import { ChatService } from './services/ChatService';
import { createApp } from './app';

async function main(): Promise<void> {
  if (appConfig.logging.logToFile) {
    logger.info(`Writing logs to ${logger.getLogPath()}`);
  }

  const store = new SqliteChatStore({
    filename: appConfig.databasePath,
    defaultThreshold: appConfig.moderation.defaultThreshold,
  });
  logger.info(`Database ready at ${appConfig.databasePath}`);

  const scorer = new SentimentToxicityScorer(logger.child('Scorer'));
  await scorer.warmup();

  const metrics = new MetricsService();
  const registry = new ConnectionRegistry(appConfig.connections.maxConnections, logger.child('Registry'));
  const authService = new AuthService(store, logger.child('AuthService'), appConfig.auth);
  const gate = new ModerationGate({ store, registry, scorer, metrics, logger: logger.child('Moderation') });
  const adminService = new AdminService({
    store,
    registry,
    metrics,
    logger: logger.child('Admin'),
    muteDurationSecs: appConfig.moderation.muteDurationSecs,
  });
  const giftService = new GiftService({
    store,
    registry,
    metrics,
    logger: logger.child('Gifts'),
    options: appConfig.gifts,
  });
  const maintenance = new MaintenanceService({
    store,
    registry,
    logger: logger.child('Maintenance'),
    options: appConfig.maintenance,
  });

  const app = createApp({
    authService,
    adminService,
    giftService,
    store,
    registry,
    metrics,
    logger,
    corsOrigin: appConfig.corsOrigin,
  });
  const server = http.createServer(app);
  const chatService = new ChatService(server, {
    auth: authService,
    store,
    registry,
    gate,
    logger: logger.child('ChatService'),
    corsOrigin: appConfig.corsOrigin,
  });

  metrics.reset();
  maintenance.start();
  giftService.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully`);

    await Promise.all([giftService.stop(), maintenance.stop()]);
    // Closing socket.io also closes the HTTP server it is attached to
    await chatService.close();
    store.close();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.fatal('Error during shutdown', error);
          process.exit(1);
        }
      );
    });
  }

  server.listen(appConfig.port, () => {
    logger.info(`Chat gateway listening on port ${appConfig.port}`);
  });
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start server', error);
  process.exit(1);
});
