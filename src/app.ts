import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import healthRoutes from './routes/health';
import { MongoDataStore } from './persistence/mongoDataStore';
import { createLedgerRoutes, LedgerController } from './services/ledger';
import {
  createOperationRoutes,
  createTokenRoutes,
  TokenController,
  TokenLifecycleOptions,
  TokenLifecycleService,
} from './services/token';
import { DataStore } from './types/store';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export interface AppOptions {
  store?: DataStore;
  lifecycle?: TokenLifecycleOptions;
}

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();

  const lifecycle = new TokenLifecycleService(options.store ?? new MongoDataStore(), options.lifecycle);
  const tokenController = new TokenController(lifecycle);
  const ledgerController = new LedgerController(lifecycle);

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', healthRoutes);
  app.use('/accounts', createLedgerRoutes(ledgerController));
  app.use('/tokens', createTokenRoutes(tokenController));
  app.use('/operations', createOperationRoutes(tokenController));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      next(error);
    }
  });

  app.get('/', (_req, res) => {
    res.json({
      name: 'Prepaid Token Service',
      version: '1.0.0',
      description: 'Single-use, time-limited access tokens funded from a prepaid balance',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
