import { Router, Request, Response } from 'express';
import { getDatabaseStatus } from '../config/database';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  const dbStatus = getDatabaseStatus();

  res.status(dbStatus.connected ? 200 : 503).json({
    status: dbStatus.connected ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services: {
      database: {
        connected: dbStatus.connected,
        readyState: dbStatus.readyState,
      },
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

router.get('/ready', (_req: Request, res: Response) => {
  const dbStatus = getDatabaseStatus();

  res.status(dbStatus.connected ? 200 : 503).json({
    status: dbStatus.connected ? 'ready' : 'not ready',
    timestamp: new Date().toISOString(),
  });
});

export default router;
