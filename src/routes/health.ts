import { Express, Request, Response } from 'express';
import pkg from '../../package.json';

const { name, version } = pkg;

const healthPayload = () => ({
    ok: true,
    service: name,
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    heapUsedMb: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
    timestamp: new Date().toISOString(),
});

export const registerHealthRoutes = (app: Express) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload());
  };

  app.get('/healthz', respond);
  app.get('/api/healthz', respond);
};
