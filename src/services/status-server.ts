import express, { type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { HealthCell } from '../monitors/health-cell.js';
import { createLogger } from '../utils/logger.js';
import type { Clock, HealthSnapshot } from '../types.js';

const logger = createLogger('Status');

export interface StatusAppOptions {
  clock?: Clock;
}

export interface HealthBody {
  status: HealthSnapshot['status'];
  lastCheck: string | null;
  lastPrice: number | null;
}

export function toHealthBody(snapshot: Readonly<HealthSnapshot>): HealthBody {
  return {
    status: snapshot.status,
    lastCheck: snapshot.lastCheck,
    lastPrice: snapshot.lastPrice,
  };
}

export function statusCodeFor(snapshot: Readonly<HealthSnapshot>): number {
  return snapshot.status === 'ok' ? 200 : 503;
}

/** Read-only view over the health cell; handlers never touch the scheduler. */
export function createStatusApp(health: HealthCell, options: StatusAppOptions = {}): express.Express {
  const clock = options.clock ?? (() => new Date());
  const app = express();
  app.disable('x-powered-by');

  app.get(['/', '/health'], (_req: Request, res: Response) => {
    const snapshot = health.read();
    res.status(statusCodeFor(snapshot)).json(toHealthBody(snapshot));
  });

  app.get('/api/status', (_req: Request, res: Response) => {
    const snapshot = health.read();
    const uptimeSeconds = Math.max(0, Math.floor((clock().getTime() - Date.parse(snapshot.startedAt)) / 1000));
    res.status(statusCodeFor(snapshot)).json({ ...snapshot, uptimeSeconds });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function startStatusServer(health: HealthCell, port: number): Promise<Server> {
  const app = createStatusApp(health);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Status server listening on ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
