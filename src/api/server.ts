import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger.js';
import { createConsensusRouter, RouterDeps } from './routes.js';

/**
 * Build the HTTP app around one engine
 */
export function createApp(deps: RouterDeps): Express {
  const app = express();
  app.use(express.json());

  app.use('/api', createConsensusRouter(deps));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Live check (for k8s probes)
  app.get('/live', (_req: Request, res: Response) => {
    res.json({ live: true });
  });

  return app;
}

/**
 * Start the API server
 */
export function startApiServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      logger.info(`API listening on port ${port}`);
      resolve(server);
    });
  });
}

/**
 * Stop the API server
 */
export function stopApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
      } else {
        logger.info('API server stopped');
        resolve();
      }
    });
  });
}
