import type { Server } from 'http';
import express, { type Express } from 'express';
import cors from 'cors';
import compileRouter from './routes/compile';
import { getConfig } from '../src/lib/config';
import { createLogger } from '../src/lib/logger';

const log = createLogger('Server');

export interface AppOptions {
  corsOrigins?: string[];
}

export interface ListenOptions {
  port: number;
  host: string;
  corsOrigins: string[];
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const corsOrigins = options.corsOrigins ?? getConfig().server.corsOrigins;

  app.use(cors({
    origin: corsOrigins.length === 1 ? corsOrigins[0] : corsOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      uptime: process.uptime(),
    });
  });

  app.use('/api', compileRouter);

  return app;
}

/**
 * Create the app and listen; resolves once the port is bound
 */
export function startServer(options: ListenOptions): Promise<Server> {
  const app = createApp({ corsOrigins: options.corsOrigins });

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      const address = server.address();
      const port = address !== null && typeof address !== 'string' ? address.port : options.port;
      log.info(`Running on http://${options.host}:${port}`);
      log.info(`Health check: http://${options.host}:${port}/health`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
