import { startServer } from './app';
import { getConfig } from '../src/lib/config';
import { createLogger } from '../src/lib/logger';

const log = createLogger('Server');
const { port, host, corsOrigins } = getConfig().server;

log.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
log.info(`CORS origins: ${corsOrigins.join(', ')}`);

// Listen on 0.0.0.0 by default for container deployment
const server = await startServer({ port, host, corsOrigins });

function shutdown(): void {
  log.info('Shutting down gracefully...');
  server.close(() => {
    log.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

process.on('uncaughtException', (error) => {
  log.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled Rejection:', reason);
});
