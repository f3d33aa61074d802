import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

const { server } = buildServer();

const SHUTDOWN_TIMEOUT_MS = 10_000;

let isShuttingDown = false;

function gracefulShutdown(signal: string): void {
  if (isShuttingDown) {
    log.warn({ signal }, 'shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info({ signal }, 'graceful shutdown initiated');

  // In-flight syntheses finish on their own backend timeouts; stop taking new ones.
  const force = setTimeout(() => {
    log.warn({ timeout_ms: SHUTDOWN_TIMEOUT_MS }, 'shutdown timeout reached, forcing exit');
    process.exit(0);
  }, SHUTDOWN_TIMEOUT_MS);
  force.unref();

  server.close(() => {
    log.info('shutdown complete');
    process.exit(0);
  });
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  log.fatal({ err: error }, 'uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error({ reason }, 'unhandled rejection');
});

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});
