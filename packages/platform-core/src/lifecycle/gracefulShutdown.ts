import { createLogger } from '../logging/logger';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

interface LabelledHook {
  hook: ShutdownHook;
  label?: string;
}

const hooks: LabelledHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(hook: ShutdownHook, label?: string): void {
  hooks.push({ hook, label });
  logger.debug('Registered shutdown hook', { label });
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs?: number): void {
  const timeout = timeoutMs || parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10);

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeout}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);
    timer.unref();

    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
      logger.info('HTTP server closed');
    }

    for (const { hook, label } of hooks) {
      try {
        await hook();
        if (label) logger.debug(`Shutdown hook completed: ${label}`);
      } catch (e) {
        logger.error('Shutdown hook failed', { label, error: e });
      }
    }

    logger.info('Graceful shutdown complete');
    clearTimeout(timer);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
