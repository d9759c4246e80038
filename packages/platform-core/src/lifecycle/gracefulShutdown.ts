import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'drain' | 'schedulers' | 'connections';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'schedulers', 'connections'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(phase: ShutdownPhase, label: string, hook: ShutdownHook): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered shutdown hook', { phase, label });
}

/** Closes the server, then runs hooks phase by phase. Hook failures are logged and skipped. */
export async function runShutdown(server?: { close: (callback: () => void) => void }): Promise<void> {
  if (server) {
    await new Promise<void>(resolve => server.close(() => resolve()));
    logger.info('HTTP server closed');
  }

  for (const phase of PHASE_ORDER) {
    for (const { hook, label } of phasedHooks.filter(h => h.phase === phase)) {
      try {
        await hook();
        logger.debug('Shutdown hook completed', { phase, label });
      } catch (error) {
        logger.error('Shutdown hook failed', { phase, label, error: serializeError(error) });
      }
    }
  }
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs?: number): void {
  const timeout = timeoutMs || parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '30000', 10);

  const shutdown = (signal: string): void => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeout}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);

    runShutdown(server)
      .then(() => {
        logger.info('Graceful shutdown complete');
        clearTimeout(timer);
        process.exit(0);
      })
      .catch(error => {
        logger.error('Error during shutdown', { error: serializeError(error) });
        clearTimeout(timer);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
