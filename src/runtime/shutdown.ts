import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

/**
 * Stops the runtime on SIGINT/SIGTERM. Resolves `done` once the runtime has stopped.
 */
export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Runtime'),
  forceExitMs = 8000,
): { done: Promise<void> } {
  let shuttingDown = false;
  let markDone: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    markDone = resolve;
  });

  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested');

    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, forceExitMs);
    forceExit.unref();

    await runtime.stop();
    clearTimeout(forceExit);
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    markDone();
  };

  const onSignal = () => {
    void shutdown();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return { done };
}
