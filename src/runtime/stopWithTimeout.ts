import { errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type ServiceStopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLog = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLog = createLogger('Runtime'),
): Promise<ServiceStopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<ServiceStopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<ServiceStopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  if (result.kind === 'stopped') {
    log.info(`service ${name} stopped`);
    return result;
  }

  if (result.kind === 'timeout') {
    log.warn(`service ${name} stop timed out`, { timeoutMs });
    // A late failure is still worth reporting once the stop settles.
    void stopPromise.then((finalResult) => {
      if (finalResult.kind === 'error') {
        log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
      }
    });
    return result;
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
  return result;
}
