import { createLogger, type LogSink } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

/** Long enough for a player to walk through SIGTERM then SIGKILL. */
const FORCE_EXIT_AFTER_MS = 10_000;

export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log: LogSink = createLogger('Server'),
  exit: (code: number) => void = (code) => process.exit(code),
): () => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    // Force-exit watchdog so Ctrl+C cannot hang forever if a stop never resolves.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, FORCE_EXIT_AFTER_MS);

    try {
      await runtime.stop();
      exit(0);
    } catch (error) {
      log.error('shutdown failed', { error });
      exit(1);
    } finally {
      clearTimeout(forceExit);
    }
  };

  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());
  return shutdown;
}
