import { loadConfig } from '@/config';
import { ensureDir } from '@/shared/utils/file';
import { createLogger, logManager } from '@/shared/logging/logger';
import { createAppContext, type AppContext, type ContextOverrides } from '@/runtime/context';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
  timeoutMs: number;
};

export type Runtime = {
  context: AppContext;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export function createRuntime(
  config = loadConfig(),
  overrides: ContextOverrides = {},
  ensureLogDir: (dir: string) => Promise<void> = ensureDir,
): Runtime {
  const context = createAppContext(config, overrides);
  const { players, store, supervisor, metadata, monitor, runningState } = context;
  let started = false;

  async function startServices(): Promise<void> {
    logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
    const log = createLogger('Server');
    log.info('bootstrapping player supervisor', {
      env: config.env.nodeEnv,
      players: config.env.playersConfigPath,
    });

    await ensureLogDir(config.env.playerLogDir);
    await store.load();

    const toRestore = await runningState.load();
    if (toRestore.length > 0) {
      log.info('restoring previously running players', { players: toRestore.join(',') });
      const restored = await players.restorePlayers(toRestore);
      log.info('restore complete', { restored: restored.length, requested: toRestore.length });
    }

    const autostarted = await players.autostartPlayers();
    if (autostarted.length > 0) {
      log.info('autostarted players', { players: autostarted.join(',') });
    }

    monitor.start();
    await monitor.poll();
    started = true;
    log.info('startup complete', { running: supervisor.runningCount() });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    if (!started) {
      log.debug('stop requested before startup finished');
    }
    started = false;

    await stopWithTimeout('status-monitor', () => monitor.stop(), 2_000, log);
    const running = store.listPlayers().filter((name) => supervisor.isRunning(name));
    await runningState.save(running, store.listPlayers().length);

    const playerStopBudget = config.supervisor.stopTimeoutMs + config.supervisor.killTimeoutMs + 500;
    const services: LifecycleService[] = [
      {
        name: 'players',
        stop: async () => {
          await supervisor.stopAll();
        },
        timeoutMs: playerStopBudget,
      },
      { name: 'metadata', stop: () => metadata.stopAll(), timeoutMs: config.metadata.stopJoinTimeoutMs + 500 },
    ];

    await Promise.all(
      services.map((service) => stopWithTimeout(service.name, service.stop, service.timeoutMs, log)),
    );
  }

  return {
    context,
    start: startServices,
    stop: stopServices,
  };
}
