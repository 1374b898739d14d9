import { loadConfig, type AppConfig } from '@/config';
import { AudioController } from '@/adapters/audio/audioController';
import { ChildProcessAdapter } from '@/adapters/process/childProcessAdapter';
import { CommandRunner } from '@/adapters/process/commandRunner';
import { createWsMetadataConnector } from '@/adapters/sendspin/wsMetadataConnection';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { systemClock } from '@/infrastructure/time/systemClock';
import type { AudioControlPort } from '@/ports/AudioControlPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { CommandPort } from '@/ports/CommandPort';
import type { MetadataConnector } from '@/ports/MetadataConnectionPort';
import type { ProcessPort } from '@/ports/ProcessPort';
import type { StoragePort } from '@/ports/StoragePort';
import { ConfigStore } from '@/application/config/configStore';
import { MetadataClientManager } from '@/application/metadata/metadataClientManager';
import { PlayerService } from '@/application/players/playerService';
import { ProcessSupervisor } from '@/application/players/processSupervisor';
import { RunningStateStore } from '@/application/players/runningStateStore';
import { StatusMonitor } from '@/application/players/statusMonitor';
import { ProviderRegistry } from '@/application/providers/providerRegistry';
import { SendspinProvider } from '@/application/providers/sendspinProvider';
import { SqueezeliteProvider } from '@/application/providers/squeezeliteProvider';

/**
 * Every long-lived object of one running instance. Built once at startup
 * and passed explicitly; nothing here is a module-level singleton.
 */
export interface AppContext {
  config: AppConfig;
  clock: ClockPort;
  audio: AudioControlPort;
  registry: ProviderRegistry;
  store: ConfigStore;
  supervisor: ProcessSupervisor;
  metadata: MetadataClientManager;
  runningState: RunningStateStore;
  monitor: StatusMonitor;
  players: PlayerService;
}

/**
 * Platform seams. Defaults talk to the real OS; tests substitute fakes.
 */
export interface ContextOverrides {
  storage?: StoragePort;
  processes?: ProcessPort;
  commands?: CommandPort;
  connector?: MetadataConnector;
  clock?: ClockPort;
}

export function createAppContext(
  config: AppConfig = loadConfig(),
  overrides: ContextOverrides = {},
): AppContext {
  const clock = overrides.clock ?? systemClock;
  const storage = overrides.storage ?? new StorageAdapter();
  const commands = overrides.commands ?? new CommandRunner();
  const processes = overrides.processes ?? new ChildProcessAdapter();
  const connector =
    overrides.connector ??
    createWsMetadataConnector({
      pingIntervalMs: config.metadata.pingIntervalMs,
      connectTimeoutMs: config.metadata.connectTimeoutMs,
    });

  const audio = new AudioController(commands);
  const registry = new ProviderRegistry(config.env.defaultProvider);
  registry.register(new SqueezeliteProvider(audio, commands));
  registry.register(new SendspinProvider(audio, commands));

  const store = new ConfigStore(storage, registry, config.env.playersConfigPath);
  const metadata = new MetadataClientManager(connector, clock, config.metadata);
  const supervisor = new ProcessSupervisor({
    config: store,
    registry,
    processes,
    clock,
    logDir: config.env.playerLogDir,
    nowPlaying: metadata,
    timings: config.supervisor,
  });
  const runningState = new RunningStateStore(storage, config.env.stateFilePath, clock);
  const monitor = new StatusMonitor(supervisor, runningState, config.env.statusPollIntervalMs);
  const players = new PlayerService({ store, registry, supervisor, audio, metadata });

  return { config, clock, audio, registry, store, supervisor, metadata, runningState, monitor, players };
}
