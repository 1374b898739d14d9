export { createRuntime, type Runtime } from '@/runtime/bootstrap';
export { createAppContext, type AppContext, type ContextOverrides } from '@/runtime/context';
export { registerShutdownHandlers } from '@/runtime/shutdown';
export { loadConfig, type AppConfig } from '@/config';
export { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
export { METADATA_TIMINGS, SUPERVISOR_TIMINGS } from '@/config/timings';

export { PlayerService, type NowPlaying, type PlayerStatus, type PlayerSummary } from '@/application/players/playerService';
export { ProcessSupervisor, type ProcessHandle } from '@/application/players/processSupervisor';
export { StatusMonitor, type StatusListener, type StatusSnapshot } from '@/application/players/statusMonitor';
export { ConfigStore } from '@/application/config/configStore';
export { ProviderRegistry } from '@/application/providers/providerRegistry';
export type { PlayerProvider, ProviderInfo } from '@/application/providers/playerProvider';
export { MetadataClientManager } from '@/application/metadata/metadataClientManager';
export { AudioController } from '@/adapters/audio/audioController';

export * from '@/domain/players/errors';
export type {
  PlayerConfig,
  ProviderType,
  SendspinPlayerConfig,
  SqueezelitePlayerConfig,
} from '@/domain/players/types';
export type { AudioDevice } from '@/domain/audio/audioDevice';
export type { TrackMetadata } from '@/domain/metadata/trackMetadata';
