import type { AudioDevice } from '@/domain/audio/audioDevice';
import {
  MixerControlUnavailableError,
  PersistError,
  PlayerError,
  PlayerNotFoundError,
  failed,
  succeeded,
  type ActionResult,
} from '@/domain/players/errors';
import {
  progressPercent,
  type TrackMetadata,
} from '@/domain/metadata/trackMetadata';
import type { PlayerConfig } from '@/domain/players/types';
import type { AudioControlPort } from '@/ports/AudioControlPort';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import type { ConfigStore } from '@/application/config/configStore';
import type { MetadataClientManager } from '@/application/metadata/metadataClientManager';
import type { ProviderInfo } from '@/application/providers/playerProvider';
import type { ProviderRegistry } from '@/application/providers/providerRegistry';
import type { ProcessHandle, ProcessSupervisor } from '@/application/players/processSupervisor';

export type PlayerSummary = PlayerConfig & { running: boolean };

export interface PlayerStatus {
  name: string;
  running: boolean;
  handle: ProcessHandle | null;
}

export interface NowPlaying {
  metadata: TrackMetadata;
  connected: boolean;
  stale: boolean;
  progressPercent: number;
}

export interface PlayerServiceDeps {
  store: ConfigStore;
  registry: ProviderRegistry;
  supervisor: ProcessSupervisor;
  audio: AudioControlPort;
  metadata: MetadataClientManager;
}

/**
 * Operations offered to the HTTP and push layers. Config mutations throw
 * {@link PlayerError}s; lifecycle calls report an {@link ActionResult}.
 */
export class PlayerService {
  private readonly log = createLogger('Players', 'Service');

  constructor(private readonly deps: PlayerServiceDeps) {}

  public listPlayers(): PlayerSummary[] {
    const { store, supervisor } = this.deps;
    return store.listPlayers().flatMap((name) => {
      const config = store.getPlayer(name);
      return config ? [{ ...config, running: supervisor.isRunning(name) }] : [];
    });
  }

  public getPlayer(name: string): PlayerConfig | null {
    return this.deps.store.getPlayer(name);
  }

  public createPlayer(input: unknown): Promise<PlayerConfig> {
    return this.deps.store.createPlayer(input);
  }

  /**
   * Applies `patch`. A running player is stopped first and restarted with
   * the new config; a failed restart is reported in the message, not thrown.
   */
  public async updatePlayer(name: string, patch: unknown): Promise<{ config: PlayerConfig; message: string }> {
    const { store, supervisor } = this.deps;
    store.requirePlayer(name);
    const wasRunning = supervisor.isRunning(name);
    if (wasRunning) {
      await supervisor.stop(name);
    }

    let config: PlayerConfig;
    try {
      config = await store.updatePlayer(name, patch);
    } catch (error) {
      if (wasRunning) {
        const restored = await supervisor.start(name);
        if (!restored.ok) {
          this.log.warn('could not restart player after rejected update', { player: name, message: restored.message });
        }
      }
      throw error;
    }

    if (!wasRunning) {
      return { config, message: 'Player updated successfully' };
    }
    const restart = await supervisor.start(config.name);
    return restart.ok
      ? { config, message: 'Player updated and restarted successfully' }
      : { config, message: `Player updated successfully, but failed to restart: ${restart.message}` };
  }

  public async deletePlayer(name: string): Promise<ActionResult> {
    const { store, supervisor } = this.deps;
    store.requirePlayer(name);
    if (supervisor.isRunning(name)) {
      const stopped = await supervisor.stop(name);
      if (!stopped.ok) {
        this.log.warn('stop before delete failed', { player: name, message: stopped.message });
      }
    }
    await store.deletePlayer(name);
    return succeeded(`Player '${name}' deleted`);
  }

  public startPlayer(name: string): Promise<ActionResult> {
    return this.deps.supervisor.start(name);
  }

  public stopPlayer(name: string): Promise<ActionResult> {
    return this.deps.supervisor.stop(name);
  }

  public getStatus(name: string): PlayerStatus {
    const { store, supervisor } = this.deps;
    if (!store.hasPlayer(name)) {
      throw new PlayerNotFoundError(name);
    }
    const running = supervisor.isRunning(name);
    return { name, running, handle: running ? supervisor.getHandle(name) : null };
  }

  public getAllStatuses(): Record<string, boolean> {
    return this.deps.supervisor.getAllStatuses();
  }

  public getDevices(): Promise<AudioDevice[]> {
    return this.deps.audio.listDevices();
  }

  public getMixerControls(device: string): Promise<string[]> {
    return this.deps.audio.listMixerControls(device);
  }

  public getPlayerVolume(name: string): Promise<number> {
    const config = this.deps.store.requirePlayer(name);
    return this.deps.registry.getForPlayer(config).getVolume(config);
  }

  /**
   * Sets the backend volume, then remembers it in the player config.
   */
  public async setPlayerVolume(name: string, volume: number): Promise<ActionResult> {
    const config = this.deps.store.getPlayer(name);
    if (!config) {
      return failed(new PlayerNotFoundError(name));
    }
    let result: ActionResult;
    try {
      result = await this.deps.registry.getForPlayer(config).setVolume(config, volume);
    } catch (error) {
      return failed(
        error instanceof PlayerError ? error : new MixerControlUnavailableError(errorMessage(error)),
      );
    }
    if (!result.ok) {
      return result;
    }
    try {
      await this.deps.store.setVolume(name, volume);
    } catch (error) {
      this.log.warn('volume applied but not saved', { player: name, message: errorMessage(error) });
      return failed(
        error instanceof PlayerError ? error : new PersistError(this.deps.store.filePath, errorMessage(error)),
      );
    }
    return result;
  }

  /**
   * Latest now-playing data, or null for players whose backend has no
   * metadata feed.
   */
  public async getNowPlaying(name: string): Promise<NowPlaying | null> {
    const config = this.deps.store.requirePlayer(name);
    const url = this.deps.registry.getForPlayer(config).nowPlayingUrl(config);
    if (!url) {
      return null;
    }
    const client = await this.deps.metadata.getOrCreate(name, url);
    if (!client) {
      return null;
    }
    const metadata = client.getMetadata();
    return {
      metadata,
      connected: client.isConnected(),
      stale: client.isStale(),
      progressPercent: progressPercent(metadata),
    };
  }

  public getProviders(availableOnly = true): Promise<ProviderInfo[]> {
    return this.deps.registry.getProviderInfo(availableOnly);
  }

  /**
   * Starts each named player that still exists and is not running.
   * Returns the names that started.
   */
  public async restorePlayers(names: readonly string[]): Promise<string[]> {
    const restored: string[] = [];
    for (const name of names) {
      if (!this.deps.store.hasPlayer(name)) {
        this.log.warn('cannot restore player, no longer configured', { player: name });
        continue;
      }
      if (this.deps.supervisor.isRunning(name)) continue;
      const result = await this.deps.supervisor.start(name);
      if (result.ok) {
        restored.push(name);
      } else {
        this.log.warn('failed to restore player', { player: name, message: result.message });
      }
    }
    return restored;
  }

  /** Starts every enabled autostart player that is not already running. */
  public autostartPlayers(): Promise<string[]> {
    const names = this.listPlayers()
      .filter((player) => player.autostart && player.enabled && !player.running)
      .map((player) => player.name);
    return this.restorePlayers(names);
  }
}
