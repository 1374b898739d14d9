import type { MetadataTimings } from '@/config/timings';
import type { TrackMetadata } from '@/domain/metadata/trackMetadata';
import type { ClockPort } from '@/ports/ClockPort';
import type { MetadataConnector } from '@/ports/MetadataConnectionPort';
import type { NowPlayingPort } from '@/ports/NowPlayingPort';
import { createLogger } from '@/shared/logging/logger';
import { SendspinMetadataClient } from '@/application/metadata/sendspinMetadataClient';

/**
 * At most one now-playing client per player, keyed by player name.
 */
export class MetadataClientManager implements NowPlayingPort {
  private readonly log = createLogger('Metadata', 'Manager');
  private readonly clients = new Map<string, SendspinMetadataClient>();

  constructor(
    private readonly connector: MetadataConnector,
    private readonly clock: ClockPort,
    private readonly timings: Partial<MetadataTimings> = {},
  ) {}

  /**
   * Returns the running client for `playerName`, creating it when needed.
   * A client bound to another URL is replaced; an empty URL yields null.
   */
  public async getOrCreate(playerName: string, serverUrl: string): Promise<SendspinMetadataClient | null> {
    if (!serverUrl) {
      return null;
    }
    let existing = this.clients.get(playerName);
    while (existing && existing.serverUrl !== serverUrl) {
      this.log.info('server URL changed, replacing metadata client', {
        player: playerName,
        from: existing.serverUrl,
        to: serverUrl,
      });
      this.clients.delete(playerName);
      await existing.stop();
      // a concurrent call may have created one while the old client stopped
      existing = this.clients.get(playerName);
    }
    if (existing) {
      return existing;
    }
    const client = new SendspinMetadataClient(playerName, serverUrl, this.connector, this.clock, this.timings);
    this.clients.set(playerName, client);
    client.start();
    return client;
  }

  public getClient(playerName: string): SendspinMetadataClient | null {
    return this.clients.get(playerName) ?? null;
  }

  public getMetadata(playerName: string): TrackMetadata | null {
    return this.clients.get(playerName)?.getMetadata() ?? null;
  }

  public async stop(playerName: string): Promise<void> {
    const client = this.clients.get(playerName);
    if (!client) {
      return;
    }
    this.clients.delete(playerName);
    await client.stop();
  }

  public async stopAll(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.stop()));
    if (clients.length > 0) {
      this.log.info('stopped all metadata clients', { count: clients.length });
    }
  }

  public size(): number {
    return this.clients.size;
  }

  public attach(playerName: string, serverUrl: string): void {
    void this.getOrCreate(playerName, serverUrl);
  }

  public detach(playerName: string): Promise<void> {
    return this.stop(playerName);
  }
}
