import { METADATA_TIMINGS, type MetadataTimings } from '@/config/timings';
import {
  emptyTrackMetadata,
  isMetadataStale,
  type TrackMetadata,
} from '@/domain/metadata/trackMetadata';
import { isRecord } from '@/domain/players/playerSchema';
import type { ClockPort } from '@/ports/ClockPort';
import type { MetadataConnection, MetadataConnector } from '@/ports/MetadataConnectionPort';
import { errorMessage, safeJsonParse } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export const METADATA_ROLE = 'metadata@v1';
const PROTOCOL_VERSION = 1;

/**
 * Reconnecting now-playing client for one player. The loop suspends only
 * while connecting, reading the next frame and waiting to retry; each of
 * those observes the stop signal.
 */
export class SendspinMetadataClient {
  private readonly log: ComponentLogger;
  private readonly timings: MetadataTimings;
  private metadata: TrackMetadata;
  private connected = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    public readonly playerName: string,
    public readonly serverUrl: string,
    private readonly connector: MetadataConnector,
    private readonly clock: ClockPort,
    timings: Partial<MetadataTimings> = {},
  ) {
    this.log = createLogger('Metadata', 'Client').child(playerName);
    this.timings = { ...METADATA_TIMINGS, ...timings };
    this.metadata = emptyTrackMetadata(clock.now());
  }

  public get clientId(): string {
    return `player-metadata-${this.playerName}`;
  }

  public start(): void {
    if (this.loop) {
      this.log.debug('metadata client already running', { url: this.serverUrl });
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.log.info('metadata client started', { url: this.serverUrl });
  }

  /**
   * Signals the loop and waits for it, at most the join timeout.
   * Safe to call repeatedly.
   */
  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }
    this.controller?.abort();
    let timer: NodeJS.Timeout | undefined;
    const joined = await Promise.race([
      loop.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.timings.stopJoinTimeoutMs);
      }),
    ]);
    clearTimeout(timer);
    if (!joined) {
      this.log.warn('metadata loop did not exit in time', { timeoutMs: this.timings.stopJoinTimeoutMs });
    }
    this.loop = null;
    this.controller = null;
    this.connected = false;
    this.log.info('metadata client stopped', { url: this.serverUrl });
  }

  public isRunning(): boolean {
    return this.loop !== null;
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public getMetadata(): TrackMetadata {
    return { ...this.metadata };
  }

  public isStale(): boolean {
    return isMetadataStale(this.metadata, this.clock.now(), this.timings.staleThresholdMs);
  }

  /** Applies one raw text frame. */
  public handleMessage(raw: string): void {
    const message = safeJsonParse(raw, {
      onError: 'warn',
      log: this.log,
      label: 'invalid JSON message',
    });
    if (!isRecord(message)) {
      return;
    }
    const payload = isRecord(message.payload) ? message.payload : {};
    switch (message.type) {
      case 'server/hello':
        this.log.info('server hello received', { server: payload.name ?? payload.server_id ?? null });
        break;
      case 'server/state':
        this.applyState(payload);
        break;
      case 'stream/start':
        this.log.debug('stream started');
        break;
      case 'stream/end':
        this.log.debug('stream ended');
        this.metadata = emptyTrackMetadata(this.stamp());
        break;
      default:
        this.log.spam('ignoring message', { type: String(message.type) });
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.session(signal);
      } catch (error) {
        if (!signal.aborted) {
          this.log.warn('metadata connection failed', { url: this.serverUrl, message: errorMessage(error) });
        }
      } finally {
        this.connected = false;
      }
      if (signal.aborted) {
        break;
      }
      this.log.debug('reconnecting', { delayMs: this.timings.reconnectDelayMs });
      await sleep(this.timings.reconnectDelayMs, signal);
    }
  }

  private async session(signal: AbortSignal): Promise<void> {
    this.log.debug('connecting', { url: this.serverUrl });
    const connection: MetadataConnection = await this.connector(this.serverUrl, signal);
    try {
      this.connected = true;
      this.log.info('connected', { url: this.serverUrl });
      connection.send(
        JSON.stringify({
          type: 'client/hello',
          payload: {
            client_id: this.clientId,
            name: this.playerName,
            version: PROTOCOL_VERSION,
            supported_roles: [METADATA_ROLE],
          },
        }),
      );
      while (!signal.aborted) {
        const frame = await connection.next(signal);
        if (frame === null) {
          break;
        }
        this.handleMessage(frame);
      }
    } finally {
      connection.close();
    }
  }

  private applyState(payload: Record<string, unknown>): void {
    const data = payload.metadata;
    if (!isRecord(data) || Object.keys(data).length === 0) {
      return;
    }
    const progress = isRecord(data.progress) ? data.progress : {};
    this.metadata = {
      title: readText(data.title),
      artist: readText(data.artist),
      album: readText(data.album),
      artworkUrl: readText(data.artwork_url),
      year: readOptionalInt(data.year),
      trackNumber: readOptionalInt(data.track),
      progressMs: readOptionalInt(progress.track_progress) ?? 0,
      durationMs: readOptionalInt(progress.track_duration) ?? 0,
      isPlaying: true,
      updatedAt: this.stamp(),
    };
    this.log.debug('metadata updated', { artist: this.metadata.artist, title: this.metadata.title });
  }

  /** Never earlier than the previous update, even if the clock steps back. */
  private stamp(): number {
    return Math.max(this.clock.now(), this.metadata.updatedAt);
  }
}

function readText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function readOptionalInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : null;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
