/**
 * Lifecycle hooks for per-player now-playing feeds, driven by the
 * supervisor as players start and stop.
 */
export interface NowPlayingPort {
  attach(playerName: string, serverUrl: string): void;
  /** Resolves once the feed is torn down; never rejects. */
  detach(playerName: string): Promise<void>;
}
