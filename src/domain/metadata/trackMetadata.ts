/**
 * Now-playing information for one player, replaced wholesale on every update.
 */
export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  artworkUrl: string;
  year: number | null;
  trackNumber: number | null;
  progressMs: number;
  durationMs: number;
  isPlaying: boolean;
  /** Epoch milliseconds of the update that produced this record. */
  updatedAt: number;
}

/** Age after which cached metadata suggests the feed is gone rather than idle. */
export const METADATA_STALE_THRESHOLD_MS = 30_000;

export function emptyTrackMetadata(updatedAt: number): TrackMetadata {
  return {
    title: '',
    artist: '',
    album: '',
    artworkUrl: '',
    year: null,
    trackNumber: null,
    progressMs: 0,
    durationMs: 0,
    isPlaying: false,
    updatedAt,
  };
}

export function isMetadataStale(
  metadata: TrackMetadata,
  now: number,
  thresholdMs = METADATA_STALE_THRESHOLD_MS,
): boolean {
  return now - metadata.updatedAt > thresholdMs;
}

export function progressPercent(metadata: TrackMetadata): number {
  if (metadata.durationMs <= 0) {
    return 0;
  }
  return Math.min(100, Math.floor((metadata.progressMs / metadata.durationMs) * 100));
}
