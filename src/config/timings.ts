/**
 * Fixed timing constants of the supervisor and the metadata clients.
 * Components take overrides at construction (tests shorten them); callers
 * never pass timeouts per operation.
 */
export interface SupervisorTimings {
  /** Window after spawn in which an exit counts as a failed start. */
  startupGraceMs: number;
  /** Wait after SIGTERM before escalating to SIGKILL. */
  stopTimeoutMs: number;
  /** Wait after SIGKILL before giving up and reporting a forced stop. */
  killTimeoutMs: number;
}

export interface MetadataTimings {
  reconnectDelayMs: number;
  staleThresholdMs: number;
  pingIntervalMs: number;
  /** Bounded join when a client is stopped. */
  stopJoinTimeoutMs: number;
  connectTimeoutMs: number;
}

export const SUPERVISOR_TIMINGS: SupervisorTimings = {
  startupGraceMs: 500,
  stopTimeoutMs: 5_000,
  killTimeoutMs: 2_000,
};

export const METADATA_TIMINGS: MetadataTimings = {
  reconnectDelayMs: 5_000,
  staleThresholdMs: 30_000,
  pingIntervalMs: 30_000,
  stopJoinTimeoutMs: 5_000,
  connectTimeoutMs: 10_000,
};

/** Running-state snapshots older than this are not restored on boot. */
export const STATE_RESTORE_MAX_AGE_MS = 5 * 60_000;

export const DEFAULT_STATUS_POLL_INTERVAL_MS = 2_000;
