import { STATE_RESTORE_MAX_AGE_MS } from '@/config/timings';
import { isRecord } from '@/domain/players/playerSchema';
import type { ClockPort } from '@/ports/ClockPort';
import type { StoragePort } from '@/ports/StoragePort';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

/**
 * Snapshot of which players were running, written beside the players file.
 */
export interface RunningState {
  /** ISO-8601 time of the snapshot. */
  timestamp: string;
  runningPlayers: string[];
  totalPlayers: number;
}

/**
 * Remembers running players across restarts. Failures are logged, never
 * thrown: losing the snapshot only means nothing is restored.
 */
export class RunningStateStore {
  private readonly log = createLogger('Players', 'State');

  constructor(
    private readonly storage: StoragePort,
    public readonly filePath: string,
    private readonly clock: ClockPort,
  ) {}

  public async save(runningPlayers: readonly string[], totalPlayers: number): Promise<void> {
    const state: RunningState = {
      timestamp: new Date(this.clock.now()).toISOString(),
      runningPlayers: [...runningPlayers],
      totalPlayers,
    };
    try {
      await this.storage.writeJson(this.filePath, state);
      this.log.debug('saved running state', { running: runningPlayers.length });
    } catch (error) {
      this.log.error('failed to save running state', { path: this.filePath, message: errorMessage(error) });
    }
  }

  /**
   * Players to restore: empty when the snapshot is missing, unreadable or
   * older than `maxAgeMs`.
   */
  public async load(maxAgeMs = STATE_RESTORE_MAX_AGE_MS): Promise<string[]> {
    const result = await this.storage.readJson(this.filePath);
    if (result.kind === 'missing') {
      this.log.info('no previous state file found');
      return [];
    }
    if (result.kind === 'invalid' || !isRecord(result.data)) {
      this.log.warn('state file unreadable, nothing restored', { path: this.filePath });
      return [];
    }
    const data = result.data;
    const timestamp = typeof data.timestamp === 'string' ? Date.parse(data.timestamp) : Number.NaN;
    if (Number.isNaN(timestamp)) {
      this.log.warn('invalid timestamp in state file, nothing restored', { path: this.filePath });
      return [];
    }
    const ageMs = this.clock.now() - timestamp;
    if (ageMs > maxAgeMs) {
      this.log.info('state file too old, not restoring players', { ageMs, maxAgeMs });
      return [];
    }
    const running = data.runningPlayers ?? data.running_players;
    if (!Array.isArray(running)) {
      return [];
    }
    return running.filter((name): name is string => typeof name === 'string' && name.length > 0);
  }
}
