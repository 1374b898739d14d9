import { createLogger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';
import type { RunningStateStore } from '@/application/players/runningStateStore';

export type StatusSnapshot = Record<string, boolean>;
export type StatusListener = (statuses: StatusSnapshot) => void;

export interface StatusSource {
  getAllStatuses(): StatusSnapshot;
}

/**
 * Polls player statuses on an interval and notifies listeners when the
 * snapshot changes. Each change is also written to the running-state file.
 */
export class StatusMonitor {
  private readonly log = createLogger('Players', 'StatusMonitor');
  private readonly listeners = new Set<StatusListener>();
  private timer: NodeJS.Timeout | null = null;
  private last: string | null = null;
  private polling: Promise<void> | null = null;

  constructor(
    private readonly source: StatusSource,
    private readonly state: RunningStateStore,
    private readonly intervalMs: number,
  ) {}

  public start(): void {
    if (this.timer) return;
    this.log.info('status monitor started', { intervalMs: this.intervalMs });
    this.timer = setInterval(() => {
      void this.poll();
    }, this.intervalMs);
    this.timer.unref();
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log.info('status monitor stopped');
    }
    await this.polling;
  }

  public onChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** One poll; overlapping calls share the poll in flight. */
  public poll(): Promise<void> {
    if (!this.polling) {
      this.polling = bestEffort(() => this.runPoll(), {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'status poll failed',
      }).finally(() => {
        this.polling = null;
      });
    }
    return this.polling;
  }

  private async runPoll(): Promise<void> {
    const statuses = this.source.getAllStatuses();
    const serialized = JSON.stringify(statuses);
    if (serialized === this.last) {
      return;
    }
    this.last = serialized;
    for (const listener of this.listeners) {
      try {
        listener({ ...statuses });
      } catch (error) {
        this.log.warn('status listener failed', { error });
      }
    }
    const running = Object.entries(statuses)
      .filter(([, isRunning]) => isRunning)
      .map(([name]) => name);
    await this.state.save(running, Object.keys(statuses).length);
  }
}
