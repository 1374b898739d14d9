import path from 'node:path';
import { SUPERVISOR_TIMINGS, type SupervisorTimings } from '@/config/timings';
import {
  AlreadyRunningError,
  BinaryNotFoundError,
  DeviceOpenError,
  NotRunningError,
  PlayerError,
  PlayerNotFoundError,
  SpawnError,
  StopError,
  failed,
  succeeded,
  type ActionResult,
} from '@/domain/players/errors';
import type { PlayerConfig } from '@/domain/players/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { NowPlayingPort } from '@/ports/NowPlayingPort';
import type { PlayerConfigPort } from '@/ports/PlayerConfigPort';
import type { ProcessPort, SpawnFailure, SupervisedProcess } from '@/ports/ProcessPort';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import type { PlayerProvider } from '@/application/providers/playerProvider';
import type { ProviderRegistry } from '@/application/providers/providerRegistry';

/**
 * Bookkeeping for one live backend process.
 */
export interface ProcessHandle {
  name: string;
  pid: number | null;
  /** Spawned detached, so the group id equals the pid. */
  pgid: number | null;
  command: readonly string[];
  startedAt: number;
  viaFallback: boolean;
}

type Slot =
  | { state: 'starting' }
  | { state: 'running'; handle: ProcessHandle; process: SupervisedProcess }
  | { state: 'stopping'; handle: ProcessHandle; process: SupervisedProcess };

type LaunchOutcome =
  | { kind: 'running'; process: SupervisedProcess }
  | { kind: 'exited'; failure: SpawnFailure | null; output: string };

export interface ProcessSupervisorOptions {
  config: PlayerConfigPort;
  registry: ProviderRegistry;
  processes: ProcessPort;
  clock: ClockPort;
  /** Directory receiving `<player>.log`, passed to backends that log to a file. */
  logDir: string;
  nowPlaying?: NowPlayingPort;
  timings?: Partial<SupervisorTimings>;
}

/**
 * Owns the live-process table. A player moves through
 * `starting -> running -> stopping` and is absent otherwise; the slot is
 * reserved synchronously, before the first await, so concurrent starts of
 * one player cannot both spawn.
 */
export class ProcessSupervisor {
  private readonly log = createLogger('Players', 'Supervisor');
  private readonly slots = new Map<string, Slot>();
  private readonly timings: SupervisorTimings;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.timings = { ...SUPERVISOR_TIMINGS, ...options.timings };
  }

  public async start(name: string): Promise<ActionResult> {
    const config = this.options.config.getPlayer(name);
    if (!config) {
      return failed(new PlayerNotFoundError(name));
    }
    let provider: PlayerProvider;
    try {
      provider = this.options.registry.getForPlayer(config);
    } catch (error) {
      return failed(toPlayerError(error));
    }

    const existing = this.slots.get(name);
    if (existing) {
      if (existing.state === 'running' && existing.process.exited()) {
        this.prune(name);
      } else {
        const detail = existing.state === 'starting' ? 'is already starting' : 'is already running';
        return failed(new AlreadyRunningError(name, detail));
      }
    }
    this.slots.set(name, { state: 'starting' });

    try {
      return await this.launchPlayer(config, provider);
    } catch (error) {
      this.log.error('unexpected failure while starting player', { player: name, message: errorMessage(error) });
      return failed(toPlayerError(error));
    } finally {
      if (this.slots.get(name)?.state === 'starting') {
        this.slots.delete(name);
      }
    }
  }

  public async stop(name: string): Promise<ActionResult> {
    const slot = this.slots.get(name);
    if (!slot) {
      return failed(new NotRunningError(`Player '${name}' not running`));
    }
    if (slot.state === 'starting') {
      return failed(new NotRunningError(`Player '${name}' is still starting`));
    }
    if (slot.state === 'stopping') {
      return failed(new NotRunningError(`Player '${name}' is already stopping`));
    }
    if (slot.process.exited()) {
      this.prune(name);
      return failed(new NotRunningError(`Player '${name}' was not running`));
    }

    this.slots.set(name, { state: 'stopping', handle: slot.handle, process: slot.process });
    const { process: target } = slot;
    try {
      this.options.processes.signalGroup(target, 'SIGTERM');
      if (await target.waitForExit(this.timings.stopTimeoutMs)) {
        this.log.info('player stopped', { player: name, pid: slot.handle.pid });
        return succeeded(`Player '${name}' stopped`);
      }
      this.log.warn('player ignored SIGTERM, killing process group', {
        player: name,
        pid: slot.handle.pid,
        timeoutMs: this.timings.stopTimeoutMs,
      });
      this.options.processes.signalGroup(target, 'SIGKILL');
      if (!(await target.waitForExit(this.timings.killTimeoutMs))) {
        this.log.warn('player still present after SIGKILL', { player: name, pid: slot.handle.pid });
      }
      return succeeded(`Player '${name}' force stopped`);
    } catch (error) {
      this.log.error('failed to stop player', { player: name, message: errorMessage(error) });
      return failed(new StopError(`Failed to stop player '${name}': ${errorMessage(error)}`));
    } finally {
      this.slots.delete(name);
      await this.detachNowPlaying(name);
    }
  }

  /**
   * True while a handle exists and its process is alive. A registered
   * process that exited on its own is pruned here.
   */
  public isRunning(name: string): boolean {
    const slot = this.slots.get(name);
    if (!slot || slot.state === 'starting') {
      return false;
    }
    if (slot.process.exited()) {
      if (slot.state === 'running') {
        this.log.warn('player exited on its own', { player: name, pid: slot.handle.pid });
        this.prune(name);
      }
      return false;
    }
    return true;
  }

  public getAllStatuses(names: readonly string[] = this.options.config.listPlayers()): Record<string, boolean> {
    const statuses: Record<string, boolean> = {};
    for (const name of names) {
      statuses[name] = this.isRunning(name);
    }
    return statuses;
  }

  public getHandle(name: string): ProcessHandle | null {
    const slot = this.slots.get(name);
    return slot && slot.state !== 'starting' ? { ...slot.handle } : null;
  }

  public runningCount(): number {
    return [...this.slots.keys()].filter((name) => this.isRunning(name)).length;
  }

  /**
   * Stops every running player and returns how many stopped. Individual
   * failures are logged and skipped.
   */
  public async stopAll(): Promise<number> {
    const names = [...this.slots.entries()]
      .filter(([, slot]) => slot.state === 'running')
      .map(([name]) => name);
    const results = await Promise.all(
      names.map((name) =>
        bestEffort(() => this.stop(name), {
          fallback: failed(new StopError(`Failed to stop player '${name}'`)),
          onError: 'warn',
          log: this.log,
          context: { player: name },
        }),
      ),
    );
    const stopped = results.filter((result) => result.ok).length;
    this.log.info('stopped all players', { stopped, total: names.length });
    return stopped;
  }

  private async launchPlayer(config: PlayerConfig, provider: PlayerProvider): Promise<ActionResult> {
    const name = config.name;
    const logPath = path.join(this.options.logDir, `${name}.log`);

    const primary = await this.launch(provider.buildCommand(config, logPath));
    if (primary.kind === 'running') {
      this.register(config, provider, primary.process, false);
      return succeeded(`Player '${name}' started`);
    }
    if (primary.failure?.kind === 'binary_not_found') {
      this.log.error('player binary missing', { player: name, binary: provider.binaryName });
      return failed(new BinaryNotFoundError(provider.binaryName));
    }
    if (primary.failure) {
      return failed(new SpawnError(`Failed to start player '${name}': ${primary.failure.message}`));
    }

    const primaryError = primary.output || 'process exited immediately';
    this.log.warn('player exited during startup', { player: name, device: config.device, error: primaryError });

    const fallbackCommand = provider.supportsFallback() ? provider.buildFallbackCommand(config, logPath) : null;
    if (!fallbackCommand) {
      return failed(
        new DeviceOpenError(`Player '${name}' failed to start: ${primaryError}`, primaryError),
      );
    }

    this.log.info('retrying player with fallback device', { player: name });
    const fallback = await this.launch(fallbackCommand);
    if (fallback.kind === 'running') {
      this.register(config, provider, fallback.process, true);
      return succeeded(
        `Player '${name}' started with null device (audio device '${config.device}' not available)`,
      );
    }
    const fallbackError = fallback.failure?.message || fallback.output || 'process exited immediately';
    this.log.error('fallback start failed', { player: name, error: fallbackError });
    return failed(
      new DeviceOpenError(
        `Player '${name}' failed to start. Primary error: ${primaryError}. Fallback error: ${fallbackError}`,
        primaryError,
        fallbackError,
      ),
    );
  }

  /**
   * Spawns `command` and watches it through the startup window.
   */
  private async launch(command: string[]): Promise<LaunchOutcome> {
    this.log.debug('spawning backend', { command: command.join(' ') });
    let spawned: SupervisedProcess;
    try {
      spawned = this.options.processes.spawn(command);
    } catch (error) {
      return { kind: 'exited', failure: { kind: 'spawn_error', message: errorMessage(error) }, output: '' };
    }
    const exitedEarly = await spawned.waitForExit(this.timings.startupGraceMs);
    if (!exitedEarly && !spawned.exited()) {
      return { kind: 'running', process: spawned };
    }
    return { kind: 'exited', failure: spawned.failure(), output: spawned.errorOutput() };
  }

  private register(
    config: PlayerConfig,
    provider: PlayerProvider,
    spawned: SupervisedProcess,
    viaFallback: boolean,
  ): void {
    const handle: ProcessHandle = {
      name: config.name,
      pid: spawned.pid,
      pgid: spawned.pid,
      command: spawned.command,
      startedAt: this.options.clock.now(),
      viaFallback,
    };
    this.slots.set(config.name, { state: 'running', handle, process: spawned });
    this.log.info('player started', { player: config.name, pid: handle.pid, viaFallback });

    const url = provider.nowPlayingUrl(config);
    if (url && this.options.nowPlaying) {
      this.options.nowPlaying.attach(config.name, url);
    }
  }

  private prune(name: string): void {
    this.slots.delete(name);
    void this.detachNowPlaying(name);
  }

  private async detachNowPlaying(name: string): Promise<void> {
    const nowPlaying = this.options.nowPlaying;
    if (!nowPlaying) {
      return;
    }
    await bestEffort(() => nowPlaying.detach(name), {
      fallback: undefined,
      onError: 'warn',
      log: this.log,
      label: 'failed to detach now-playing feed',
      context: { player: name },
    });
  }
}

function toPlayerError(error: unknown): PlayerError {
  return error instanceof PlayerError ? error : new SpawnError(errorMessage(error));
}
