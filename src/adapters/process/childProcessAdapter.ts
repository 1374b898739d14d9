import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type {
  ProcessPort,
  SpawnFailure,
  SupervisedProcess,
  TerminationSignal,
} from '@/ports/ProcessPort';
import { errorCode, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Players', 'Process');

const OUTPUT_TAIL_BYTES = 4096;

/** How long after `exit` the pipes may stay open before the process counts as gone. */
export const STDIO_DRAIN_MS = 250;

/** The parts of a spawned child the wrapper relies on. */
export interface ChildLike {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit' | 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Wraps one spawned backend. Output is drained continuously so a chatty
 * process never blocks on a full pipe; only the tail is kept. The process
 * counts as exited once its pipes close, so the error excerpt is complete;
 * a helper holding the pipes open delays that by at most `STDIO_DRAIN_MS`.
 */
export class ChildSupervisedProcess implements SupervisedProcess {
  private exitedFlag = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private spawnFailure: SpawnFailure | null = null;
  private stderrTail = '';
  private stdoutTail = '';
  private readonly exitWaiters = new Set<() => void>();

  constructor(
    public readonly command: readonly string[],
    private readonly child: ChildLike,
  ) {
    child.stdout?.on('data', (chunk: Buffer) => {
      this.stdoutTail = appendTail(this.stdoutTail, chunk.toString());
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      this.stderrTail = appendTail(this.stderrTail, chunk.toString());
    });
    child.on('error', (error) => {
      this.spawnFailure = {
        kind: errorCode(error) === 'ENOENT' ? 'binary_not_found' : 'spawn_error',
        message: errorMessage(error),
      };
      this.markExited();
    });
    child.on('exit', (code, signal) => {
      log.debug('backend exited', { binary: command[0], pid: child.pid ?? null, code, signal });
      if (!this.exitedFlag && !this.drainTimer) {
        this.drainTimer = setTimeout(() => this.markExited(), STDIO_DRAIN_MS);
        this.drainTimer.unref();
      }
    });
    child.on('close', () => {
      this.markExited();
    });
  }

  public get pid(): number | null {
    return this.child.pid ?? null;
  }

  public exited(): boolean {
    return this.exitedFlag;
  }

  public failure(): SpawnFailure | null {
    return this.spawnFailure;
  }

  public errorOutput(): string {
    const stderr = this.stderrTail.trim();
    return stderr || this.stdoutTail.trim();
  }

  public waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exitedFlag) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters.delete(onExit);
        resolve(false);
      }, timeoutMs);
      this.exitWaiters.add(onExit);
    });
  }

  public signal(signal: TerminationSignal): void {
    const pid = this.child.pid;
    if (pid === undefined || this.exitedFlag) {
      return;
    }
    if (process.platform === 'win32') {
      this.child.kill(signal);
      return;
    }
    try {
      process.kill(-pid, signal);
    } catch (error) {
      if (errorCode(error) === 'ESRCH') {
        return;
      }
      // group already gone or not ours; fall back to the leader
      log.debug('group signal failed, signalling process', { pid, signal, message: errorMessage(error) });
      this.child.kill(signal);
    }
  }

  private markExited(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    if (this.exitedFlag) {
      return;
    }
    this.exitedFlag = true;
    for (const waiter of this.exitWaiters) {
      waiter();
    }
    this.exitWaiters.clear();
  }
}

function appendTail(current: string, chunk: string): string {
  const combined = current + chunk;
  return combined.length > OUTPUT_TAIL_BYTES ? combined.slice(-OUTPUT_TAIL_BYTES) : combined;
}

/**
 * Spawns backends detached so each leads its own process group and can be
 * stopped together with any helpers it forks.
 */
export class ChildProcessAdapter implements ProcessPort {
  public spawn(command: readonly string[]): SupervisedProcess {
    const [binary, ...args] = command;
    const child = spawn(binary, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });
    log.debug('spawned backend', { binary, pid: child.pid ?? null });
    return new ChildSupervisedProcess(command, child);
  }

  public signalGroup(target: SupervisedProcess, signal: TerminationSignal): void {
    if (!(target instanceof ChildSupervisedProcess)) {
      log.warn('signal for foreign process ignored', { pid: target.pid, signal });
      return;
    }
    target.signal(signal);
  }
}
