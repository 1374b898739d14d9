/**
 * Why a spawn never produced a running process.
 */
export type SpawnFailure = {
  kind: 'binary_not_found' | 'spawn_error';
  message: string;
};

export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

/**
 * A backend process started in its own process group.
 */
export interface SupervisedProcess {
  readonly pid: number | null;
  readonly command: readonly string[];
  /** True once the process has exited or failed to start. */
  exited(): boolean;
  /** Set when the spawn itself failed; the process never ran. */
  failure(): SpawnFailure | null;
  /** Tail of what the process wrote to stderr. */
  errorOutput(): string;
  /** Resolves true when the process exits within `timeoutMs`, false otherwise. */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

/**
 * Spawns and signals player backends. The platform seam of the supervisor:
 * tests replace it with a scripted fake.
 */
export interface ProcessPort {
  spawn(command: readonly string[]): SupervisedProcess;
  /** Signals the whole process group; platforms without groups signal the process. */
  signalGroup(process: SupervisedProcess, signal: TerminationSignal): void;
}
