export type CommandOutput =
  | { kind: 'completed'; code: number; stdout: string; stderr: string }
  | { kind: 'not_found'; message: string }
  | { kind: 'failed'; message: string };

/**
 * Runs a short-lived external tool and collects its output.
 */
export interface CommandPort {
  run(binary: string, args: readonly string[]): Promise<CommandOutput>;
  /** Whether `binary` resolves on PATH. */
  which(binary: string): Promise<boolean>;
}
