import { execFile } from 'node:child_process';
import type { CommandOutput, CommandPort } from '@/ports/CommandPort';
import { errorCode, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Audio', 'Command');

const COMMAND_TIMEOUT_MS = 10_000;

/**
 * Runs ALSA utilities and PATH lookups through execFile (no shell).
 */
export class CommandRunner implements CommandPort {
  public run(binary: string, args: readonly string[]): Promise<CommandOutput> {
    return new Promise((resolve) => {
      execFile(binary, [...args], { timeout: COMMAND_TIMEOUT_MS }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ kind: 'completed', code: 0, stdout, stderr });
          return;
        }
        if (errorCode(error) === 'ENOENT') {
          resolve({ kind: 'not_found', message: `${binary}: command not found` });
          return;
        }
        const exitCode = exitCodeOf(error);
        if (exitCode !== undefined) {
          resolve({ kind: 'completed', code: exitCode, stdout, stderr });
          return;
        }
        log.spam('command failed', { binary, args: args.join(' '), message: errorMessage(error) });
        resolve({ kind: 'failed', message: errorMessage(error) });
      });
    });
  }

  public async which(binary: string): Promise<boolean> {
    const result = await this.run('which', [binary]);
    return result.kind === 'completed' && result.code === 0 && result.stdout.trim().length > 0;
  }
}

function exitCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}
