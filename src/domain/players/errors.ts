import type { FieldIssue } from '@/domain/players/types';

export type PlayerErrorCode =
  | 'validation_error'
  | 'player_not_found'
  | 'player_exists'
  | 'already_running'
  | 'not_running'
  | 'binary_not_found'
  | 'device_open_failed'
  | 'provider_not_found'
  | 'persist_failed'
  | 'spawn_failed'
  | 'stop_failed'
  | 'mixer_unavailable';

/**
 * Base class for every failure surfaced to callers of the player operations.
 */
export class PlayerError extends Error {
  constructor(
    public readonly code: PlayerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends PlayerError {
  constructor(public readonly issues: FieldIssue[]) {
    super('validation_error', formatIssues(issues));
  }
}

export class PlayerNotFoundError extends PlayerError {
  constructor(public readonly playerName: string) {
    super('player_not_found', `Player '${playerName}' not found`);
  }
}

export class PlayerExistsError extends PlayerError {
  constructor(public readonly playerName: string) {
    super('player_exists', `Player with name '${playerName}' already exists`);
  }
}

export class AlreadyRunningError extends PlayerError {
  constructor(public readonly playerName: string, detail = 'already running') {
    super('already_running', `Player '${playerName}' ${detail}`);
  }
}

export class NotRunningError extends PlayerError {
  constructor(message: string) {
    super('not_running', message);
  }
}

export class BinaryNotFoundError extends PlayerError {
  constructor(public readonly binary: string) {
    super('binary_not_found', `${binary} binary not found - is it installed and on PATH?`);
  }
}

/**
 * The backend exited inside the startup window, typically because the
 * configured audio device could not be opened.
 */
export class DeviceOpenError extends PlayerError {
  constructor(
    message: string,
    public readonly primaryError: string,
    public readonly fallbackError: string | null = null,
  ) {
    super('device_open_failed', message);
  }
}

export class ProviderNotFoundError extends PlayerError {
  constructor(public readonly provider: string) {
    super('provider_not_found', `Unknown provider type: ${provider}`);
  }
}

export class PersistError extends PlayerError {
  constructor(
    public readonly path: string,
    cause: string,
  ) {
    super('persist_failed', `Failed to save configuration to ${path}: ${cause}`);
  }
}

export class SpawnError extends PlayerError {
  constructor(message: string) {
    super('spawn_failed', message);
  }
}

export class StopError extends PlayerError {
  constructor(message: string) {
    super('stop_failed', message);
  }
}

/**
 * No mixer control accepted a volume write. Reads never raise this; they
 * fall back to the default percentage.
 */
export class MixerControlUnavailableError extends PlayerError {
  constructor(message: string) {
    super('mixer_unavailable', message);
  }
}

function formatIssues(issues: FieldIssue[]): string {
  if (issues.length === 0) {
    return 'Invalid player configuration';
  }
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
}

/**
 * Outcome of operations that report success or failure instead of throwing.
 */
export type ActionResult =
  | { ok: true; message: string }
  | { ok: false; message: string; error: PlayerError };

export function succeeded(message: string): ActionResult {
  return { ok: true, message };
}

export function failed(error: PlayerError, message = error.message): ActionResult {
  return { ok: false, message, error };
}
