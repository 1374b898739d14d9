export const PROVIDER_TYPES = ['squeezelite', 'sendspin'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export const DEFAULT_PROVIDER: ProviderType = 'squeezelite';

export const SENDSPIN_LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type SendspinLogLevel = (typeof SENDSPIN_LOG_LEVELS)[number];

export function isProviderType(value: unknown): value is ProviderType {
  return typeof value === 'string' && PROVIDER_TYPES.some((type) => type === value);
}

interface BasePlayerConfig {
  /** Unique key of the player; also the name announced to the music server. */
  name: string;
  /** Output device identifier as understood by the backend (ALSA id, index, name). */
  device: string;
  volume: number;
  autostart: boolean;
  enabled: boolean;
}

export interface SqueezelitePlayerConfig extends BasePlayerConfig {
  provider: 'squeezelite';
  /** Lowercase colon-separated MAC announced to LMS. */
  macAddress: string;
  /** Optional LMS host (or host:port); empty means discovery. */
  serverIp: string;
}

export interface SendspinPlayerConfig extends BasePlayerConfig {
  provider: 'sendspin';
  clientId: string;
  /** ws:// or wss:// server URL; empty means mDNS discovery. */
  serverUrl: string;
  delayMs: number;
  logLevel: SendspinLogLevel;
}

export type PlayerConfig = SqueezelitePlayerConfig | SendspinPlayerConfig;

export type PlayerConfigMap = Record<string, PlayerConfig>;

/**
 * Untyped player fields as they arrive from a caller or from disk, keyed by
 * the camelCase field names. Providers fill defaults on drafts before the
 * schema turns them into a {@link PlayerConfig}.
 */
export type PlayerDraft = Record<string, unknown>;

export type FieldIssue = {
  field: string;
  message: string;
};
