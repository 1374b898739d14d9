import {
  DEFAULT_PROVIDER,
  SENDSPIN_LOG_LEVELS,
  isProviderType,
  type FieldIssue,
  type PlayerConfig,
  type PlayerDraft,
  type ProviderType,
  type SendspinLogLevel,
  type SendspinPlayerConfig,
  type SqueezelitePlayerConfig,
} from '@/domain/players/types';

export const MAX_NAME_LENGTH = 64;
export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;
export const DEFAULT_VOLUME = 75;
export const DEFAULT_DEVICE = 'default';
export const DEFAULT_SENDSPIN_LOG_LEVEL: SendspinLogLevel = 'INFO';

const MAC_ADDRESS_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;
const SERVER_HOST_PATTERN = /^[A-Za-z0-9._-]+(:\d{1,5})?$/;
const WEBSOCKET_URL_PATTERN = /^wss?:\/\/\S+$/;
const ALSA_HARDWARE_DEVICE_PATTERN = /^(plug)?hw:/;

/**
 * Field names accepted in snake_case (the layout of hand-written files and
 * older API clients) and the camelCase name they map to.
 */
const FIELD_ALIASES: Record<string, string> = {
  mac_address: 'macAddress',
  server_ip: 'serverIp',
  client_id: 'clientId',
  server_url: 'serverUrl',
  delay_ms: 'delayMs',
  log_level: 'logLevel',
};

export type SchemaResult<T> = { ok: true; value: T } | { ok: false; issues: FieldIssue[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAlsaHardwareDevice(device: string): boolean {
  return ALSA_HARDWARE_DEVICE_PATTERN.test(device);
}

/**
 * Turns caller input into a draft with camelCase keys. `name` fills in a
 * missing name field (the config file keys players by name).
 */
export function toPlayerDraft(input: unknown, name?: string): SchemaResult<PlayerDraft> {
  if (!isRecord(input)) {
    return { ok: false, issues: [{ field: 'config', message: 'player configuration must be an object' }] };
  }
  const draft: PlayerDraft = {};
  for (const [key, value] of Object.entries(input)) {
    draft[FIELD_ALIASES[key] ?? key] = value;
  }
  if ((draft.name === undefined || draft.name === '') && name) {
    draft.name = name;
  }
  return { ok: true, value: draft };
}

/**
 * Resolves the provider a draft asks for; a missing field means the default provider.
 */
export function draftProvider(draft: { provider?: unknown }): string {
  const provider = draft.provider;
  if (provider === undefined || provider === null || provider === '') {
    return DEFAULT_PROVIDER;
  }
  return String(provider);
}

export function getDefaultConfig(provider: ProviderType): PlayerDraft {
  const common = {
    provider,
    device: DEFAULT_DEVICE,
    volume: DEFAULT_VOLUME,
    autostart: false,
    enabled: true,
  };
  if (provider === 'sendspin') {
    return {
      ...common,
      serverUrl: '',
      clientId: '',
      delayMs: 0,
      logLevel: DEFAULT_SENDSPIN_LOG_LEVEL,
    };
  }
  return { ...common, serverIp: '', macAddress: '' };
}

/**
 * Validates a draft against the schema of its provider and returns the typed
 * config. Defaults are applied for absent optional fields.
 */
export function parsePlayerConfig(draft: PlayerDraft): SchemaResult<PlayerConfig> {
  const provider = draftProvider(draft);
  if (!isProviderType(provider)) {
    return { ok: false, issues: [{ field: 'provider', message: `unknown provider '${provider}'` }] };
  }
  const merged: PlayerDraft = { ...getDefaultConfig(provider) };
  for (const [key, value] of Object.entries(draft)) {
    if (value === undefined || value === null) continue;
    // blank device or log level falls back to the default rather than failing
    if (value === '' && (key === 'device' || key === 'logLevel')) continue;
    merged[key] = value;
  }
  const issues: FieldIssue[] = [];
  const base = {
    name: readName(merged.name, issues),
    device: readString(merged, 'device', issues),
    volume: readVolume(merged.volume, issues),
    autostart: readBoolean(merged, 'autostart', issues),
    enabled: readBoolean(merged, 'enabled', issues),
  };

  let config: PlayerConfig;
  if (provider === 'sendspin') {
    const sendspin: SendspinPlayerConfig = {
      ...base,
      provider,
      clientId: readString(merged, 'clientId', issues),
      serverUrl: readServerUrl(merged.serverUrl, issues),
      delayMs: readDelay(merged.delayMs, issues),
      logLevel: readLogLevel(merged.logLevel, issues),
    };
    if (isAlsaHardwareDevice(sendspin.device)) {
      issues.push({
        field: 'device',
        message: `ALSA device '${sendspin.device}' is not supported by sendspin (PortAudio); use a device index or name`,
      });
    }
    config = sendspin;
  } else {
    const squeezelite: SqueezelitePlayerConfig = {
      ...base,
      provider,
      macAddress: readMacAddress(merged.macAddress, issues),
      serverIp: readServerIp(merged.serverIp, issues),
    };
    config = squeezelite;
  }

  return issues.length > 0 ? { ok: false, issues } : { ok: true, value: config };
}

export type PlayersFileResult = {
  valid: boolean;
  errors: string[];
  players: Record<string, PlayerConfig>;
  /** Entries that failed validation, exactly as read. */
  rejected: Record<string, unknown>;
};

/**
 * Validates the whole players document. Valid entries are returned even when
 * others fail, so one bad entry does not take every player offline.
 */
export function validatePlayersFile(data: unknown): PlayersFileResult {
  if (!isRecord(data)) {
    return {
      valid: false,
      errors: ['players file must contain a dictionary of players'],
      players: {},
      rejected: {},
    };
  }
  const errors: string[] = [];
  const players: Record<string, PlayerConfig> = {};
  const rejected: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(data)) {
    const checked = checkEntry(key, entry);
    if (typeof checked === 'string') {
      errors.push(checked);
      rejected[key] = entry;
      continue;
    }
    players[key] = checked;
  }
  return { valid: errors.length === 0, errors, players, rejected };
}

function checkEntry(key: string, entry: unknown): PlayerConfig | string {
  const draft = toPlayerDraft(entry, key);
  if (!draft.ok) {
    return `${key}: ${formatIssueList(draft.issues)}`;
  }
  const parsed = parsePlayerConfig(draft.value);
  if (!parsed.ok) {
    return `${key}: ${formatIssueList(parsed.issues)}`;
  }
  if (parsed.value.name !== key) {
    return `${key}: name '${parsed.value.name}' does not match its key`;
  }
  return parsed.value;
}

export function formatIssueList(issues: FieldIssue[]): string {
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
}

function readName(value: unknown, issues: FieldIssue[]): string {
  if (typeof value !== 'string') {
    issues.push({ field: 'name', message: 'player name is required' });
    return '';
  }
  const name = value.trim();
  if (!name) {
    issues.push({ field: 'name', message: 'player name is required' });
  } else if (name.length > MAX_NAME_LENGTH) {
    issues.push({ field: 'name', message: `player name too long (max ${MAX_NAME_LENGTH} characters)` });
  } else if (/[/\\\0]/.test(name)) {
    issues.push({ field: 'name', message: 'player name contains invalid characters' });
  }
  return name;
}

function readString(source: PlayerDraft, field: string, issues: FieldIssue[]): string {
  const value = source[field];
  if (typeof value !== 'string') {
    issues.push({ field, message: 'must be a string' });
    return '';
  }
  return value.trim();
}

function readBoolean(source: PlayerDraft, field: string, issues: FieldIssue[]): boolean {
  const value = source[field];
  if (typeof value !== 'boolean') {
    issues.push({ field, message: 'must be true or false' });
    return false;
  }
  return value;
}

function readVolume(value: unknown, issues: FieldIssue[]): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    issues.push({ field: 'volume', message: 'volume must be an integer' });
    return DEFAULT_VOLUME;
  }
  if (value < MIN_VOLUME || value > MAX_VOLUME) {
    issues.push({ field: 'volume', message: `volume must be between ${MIN_VOLUME} and ${MAX_VOLUME}` });
  }
  return value;
}

function readMacAddress(value: unknown, issues: FieldIssue[]): string {
  if (typeof value !== 'string') {
    issues.push({ field: 'macAddress', message: 'MAC address must be a string' });
    return '';
  }
  const mac = value.trim();
  if (mac && !MAC_ADDRESS_PATTERN.test(mac)) {
    issues.push({ field: 'macAddress', message: `invalid MAC address '${mac}' (expected xx:xx:xx:xx:xx:xx)` });
  }
  return mac.toLowerCase();
}

function readServerIp(value: unknown, issues: FieldIssue[]): string {
  if (typeof value !== 'string') {
    issues.push({ field: 'serverIp', message: 'must be a string' });
    return '';
  }
  const server = value.trim();
  if (server.includes('://')) {
    issues.push({ field: 'serverIp', message: 'server_ip must be a host or IP address, not a URL' });
  } else if (server && !SERVER_HOST_PATTERN.test(server)) {
    issues.push({ field: 'serverIp', message: `invalid server_ip '${server}'` });
  }
  return server;
}

function readServerUrl(value: unknown, issues: FieldIssue[]): string {
  if (typeof value !== 'string') {
    issues.push({ field: 'serverUrl', message: 'must be a string' });
    return '';
  }
  const url = value.trim();
  if (url && !WEBSOCKET_URL_PATTERN.test(url)) {
    issues.push({ field: 'serverUrl', message: 'server_url must start with ws:// or wss://' });
  }
  return url;
}

function readDelay(value: unknown, issues: FieldIssue[]): number {
  const numeric = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isInteger(numeric)) {
    issues.push({ field: 'delayMs', message: 'delay must be an integer (milliseconds)' });
    return 0;
  }
  return numeric;
}

function readLogLevel(value: unknown, issues: FieldIssue[]): SendspinLogLevel {
  const upper = typeof value === 'string' ? value.trim().toUpperCase() : '';
  const level = SENDSPIN_LOG_LEVELS.find((candidate) => candidate === upper);
  if (!level) {
    issues.push({
      field: 'logLevel',
      message: `invalid log level '${String(value)}' (expected one of ${SENDSPIN_LOG_LEVELS.join(', ')})`,
    });
    return DEFAULT_SENDSPIN_LOG_LEVEL;
  }
  return level;
}
