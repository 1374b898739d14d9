import path from 'node:path';
import { DEFAULT_PROVIDER, isProviderType, type ProviderType } from '@/domain/players/types';
import { DEFAULT_STATUS_POLL_INTERVAL_MS } from '@/config/timings';
import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
  /** JSON document holding every player definition. */
  playersConfigPath: string;
  /** Snapshot of which players were running, used to restore after restart. */
  stateFilePath: string;
  /** Directory receiving one backend log file per player. */
  playerLogDir: string;
  defaultProvider: ProviderType;
  statusPollIntervalMs: number;
}

function defaultEnvironment(cwd: string): EnvironmentConfig {
  return {
    nodeEnv: 'development',
    logLevel: 'info',
    logJson: false,
    playersConfigPath: path.resolve(cwd, 'config', 'players.json'),
    stateFilePath: path.resolve(cwd, 'config', 'state.json'),
    playerLogDir: path.resolve(cwd, 'logs'),
    defaultProvider: DEFAULT_PROVIDER,
    statusPollIntervalMs: DEFAULT_STATUS_POLL_INTERVAL_MS,
  };
}

/**
 * Builds the environment configuration from defaults plus the supported
 * overrides. Unrecognised values fall back to the default.
 */
export function loadEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): EnvironmentConfig {
  const config = defaultEnvironment(cwd);
  const nodeEnv = env.NODE_ENV;
  if (nodeEnv === 'production' || nodeEnv === 'test' || nodeEnv === 'development') {
    config.nodeEnv = nodeEnv;
  }
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(level)) {
    config.logLevel = level;
  }
  config.logJson = env.LOG_JSON === 'true' || env.LOG_JSON === '1';
  if (env.PLAYERS_CONFIG_PATH) {
    config.playersConfigPath = path.resolve(cwd, env.PLAYERS_CONFIG_PATH);
  }
  if (env.PLAYERS_STATE_PATH) {
    config.stateFilePath = path.resolve(cwd, env.PLAYERS_STATE_PATH);
  }
  if (env.PLAYERS_LOG_DIR) {
    config.playerLogDir = path.resolve(cwd, env.PLAYERS_LOG_DIR);
  }
  if (isProviderType(env.DEFAULT_PROVIDER)) {
    config.defaultProvider = env.DEFAULT_PROVIDER;
  }
  const interval = Number(env.STATUS_POLL_INTERVAL_MS);
  if (Number.isInteger(interval) && interval > 0) {
    config.statusPollIntervalMs = interval;
  }
  return config;
}
