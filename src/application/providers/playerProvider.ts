import type { ActionResult } from '@/domain/players/errors';
import type {
  FieldIssue,
  PlayerConfig,
  PlayerDraft,
  ProviderType,
} from '@/domain/players/types';

/**
 * Static description of a provider, listed to clients choosing a backend.
 */
export interface ProviderDefinition {
  type: ProviderType;
  displayName: string;
  description: string;
  binaryName: string;
  requiredFields: readonly string[];
  supportsFallback: boolean;
}

export interface ProviderInfo {
  type: ProviderType;
  displayName: string;
  binary: string;
  available: boolean;
}

/**
 * Capability set of one player backend. The registry selects the
 * implementation from the `provider` field of a config.
 */
export interface PlayerProvider {
  readonly type: ProviderType;
  readonly definition: ProviderDefinition;
  readonly displayName: string;
  readonly binaryName: string;

  buildCommand(config: PlayerConfig, logPath: string): string[];
  /** Alternate launch used when the primary exits inside the startup window; null when unsupported. */
  buildFallbackCommand(config: PlayerConfig, logPath: string): string[] | null;
  supportsFallback(): boolean;

  /** Provider-level checks run on a prepared draft before the schema parse. */
  validateConfig(draft: PlayerDraft): FieldIssue[];
  /** Fills defaults and generated identifiers. Never mutates the input. */
  prepareConfig(draft: PlayerDraft): PlayerDraft;
  getDefaultConfig(): PlayerDraft;
  getRequiredFields(): string[];

  getVolume(config: PlayerConfig): Promise<number>;
  setVolume(config: PlayerConfig, volume: number): Promise<ActionResult>;

  /** True when the backend binary resolves on PATH. */
  isAvailable(): Promise<boolean>;
  /** Streaming now-playing endpoint for this player, or null when the backend has none. */
  nowPlayingUrl(config: PlayerConfig): string | null;
}
