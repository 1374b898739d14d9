import { ProviderNotFoundError } from '@/domain/players/errors';
import { draftProvider } from '@/domain/players/playerSchema';
import {
  DEFAULT_PROVIDER,
  isProviderType,
  type FieldIssue,
  type PlayerConfig,
  type PlayerDraft,
  type ProviderType,
} from '@/domain/players/types';
import { createLogger } from '@/shared/logging/logger';
import type { PlayerProvider, ProviderInfo } from '@/application/providers/playerProvider';

/**
 * Provider instances keyed by type, in registration order.
 */
export class ProviderRegistry {
  private readonly log = createLogger('Players', 'Providers');
  private readonly providers = new Map<ProviderType, PlayerProvider>();

  constructor(public readonly defaultProvider: ProviderType = DEFAULT_PROVIDER) {}

  public register(provider: PlayerProvider): void {
    this.providers.set(provider.type, provider);
    this.log.debug('registered provider', { type: provider.type });
  }

  public get(type: string): PlayerProvider | null {
    return isProviderType(type) ? this.providers.get(type) ?? null : null;
  }

  public getOrDefault(type?: string | null): PlayerProvider | null {
    return this.get(type ?? this.defaultProvider);
  }

  public has(type: string): boolean {
    return this.get(type) !== null;
  }

  /**
   * Provider for a stored config or a caller draft; a missing `provider`
   * field means the squeezelite backend.
   */
  public getForPlayer(config: PlayerConfig | PlayerDraft): PlayerProvider {
    const type = draftProvider(config);
    const provider = this.get(type);
    if (!provider) {
      throw new ProviderNotFoundError(type);
    }
    return provider;
  }

  public async listProviders(availableOnly = false): Promise<ProviderType[]> {
    const types: ProviderType[] = [];
    for (const provider of this.providers.values()) {
      if (!availableOnly || (await provider.isAvailable())) {
        types.push(provider.type);
      }
    }
    return types;
  }

  /**
   * The configured default when its binary is installed, else the first
   * installed provider, else null.
   */
  public async getDefaultAvailableProvider(): Promise<ProviderType | null> {
    const preferred = this.providers.get(this.defaultProvider);
    if (preferred && (await preferred.isAvailable())) {
      return preferred.type;
    }
    for (const provider of this.providers.values()) {
      if (await provider.isAvailable()) {
        return provider.type;
      }
    }
    return null;
  }

  public async getProviderInfo(availableOnly = true): Promise<ProviderInfo[]> {
    const info: ProviderInfo[] = [];
    for (const provider of this.providers.values()) {
      const available = await provider.isAvailable();
      if (availableOnly && !available) continue;
      info.push({
        type: provider.type,
        displayName: provider.displayName,
        binary: provider.binaryName,
        available,
      });
    }
    return info;
  }

  public validatePlayerConfig(draft: PlayerDraft): FieldIssue[] {
    const provider = this.get(draftProvider(draft));
    if (!provider) {
      return [{ field: 'provider', message: `Unknown provider type: ${draftProvider(draft)}` }];
    }
    return provider.validateConfig(draft);
  }

  /** Unknown providers get the draft back unchanged; validation reports them. */
  public preparePlayerConfig(draft: PlayerDraft): PlayerDraft {
    const provider = this.get(draftProvider(draft));
    return provider ? provider.prepareConfig(draft) : draft;
  }
}
