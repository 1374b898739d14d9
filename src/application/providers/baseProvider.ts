import { ValidationError, type ActionResult } from '@/domain/players/errors';
import { MAX_NAME_LENGTH, getDefaultConfig } from '@/domain/players/playerSchema';
import type {
  FieldIssue,
  PlayerConfig,
  PlayerDraft,
  ProviderType,
} from '@/domain/players/types';
import type { AudioControlPort } from '@/ports/AudioControlPort';
import type { CommandPort } from '@/ports/CommandPort';
import type { PlayerProvider, ProviderDefinition } from '@/application/providers/playerProvider';

/**
 * Behaviour shared by the ALSA-mixer backed providers: defaults, name checks,
 * mixer volume and PATH lookup.
 */
export abstract class BaseProvider implements PlayerProvider {
  public abstract readonly definition: ProviderDefinition;

  constructor(
    protected readonly audio: AudioControlPort,
    protected readonly commands: CommandPort,
  ) {}

  public get type(): ProviderType {
    return this.definition.type;
  }

  public get displayName(): string {
    return this.definition.displayName;
  }

  public get binaryName(): string {
    return this.definition.binaryName;
  }

  public abstract buildCommand(config: PlayerConfig, logPath: string): string[];

  public abstract buildFallbackCommand(config: PlayerConfig, logPath: string): string[] | null;

  public supportsFallback(): boolean {
    return this.definition.supportsFallback;
  }

  public getDefaultConfig(): PlayerDraft {
    return getDefaultConfig(this.type);
  }

  public getRequiredFields(): string[] {
    return [...this.definition.requiredFields];
  }

  public prepareConfig(draft: PlayerDraft): PlayerDraft {
    const prepared: PlayerDraft = { ...this.getDefaultConfig() };
    for (const [key, value] of Object.entries(draft)) {
      if (value !== undefined) {
        prepared[key] = value;
      }
    }
    return this.fillGenerated(prepared);
  }

  public validateConfig(draft: PlayerDraft): FieldIssue[] {
    const issues: FieldIssue[] = [];
    for (const field of this.definition.requiredFields) {
      const value = draft[field];
      if (value === undefined || value === null || value === '') {
        issues.push({ field, message: `${requiredLabel(field)} is required` });
      }
    }
    const name = draft.name;
    if (typeof name === 'string' && name) {
      if (name.length > MAX_NAME_LENGTH) {
        issues.push({ field: 'name', message: `Player name too long (max ${MAX_NAME_LENGTH} characters)` });
      } else if (/[/\\\0]/.test(name)) {
        issues.push({ field: 'name', message: 'Player name contains invalid characters' });
      }
    }
    return [...issues, ...this.validateSpecific(draft)];
  }

  public getVolume(config: PlayerConfig): Promise<number> {
    return this.audio.getVolume(config.device);
  }

  public setVolume(config: PlayerConfig, volume: number): Promise<ActionResult> {
    return this.audio.setVolume(config.device, volume);
  }

  public isAvailable(): Promise<boolean> {
    return this.commands.which(this.binaryName);
  }

  public nowPlayingUrl(_config: PlayerConfig): string | null {
    return null;
  }

  /** Generated identifiers for fields the caller left empty. */
  protected abstract fillGenerated(draft: PlayerDraft): PlayerDraft;

  protected validateSpecific(_draft: PlayerDraft): FieldIssue[] {
    return [];
  }
}

function requiredLabel(field: string): string {
  if (field === 'name') return 'Player name';
  if (field === 'device') return 'Audio device';
  return field;
}

export function hasNonEmptyString(draft: PlayerDraft, field: string): boolean {
  const value = draft[field];
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Narrows a config handed to a provider of another backend; reaching the
 * throw means the registry resolved the wrong provider.
 */
export function expectProvider<T extends ProviderType>(
  config: PlayerConfig,
  type: T,
): Extract<PlayerConfig, { provider: T }> {
  if (isConfigOf(config, type)) {
    return config;
  }
  throw new ValidationError([
    { field: 'provider', message: `expected a ${type} player, got '${config.provider}'` },
  ]);
}

function isConfigOf<T extends ProviderType>(
  config: PlayerConfig,
  type: T,
): config is Extract<PlayerConfig, { provider: T }> {
  return config.provider === type;
}
