import {
  PersistError,
  PlayerExistsError,
  PlayerNotFoundError,
  ValidationError,
} from '@/domain/players/errors';
import {
  formatIssueList,
  parsePlayerConfig,
  toPlayerDraft,
  validatePlayersFile,
} from '@/domain/players/playerSchema';
import type { PlayerConfig, PlayerConfigMap, PlayerDraft } from '@/domain/players/types';
import type { PlayerConfigPort } from '@/ports/PlayerConfigPort';
import type { StoragePort } from '@/ports/StoragePort';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import type { ProviderRegistry } from '@/application/providers/providerRegistry';

/**
 * Player definitions backed by one JSON document keyed by player name.
 * Every mutation validates first, then rewrites the whole file; a failed
 * write restores the previous in-memory map. Entries that fail validation
 * on load are neither listed nor started, but are written back as read.
 */
export class ConfigStore implements PlayerConfigPort {
  private readonly log = createLogger('Config', 'Players');
  private players = new Map<string, PlayerConfig>();
  private rejected = new Map<string, unknown>();
  private mutations: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly storage: StoragePort,
    private readonly registry: ProviderRegistry,
    public readonly filePath: string,
  ) {}

  public async load(): Promise<PlayerConfigMap> {
    const result = await this.storage.readJson(this.filePath);
    this.players = new Map();
    this.rejected = new Map();
    if (result.kind === 'missing') {
      this.log.info('no players file yet, starting empty', { path: this.filePath });
      return this.getAll();
    }
    if (result.kind === 'invalid') {
      this.log.error('players file unreadable, starting empty', {
        path: this.filePath,
        reason: result.reason,
      });
      return this.getAll();
    }
    const validation = validatePlayersFile(result.data);
    for (const error of validation.errors) {
      this.log.warn('skipping invalid player entry', { path: this.filePath, error });
    }
    for (const [name, config] of Object.entries(validation.players)) {
      this.players.set(name, config);
    }
    for (const [name, entry] of Object.entries(validation.rejected)) {
      this.rejected.set(name, entry);
    }
    this.log.info('players loaded', { count: this.players.size, rejected: this.rejected.size });
    return this.getAll();
  }

  /** Rewrites the players file from the in-memory map and the rejected entries. */
  public async save(): Promise<void> {
    const document: Record<string, unknown> = this.getAll();
    for (const [name, entry] of this.rejected) {
      if (!(name in document)) {
        document[name] = entry;
      }
    }
    try {
      await this.storage.writeJson(this.filePath, document);
    } catch (error) {
      this.log.error('failed to save players', { path: this.filePath, message: errorMessage(error) });
      throw new PersistError(this.filePath, errorMessage(error));
    }
  }

  public getPlayer(name: string): PlayerConfig | null {
    const config = this.players.get(name);
    return config ? { ...config } : null;
  }

  public requirePlayer(name: string): PlayerConfig {
    const config = this.getPlayer(name);
    if (!config) {
      throw new PlayerNotFoundError(name);
    }
    return config;
  }

  public hasPlayer(name: string): boolean {
    return this.players.has(name);
  }

  public listPlayers(): string[] {
    return [...this.players.keys()];
  }

  public getAll(): PlayerConfigMap {
    const all: PlayerConfigMap = {};
    for (const [name, config] of this.players) {
      all[name] = { ...config };
    }
    return all;
  }

  /**
   * Validates and stores a new player. Provider defaults and generated
   * identifiers are filled before validation.
   */
  public createPlayer(input: unknown): Promise<PlayerConfig> {
    return this.mutate(async () => {
      const config = this.resolve(this.draftFrom(input));
      if (this.players.has(config.name)) {
        throw new PlayerExistsError(config.name);
      }
      await this.commit((players) => players.set(config.name, config));
      this.log.info('player created', { player: config.name, provider: config.provider });
      return { ...config };
    });
  }

  /**
   * Applies `patch` over the stored fields. A `name` in the patch renames
   * the player; the position in the file is kept.
   */
  public updatePlayer(name: string, patch: unknown): Promise<PlayerConfig> {
    return this.mutate(async () => {
      const existing = this.requirePlayer(name);
      const draft: PlayerDraft = { ...existing, ...this.draftFrom(patch) };
      const config = this.resolve(draft);
      if (config.name !== name && this.players.has(config.name)) {
        throw new PlayerExistsError(config.name);
      }
      await this.commit((players) => replaceEntry(players, name, config));
      if (config.name !== name) {
        this.log.info('player renamed', { from: name, to: config.name });
      } else {
        this.log.info('player updated', { player: name });
      }
      return { ...config };
    });
  }

  public deletePlayer(name: string): Promise<PlayerConfig> {
    return this.mutate(async () => {
      const existing = this.requirePlayer(name);
      await this.commit((players) => players.delete(name));
      this.log.info('player deleted', { player: name });
      return existing;
    });
  }

  /** Persists the remembered volume of a player. */
  public setVolume(name: string, volume: number): Promise<PlayerConfig> {
    return this.updatePlayer(name, { volume });
  }

  private draftFrom(input: unknown): PlayerDraft {
    const draft = toPlayerDraft(input);
    if (!draft.ok) {
      throw new ValidationError(draft.issues);
    }
    return draft.value;
  }

  private resolve(draft: PlayerDraft): PlayerConfig {
    const provider = this.registry.getForPlayer(draft);
    const prepared = provider.prepareConfig(draft);
    const issues = provider.validateConfig(prepared);
    if (issues.length > 0) {
      throw new ValidationError(issues);
    }
    const parsed = parsePlayerConfig(prepared);
    if (!parsed.ok) {
      this.log.debug('player config rejected', { issues: formatIssueList(parsed.issues) });
      throw new ValidationError(parsed.issues);
    }
    return parsed.value;
  }

  /**
   * Applies `change` to a copy of the map and swaps it in only once the
   * file write succeeded. A valid player replaces a rejected entry of the
   * same name.
   */
  private async commit(change: (players: Map<string, PlayerConfig>) => unknown): Promise<void> {
    const previous = this.players;
    const previousRejected = this.rejected;
    const next = new Map(previous);
    change(next);
    this.players = next;
    this.rejected = new Map([...previousRejected].filter(([name]) => !next.has(name)));
    try {
      await this.save();
    } catch (error) {
      this.players = previous;
      this.rejected = previousRejected;
      throw error;
    }
  }

  /** Runs mutations one at a time so interleaved writes cannot lose updates. */
  private mutate<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.mutations.then(operation, operation);
    this.mutations = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function replaceEntry(
  players: Map<string, PlayerConfig>,
  oldName: string,
  config: PlayerConfig,
): void {
  const entries = [...players.entries()].map(([key, value]): [string, PlayerConfig] =>
    key === oldName ? [config.name, config] : [key, value],
  );
  players.clear();
  for (const [key, value] of entries) {
    players.set(key, value);
  }
}
