import type { PlayerConfig } from '@/domain/players/types';

/**
 * Read access to stored player definitions.
 */
export interface PlayerConfigPort {
  getPlayer(name: string): PlayerConfig | null;
  listPlayers(): string[];
}
