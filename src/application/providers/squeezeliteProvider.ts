import { NULL_DEVICE } from '@/domain/audio/audioDevice';
import type { PlayerConfig, PlayerDraft, SqueezelitePlayerConfig } from '@/domain/players/types';
import { generateMacAddress } from '@/shared/utils/playerIds';
import type { ProviderDefinition } from '@/application/providers/playerProvider';
import { BaseProvider, expectProvider, hasNonEmptyString } from '@/application/providers/baseProvider';

const OUTPUT_BUFFER_KB = '80';
const STREAM_BUFFER = '500:2000';
const IDLE_CLOSE_SECONDS = '5';
/** The null output cannot negotiate a rate on its own. */
const NULL_DEVICE_SAMPLE_RATE = '44100';

export const SQUEEZELITE_PROVIDER_DEFINITION: ProviderDefinition = {
  type: 'squeezelite',
  displayName: 'Squeezelite',
  description: 'Headless Squeezebox player for Lyrion / Logitech Media Server.',
  binaryName: 'squeezelite',
  requiredFields: ['name', 'device'],
  supportsFallback: true,
};

/**
 * Squeezelite players. Volume goes through the ALSA mixer of the output
 * device; a failing device falls back to the null output so the player
 * stays registered with the server.
 */
export class SqueezeliteProvider extends BaseProvider {
  public readonly definition = SQUEEZELITE_PROVIDER_DEFINITION;

  public buildCommand(config: PlayerConfig, logPath: string): string[] {
    const player = expectProvider(config, 'squeezelite');
    const command = this.commandFor(player, player.device, logPath);
    if (player.device === NULL_DEVICE) {
      command.push('-r', NULL_DEVICE_SAMPLE_RATE);
    }
    return command;
  }

  public buildFallbackCommand(config: PlayerConfig, logPath: string): string[] {
    const player = expectProvider(config, 'squeezelite');
    return [...this.commandFor(player, NULL_DEVICE, logPath), '-r', NULL_DEVICE_SAMPLE_RATE];
  }

  protected fillGenerated(draft: PlayerDraft): PlayerDraft {
    if (!hasNonEmptyString(draft, 'macAddress') && typeof draft.name === 'string' && draft.name.trim()) {
      return { ...draft, macAddress: generateMacAddress(draft.name.trim()) };
    }
    return draft;
  }

  private commandFor(player: SqueezelitePlayerConfig, device: string, logPath: string): string[] {
    const macAddress = player.macAddress || generateMacAddress(player.name);
    const command = [this.binaryName, '-n', player.name, '-o', device, '-m', macAddress];
    if (player.serverIp) {
      command.push('-s', player.serverIp);
    }
    command.push('-f', logPath, '-a', OUTPUT_BUFFER_KB, '-b', STREAM_BUFFER, '-C', IDLE_CLOSE_SECONDS);
    return command;
  }
}
