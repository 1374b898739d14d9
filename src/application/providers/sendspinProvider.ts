import type { FieldIssue, PlayerConfig, PlayerDraft } from '@/domain/players/types';
import { isAlsaHardwareDevice } from '@/domain/players/playerSchema';
import { createLogger } from '@/shared/logging/logger';
import { generateClientId } from '@/shared/utils/playerIds';
import type { ProviderDefinition } from '@/application/providers/playerProvider';
import { BaseProvider, expectProvider, hasNonEmptyString } from '@/application/providers/baseProvider';

export const SENDSPIN_PROVIDER_DEFINITION: ProviderDefinition = {
  type: 'sendspin',
  displayName: 'Sendspin',
  description: 'Synchronized multi-room player for Sendspin servers (Music Assistant).',
  binaryName: 'sendspin',
  requiredFields: ['name'],
  supportsFallback: false,
};

/**
 * Sendspin players. The backend opens audio through PortAudio, so ALSA
 * `hw:` ids are never passed on. Volume still uses the ALSA mixer.
 */
export class SendspinProvider extends BaseProvider {
  public readonly definition = SENDSPIN_PROVIDER_DEFINITION;
  private readonly log = createLogger('Players', 'Sendspin');

  public buildCommand(config: PlayerConfig, _logPath: string): string[] {
    const player = expectProvider(config, 'sendspin');
    const command = [
      this.binaryName,
      '--headless',
      '--name',
      player.name,
      '--id',
      player.clientId || generateClientId(player.name),
    ];

    const device = player.device;
    if (device && device !== 'default' && device !== 'null') {
      if (isAlsaHardwareDevice(device)) {
        this.log.warn('ALSA device not usable by sendspin, using the system default output', {
          player: player.name,
          device,
        });
      } else {
        command.push('--audio-device', device);
      }
    }
    if (player.serverUrl) {
      command.push('--url', player.serverUrl);
    }
    if (player.delayMs !== 0) {
      command.push('--static-delay-ms', String(player.delayMs));
    }
    command.push('--log-level', player.logLevel);
    return command;
  }

  public buildFallbackCommand(_config: PlayerConfig, _logPath: string): null {
    return null;
  }

  public nowPlayingUrl(config: PlayerConfig): string | null {
    const player = expectProvider(config, 'sendspin');
    return player.serverUrl || null;
  }

  protected fillGenerated(draft: PlayerDraft): PlayerDraft {
    if (!hasNonEmptyString(draft, 'clientId') && typeof draft.name === 'string' && draft.name.trim()) {
      return { ...draft, clientId: generateClientId(draft.name.trim()) };
    }
    return draft;
  }

  protected validateSpecific(draft: PlayerDraft): FieldIssue[] {
    const issues: FieldIssue[] = [];
    const serverUrl = draft.serverUrl;
    if (typeof serverUrl === 'string' && serverUrl && !/^wss?:\/\//.test(serverUrl)) {
      issues.push({ field: 'serverUrl', message: 'Server URL must start with ws:// or wss://' });
    }
    const delay = draft.delayMs;
    if (delay !== undefined && delay !== null && !Number.isInteger(Number(delay))) {
      issues.push({ field: 'delayMs', message: 'Delay must be an integer (milliseconds)' });
    }
    return issues;
  }
}
