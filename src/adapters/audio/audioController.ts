import {
  DEFAULT_MIXER_CONTROLS,
  DEFAULT_VOLUME_PERCENT,
  FALLBACK_AUDIO_DEVICES,
  VOLUME_READ_CONTROLS,
  VOLUME_WRITE_CONTROLS,
  isVirtualDevice,
  type AudioDevice,
} from '@/domain/audio/audioDevice';
import {
  MixerControlUnavailableError,
  ValidationError,
  failed,
  succeeded,
  type ActionResult,
} from '@/domain/players/errors';
import { MAX_VOLUME, MIN_VOLUME } from '@/domain/players/playerSchema';
import type { AudioControlPort, AudioDebugInfo } from '@/ports/AudioControlPort';
import type { CommandOutput, CommandPort } from '@/ports/CommandPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import {
  parseAplayDevices,
  parseCardNumber,
  parseMixerControls,
  parseVolumePercent,
} from '@/adapters/audio/alsaOutputParser';

/**
 * ALSA device listing and mixer control through `aplay` and `amixer`.
 */
export class AudioController implements AudioControlPort {
  private readonly log = createLogger('Audio', 'Controller');

  constructor(private readonly commands: CommandPort) {}

  public isVirtualDevice(device: string): boolean {
    return isVirtualDevice(device);
  }

  public async listDevices(): Promise<AudioDevice[]> {
    const fallback = FALLBACK_AUDIO_DEVICES.map((device) => ({ ...device }));
    const hardware = await bestEffort(
      async () => {
        const result = await this.commands.run('aplay', ['-l']);
        if (result.kind !== 'completed' || result.code !== 0) {
          this.log.warn('could not list hardware devices, using fallback devices only', {
            reason: describeFailure(result),
          });
          return [];
        }
        this.log.spam('aplay -l output', { output: result.stdout });
        return parseAplayDevices(result.stdout);
      },
      { fallback: [], onError: 'warn', log: this.log, label: 'device listing failed' },
    );
    if (hardware.length > 0) {
      this.log.debug('found hardware audio devices', { count: hardware.length });
    }
    return [...fallback, ...hardware];
  }

  public async listMixerControls(device: string): Promise<string[]> {
    const card = this.hardwareCard(device);
    if (card === null) {
      return [...DEFAULT_MIXER_CONTROLS];
    }
    return bestEffort(
      async () => {
        const result = await this.commands.run('amixer', ['-c', card, 'scontrols']);
        if (result.kind !== 'completed' || result.code !== 0) {
          this.log.warn('could not list mixer controls', { device, reason: describeFailure(result) });
          return [...DEFAULT_MIXER_CONTROLS];
        }
        const controls = parseMixerControls(result.stdout);
        return controls.length > 0 ? controls : [...DEFAULT_MIXER_CONTROLS];
      },
      { fallback: [...DEFAULT_MIXER_CONTROLS], onError: 'warn', log: this.log, context: { device } },
    );
  }

  public async getVolume(device: string): Promise<number> {
    const card = this.hardwareCard(device);
    if (card === null) {
      this.log.debug('no hardware mixer, reporting default volume', { device });
      return DEFAULT_VOLUME_PERCENT;
    }
    return bestEffort(
      async () => {
        for (const control of VOLUME_READ_CONTROLS) {
          const result = await this.commands.run('amixer', ['-c', card, 'sget', control]);
          if (result.kind === 'not_found') {
            this.log.warn('amixer not available', { device });
            return DEFAULT_VOLUME_PERCENT;
          }
          if (result.kind !== 'completed' || result.code !== 0) continue;
          const volume = parseVolumePercent(result.stdout);
          if (volume !== null) {
            this.log.debug('read volume', { device, control, volume });
            return volume;
          }
        }
        this.log.warn('no working volume control', { device });
        return DEFAULT_VOLUME_PERCENT;
      },
      { fallback: DEFAULT_VOLUME_PERCENT, onError: 'warn', log: this.log, context: { device } },
    );
  }

  public async setVolume(device: string, volume: number): Promise<ActionResult> {
    if (!Number.isInteger(volume) || volume < MIN_VOLUME || volume > MAX_VOLUME) {
      return failed(
        new ValidationError([{ field: 'volume', message: 'Volume must be between 0 and 100' }]),
        'Volume must be between 0 and 100',
      );
    }
    if (this.isVirtualDevice(device)) {
      this.log.info('virtual device, volume kept without hardware control', { device, volume });
      return succeeded(`Volume set to ${volume}% (virtual device)`);
    }
    const card = parseCardNumber(device);
    if (card === null) {
      return succeeded(`Volume set to ${volume}% (no hardware control)`);
    }

    let lastError = '';
    for (const control of VOLUME_WRITE_CONTROLS) {
      const result = await this.commands.run('amixer', ['-c', card, 'sset', control, `${volume}%`]);
      if (result.kind === 'not_found') {
        this.log.warn('amixer not available', { device });
        return failed(mixerError('Audio mixer control not available'));
      }
      if (result.kind === 'completed' && result.code === 0) {
        this.log.info('set volume', { device, control, volume });
        return succeeded(`Volume set to ${volume}% (${control})`);
      }
      lastError = describeFailure(result);
      this.log.debug('mixer control rejected volume', { device, control, error: lastError });
    }

    this.log.warn('no working volume control', { device });
    const detail = lastError ? `: ${lastError}` : '';
    return failed(mixerError(`No working volume controls found for device ${device}${detail}`));
  }

  public async debugInfo(): Promise<AudioDebugInfo> {
    const [aplay, amixer, devices] = await Promise.all([
      this.commands.run('aplay', ['-l']),
      this.commands.run('amixer', []),
      this.listDevices(),
    ]);
    const mixerControls: Record<string, string[]> = {};
    for (const device of devices) {
      if (device.id.startsWith('hw:')) {
        mixerControls[device.id] = await this.listMixerControls(device.id);
      }
    }
    return {
      aplayAvailable: aplay.kind === 'completed' && aplay.code === 0,
      amixerAvailable: amixer.kind === 'completed' && amixer.code === 0,
      aplayOutput: aplay.kind === 'completed' ? aplay.stdout : aplay.message,
      amixerOutput: amixer.kind === 'completed' ? amixer.stdout : amixer.message,
      devices,
      mixerControls,
    };
  }

  /** Card number for devices with a hardware mixer; null means use defaults. */
  private hardwareCard(device: string): string | null {
    if (this.isVirtualDevice(device)) {
      return null;
    }
    return parseCardNumber(device);
  }
}

function describeFailure(result: CommandOutput): string {
  if (result.kind === 'completed') {
    return result.stderr.trim() || `exit code ${result.code}`;
  }
  return result.message;
}

function mixerError(message: string): MixerControlUnavailableError {
  return new MixerControlUnavailableError(message);
}
