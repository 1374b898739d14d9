import type { AudioDevice } from '@/domain/audio/audioDevice';

/*
 * Parsers for `aplay -l` and `amixer` text output. Each accepts arbitrary
 * text and returns only what matches the documented line shapes.
 */

// card 0: PCH [HDA Intel PCH], device 0: ALC887-VD Analog [ALC887-VD Analog]
const APLAY_DEVICE_LINE = /^card\s+(\d+):\s*([^,]*?),\s*device\s+(\d+):/;
const CARD_NUMBER = /hw:([0-9]+)/;
const CONTROL_NAME = /'([^']+)'/;
const VOLUME_PERCENT = /\[(\d+)%\]/;

/**
 * Extracts hardware playback devices from `aplay -l`. Lines that do not
 * carry both a card and a device number are skipped.
 */
export function parseAplayDevices(output: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  for (const rawLine of output.split('\n')) {
    const match = APLAY_DEVICE_LINE.exec(rawLine.trim());
    if (!match) continue;
    const [, card, cardLabel, device] = match;
    const id = `hw:${card},${device}`;
    const label = cardLabel.split('[')[0].trim() || `card ${card}`;
    devices.push({ id, name: `${label} (${id})`, card, device });
  }
  return devices;
}

/**
 * Card number of an ALSA hardware id (`hw:1,0` and `plughw:1,0` give `1`).
 */
export function parseCardNumber(device: string): string | null {
  const match = CARD_NUMBER.exec(device);
  return match ? match[1] : null;
}

/**
 * Control names from `amixer scontrols`, in listing order.
 */
export function parseMixerControls(output: string): string[] {
  const controls: string[] = [];
  for (const line of output.split('\n')) {
    if (!line.includes('Simple mixer control')) continue;
    const match = CONTROL_NAME.exec(line);
    if (match) {
      controls.push(match[1]);
    }
  }
  return controls;
}

/**
 * First `[NN%]` token of `amixer sget` output; null when absent or out of range.
 */
export function parseVolumePercent(output: string): number | null {
  const match = VOLUME_PERCENT.exec(output);
  if (!match) {
    return null;
  }
  const volume = Number.parseInt(match[1], 10);
  return volume >= 0 && volume <= 100 ? volume : null;
}
