/**
 * An output device as listed to callers. Regenerated on every enumeration.
 */
export interface AudioDevice {
  /** ALSA identifier: `hw:0,0`, `null`, `default`, ... */
  id: string;
  name: string;
  card: string;
  device: string;
}

/** Software sinks with no hardware mixer behind them. */
export const VIRTUAL_AUDIO_DEVICES: readonly string[] = ['null', 'pulse', 'dmix', 'default'];

export const NULL_DEVICE = 'null';

/** Always listed first, in this order, whatever the hardware state. */
export const FALLBACK_AUDIO_DEVICES: readonly AudioDevice[] = [
  { id: 'null', name: 'Null Audio Device (Silent)', card: 'null', device: '0' },
  { id: 'default', name: 'Default Audio Device', card: '0', device: '0' },
  { id: 'dmix', name: 'Software Mixing Device', card: 'dmix', device: '0' },
];

export const DEFAULT_MIXER_CONTROLS: readonly string[] = ['Master', 'PCM'];

/** Tried in order when reading; Capture is only useful for status display. */
export const VOLUME_READ_CONTROLS: readonly string[] = [
  'Master',
  'PCM',
  'Speaker',
  'Headphone',
  'Digital',
  'Capture',
];

export const VOLUME_WRITE_CONTROLS: readonly string[] = [
  'Master',
  'PCM',
  'Speaker',
  'Headphone',
  'Digital',
];

export const DEFAULT_VOLUME_PERCENT = 75;

export function isVirtualDevice(device: string): boolean {
  return VIRTUAL_AUDIO_DEVICES.includes(device);
}
