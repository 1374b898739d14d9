import type { AudioDevice } from '@/domain/audio/audioDevice';
import type { ActionResult } from '@/domain/players/errors';

export interface AudioDebugInfo {
  aplayAvailable: boolean;
  amixerAvailable: boolean;
  aplayOutput: string;
  amixerOutput: string;
  devices: AudioDevice[];
  mixerControls: Record<string, string[]>;
}

/**
 * Device enumeration and hardware volume. Tool failures never surface here:
 * every read degrades to a default.
 */
export interface AudioControlPort {
  listDevices(): Promise<AudioDevice[]>;
  listMixerControls(device: string): Promise<string[]>;
  getVolume(device: string): Promise<number>;
  setVolume(device: string, volume: number): Promise<ActionResult>;
  isVirtualDevice(device: string): boolean;
  debugInfo(): Promise<AudioDebugInfo>;
}
