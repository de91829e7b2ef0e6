import { DEFAULT_VOLUME } from '../../config/PlaybackConfig';
import { clamp } from '../../utils/math';
import type { Disposable } from '../Disposable';

/**
 * Callback interface so VolumeManager can notify its owner without
 * importing it.
 */
export interface VolumeManagerCallbacks {
  onVolumeChanged(volume: number): void;
  onMutedChanged(muted: boolean): void;
}

/**
 * VolumeManager owns the audio level:
 * - Volume level (0..1) with clamping
 * - Mute/unmute with previous-volume restore
 *
 * The transport only ever sees the effective volume (0 while muted).
 */
export class VolumeManager implements Disposable {
  private _volume: number;
  private _muted = false;
  private _previousVolume: number; // For unmute restore
  private _callbacks: VolumeManagerCallbacks | null = null;

  constructor(initialVolume: number = DEFAULT_VOLUME) {
    this._volume = clamp(initialVolume, 0, 1);
    this._previousVolume = this._volume > 0 ? this._volume : DEFAULT_VOLUME;
  }

  setCallbacks(callbacks: VolumeManagerCallbacks): void {
    this._callbacks = callbacks;
  }

  get volume(): number {
    return this._volume;
  }

  set volume(value: number) {
    if (Number.isNaN(value)) return;
    const clamped = clamp(value, 0, 1);
    if (clamped === this._volume) return;

    if (clamped > 0) {
      this._previousVolume = clamped;
    }
    this._volume = clamped;
    // Raising the volume unmutes
    if (clamped > 0 && this._muted) {
      this._muted = false;
      this._callbacks?.onMutedChanged(false);
    }
    this._callbacks?.onVolumeChanged(this._volume);
  }

  get muted(): boolean {
    return this._muted;
  }

  set muted(value: boolean) {
    if (value === this._muted) return;
    if (value && this._volume > 0) {
      this._previousVolume = this._volume;
    }
    this._muted = value;
    this._callbacks?.onMutedChanged(this._muted);
  }

  toggleMute(): void {
    if (this._muted) {
      this._muted = false;
      if (this._volume === 0) {
        this._volume = this._previousVolume;
        this._callbacks?.onVolumeChanged(this._volume);
      }
    } else {
      if (this._volume > 0) {
        this._previousVolume = this._volume;
      }
      this._muted = true;
    }
    this._callbacks?.onMutedChanged(this._muted);
  }

  /** 0 when muted, otherwise the volume. */
  getEffectiveVolume(): number {
    return this._muted ? 0 : this._volume;
  }

  dispose(): void {
    this._callbacks = null;
  }
}
