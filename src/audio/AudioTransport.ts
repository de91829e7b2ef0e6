/**
 * Audio playback backend consumed by the scheduler. One instance per loaded
 * project; the scheduler creates a fresh one for every `load()`.
 */
export interface AudioTransport {
  /** Open `resource` and resolve with its duration in seconds. */
  open(resource: string): Promise<number>;
  play(): Promise<void>;
  pause(): void;
  seek(seconds: number): void;
  setVolume(volume: number): void;
  setRate(rate: number): void;
  /** Current playback position in seconds. */
  currentPosition(): number;
  /** Subscribe to end of media; returns an unsubscribe function. */
  onEnded(callback: () => void): () => void;
  /** Subscribe to playback failures; returns an unsubscribe function. */
  onError(callback: (error: Error) => void): () => void;
  close(): void;
}

export type AudioTransportFactory = () => AudioTransport;
