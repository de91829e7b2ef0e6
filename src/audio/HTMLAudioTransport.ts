/**
 * HTMLAudioTransport - AudioTransport over an <audio> element.
 *
 * Takes any object shaped like HTMLAudioElement so it can be driven by a
 * stand-in outside the browser.
 */

import { LoadError, TransportError, errorMessage } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { AudioTransport } from './AudioTransport';

const log = new Logger('HTMLAudioTransport');

export interface AudioElementLike {
  src: string;
  preload: string;
  currentTime: number;
  volume: number;
  playbackRate: number;
  readonly duration: number;
  readonly error: { readonly message: string } | null;
  play(): Promise<void>;
  pause(): void;
  load(): void;
  removeAttribute(name: string): void;
  addEventListener(type: string, listener: () => void): void;
  removeEventListener(type: string, listener: () => void): void;
}

export class HTMLAudioTransport implements AudioTransport {
  private listeners: Array<{ type: string; listener: () => void }> = [];
  private closed = false;

  constructor(private readonly element: AudioElementLike) {}

  open(resource: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        this.element.removeEventListener('loadedmetadata', onMetadata);
        this.element.removeEventListener('error', onError);
      };
      const onMetadata = (): void => {
        cleanup();
        resolve(this.element.duration);
      };
      const onError = (): void => {
        cleanup();
        reject(new LoadError(`Cannot load audio ${resource}: ${this.describeError()}`));
      };

      this.element.addEventListener('loadedmetadata', onMetadata);
      this.element.addEventListener('error', onError);
      this.element.preload = 'auto';
      this.element.src = resource;
      this.element.load();
    });
  }

  async play(): Promise<void> {
    try {
      await this.element.play();
    } catch (error) {
      // Autoplay policy rejections land here
      throw new TransportError(`Audio element refused to play: ${errorMessage(error)}`, error);
    }
  }

  pause(): void {
    this.element.pause();
  }

  seek(seconds: number): void {
    this.element.currentTime = seconds;
  }

  setVolume(volume: number): void {
    this.element.volume = volume;
  }

  setRate(rate: number): void {
    this.element.playbackRate = rate;
  }

  currentPosition(): number {
    return this.element.currentTime;
  }

  onEnded(callback: () => void): () => void {
    return this.listen('ended', callback);
  }

  onError(callback: (error: Error) => void): () => void {
    return this.listen('error', () => callback(new TransportError(`Audio playback failed: ${this.describeError()}`)));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const { type, listener } of this.listeners) {
      this.element.removeEventListener(type, listener);
    }
    this.listeners = [];
    this.element.pause();
    // Detach the source so the browser drops its buffers
    this.element.removeAttribute('src');
    this.element.load();
    log.debug('Closed');
  }

  private listen(type: string, listener: () => void): () => void {
    this.element.addEventListener(type, listener);
    const record = { type, listener };
    this.listeners.push(record);
    return () => {
      this.element.removeEventListener(type, listener);
      this.listeners = this.listeners.filter((item) => item !== record);
    };
  }

  private describeError(): string {
    return this.element.error?.message || 'unknown media error';
  }
}
