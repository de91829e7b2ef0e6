/**
 * PlaybackScheduler - keeps the displayed photo in step with the audio.
 *
 * The audio transport is the only clock for "where are we": every tick reads
 * its position, asks the TimelineIndex which entry is active, hands that to
 * the TransitionStateMachine, draws the resulting layers and then notifies
 * listeners. Nothing is predicted, so drift cannot accumulate.
 *
 * Tick order is fixed: position -> index -> transitions -> render -> events.
 * Commands issued by listeners while a tick is running are queued and run
 * right after it.
 *
 * Rate is applied to the transport only. Photo switching follows the reported
 * position, so at 2x the photos change twice as fast, which is what a
 * slideshow synced to the audio should do.
 */

import {
  DEFAULT_VOLUME,
  MAX_PLAYBACK_RATE,
  MIN_PLAYBACK_RATE,
  PHOTO_CACHE_SIZE,
  PHOTO_PRELOAD_AHEAD,
  PLAYBACK_RATE_PRESETS,
} from '../../config/PlaybackConfig';
import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import { Logger } from '../../utils/Logger';
import { clamp, isFiniteNumber } from '../../utils/math';
import { LoadError, TransportError, ValidationError, errorMessage } from '../errors';
import { TimelineIndex } from '../timeline/TimelineIndex';
import {
  DEFAULT_TRANSITION_SETTINGS,
  TransitionStateMachine,
  type TransitionSettings,
} from '../transition/TransitionStateMachine';
import { FrameLoop, defaultFrameRequester, performanceClock, type Clock, type FrameRequester } from '../../services/FrameLoop';
import { PhotoCompositor } from '../../render/PhotoCompositor';
import { PhotoCache } from './PhotoCache';
import { VolumeManager } from './VolumeManager';
import type { AudioTransport, AudioTransportFactory } from '../../audio/AudioTransport';
import type { Disposable } from '../Disposable';
import type { DrawingSurface, ImageSource } from '../../render/DrawingSurface';
import type { PhotoChange, PlaybackState, TimeUpdate } from '../types/playback';
import type { Timeline, TimelineEntry } from '../types/timeline';

const log = new Logger('PlaybackScheduler');

export interface PlaybackSchedulerEvents extends EventMap {
  loaded: { duration: number; entryCount: number };
  play: void;
  pause: void;
  stop: void;
  seek: { time: number };
  timeUpdate: TimeUpdate;
  photoChange: PhotoChange;
  volumeChange: { volume: number };
  muteChange: { muted: boolean };
  rateChange: { rate: number };
  error: { message: string };
  ended: void;
}

export interface PlaybackSchedulerOptions {
  transition: TransitionSettings;
  initialVolume: number;
  photoCacheSize: number;
  /** Entries decoded ahead of the active one */
  preloadAhead: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: PlaybackSchedulerOptions = {
  transition: DEFAULT_TRANSITION_SETTINGS,
  initialVolume: DEFAULT_VOLUME,
  photoCacheSize: PHOTO_CACHE_SIZE,
  preloadAhead: PHOTO_PRELOAD_AHEAD,
};

export type PlaybackSchedulerOverrides = Partial<Omit<PlaybackSchedulerOptions, 'transition'>> & {
  transition?: Partial<TransitionSettings>;
};

export interface PlaybackSchedulerDeps<TImage> {
  createTransport: AudioTransportFactory;
  surface: DrawingSurface<TImage>;
  images: ImageSource<TImage>;
  /** Drawn before the first photo and while a photo is still decoding */
  placeholder?: TImage;
  clock?: Clock;
  frames?: FrameRequester;
  options?: PlaybackSchedulerOverrides;
}

export class PlaybackScheduler<TImage> extends EventEmitter<PlaybackSchedulerEvents> implements Disposable {
  private readonly createTransport: AudioTransportFactory;
  private readonly surface: DrawingSurface<TImage>;
  private readonly images: ImageSource<TImage>;
  private readonly clock: Clock;
  private readonly options: PlaybackSchedulerOptions;
  private readonly transitions: TransitionStateMachine;
  private readonly volumeManager: VolumeManager;
  private readonly compositor: PhotoCompositor<TImage>;
  private readonly loop: FrameLoop;

  private photos: PhotoCache<TImage>;
  private transport: AudioTransport | null = null;
  private transportSubscriptions: Array<() => void> = [];
  private index: TimelineIndex | null = null;

  private isPlaying = false;
  private playPending = false;
  private currentTime = 0;
  private duration = 0;
  private rate = 1;
  private lastTick: number | null = null;
  // Set by seek, stop and play so the next tick may move backwards
  private discontinuity = false;
  // Entry last reported through photoChange
  private reportedEntry: number | null = null;

  private loadToken = 0;
  private playToken = 0;
  private inTick = false;
  private deferred: Array<() => void> = [];
  private disposed = false;

  constructor(deps: PlaybackSchedulerDeps<TImage>) {
    super();
    const overrides = deps.options ?? {};
    this.options = {
      ...DEFAULT_SCHEDULER_OPTIONS,
      ...overrides,
      transition: { ...DEFAULT_SCHEDULER_OPTIONS.transition, ...overrides.transition },
    };

    this.createTransport = deps.createTransport;
    this.surface = deps.surface;
    this.images = deps.images;
    this.clock = deps.clock ?? performanceClock;
    this.transitions = new TransitionStateMachine(this.options.transition);
    this.compositor = new PhotoCompositor(deps.surface, deps.placeholder ?? null);
    this.loop = new FrameLoop(deps.frames ?? defaultFrameRequester(), this.onFrame);
    this.photos = this.createPhotoCache();

    this.volumeManager = new VolumeManager(this.options.initialVolume);
    this.volumeManager.setCallbacks({
      onVolumeChanged: (volume) => {
        this.applyVolume();
        this.emit('volumeChange', { volume });
      },
      onMutedChanged: (muted) => {
        this.applyVolume();
        this.emit('muteChange', { muted });
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * Open `audioResource` and show `timeline` against it.
   *
   * Resolves `false` when a newer load superseded this one. On failure the
   * previously loaded project stays as it was.
   *
   * @throws LoadError when the transport cannot open the audio
   */
  async load(audioResource: string, timeline: Timeline): Promise<boolean> {
    if (this.disposed) {
      throw new ValidationError('Cannot load into a disposed scheduler');
    }

    const token = ++this.loadToken;
    const transport = this.createTransport();

    let reportedDuration: number;
    try {
      reportedDuration = await transport.open(audioResource);
    } catch (error) {
      transport.close();
      if (token !== this.loadToken) return false;
      const loadError =
        error instanceof LoadError
          ? error
          : new LoadError(`Cannot open ${audioResource}: ${errorMessage(error)}`, error);
      log.error(loadError.message);
      this.emit('error', { message: loadError.message });
      throw loadError;
    }

    if (token !== this.loadToken) {
      transport.close();
      return false;
    }

    const index = new TimelineIndex(timeline);
    const first = index.activeEntryAt(0);
    const photos = this.createPhotoCache();
    const firstEntry = index.getEntry(first);
    if (firstEntry) {
      await photos.ensure(firstEntry.resourceRef);
    }
    photos.preload(this.preloadWindow(index, first));

    if (token !== this.loadToken) {
      photos.clear();
      transport.close();
      return false;
    }

    // Swap. Nothing below awaits, so listeners never see a half-loaded state.
    const wasPlaying = this.isPlaying;
    this.halt();
    this.releaseTransport();
    this.photos.clear();

    this.transport = transport;
    this.index = index;
    this.photos = photos;
    this.duration =
      isFiniteNumber(reportedDuration) && reportedDuration > 0 ? reportedDuration : timeline.audioDurationSeconds;
    this.currentTime = 0;
    this.discontinuity = false;
    this.transitions.reset(first);
    this.reportedEntry = first;

    this.transportSubscriptions = [
      transport.onEnded(() => {
        if (transport === this.transport) this.runOrDefer(() => this.handleEnded());
      }),
      transport.onError((error) => {
        if (transport === this.transport) this.runOrDefer(() => this.failPlayback(error));
      }),
    ];
    transport.setVolume(this.volumeManager.getEffectiveVolume());
    transport.setRate(this.rate);

    this.render();
    log.info(`Loaded ${audioResource}: ${this.duration}s, ${index.size} photos`);
    if (wasPlaying) this.emit('pause', undefined);
    this.emit('loaded', { duration: this.duration, entryCount: index.size });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Transport commands
  // ---------------------------------------------------------------------------

  /** Start playback. Failures are reported through the `error` event. */
  async play(): Promise<void> {
    if (this.inTick) {
      return new Promise((resolve) => {
        this.deferred.push(() => {
          void this.play().then(resolve);
        });
      });
    }

    const transport = this.transport;
    if (!transport || this.isPlaying || this.playPending) return;

    const token = ++this.playToken;
    this.playPending = true;
    try {
      await transport.play();
    } catch (error) {
      if (token !== this.playToken) return;
      this.playPending = false;
      const playError = new TransportError(`Playback failed to start: ${errorMessage(error)}`, error);
      log.error(playError.message);
      this.emit('error', { message: playError.message });
      return;
    }

    if (token !== this.playToken || transport !== this.transport) {
      // Paused, stopped or reloaded while the transport was starting
      if (transport === this.transport) transport.pause();
      return;
    }

    this.playPending = false;
    this.isPlaying = true;
    // A transport that ended restarts from 0; trust its position on the first tick
    this.discontinuity = true;
    this.lastTick = this.clock.now();
    this.loop.start();
    log.debug(`Playing from ${this.currentTime}s`);
    this.emit('play', undefined);
  }

  pause(): void {
    if (this.defer(() => this.pause())) return;
    if (!this.isPlaying && !this.playPending) return;

    const wasPlaying = this.isPlaying;
    this.halt();
    if (wasPlaying) {
      log.debug(`Paused at ${this.currentTime}s`);
      this.emit('pause', undefined);
    }
  }

  /** Pause and rewind to the start with a hard cut. */
  stop(): void {
    if (this.defer(() => this.stop())) return;
    const transport = this.transport;
    const index = this.index;
    if (!transport || !index) return;

    this.halt();
    if (!this.seekTransport(transport, 0)) return;

    this.currentTime = 0;
    this.discontinuity = true;
    this.cutTo(index.activeEntryAt(0));
    this.emit('stop', undefined);
    this.notifyPhotoChange();
    this.emitTimeUpdate();
  }

  /** Jump to `seconds` (clamped to the audio). Always a hard cut. */
  seek(seconds: number): void {
    if (this.defer(() => this.seek(seconds))) return;
    const transport = this.transport;
    const index = this.index;
    if (!transport || !index) return;

    const time = Number.isNaN(seconds) ? 0 : clamp(seconds, 0, this.duration);
    if (!this.seekTransport(transport, time)) return;

    this.currentTime = time;
    this.discontinuity = true;
    if (this.isPlaying) this.lastTick = this.clock.now();
    this.cutTo(index.activeEntryAt(time));
    this.emit('seek', { time });
    this.notifyPhotoChange();
    this.emitTimeUpdate();
  }

  setVolume(volume: number): void {
    if (this.defer(() => this.setVolume(volume))) return;
    this.volumeManager.volume = volume;
  }

  setMuted(muted: boolean): void {
    if (this.defer(() => this.setMuted(muted))) return;
    this.volumeManager.muted = muted;
  }

  toggleMute(): void {
    if (this.defer(() => this.toggleMute())) return;
    this.volumeManager.toggleMute();
  }

  setRate(rate: number): void {
    if (this.defer(() => this.setRate(rate))) return;
    if (Number.isNaN(rate)) return;

    const clamped = clamp(rate, MIN_PLAYBACK_RATE, MAX_PLAYBACK_RATE);
    if (clamped === this.rate) return;
    this.rate = clamped;
    this.transport?.setRate(clamped);
    this.emit('rateChange', { rate: clamped });
  }

  /** Step to the next rate preset, wrapping to the slowest. */
  cycleRate(): void {
    if (this.defer(() => this.cycleRate())) return;
    const next = PLAYBACK_RATE_PRESETS.find((preset) => preset > this.rate) ?? PLAYBACK_RATE_PRESETS[0];
    this.setRate(next);
  }

  /** Image drawn before the first photo and while photos decode; `null` leaves those frames blank. */
  setPlaceholder(image: TImage | null): void {
    if (this.defer(() => this.setPlaceholder(image))) return;
    this.compositor.setPlaceholder(image);
    this.render();
  }

  /** Change the transition used for the next photo change. */
  setTransition(settings: Partial<TransitionSettings>): void {
    this.transitions.configure(settings);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getState(): PlaybackState {
    return {
      isPlaying: this.isPlaying,
      currentTimeSeconds: this.currentTime,
      durationSeconds: this.duration,
      volume: this.volumeManager.volume,
      muted: this.volumeManager.muted,
      rate: this.rate,
      activeEntryIndex: this.transitions.committedIndex,
      transition: this.transitions.state,
    };
  }

  getEntries(): readonly TimelineEntry[] {
    return this.index?.getEntries() ?? [];
  }

  activeEntryAt(seconds: number): number | null {
    return this.index?.activeEntryAt(seconds) ?? null;
  }

  getTimeline(): Timeline | null {
    return this.index?.timeline ?? null;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.loadToken++;
    this.halt();
    this.loop.dispose();
    this.releaseTransport();
    this.index = null;
    this.photos.clear();
    this.volumeManager.dispose();
    this.deferred = [];
    this.removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Render loop
  // ---------------------------------------------------------------------------

  private onFrame = (): void => {
    if (!this.isPlaying) return;

    this.inTick = true;
    try {
      this.tick();
    } catch (error) {
      this.failPlayback(error);
    } finally {
      this.inTick = false;
    }
    this.flushDeferred();
  };

  private tick(): void {
    const transport = this.transport;
    const index = this.index;
    if (!transport || !index) return;

    const now = this.clock.now();
    const deltaSeconds = this.lastTick === null ? 0 : Math.max(0, (now - this.lastTick) / 1000);
    this.lastTick = now;

    let position = this.readPosition(transport);
    const rewound = position < this.currentTime;
    if (rewound && !this.discontinuity) {
      position = this.currentTime;
    }
    const restarted = rewound && this.discontinuity;
    this.discontinuity = false;
    this.currentTime = position;

    const target = index.activeEntryAt(position);
    if (restarted && target !== this.transitions.targetIndex) {
      // Jumped back (replay after the end): cut like a seek
      this.transitions.reset(target);
    } else if (!this.transitions.request(target, now)) {
      // A transition started on this tick begins at zero elapsed time
      this.transitions.advance(deltaSeconds);
    }

    this.render();
    this.photos.preload(this.preloadWindow(index, target));
    this.notifyPhotoChange();
    this.emitTimeUpdate();
  }

  private handleEnded(): void {
    const transport = this.transport;
    const index = this.index;
    if (!transport || !index) return;

    this.halt();
    this.currentTime = Math.max(this.currentTime, this.readPosition(transport));
    this.transitions.finish();
    const target = index.activeEntryAt(this.currentTime);
    if (target !== this.transitions.committedIndex) {
      this.transitions.reset(target);
    }

    this.render();
    this.notifyPhotoChange();
    this.emitTimeUpdate();
    log.debug('Reached end of audio');
    this.emit('ended', undefined);
  }

  private failPlayback(error: unknown): void {
    const message = error instanceof TransportError ? error.message : `Playback error: ${errorMessage(error)}`;
    log.error(message);

    const wasPlaying = this.isPlaying;
    this.halt();
    this.emit('error', { message });
    if (wasPlaying) this.emit('pause', undefined);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Stop the loop and the transport without emitting anything. */
  private halt(): void {
    this.playToken++;
    this.playPending = false;
    this.isPlaying = false;
    this.lastTick = null;
    this.loop.stop();
    if (this.transport) {
      try {
        this.transport.pause();
      } catch (error) {
        log.warn(`Transport pause failed: ${errorMessage(error)}`);
      }
    }
  }

  private releaseTransport(): void {
    for (const unsubscribe of this.transportSubscriptions) {
      unsubscribe();
    }
    this.transportSubscriptions = [];
    this.transport?.close();
    this.transport = null;
  }

  private seekTransport(transport: AudioTransport, seconds: number): boolean {
    try {
      transport.seek(seconds);
      return true;
    } catch (error) {
      this.failPlayback(new TransportError(`Seek to ${seconds}s failed: ${errorMessage(error)}`, error));
      return false;
    }
  }

  private readPosition(transport: AudioTransport): number {
    const position = transport.currentPosition();
    if (!isFiniteNumber(position)) return this.currentTime;
    return clamp(position, 0, this.duration);
  }

  private cutTo(entryIndex: number | null): void {
    this.transitions.reset(entryIndex);
    this.render();
    this.showWhenDecoded(entryIndex);
  }

  /** Re-render once the photo arrives if playback is not running to do it. */
  private showWhenDecoded(entryIndex: number | null): void {
    const entry = this.index?.getEntry(entryIndex) ?? null;
    if (!entry || this.photos.has(entry.resourceRef)) return;

    const photos = this.photos;
    void photos.ensure(entry.resourceRef).then((image) => {
      if (image !== null && photos === this.photos && !this.isPlaying) {
        this.render();
      }
    });
  }

  private render(): void {
    const index = this.index;
    if (!index) return;

    const layers = this.transitions.computeLayers(this.surface.width);
    try {
      this.compositor.render(layers, (entryIndex) => {
        const entry = index.getEntry(entryIndex);
        return entry ? this.photos.peek(entry.resourceRef) : undefined;
      });
    } catch (error) {
      log.error(`Render failed: ${errorMessage(error)}`);
    }
  }

  private preloadWindow(index: TimelineIndex, from: number | null): string[] {
    const start = from ?? 0;
    return index
      .getEntries()
      .slice(start, start + this.options.preloadAhead + 1)
      .map((entry) => entry.resourceRef);
  }

  private notifyPhotoChange(): void {
    const target = this.transitions.targetIndex;
    if (target === this.reportedEntry) return;
    this.reportedEntry = target;
    this.emit('photoChange', { index: target, entry: this.index?.getEntry(target) ?? null });
  }

  private emitTimeUpdate(): void {
    this.emit('timeUpdate', { currentTime: this.currentTime, duration: this.duration });
  }

  private applyVolume(): void {
    this.transport?.setVolume(this.volumeManager.getEffectiveVolume());
  }

  private createPhotoCache(): PhotoCache<TImage> {
    return new PhotoCache(this.images, this.options.photoCacheSize, (resourceRef, error) => {
      this.emit('error', { message: `Cannot decode photo ${resourceRef}: ${errorMessage(error)}` });
    });
  }

  /** Queue `command` when called from inside a tick. Returns true if queued. */
  private defer(command: () => void): boolean {
    if (!this.inTick) return false;
    this.deferred.push(command);
    return true;
  }

  private runOrDefer(command: () => void): void {
    if (!this.defer(command)) command();
  }

  private flushDeferred(): void {
    while (this.deferred.length > 0) {
      const queued = this.deferred;
      this.deferred = [];
      for (const command of queued) {
        command();
      }
    }
  }
}
