/**
 * TransitionStateMachine - which photo is committed, and which change is
 * animating, independent of how time advances.
 *
 *   Idle --request(target != committed)--> Transitioning
 *   Transitioning --advance() reaches duration--> Idle (target committed)
 *   Transitioning --request(other target)--> Transitioning, restarted from
 *     the committed entry (in-flight blends are abandoned, not chained)
 *
 * Elapsed time is played time: the owner feeds `advance()` only from render
 * ticks, so a paused transition stays frozen at its fraction. `startWallClock`
 * records when the change was detected, for diagnostics.
 */

import { DEFAULT_TRANSITION_DURATION_SECONDS } from '../../config/PlaybackConfig';
import { clamp } from '../../utils/math';
import { DEFAULT_EASING, getEasing, type EasingName } from './Easing';
import { idleLayers, transitionLayers } from './TransitionLayers';
import type { RenderLayer, TransitionState, TransitionStyle } from '../types/transition';

export type TransitionPhase = 'idle' | 'transitioning';

export interface TransitionSettings {
  style: TransitionStyle;
  durationSeconds: number;
  easing: EasingName;
}

export const DEFAULT_TRANSITION_SETTINGS: TransitionSettings = {
  style: 'fade',
  durationSeconds: DEFAULT_TRANSITION_DURATION_SECONDS,
  easing: DEFAULT_EASING,
};

interface ActiveTransition {
  from: number | null;
  to: number | null;
  startWallClock: number;
  durationSeconds: number;
  style: TransitionStyle;
  easing: EasingName;
  elapsedSeconds: number;
}

export class TransitionStateMachine {
  private settings: TransitionSettings;
  private committed: number | null = null;
  private active: ActiveTransition | null = null;

  constructor(settings: Partial<TransitionSettings> = {}) {
    this.settings = { ...DEFAULT_TRANSITION_SETTINGS, ...settings };
  }

  /** Change style/duration/easing for transitions started from now on. */
  configure(settings: Partial<TransitionSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  getSettings(): TransitionSettings {
    return { ...this.settings };
  }

  get phase(): TransitionPhase {
    return this.active ? 'transitioning' : 'idle';
  }

  get committedIndex(): number | null {
    return this.committed;
  }

  /** Entry being shown or animated toward. */
  get targetIndex(): number | null {
    return this.active ? this.active.to : this.committed;
  }

  /** Copy of the in-flight transition, or `null` when idle. */
  get state(): TransitionState | null {
    const t = this.active;
    if (!t) return null;
    return {
      fromEntryIndex: t.from,
      toEntryIndex: t.to,
      startWallClock: t.startWallClock,
      durationSeconds: t.durationSeconds,
      styleKind: t.style,
      elapsedSeconds: t.elapsedSeconds,
    };
  }

  /** Hard cut to `committed`, discarding any in-flight transition. */
  reset(committed: number | null): void {
    this.committed = committed;
    this.active = null;
  }

  /**
   * The index reports `target` as the active entry.
   * Returns true when the displayed target changed.
   */
  request(target: number | null, nowWallClock: number): boolean {
    const active = this.active;

    if (active) {
      if (target === active.to) return false;
      if (target === this.committed) {
        this.active = null;
        return true;
      }
    } else if (target === this.committed) {
      return false;
    }

    const { style, durationSeconds, easing } = this.settings;
    if (style === 'none' || durationSeconds <= 0) {
      this.reset(target);
      return true;
    }

    this.active = {
      from: this.committed,
      to: target,
      startWallClock: nowWallClock,
      durationSeconds,
      style,
      easing,
      elapsedSeconds: 0,
    };
    return true;
  }

  /**
   * Add played time to the in-flight transition.
   * Returns true when this call committed it.
   */
  advance(deltaSeconds: number): boolean {
    const active = this.active;
    if (!active || !(deltaSeconds > 0)) return false;

    active.elapsedSeconds += deltaSeconds;
    if (active.elapsedSeconds >= active.durationSeconds) {
      this.reset(active.to);
      return true;
    }
    return false;
  }

  /** Commit the in-flight transition immediately (end of media). */
  finish(): void {
    if (this.active) {
      this.reset(this.active.to);
    }
  }

  /** Linear progress in [0, 1]; 1 when idle. */
  progress(): number {
    const active = this.active;
    if (!active) return 1;
    return clamp(active.elapsedSeconds / active.durationSeconds, 0, 1);
  }

  /** Progress through the easing the transition started with. */
  easedProgress(): number {
    const active = this.active;
    if (!active) return 1;
    return getEasing(active.easing)(this.progress());
  }

  /** Layers to draw for the current state, back to front. */
  computeLayers(viewportWidth: number): RenderLayer[] {
    const active = this.active;
    if (!active) return idleLayers(this.committed);
    return transitionLayers(active.style, active.from, active.to, this.easedProgress(), viewportWidth);
  }
}
