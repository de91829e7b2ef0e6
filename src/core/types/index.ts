export type {
  ResourceRef, NaiveTimestamp, TimestampedFile, PhotoInput,
  TimelineEntry, ExclusionReason, ExcludedPhoto, Timeline, BuildWarning,
} from './timeline';

export type { TransitionStyle, TransitionState, LayerTransform, RenderLayer } from './transition';
export { TRANSITION_STYLES, IDENTITY_TRANSFORM, isTransitionStyle } from './transition';

export type { PlaybackState, TimeUpdate, PhotoChange } from './playback';
