// Errors
export { AppError, ParseError, LoadError, TransportError, ValidationError, errorMessage } from './core/errors';

// Types
export * from './core/types';

// Timeline pipeline
export {
  parseTimestamp,
  parseFilenames,
  createTimestamp,
  formatTimestamp,
  secondsBetween,
  compareTimestamps,
} from './core/timeline/TimestampParser';
export {
  buildTimeline,
  buildTimelineFromFilenames,
  getBuildWarnings,
  type NamedPhoto,
  type TimelineFromFilenamesResult,
} from './core/timeline/TimelineBuilder';
export { TimelineIndex } from './core/timeline/TimelineIndex';
export { markerPositions, findMarkerNear, fractionToTime, type TimelineMarker } from './core/timeline/TimelineMarkers';
export { TimelineSerializer, type TimelineJSON } from './core/timeline/TimelineSerializer';

// Transitions
export {
  TransitionStateMachine,
  DEFAULT_TRANSITION_SETTINGS,
  type TransitionPhase,
  type TransitionSettings,
} from './core/transition/TransitionStateMachine';
export { EASINGS, getEasing, type EasingName, type EasingFunction } from './core/transition/Easing';

// Playback
export {
  PlaybackScheduler,
  DEFAULT_SCHEDULER_OPTIONS,
  type PlaybackSchedulerDeps,
  type PlaybackSchedulerEvents,
  type PlaybackSchedulerOptions,
  type PlaybackSchedulerOverrides,
} from './core/playback/PlaybackScheduler';
export { FrameLoop, defaultFrameRequester, performanceClock, type Clock, type FrameRequester } from './services/FrameLoop';

// Project loading
export { prepareProject, type ProjectInput, type ProjectAudio } from './core/project/ProjectLoader';
export { probeAudioDuration } from './audio/AudioProbe';

// Host adapters
export type { AudioTransport, AudioTransportFactory } from './audio/AudioTransport';
export { HTMLAudioTransport, type AudioElementLike } from './audio/HTMLAudioTransport';
export type { DrawingSurface, ImageSource } from './render/DrawingSurface';
export { CanvasDrawingSurface, type Canvas2DContextLike, type SizedImage } from './render/CanvasDrawingSurface';

// Export
export * from './export';

// Utilities
export type { Disposable } from './core/Disposable';
export { Logger, LogLevel } from './utils/Logger';
export { formatClock, formatProgress } from './utils/Timecode';
export * from './config';
