/**
 * Centralized playback-related constants.
 *
 * Rate limits and presets, volume defaults, transition defaults and photo
 * cache sizing used by the playback scheduler.
 */

/** Slowest allowed playback rate */
export const MIN_PLAYBACK_RATE = 0.25;

/** Fastest allowed playback rate */
export const MAX_PLAYBACK_RATE = 2;

/** Rates visited by `cycleRate()`, in order */
export const PLAYBACK_RATE_PRESETS = [0.5, 0.75, 1, 1.25, 1.5, 2] as const;

export type PlaybackRatePreset = typeof PLAYBACK_RATE_PRESETS[number];

/** Initial output volume for a new scheduler */
export const DEFAULT_VOLUME = 0.8;

/** Duration of the animated photo change, in seconds of played time */
export const DEFAULT_TRANSITION_DURATION_SECONDS = 0.5;

/** Number of decoded photos kept in memory */
export const PHOTO_CACHE_SIZE = 24;

/** How many entries after the active one are decoded ahead of time */
export const PHOTO_PRELOAD_AHEAD = 3;
