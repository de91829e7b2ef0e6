/**
 * Configuration barrel export.
 *
 * Re-exports every centralized constant so consumers can import from
 * `src/config` instead of reaching into individual modules.
 */

export * from './PlaybackConfig';
export * from './ExportConfig';
export * from './TimelineConfig';
