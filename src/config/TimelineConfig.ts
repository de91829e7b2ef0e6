/**
 * Timeline and scrubber constants.
 */

/** Marker hit radius as a fraction of the full timeline width (1%) */
export const MARKER_HIT_TOLERANCE = 0.01;

/** Version written by TimelineSerializer.toJSON */
export const TIMELINE_JSON_VERSION = 1;
