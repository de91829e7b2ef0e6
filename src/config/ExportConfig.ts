/**
 * Export-related constants.
 */

/** Frame rate used when the caller does not pick one */
export const DEFAULT_EXPORT_FRAME_RATE = 30;

/** Upper bound accepted for export frame rates */
export const MAX_EXPORT_FRAME_RATE = 120;

/**
 * Resource id emitted for frames that have no photo (the period before the
 * first photo, or a timeline without photos). The encoder maps it to a blank
 * or branded still.
 */
export const PLACEHOLDER_RESOURCE = 'placeholder';
