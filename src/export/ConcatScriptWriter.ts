/**
 * Writes an ffmpeg concat-demuxer script ("ffconcat") for an export plan:
 * one `file` + `duration` pair per segment. The last file is listed twice
 * because the demuxer ignores the final `duration` otherwise.
 */

import type { ExportPlan, ExportSegment } from './ExportFrameGenerator';

/** Maps a segment to the on-disk image the encoder should read. */
export type SegmentPathResolver = (segment: ExportSegment) => string;

/** Quote a path for a concat script line. */
export function quoteConcatPath(path: string): string {
  return `'${path.replace(/'/g, "'\\''")}'`;
}

function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(6)));
}

export function writeConcatScript(plan: ExportPlan, resolvePath: SegmentPathResolver): string {
  const lines = ['ffconcat version 1.0'];
  let last: string | null = null;

  for (const segment of plan.segments) {
    last = quoteConcatPath(resolvePath(segment));
    lines.push(`file ${last}`);
    lines.push(`duration ${formatSeconds(segment.frameCount / plan.frameRate)}`);
  }
  if (last !== null) {
    lines.push(`file ${last}`);
  }

  return lines.join('\n') + '\n';
}
