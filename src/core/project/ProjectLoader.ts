/**
 * Turns an uploaded recording plus photos into a Timeline: parse names,
 * probe the audio duration, build.
 */

import { probeAudioDuration } from '../../audio/AudioProbe';
import { Logger } from '../../utils/Logger';
import { buildTimelineFromFilenames, type NamedPhoto, type TimelineFromFilenamesResult } from '../timeline/TimelineBuilder';
import { parseTimestamp } from '../timeline/TimestampParser';

const log = new Logger('ProjectLoader');

export interface ProjectAudio {
  name: string;
  data: Blob;
}

export interface ProjectInput {
  audio: ProjectAudio;
  photos: readonly NamedPhoto[];
}

export type DurationProbe = (file: Blob) => Promise<number>;

/**
 * @throws ParseError when the audio file name carries no timestamp
 * @throws LoadError when the audio duration cannot be read
 */
export async function prepareProject(
  input: ProjectInput,
  probe: DurationProbe = probeAudioDuration
): Promise<TimelineFromFilenamesResult> {
  // Fail on a bad audio name before reading the file
  parseTimestamp(input.audio.name);

  const duration = await probe(input.audio.data);
  const result = buildTimelineFromFilenames(input.audio.name, duration, input.photos);

  log.info(
    `Prepared ${input.audio.name}: ${result.timeline.entries.length} photos placed, ` +
      `${result.timeline.excluded.length} excluded, ${result.parseErrors.length} unparseable`
  );
  return result;
}
