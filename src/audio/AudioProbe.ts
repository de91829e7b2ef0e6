/**
 * Reads the duration of an audio file from its container with mediabunny,
 * without decoding the samples.
 */

import { Input, BlobSource, ALL_FORMATS } from 'mediabunny';
import { LoadError, errorMessage } from '../core/errors';
import { Logger } from '../utils/Logger';

const log = new Logger('AudioProbe');

/**
 * @throws LoadError when the file has no audio track or cannot be parsed
 */
export async function probeAudioDuration(file: Blob): Promise<number> {
  let input: Input | null = null;
  try {
    input = new Input({ source: new BlobSource(file), formats: ALL_FORMATS });

    const audioTrack = await input.getPrimaryAudioTrack();
    if (!audioTrack) {
      throw new LoadError('No audio track found in file');
    }

    const duration = await input.computeDuration();
    if (!Number.isFinite(duration) || duration < 0) {
      throw new LoadError(`Audio file reports an invalid duration (${duration})`);
    }
    log.debug(`Probed duration ${duration}s`);
    return duration;
  } catch (error) {
    if (error instanceof LoadError) throw error;
    throw new LoadError(`Cannot read audio file: ${errorMessage(error)}`, error);
  } finally {
    input?.dispose();
  }
}
