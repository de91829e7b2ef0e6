import { describe, it, expect, vi, beforeEach } from 'vitest';
import { probeAudioDuration } from './AudioProbe';
import { LoadError } from '../core/errors';

const mocks = vi.hoisted(() => {
  const state: { audioTrack: { codec: string } | null; duration: number; error: Error | null } = {
    audioTrack: { codec: 'aac' },
    duration: 600,
    error: null,
  };
  return { state, dispose: vi.fn() };
});

vi.mock('mediabunny', () => ({
  Input: vi.fn().mockImplementation(function () {
    return {
      getPrimaryAudioTrack: vi.fn(async () => mocks.state.audioTrack),
      computeDuration: vi.fn(async () => {
        if (mocks.state.error) throw mocks.state.error;
        return mocks.state.duration;
      }),
      dispose: mocks.dispose,
    };
  }),
  BlobSource: vi.fn(),
  ALL_FORMATS: [],
}));

describe('probeAudioDuration', () => {
  const file = new Blob(['not really audio']);

  beforeEach(() => {
    mocks.state.audioTrack = { codec: 'aac' };
    mocks.state.duration = 600;
    mocks.state.error = null;
    mocks.dispose.mockClear();
  });

  it('reads the container duration and releases the input', async () => {
    await expect(probeAudioDuration(file)).resolves.toBe(600);
    expect(mocks.dispose).toHaveBeenCalledTimes(1);
  });

  it('rejects files without an audio track', async () => {
    mocks.state.audioTrack = null;
    await expect(probeAudioDuration(file)).rejects.toThrow('No audio track found in file');
    expect(mocks.dispose).toHaveBeenCalledTimes(1);
  });

  it('wraps parser failures in LoadError', async () => {
    mocks.state.error = new Error('bad header');
    const result = probeAudioDuration(file);
    await expect(result).rejects.toBeInstanceOf(LoadError);
    await expect(result).rejects.toThrow('Cannot read audio file: bad header');
  });

  it('rejects a non-finite duration', async () => {
    mocks.state.duration = Number.NaN;
    await expect(probeAudioDuration(file)).rejects.toThrow('Audio file reports an invalid duration (NaN)');
  });
});
