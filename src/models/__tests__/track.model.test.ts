import { buildFilename, createTrack, formatTrackDuration } from '../track.model';

describe('createTrack', () => {
  const input = {
    id: 'track-9',
    name: 'Back in Black (Live!)',
    artist: 'AC/DC',
    album: 'Stage',
    durationMs: 255000
  };

  it('derives a file-system safe filename', () => {
    expect(createTrack(input).filename).toBe('ACDC - Back in Black Live');
  });

  it('keeps non-latin letters, dashes and underscores', () => {
    expect(buildFilename('Sigur Rós', 'Hoppípolla_2 - edit')).toBe('Sigur Rós - Hoppípolla_2 - edit');
  });

  it('freezes the descriptor', () => {
    expect(Object.isFrozen(createTrack(input))).toBe(true);
  });

  it('rejects a negative duration', () => {
    expect(() => createTrack({ ...input, durationMs: -1 })).toThrow(RangeError);
  });

  it('accepts a zero duration', () => {
    expect(createTrack({ ...input, durationMs: 0 }).durationMs).toBe(0);
  });
});

describe('formatTrackDuration', () => {
  it('formats minutes and zero-padded seconds', () => {
    expect(formatTrackDuration(245000)).toBe('4:05');
    expect(formatTrackDuration(59000)).toBe('0:59');
  });
});
