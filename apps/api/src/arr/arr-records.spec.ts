import {
  episodeFileQualityName,
  episodeLabel,
  movieQualityName,
  movieTitle,
  readBool,
  readInt,
} from './arr-records';

describe('arr record accessors', () => {
  it('reads nested integers and rejects other types', () => {
    const record = { id: 7, nested: { value: 3 }, fractional: 1.5, text: '9' };

    expect(readInt(record, 'id')).toBe(7);
    expect(readInt(record, 'nested.value')).toBe(3);
    expect(readInt(record, 'fractional')).toBeNull();
    expect(readInt(record, 'text')).toBeNull();
    expect(readInt(record, 'missing.path')).toBeNull();
  });

  it('reads booleans strictly', () => {
    expect(readBool({ monitored: true }, 'monitored')).toBe(true);
    expect(readBool({ monitored: false }, 'monitored')).toBe(false);
    expect(readBool({ monitored: 'true' }, 'monitored')).toBeNull();
    expect(readBool({}, 'monitored')).toBeNull();
  });

  it('extracts the movie file quality name', () => {
    expect(
      movieQualityName({
        movieFile: { quality: { quality: { name: 'Bluray-1080p' } } },
      }),
    ).toBe('Bluray-1080p');
    expect(movieQualityName({ movieFile: null })).toBe('');
    expect(movieQualityName({})).toBe('');
  });

  it('extracts the episode file quality name', () => {
    expect(
      episodeFileQualityName({ quality: { quality: { name: 'WEBDL-720p' } } }),
    ).toBe('WEBDL-720p');
    expect(episodeFileQualityName({ quality: {} })).toBe('');
  });

  it('falls back from title to sortTitle to Unknown', () => {
    expect(movieTitle({ title: 'Arrival', sortTitle: 'arrival' })).toBe('Arrival');
    expect(movieTitle({ title: '  ', sortTitle: 'arrival' })).toBe('arrival');
    expect(movieTitle({})).toBe('Unknown');
  });

  it('labels episodes by season and episode number', () => {
    expect(
      episodeLabel({ seasonNumber: 1, episodeNumber: 2, title: 'Pilot' }, 10),
    ).toBe('S01E02 - Pilot');
    expect(episodeLabel({ seasonNumber: 12, episodeNumber: 105 }, 10)).toBe(
      'S12E105',
    );
    expect(episodeLabel({ title: 'Special' }, 10)).toBe('Series 10 - Special');
    expect(episodeLabel({}, 10)).toBe('Series 10');
  });
});
