import { BadRequestException } from '@nestjs/common';
import { normalizeHttpBaseUrl, parseSettingsPatch } from './settings.validation';

describe('normalizeHttpBaseUrl', () => {
  it.each([
    ['radarr.local:7878', 'http://radarr.local:7878'],
    ['  https://sonarr.example.test  ', 'https://sonarr.example.test'],
    ['HTTP://radarr.local', 'HTTP://radarr.local'],
    ['', ''],
  ])('normalizes %j to %j', (raw, expected) => {
    expect(normalizeHttpBaseUrl(raw)).toBe(expected);
  });

  it('rejects non-http protocols', () => {
    expect(() => normalizeHttpBaseUrl('ftp://radarr.local')).toThrow(
      new BadRequestException('baseUrl must be a valid http(s) URL'),
    );
  });

  it('rejects non-string values', () => {
    expect(() => normalizeHttpBaseUrl(42, 'radarr.baseUrl')).toThrow(
      'radarr.baseUrl must be a string',
    );
  });
});

describe('parseSettingsPatch', () => {
  it('keeps known fields and drops the rest', () => {
    expect(
      parseSettingsPatch({
        radarr: {
          baseUrl: 'radarr.local:7878',
          targetQuality: ' 1080p ',
          profileId: 4,
          extra: true,
        },
        pollIntervalSeconds: 90.7,
        enabled: false,
        unknown: 'x',
      }),
    ).toEqual({
      radarr: {
        baseUrl: 'http://radarr.local:7878',
        targetQuality: '1080p',
        profileId: 4,
      },
      pollIntervalSeconds: 90,
      enabled: false,
    });
  });

  it('allows clearing the profile id', () => {
    expect(parseSettingsPatch({ sonarr: { profileId: null } })).toEqual({
      sonarr: { profileId: null },
    });
  });

  it.each([
    [null, 'settings must be an object'],
    [{ radarr: 'x' }, 'settings.radarr must be an object'],
    [{ sonarr: { apiKey: 1 } }, 'settings.sonarr.apiKey must be a string'],
    [{ radarr: { profileId: 1.5 } }, 'settings.radarr.profileId must be an integer or null'],
    [{ pollIntervalSeconds: '60' }, 'settings.pollIntervalSeconds must be a number'],
    [{ enabled: 'yes' }, 'settings.enabled must be a boolean'],
  ])('rejects %j', (raw, message) => {
    expect(() => parseSettingsPatch(raw)).toThrow(message);
  });
});
