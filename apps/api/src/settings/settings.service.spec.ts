import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SettingsService } from './settings.service';

const ENV_KEYS = [
  'SETTINGS_PATH',
  'RADARR_URL',
  'RADARR_API_KEY',
  'SONARR_URL',
  'SONARR_API_KEY',
] as const;

describe('SettingsService', () => {
  let dir: string;
  let settingsPath: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    dir = await mkdtemp(join(tmpdir(), 'settings-spec-'));
    settingsPath = join(dir, 'nested', 'settings.json');
    process.env.SETTINGS_PATH = settingsPath;
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', async () => {
    const service = new SettingsService();

    await expect(service.load()).resolves.toEqual({
      radarr: {
        baseUrl: '',
        apiKey: '',
        profileName: '',
        profileId: null,
        targetQuality: '',
        stopMode: 'cutoff',
      },
      sonarr: {
        baseUrl: '',
        apiKey: '',
        profileName: '',
        profileId: null,
        targetQuality: '',
        stopMode: 'cutoff',
      },
      pollIntervalSeconds: 300,
      enabled: true,
    });
  });

  it('returns defaults when the file is not valid JSON', async () => {
    const service = new SettingsService();
    await service.save(await service.load());
    await writeFile(settingsPath, '{not json', 'utf8');

    const settings = await service.load();
    expect(settings.pollIntervalSeconds).toBe(300);
    expect(settings.enabled).toBe(true);
  });

  it('normalizes stored values on load', async () => {
    const service = new SettingsService();
    await service.save(await service.load());
    await writeFile(
      settingsPath,
      JSON.stringify({
        radarr: { baseUrl: ' http://radarr.local ', targetQuality: ' 1080p ', profileId: '4' },
        pollIntervalSeconds: '120',
        enabled: false,
      }),
      'utf8',
    );

    const settings = await service.load();
    expect(settings.radarr).toEqual({
      baseUrl: 'http://radarr.local',
      apiKey: '',
      profileName: '',
      profileId: 4,
      targetQuality: '1080p',
      stopMode: 'cutoff',
    });
    expect(settings.pollIntervalSeconds).toBe(120);
    expect(settings.enabled).toBe(false);
  });

  it('deep-merges patches and raises the poll interval to the floor', async () => {
    const service = new SettingsService();
    await service.update({
      radarr: { baseUrl: 'http://radarr.local', apiKey: 'test-secret' },
    });

    const next = await service.update({
      radarr: { targetQuality: '2160p' },
      pollIntervalSeconds: 5,
    });

    expect(next.radarr.baseUrl).toBe('http://radarr.local');
    expect(next.radarr.apiKey).toBe('test-secret');
    expect(next.radarr.targetQuality).toBe('2160p');
    expect(next.pollIntervalSeconds).toBe(30);

    const onDisk: unknown = JSON.parse(await readFile(settingsPath, 'utf8'));
    expect(onDisk).toEqual(next);
  });

  it('keeps every patch when updates run concurrently', async () => {
    const service = new SettingsService();

    await Promise.all([
      service.update({ radarr: { targetQuality: '1080p' } }),
      service.update({ sonarr: { targetQuality: '720p' } }),
      service.update({ pollIntervalSeconds: 600 }),
    ]);

    const stored = await service.load();
    expect(stored.radarr.targetQuality).toBe('1080p');
    expect(stored.sonarr.targetQuality).toBe('720p');
    expect(stored.pollIntervalSeconds).toBe(600);
  });

  it('falls back to environment connection values when stored ones are empty', async () => {
    process.env.RADARR_URL = 'http://env-radarr:7878';
    process.env.RADARR_API_KEY = 'env-key';
    process.env.SONARR_URL = 'http://env-sonarr:8989';
    const service = new SettingsService();
    await service.update({ sonarr: { baseUrl: 'http://stored-sonarr:8989' } });

    const effective = await service.loadEffective();

    expect(effective.radarr.baseUrl).toBe('http://env-radarr:7878');
    expect(effective.radarr.apiKey).toBe('env-key');
    expect(effective.sonarr.baseUrl).toBe('http://stored-sonarr:8989');
    expect(effective.sonarr.apiKey).toBe('');
  });

  it('replaces api keys with presence flags in the public view', async () => {
    const service = new SettingsService();
    const stored = await service.update({
      radarr: { apiKey: 'test-secret', targetQuality: '1080p' },
    });

    const view = service.toPublic(stored);

    expect(view.radarr).toEqual({
      baseUrl: '',
      profileName: '',
      profileId: null,
      targetQuality: '1080p',
      stopMode: 'cutoff',
      apiKeyConfigured: true,
    });
    expect(view.sonarr.apiKeyConfigured).toBe(false);
    expect(JSON.stringify(view)).not.toContain('test-secret');
  });
});
