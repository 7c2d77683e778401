import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isPlainObject } from '../arr/arr-records';
import type { ArrConnection, ArrServiceKey } from '../arr/arr.types';
import { resolveSettingsPath } from '../bootstrap-env';
import { errToMessage, isMissingFile } from '../lib/errors';

export const DEFAULT_POLL_INTERVAL_SECONDS = 300;
export const MIN_POLL_INTERVAL_SECONDS = 30;
export const DEFAULT_STOP_MODE = 'cutoff';

export type ServiceSettings = {
  baseUrl: string;
  apiKey: string;
  profileName: string;
  profileId: number | null;
  targetQuality: string;
  /** Informational only; the reconciler does not branch on it. */
  stopMode: string;
};

export type AppSettings = {
  radarr: ServiceSettings;
  sonarr: ServiceSettings;
  pollIntervalSeconds: number;
  enabled: boolean;
};

export type PublicServiceSettings = Omit<ServiceSettings, 'apiKey'> & {
  apiKeyConfigured: boolean;
};

export type PublicSettings = {
  radarr: PublicServiceSettings;
  sonarr: PublicServiceSettings;
  pollIntervalSeconds: number;
  enabled: boolean;
};

const ENV_FALLBACKS: Record<ArrServiceKey, { url: string; apiKey: string }> = {
  radarr: { url: 'RADARR_URL', apiKey: 'RADARR_API_KEY' },
  sonarr: { url: 'SONARR_URL', apiKey: 'SONARR_API_KEY' },
};

function asString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function asInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== 'string') return null;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : null;
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  for (const [key, value] of Object.entries(source)) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') {
      continue;
    }
    if (value === undefined) continue;
    const existing = target[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      target[key] = deepMerge({ ...existing }, value);
      continue;
    }
    target[key] = value;
  }
  return target;
}

function normalizeServiceSettings(raw: unknown): ServiceSettings {
  const rec = isPlainObject(raw) ? raw : {};
  return {
    baseUrl: asString(rec['baseUrl']),
    apiKey: asString(rec['apiKey']),
    profileName: asString(rec['profileName']),
    profileId: asInt(rec['profileId']),
    targetQuality: asString(rec['targetQuality']),
    stopMode: asString(rec['stopMode']) || DEFAULT_STOP_MODE,
  };
}

export function normalizeSettings(raw: unknown): AppSettings {
  const rec = isPlainObject(raw) ? raw : {};
  const enabled = rec['enabled'];
  return {
    radarr: normalizeServiceSettings(rec['radarr']),
    sonarr: normalizeServiceSettings(rec['sonarr']),
    pollIntervalSeconds:
      asInt(rec['pollIntervalSeconds']) ?? DEFAULT_POLL_INTERVAL_SECONDS,
    enabled: typeof enabled === 'boolean' ? enabled : true,
  };
}

export function connectionFor(
  settings: AppSettings,
  service: ArrServiceKey,
): ArrConnection {
  const { baseUrl, apiKey } = settings[service];
  return { baseUrl, apiKey };
}

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly path = resolveSettingsPath();
  private writeChain: Promise<void> = Promise.resolve();

  /** Stored settings exactly as saved; defaults when missing or unreadable. */
  async load(): Promise<AppSettings> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn(
          `Settings unreadable at ${this.path}; using defaults: ${errToMessage(err)}`,
        );
      }
      return normalizeSettings({});
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.logger.warn(
        `Settings file ${this.path} is not valid JSON; using defaults: ${errToMessage(err)}`,
      );
      return normalizeSettings({});
    }
    return normalizeSettings(parsed);
  }

  /** Stored settings with connection fields falling back to the environment. */
  async loadEffective(): Promise<AppSettings> {
    return this.effective(await this.load());
  }

  effective(stored: AppSettings): AppSettings {
    const withFallback = (service: ArrServiceKey): ServiceSettings => {
      const env = ENV_FALLBACKS[service];
      const current = stored[service];
      return {
        ...current,
        baseUrl: current.baseUrl || asString(process.env[env.url]),
        apiKey: current.apiKey || asString(process.env[env.apiKey]),
      };
    };
    return {
      ...stored,
      radarr: withFallback('radarr'),
      sonarr: withFallback('sonarr'),
    };
  }

  toPublic(settings: AppSettings): PublicSettings {
    const strip = ({ apiKey, ...rest }: ServiceSettings): PublicServiceSettings => ({
      ...rest,
      apiKeyConfigured: Boolean(apiKey),
    });
    return {
      radarr: strip(settings.radarr),
      sonarr: strip(settings.sonarr),
      pollIntervalSeconds: settings.pollIntervalSeconds,
      enabled: settings.enabled,
    };
  }

  /**
   * Deep-merges `patch` into the stored document. The read, merge and write
   * run as one step on the write chain, so concurrent updates all land. The
   * poll interval is raised to the 30 second floor on save.
   */
  async update(patch: Record<string, unknown>): Promise<AppSettings> {
    const next = await this.enqueue(async () => {
      const current = await this.load();
      const merged = normalizeSettings(deepMerge({ ...current }, patch));
      merged.pollIntervalSeconds = Math.max(
        merged.pollIntervalSeconds,
        MIN_POLL_INTERVAL_SECONDS,
      );
      await this.write(merged);
      return merged;
    });
    this.logger.log('Updated settings');
    return next;
  }

  async save(settings: AppSettings): Promise<void> {
    await this.enqueue(() => this.write(settings));
  }

  private async write(settings: AppSettings) {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.writeChain.then(task);
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
