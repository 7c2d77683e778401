import { BadRequestException } from '@nestjs/common';
import { isPlainObject } from '../arr/arr-records';

const URL_SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;
const HTTP_PROTOCOLS = new Set(['http:', 'https:']);
const SERVICE_STRING_FIELDS = [
  'baseUrl',
  'apiKey',
  'profileName',
  'targetQuality',
  'stopMode',
] as const;

function ensureHttpBaseUrlPrefix(baseUrlRaw: string): string {
  if (URL_SCHEME_PREFIX.test(baseUrlRaw)) return baseUrlRaw;
  return `http://${baseUrlRaw}`;
}

/** Empty stays empty (falls back to the environment); otherwise http(s) only. */
export function normalizeHttpBaseUrl(raw: unknown, field = 'baseUrl'): string {
  if (raw !== undefined && raw !== null && typeof raw !== 'string') {
    throw new BadRequestException(`${field} must be a string`);
  }
  const baseUrlRaw = typeof raw === 'string' ? raw.trim() : '';
  if (!baseUrlRaw) return '';
  const baseUrl = ensureHttpBaseUrlPrefix(baseUrlRaw);
  try {
    const parsed = new URL(baseUrl);
    if (!HTTP_PROTOCOLS.has(parsed.protocol.toLowerCase())) {
      throw new Error('Unsupported protocol');
    }
  } catch {
    throw new BadRequestException(`${field} must be a valid http(s) URL`);
  }
  return baseUrl;
}

function parseServicePatch(
  raw: unknown,
  service: 'radarr' | 'sonarr',
): Record<string, unknown> {
  if (!isPlainObject(raw)) {
    throw new BadRequestException(`settings.${service} must be an object`);
  }
  const out: Record<string, unknown> = {};
  for (const field of SERVICE_STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new BadRequestException(`settings.${service}.${field} must be a string`);
    }
    out[field] = value.trim();
  }
  if (out['baseUrl'] !== undefined) {
    out['baseUrl'] = normalizeHttpBaseUrl(out['baseUrl'], `settings.${service}.baseUrl`);
  }

  const profileId = raw['profileId'];
  if (profileId !== undefined) {
    if (
      profileId !== null &&
      !(typeof profileId === 'number' && Number.isInteger(profileId))
    ) {
      throw new BadRequestException(
        `settings.${service}.profileId must be an integer or null`,
      );
    }
    out['profileId'] = profileId;
  }
  return out;
}

/** Validates a settings patch body, keeping only known fields. */
export function parseSettingsPatch(raw: unknown): Record<string, unknown> {
  if (!isPlainObject(raw)) {
    throw new BadRequestException('settings must be an object');
  }
  const patch: Record<string, unknown> = {};

  for (const service of ['radarr', 'sonarr'] as const) {
    if (raw[service] !== undefined) {
      patch[service] = parseServicePatch(raw[service], service);
    }
  }

  const interval = raw['pollIntervalSeconds'];
  if (interval !== undefined) {
    if (typeof interval !== 'number' || !Number.isFinite(interval)) {
      throw new BadRequestException('settings.pollIntervalSeconds must be a number');
    }
    patch['pollIntervalSeconds'] = Math.trunc(interval);
  }

  const enabled = raw['enabled'];
  if (enabled !== undefined) {
    if (typeof enabled !== 'boolean') {
      throw new BadRequestException('settings.enabled must be a boolean');
    }
    patch['enabled'] = enabled;
  }

  return patch;
}
