import { isPlainObject, readInt } from './arr-records';
import {
  ArrConnectivityError,
  type ArrConnection,
  type ArrQualityProfile,
} from './arr.types';
import { errToMessage } from '../lib/errors';

export const ARR_REQUEST_TIMEOUT_MS = 20_000;

export function buildArrApiUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, string | number>,
) {
  const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const url = new URL(`api/v3/${path.replace(/^\/+/, '')}`, normalized);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Single request against an *arr v3 API. `action` names the call in error
 * messages, e.g. "Radarr list movies".
 */
export async function arrRequest(params: {
  service: string;
  action: string;
  connection: ArrConnection;
  path: string;
  method?: 'GET' | 'PUT';
  query?: Record<string, string | number>;
  body?: unknown;
  timeoutMs?: number;
}): Promise<unknown> {
  const { service, action, connection, path, query, body } = params;
  const method = params.method ?? 'GET';
  const baseUrl = connection.baseUrl.trim();
  const apiKey = connection.apiKey.trim();
  if (!baseUrl || !apiKey) {
    throw new ArrConnectivityError(`Missing ${service} base URL or API key`);
  }

  let url: string;
  try {
    url = buildArrApiUrl(baseUrl, path, query);
  } catch (err) {
    throw new ArrConnectivityError(`${action} failed: ${errToMessage(err)}`);
  }

  const headers: Record<string, string> = {
    Accept: 'application/json',
    'X-Api-Key': apiKey,
  };
  if (body !== undefined) headers['Content-Type'] = 'application/json';

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(),
    params.timeoutMs ?? ARR_REQUEST_TIMEOUT_MS,
  );

  try {
    const res = await fetch(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new ArrConnectivityError(
        `${action} failed: HTTP ${res.status} ${text}`.trim(),
      );
    }

    if (method === 'PUT') return null;
    const data: unknown = await res.json();
    return data;
  } catch (err) {
    if (err instanceof ArrConnectivityError) throw err;
    throw new ArrConnectivityError(`${action} failed: ${errToMessage(err)}`);
  } finally {
    clearTimeout(timeout);
  }
}

export function parseQualityProfiles(data: unknown): ArrQualityProfile[] {
  if (!Array.isArray(data)) return [];
  return data.flatMap((raw: unknown) => {
    if (!isPlainObject(raw)) return [];
    const id = readInt(raw, 'id');
    if (id === null) return [];
    const name = raw['name'];
    return [{ id, name: typeof name === 'string' ? name : String(name ?? '') }];
  });
}

export function parseRecordList(data: unknown) {
  return Array.isArray(data) ? data.filter(isPlainObject) : [];
}
