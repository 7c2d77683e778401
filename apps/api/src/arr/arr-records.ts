import type { ArrRecord } from './arr.types';

// Typed reads over loosely-shaped catalog records. A missing or wrongly-typed
// field reads as null, never throws.

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function pick(obj: ArrRecord, path: string): unknown {
  const parts = path.split('.');
  let cur: unknown = obj;
  for (const part of parts) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[part];
  }
  return cur;
}

export function readInt(obj: ArrRecord, path: string): number | null {
  const v = pick(obj, path);
  return typeof v === 'number' && Number.isInteger(v) ? v : null;
}

export function readBool(obj: ArrRecord, path: string): boolean | null {
  const v = pick(obj, path);
  return typeof v === 'boolean' ? v : null;
}

export function readString(obj: ArrRecord, path: string): string | null {
  const v = pick(obj, path);
  if (typeof v !== 'string') return null;
  const s = v.trim();
  return s ? s : null;
}

export function movieQualityName(movie: ArrRecord): string {
  return readString(movie, 'movieFile.quality.quality.name') ?? '';
}

export function episodeFileQualityName(episodeFile: ArrRecord): string {
  return readString(episodeFile, 'quality.quality.name') ?? '';
}

export function movieTitle(movie: ArrRecord): string {
  return readString(movie, 'title') ?? readString(movie, 'sortTitle') ?? 'Unknown';
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

/** `S01E02 - Title`, falling back to `Series <id>` without numbering. */
export function episodeLabel(episode: ArrRecord, seriesId: number): string {
  const season = readInt(episode, 'seasonNumber');
  const number = readInt(episode, 'episodeNumber');
  const title = readString(episode, 'title');

  const base =
    season !== null && number !== null
      ? `S${pad2(season)}E${pad2(number)}`
      : `Series ${seriesId}`;
  return title ? `${base} - ${title}` : base;
}
