import { Injectable, Logger } from '@nestjs/common';
import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isPlainObject } from '../arr/arr-records';
import type { ArrServiceKey } from '../arr/arr.types';
import { resolveChangeLogPath } from '../bootstrap-env';
import { isMissingFile } from '../lib/errors';

export const CHANGE_LOG_DEFAULT_LIMIT = 200;

export type ChangeLogAction = 'unmonitor' | 'unmonitor_episode';

export type ChangeLogInput = {
  service: ArrServiceKey;
  itemId: number | null;
  seriesId?: number;
  title: string;
  profileId: number | null;
  action: ChangeLogAction;
};

export type ChangeLogEntry = ChangeLogInput & {
  timestamp: string;
};

/**
 * Append-only record of every unmonitor the reconciler performed, one JSON
 * object per line. Writes go through a single promise chain.
 */
@Injectable()
export class ChangeLogService {
  private readonly logger = new Logger(ChangeLogService.name);
  private readonly path = resolveChangeLogPath();
  private writeChain: Promise<void> = Promise.resolve();

  async append(entry: ChangeLogInput): Promise<ChangeLogEntry> {
    const enriched: ChangeLogEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const line = `${JSON.stringify(enriched)}\n`;
    await this.enqueue(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, line, 'utf8');
    });
    return enriched;
  }

  async recent(limit = CHANGE_LOG_DEFAULT_LIMIT): Promise<ChangeLogEntry[]> {
    if (limit <= 0) return [];
    await this.writeChain.catch(() => undefined);

    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const lines = text.split('\n').filter((l) => l.trim());
    const entries: ChangeLogEntry[] = [];
    for (const line of lines.slice(-limit).reverse()) {
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async clear(): Promise<void> {
    await this.enqueue(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, '', 'utf8');
    });
    this.logger.log('Change log cleared');
  }

  private async enqueue(write: () => Promise<void>) {
    const next = this.writeChain.catch(() => undefined).then(write);
    this.writeChain = next;
    await next;
  }
}

function isServiceKey(value: unknown): value is ArrServiceKey {
  return value === 'radarr' || value === 'sonarr';
}

function isAction(value: unknown): value is ChangeLogAction {
  return value === 'unmonitor' || value === 'unmonitor_episode';
}

function parseEntry(line: string): ChangeLogEntry | null {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isPlainObject(payload)) return null;

  const service = payload['service'];
  const action = payload['action'];
  const timestamp = payload['timestamp'];
  if (!isServiceKey(service) || !isAction(action)) return null;
  if (typeof timestamp !== 'string') return null;

  const toIntOrNull = (v: unknown) =>
    typeof v === 'number' && Number.isInteger(v) ? v : null;
  const seriesId = toIntOrNull(payload['seriesId']);
  const title = payload['title'];

  return {
    timestamp,
    service,
    itemId: toIntOrNull(payload['itemId']),
    ...(seriesId !== null ? { seriesId } : {}),
    title: typeof title === 'string' ? title : 'Unknown',
    profileId: toIntOrNull(payload['profileId']),
    action,
  };
}
