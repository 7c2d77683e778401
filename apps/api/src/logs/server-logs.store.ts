import { inspect } from 'node:util';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: number;
  time: string; // ISO
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

// Nest boot chatter; warnings and errors from these are still kept.
const IGNORED_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
  'MiddlewareModule',
]);

export const SERVER_LOGS_CAPACITY = 2000;
const MAX_MESSAGE_LENGTH = 10_000;

let nextId = 1;
const ring: Array<ServerLogEntry | null> = Array.from(
  { length: SERVER_LOGS_CAPACITY },
  () => null,
);
let writeIndex = 0;
let count = 0;

export function clearServerLogs() {
  for (let i = 0; i < ring.length; i += 1) ring[i] = null;
  writeIndex = 0;
  count = 0;
  // nextId keeps counting so afterId polling never sees an id twice.
}

function normalizeMessage(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (
    typeof input === 'number' ||
    typeof input === 'boolean' ||
    typeof input === 'bigint'
  ) {
    return String(input);
  }
  if (typeof input === 'symbol') {
    return input.description ? `Symbol(${input.description})` : 'Symbol()';
  }
  try {
    const json = JSON.stringify(input);
    return typeof json === 'string'
      ? json
      : inspect(input, { depth: 6, maxArrayLength: 50 });
  } catch {
    // circular
    return inspect(input, { depth: 6, maxArrayLength: 50 });
  }
}

export function addServerLog(params: {
  level: ServerLogLevel;
  message: unknown;
  stack?: unknown;
  context?: unknown;
}) {
  const msg = normalizeMessage(params.message).trim();
  const stack = normalizeMessage(params.stack).trim();
  const combined = stack ? (msg ? `${msg}\n${stack}` : stack) : msg;
  if (!combined) return;

  const contextRaw =
    typeof params.context === 'string' ? params.context.trim() : '';
  const context = contextRaw ? contextRaw : null;

  const quiet = params.level === 'debug' || params.level === 'info';
  if (quiet && context && IGNORED_CONTEXTS.has(context)) return;

  ring[writeIndex] = {
    id: nextId++,
    time: new Date().toISOString(),
    level: params.level,
    message:
      combined.length > MAX_MESSAGE_LENGTH
        ? `${combined.slice(0, MAX_MESSAGE_LENGTH)}...`
        : combined,
    context,
  };
  writeIndex = (writeIndex + 1) % SERVER_LOGS_CAPACITY;
  count = Math.min(SERVER_LOGS_CAPACITY, count + 1);
}

/** Oldest-first; `limit` keeps the newest entries after the `afterId` filter. */
export function listServerLogs(params?: { afterId?: number; limit?: number }): {
  logs: ServerLogEntry[];
  latestId: number;
} {
  const latestId = nextId - 1;
  const limit = Math.max(
    1,
    Math.min(SERVER_LOGS_CAPACITY, params?.limit ?? 200),
  );
  const afterId = params?.afterId ?? null;

  if (!count) return { logs: [], latestId };

  const oldestIndex = count === SERVER_LOGS_CAPACITY ? writeIndex : 0;
  const ordered: ServerLogEntry[] = [];
  for (let i = 0; i < count; i++) {
    const entry = ring[(oldestIndex + i) % SERVER_LOGS_CAPACITY];
    if (entry) ordered.push(entry);
  }

  const filtered =
    afterId === null ? ordered : ordered.filter((l) => l.id > afterId);
  return { logs: filtered.slice(-limit), latestId };
}
