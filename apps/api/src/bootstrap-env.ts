import { Logger } from '@nestjs/common';
import { chmod, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

export type BootstrapEnv = {
  repoRoot: string;
  dataDir: string;
  settingsPath: string;
  changeLogPath: string;
};

const repoRoot = join(__dirname, '..', '..', '..');
const logger = new Logger('Bootstrap');

function parseUmask(raw: string | undefined): number | null {
  const v = raw?.trim();
  if (!v) return null;
  let s = v.toLowerCase();
  if (s.startsWith('0o')) s = s.slice(2);
  if (!/^[0-7]{1,4}$/.test(s)) return null;
  return Number.parseInt(s, 8);
}

async function tightenModeNoWorldAccess(path: string) {
  try {
    const mode = (await stat(path)).mode & 0o777;
    const tightened = mode & 0o770;
    if (tightened !== mode) {
      await chmod(path, tightened);
    }
  } catch (err) {
    logger.warn(
      `Could not tighten permissions on ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function resolveDataDir(): string {
  return process.env.APP_DATA_DIR?.trim() || join(repoRoot, 'data');
}

export function resolveSettingsPath(): string {
  return (
    process.env.SETTINGS_PATH?.trim() || join(resolveDataDir(), 'settings.json')
  );
}

export function resolveChangeLogPath(): string {
  return (
    process.env.CHANGE_LOG_PATH?.trim() ||
    join(resolveDataDir(), 'change-log.jsonl')
  );
}

/**
 * Fills in the data directory and file locations before the Nest app is
 * created, so every service reads the same paths from process.env.
 */
export async function ensureBootstrapEnv(): Promise<BootstrapEnv> {
  // API keys live in the settings file; keep new files owner/group only.
  const desiredUmask = parseUmask(process.env.APP_UMASK) ?? 0o007;
  try {
    process.umask(desiredUmask);
  } catch (err) {
    // umask is not supported in worker threads
    logger.debug(
      `umask not applied: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const dataDir = resolveDataDir();
  process.env.APP_DATA_DIR = dataDir;
  await mkdir(dataDir, { recursive: true });
  await tightenModeNoWorldAccess(dataDir);

  const settingsPath = resolveSettingsPath();
  const changeLogPath = resolveChangeLogPath();
  process.env.SETTINGS_PATH = settingsPath;
  process.env.CHANGE_LOG_PATH = changeLogPath;

  return { repoRoot, dataDir, settingsPath, changeLogPath };
}
