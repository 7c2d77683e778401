import { Injectable } from '@nestjs/common';
import { constants as fsConstants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import type { AppMetaResponseDto, HealthResponseDto } from './app.dto';
import { readAppMeta } from './app.meta';
import { resolveDataDir } from './bootstrap-env';
import { errToMessage } from './lib/errors';

export type ReadinessCheck =
  | { ok: true }
  | {
      ok: false;
      error: string;
    };

export type ReadinessResponse = {
  status: 'ready' | 'not_ready';
  time: string;
  checks: {
    dataDir: ReadinessCheck;
  };
};

@Injectable()
export class AppService {
  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  getMeta(): AppMetaResponseDto {
    return readAppMeta();
  }

  async getReadiness(): Promise<ReadinessResponse> {
    const time = new Date().toISOString();
    const dataDir = resolveDataDir();

    let dataDirCheck: ReadinessCheck;
    try {
      const s = await stat(dataDir);
      if (!s.isDirectory()) {
        dataDirCheck = { ok: false, error: 'APP_DATA_DIR is not a directory' };
      } else {
        // Creating files needs write + search on the directory.
        await access(dataDir, fsConstants.W_OK | fsConstants.X_OK);
        dataDirCheck = { ok: true };
      }
    } catch (err) {
      dataDirCheck = { ok: false, error: errToMessage(err) };
    }

    const status = dataDirCheck.ok ? ('ready' as const) : ('not_ready' as const);
    return { status, time, checks: { dataDir: dataDirCheck } };
  }
}
