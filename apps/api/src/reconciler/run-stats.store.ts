import { Injectable } from '@nestjs/common';
import type { ArrServiceKey } from '../arr/arr.types';
import type {
  RunRecord,
  RunStatsSnapshot,
  ServiceHealth,
  UnmonitoredCounts,
} from './reconciler.types';

export const RUN_HISTORY_CAPACITY = 25;

function initialHealth(): ServiceHealth {
  return { ok: null, message: 'Not checked yet', checkedAt: null };
}

/**
 * Sole owner of the run bookkeeping shared by scheduled passes, manual passes
 * and status requests. Each method applies its whole field group in one
 * synchronous step and reads hand out copies, so callers never see a record
 * half-written.
 */
@Injectable()
export class RunStatsStore {
  private lastRun: string | null = null;
  private lastError = '';
  private lastUnmonitored: UnmonitoredCounts = { radarr: 0, sonarr: 0 };
  private recentRuns: RunRecord[] = [];
  private readonly serviceStatus: Record<ArrServiceKey, ServiceHealth> = {
    radarr: initialHealth(),
    sonarr: initialHealth(),
  };

  snapshot(): RunStatsSnapshot {
    return {
      lastRun: this.lastRun,
      lastError: this.lastError,
      lastUnmonitored: { ...this.lastUnmonitored },
      recentRuns: this.recentRuns.map((r) => ({ ...r })),
      serviceStatus: {
        radarr: { ...this.serviceStatus.radarr },
        sonarr: { ...this.serviceStatus.sonarr },
      },
    };
  }

  getServiceHealth(service: ArrServiceKey): ServiceHealth {
    return { ...this.serviceStatus[service] };
  }

  setServiceHealth(
    service: ArrServiceKey,
    ok: boolean,
    message: string,
    checkedAt: Date = new Date(),
  ): ServiceHealth {
    const next: ServiceHealth = {
      ok,
      message,
      checkedAt: checkedAt.toISOString(),
    };
    this.serviceStatus[service] = next;
    return { ...next };
  }

  /**
   * Publishes a finished pass: last-run fields and the history entry move
   * together.
   */
  recordRun(record: RunRecord): RunRecord {
    const frozen = Object.freeze({ ...record });
    this.lastRun = record.finishedAt;
    this.lastError = record.error;
    this.lastUnmonitored = {
      radarr: record.radarrUnmonitored,
      sonarr: record.sonarrUnmonitored,
    };
    this.recentRuns = [frozen, ...this.recentRuns].slice(0, RUN_HISTORY_CAPACITY);
    return { ...frozen };
  }

  clearHistory() {
    this.recentRuns = [];
  }
}
