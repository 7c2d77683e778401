import type { ArrServiceKey } from '../arr/arr.types';
import type { ChangeLogEntry } from '../change-log/change-log.service';
import type { PublicSettings } from '../settings/settings.service';

export type PassTrigger = 'manual' | 'schedule';

export type RunStatus = 'completed' | 'disabled' | 'failed';

export type ServiceHealth = {
  /** null until the first probe. */
  ok: boolean | null;
  message: string;
  checkedAt: string | null;
};

export type UnmonitoredCounts = Record<ArrServiceKey, number>;

export type RunRecord = {
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  trigger: PassTrigger;
  status: RunStatus;
  radarrUnmonitored: number;
  sonarrUnmonitored: number;
  error: string;
};

export type RunStatsSnapshot = {
  lastRun: string | null;
  lastError: string;
  lastUnmonitored: UnmonitoredCounts;
  recentRuns: RunRecord[];
  serviceStatus: Record<ArrServiceKey, ServiceHealth>;
};

export type StatusPayload = RunStatsSnapshot & {
  recentChanges: ChangeLogEntry[];
  settings: PublicSettings;
};

export type SchedulerState = 'running' | 'stopped';

/** Outcome of one service's pass. `error` is unprefixed. */
export type ServicePassResult = {
  count: number;
  error: string;
};
