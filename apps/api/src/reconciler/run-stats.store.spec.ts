import { RUN_HISTORY_CAPACITY, RunStatsStore } from './run-stats.store';
import type { RunRecord } from './reconciler.types';

function makeRun(index: number, overrides: Partial<RunRecord> = {}): RunRecord {
  const finishedAt = new Date(Date.UTC(2026, 0, 1, 0, 0, index)).toISOString();
  return {
    startedAt: finishedAt,
    finishedAt,
    durationSeconds: 0.5,
    trigger: 'schedule',
    status: 'completed',
    radarrUnmonitored: index,
    sonarrUnmonitored: 0,
    error: '',
    ...overrides,
  };
}

describe('RunStatsStore', () => {
  let store: RunStatsStore;

  beforeEach(() => {
    store = new RunStatsStore();
  });

  it('starts with unchecked service health and no runs', () => {
    expect(store.snapshot()).toEqual({
      lastRun: null,
      lastError: '',
      lastUnmonitored: { radarr: 0, sonarr: 0 },
      recentRuns: [],
      serviceStatus: {
        radarr: { ok: null, message: 'Not checked yet', checkedAt: null },
        sonarr: { ok: null, message: 'Not checked yet', checkedAt: null },
      },
    });
  });

  it('publishes last-run fields together with the history entry', () => {
    store.recordRun(
      makeRun(3, { sonarrUnmonitored: 2, error: 'Sonarr: HTTP 500' }),
    );

    const snapshot = store.snapshot();
    expect(snapshot.lastRun).toBe('2026-01-01T00:00:03.000Z');
    expect(snapshot.lastError).toBe('Sonarr: HTTP 500');
    expect(snapshot.lastUnmonitored).toEqual({ radarr: 3, sonarr: 2 });
    expect(snapshot.recentRuns).toHaveLength(1);
    expect(snapshot.recentRuns[0]?.error).toBe('Sonarr: HTTP 500');
  });

  it('keeps the newest runs first and evicts beyond capacity', () => {
    for (let i = 1; i <= RUN_HISTORY_CAPACITY + 5; i += 1) {
      store.recordRun(makeRun(i));
    }

    const runs = store.snapshot().recentRuns;
    expect(runs).toHaveLength(RUN_HISTORY_CAPACITY);
    expect(runs[0]?.radarrUnmonitored).toBe(RUN_HISTORY_CAPACITY + 5);
    expect(runs[RUN_HISTORY_CAPACITY - 1]?.radarrUnmonitored).toBe(6);
  });

  it('clears history but keeps last-run fields and health', () => {
    store.recordRun(makeRun(1, { error: 'Radarr: down' }));
    store.setServiceHealth('radarr', false, 'down', new Date('2026-01-01T00:00:00Z'));

    store.clearHistory();

    const snapshot = store.snapshot();
    expect(snapshot.recentRuns).toEqual([]);
    expect(snapshot.lastError).toBe('Radarr: down');
    expect(snapshot.lastRun).toBe('2026-01-01T00:00:01.000Z');
    expect(snapshot.serviceStatus.radarr).toEqual({
      ok: false,
      message: 'down',
      checkedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('hands out copies that do not alias internal state', () => {
    store.recordRun(makeRun(1));
    const snapshot = store.snapshot();
    snapshot.recentRuns.pop();
    snapshot.serviceStatus.sonarr.ok = true;

    const again = store.snapshot();
    expect(again.recentRuns).toHaveLength(1);
    expect(again.serviceStatus.sonarr.ok).toBeNull();
  });
});
