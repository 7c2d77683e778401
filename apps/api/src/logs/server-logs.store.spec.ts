import {
  addServerLog,
  clearServerLogs,
  listServerLogs,
  SERVER_LOGS_CAPACITY,
} from './server-logs.store';

describe('server logs store', () => {
  beforeEach(() => {
    clearServerLogs();
  });

  it('keeps entries oldest-first with increasing ids', () => {
    addServerLog({ level: 'info', message: 'first', context: 'ReconcilerService' });
    addServerLog({ level: 'warn', message: 'second' });

    const { logs, latestId } = listServerLogs();
    expect(logs.map((l) => l.message)).toEqual(['first', 'second']);
    expect(logs[0]?.context).toBe('ReconcilerService');
    expect(logs[1]?.context).toBeNull();
    expect(logs[1]?.id).toBe(latestId);
    expect(logs[1]?.id).toBe((logs[0]?.id ?? 0) + 1);
  });

  it('returns only entries after the given id', () => {
    addServerLog({ level: 'info', message: 'a' });
    const { latestId } = listServerLogs();
    addServerLog({ level: 'info', message: 'b' });

    expect(listServerLogs({ afterId: latestId }).logs.map((l) => l.message)).toEqual([
      'b',
    ]);
  });

  it('drops framework boot chatter below warn', () => {
    addServerLog({ level: 'info', message: 'Mapped {/api/status, GET}', context: 'RouterExplorer' });
    addServerLog({ level: 'warn', message: 'deprecated option', context: 'NestFactory' });

    expect(listServerLogs().logs.map((l) => l.message)).toEqual([
      'deprecated option',
    ]);
  });

  it('appends the stack to the message and skips empty lines', () => {
    addServerLog({ level: 'error', message: 'failed', stack: 'Error: x\n    at y' });
    addServerLog({ level: 'info', message: '   ' });

    const { logs } = listServerLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]?.message).toBe('failed\nError: x\n    at y');
  });

  it('serializes object messages as JSON', () => {
    addServerLog({ level: 'debug', message: { radarr: 1 } });

    expect(listServerLogs().logs[0]?.message).toBe('{"radarr":1}');
  });

  it('overwrites the oldest entries once full', () => {
    for (let i = 1; i <= SERVER_LOGS_CAPACITY + 3; i += 1) {
      addServerLog({ level: 'info', message: `line ${i}` });
    }

    const { logs } = listServerLogs({ limit: SERVER_LOGS_CAPACITY });
    expect(logs).toHaveLength(SERVER_LOGS_CAPACITY);
    expect(logs[0]?.message).toBe('line 4');
    expect(logs[logs.length - 1]?.message).toBe(`line ${SERVER_LOGS_CAPACITY + 3}`);
  });
});
