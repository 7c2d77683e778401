import { logLevelsFromEnv } from './buffered-logger';

describe('logLevelsFromEnv', () => {
  it('enables the named level and everything more severe', () => {
    expect(logLevelsFromEnv('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(logLevelsFromEnv(' LOG ')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('enables every level when unset or unknown', () => {
    const all = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];
    expect(logLevelsFromEnv(undefined)).toEqual(all);
    expect(logLevelsFromEnv('chatty')).toEqual(all);
  });
});
