import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { addServerLog } from './server-logs.store';

const LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** LOG_LEVEL=warn enables fatal, error and warn; unknown values mean everything. */
export function logLevelsFromEnv(raw: string | undefined): LogLevel[] {
  const wanted = (raw ?? '').trim().toLowerCase();
  const index = LEVEL_ORDER.findIndex((level) => level === wanted);
  return index === -1 ? [...LEVEL_ORDER] : LEVEL_ORDER.slice(0, index + 1);
}

/**
 * Console logger that mirrors every line it prints into the in-memory buffer
 * served by `GET /api/logs`.
 */
export class BufferedLogger extends ConsoleLogger {
  constructor() {
    super();
    this.setLogLevels(logLevelsFromEnv(process.env.LOG_LEVEL));
  }

  override log(message: unknown, context?: string) {
    if (!this.isLevelEnabled('log')) return;
    super.log(message, context);
    addServerLog({ level: 'info', message, context });
  }

  override warn(message: unknown, context?: string) {
    if (!this.isLevelEnabled('warn')) return;
    super.warn(message, context);
    addServerLog({ level: 'warn', message, context });
  }

  override error(message: unknown, stack?: string, context?: string) {
    if (!this.isLevelEnabled('error')) return;
    super.error(message, stack, context);
    addServerLog({ level: 'error', message, stack, context });
  }

  override fatal(message: unknown, context?: string) {
    if (!this.isLevelEnabled('fatal')) return;
    super.fatal(message, context);
    addServerLog({ level: 'error', message, context });
  }

  override debug(message: unknown, context?: string) {
    if (!this.isLevelEnabled('debug')) return;
    super.debug(message, context);
    addServerLog({ level: 'debug', message, context });
  }

  override verbose(message: unknown, context?: string) {
    if (!this.isLevelEnabled('verbose')) return;
    super.verbose(message, context);
    addServerLog({ level: 'debug', message, context });
  }
}
