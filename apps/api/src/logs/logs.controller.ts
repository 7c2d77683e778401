import { Controller, Delete, Get, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { clearServerLogs, listServerLogs } from './server-logs.store';

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  @Get()
  getLogs(
    @Query('afterId') afterIdRaw?: string,
    @Query('limit') limitRaw?: string,
  ) {
    const data = listServerLogs({
      afterId: parseOptionalInt(afterIdRaw),
      limit: parseOptionalInt(limitRaw),
    });
    return { ok: true, ...data };
  }

  @Delete()
  clearLogs() {
    clearServerLogs();
    return { ok: true };
  }
}
