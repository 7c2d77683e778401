import { Controller, Delete, Get, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  CHANGE_LOG_DEFAULT_LIMIT,
  ChangeLogService,
} from './change-log.service';

@Controller('change-log')
@ApiTags('change-log')
export class ChangeLogController {
  constructor(private readonly changeLog: ChangeLogService) {}

  @Get()
  async list(@Query('limit') limitRaw?: string) {
    const limit = Math.max(
      1,
      Math.min(
        5000,
        Number.parseInt(limitRaw ?? `${CHANGE_LOG_DEFAULT_LIMIT}`, 10) ||
          CHANGE_LOG_DEFAULT_LIMIT,
      ),
    );
    const entries = await this.changeLog.recent(limit);
    return { entries };
  }

  @Delete()
  async clear() {
    await this.changeLog.clear();
    return { ok: true };
  }
}
