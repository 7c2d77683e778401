import { Controller, Get, Res } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { AppService } from './app.service';
import { AppMetaResponseDto, HealthResponseDto } from './app.dto';

@Controller()
@ApiTags('app')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @ApiOkResponse({ type: HealthResponseDto })
  getHealth() {
    return this.appService.getHealth();
  }

  @Get('meta')
  @ApiOkResponse({ type: AppMetaResponseDto })
  getMeta() {
    return this.appService.getMeta();
  }

  @Get('ready')
  @ApiOkResponse({
    schema: {
      example: {
        status: 'ready',
        time: '2026-01-02T00:00:00.000Z',
        checks: { dataDir: { ok: true } },
      },
    },
  })
  async getReady(@Res({ passthrough: true }) res: Response) {
    const readiness = await this.appService.getReadiness();
    if (readiness.status !== 'ready') res.status(503);
    return readiness;
  }
}
