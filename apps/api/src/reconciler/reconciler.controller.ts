import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ReconcilerScheduler } from './reconciler.scheduler';
import { ReconcilerService } from './reconciler.service';

@Controller()
@ApiTags('reconciler')
export class ReconcilerController {
  constructor(
    private readonly reconciler: ReconcilerService,
    private readonly scheduler: ReconcilerScheduler,
  ) {}

  @Get('status')
  async status() {
    const payload = await this.reconciler.statusPayload();
    return { ...payload, scheduler: { state: this.scheduler.state } };
  }

  @Post('run-now')
  @HttpCode(200)
  async runNow() {
    const run = await this.reconciler.runOnce('manual');
    return { ok: true, run };
  }

  @Post('clear-history')
  @HttpCode(200)
  clearHistory() {
    this.reconciler.clearHistory();
    return { ok: true };
  }

  @Get('scheduler')
  schedulerState() {
    return { state: this.scheduler.state };
  }

  @Post('scheduler/start')
  @HttpCode(200)
  startScheduler() {
    const started = this.scheduler.start();
    return { ok: true, started, state: this.scheduler.state };
  }

  @Post('scheduler/stop')
  @HttpCode(200)
  async stopScheduler() {
    await this.scheduler.stop();
    return { ok: true, state: this.scheduler.state };
  }
}
