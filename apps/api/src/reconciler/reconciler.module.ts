import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ChangeLogModule } from '../change-log/change-log.module';
import { RadarrModule } from '../radarr/radarr.module';
import { SettingsModule } from '../settings/settings.module';
import { SonarrModule } from '../sonarr/sonarr.module';
import { ReconcilerController } from './reconciler.controller';
import { ReconcilerScheduler } from './reconciler.scheduler';
import { ReconcilerService } from './reconciler.service';
import { RunStatsStore } from './run-stats.store';

@Module({
  imports: [
    SettingsModule,
    ChangeLogModule,
    RadarrModule,
    SonarrModule,
    ScheduleModule.forRoot(),
  ],
  controllers: [ReconcilerController],
  providers: [ReconcilerService, ReconcilerScheduler, RunStatsStore],
  exports: [ReconcilerService],
})
export class ReconcilerModule {}
