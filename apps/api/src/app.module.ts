import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ChangeLogModule } from './change-log/change-log.module';
import { IntegrationsModule } from './integrations/integrations.module';
import { LogsModule } from './logs/logs.module';
import { RadarrModule } from './radarr/radarr.module';
import { ReconcilerModule } from './reconciler/reconciler.module';
import { SettingsModule } from './settings/settings.module';
import { SonarrModule } from './sonarr/sonarr.module';

@Module({
  imports: [
    SettingsModule,
    ChangeLogModule,
    RadarrModule,
    SonarrModule,
    ReconcilerModule,
    IntegrationsModule,
    LogsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
