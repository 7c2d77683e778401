import { Module } from '@nestjs/common';
import { RadarrModule } from '../radarr/radarr.module';
import { ReconcilerModule } from '../reconciler/reconciler.module';
import { SettingsModule } from '../settings/settings.module';
import { SonarrModule } from '../sonarr/sonarr.module';
import { IntegrationsController } from './integrations.controller';

@Module({
  imports: [SettingsModule, RadarrModule, SonarrModule, ReconcilerModule],
  controllers: [IntegrationsController],
})
export class IntegrationsModule {}
