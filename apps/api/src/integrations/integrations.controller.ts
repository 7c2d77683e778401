import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  ARR_SERVICE_LABELS,
  ArrConnectivityError,
  type ArrServiceKey,
} from '../arr/arr.types';
import { RadarrService } from '../radarr/radarr.service';
import { ReconcilerService } from '../reconciler/reconciler.service';
import { connectionFor, SettingsService } from '../settings/settings.service';
import { parseSettingsPatch } from '../settings/settings.validation';
import { SonarrService } from '../sonarr/sonarr.service';

type TestConnectionBody = {
  baseUrl?: unknown;
  apiKey?: unknown;
  profileName?: unknown;
  profileId?: unknown;
  targetQuality?: unknown;
  stopMode?: unknown;
};

@Controller()
@ApiTags('integrations')
export class IntegrationsController {
  constructor(
    private readonly settingsService: SettingsService,
    private readonly reconciler: ReconcilerService,
    private readonly radarr: RadarrService,
    private readonly sonarr: SonarrService,
  ) {}

  @Post('radarr/test')
  @HttpCode(200)
  testRadarr(@Body() body: TestConnectionBody) {
    return this.saveAndTest('radarr', body);
  }

  @Post('sonarr/test')
  @HttpCode(200)
  testSonarr(@Body() body: TestConnectionBody) {
    return this.saveAndTest('sonarr', body);
  }

  @Get('radarr/profiles')
  async radarrProfiles() {
    const settings = await this.settingsService.loadEffective();
    const profiles = await this.radarr.listQualityProfiles(
      connectionFor(settings, 'radarr'),
    );
    return { profiles };
  }

  @Get('sonarr/profiles')
  async sonarrProfiles() {
    const settings = await this.settingsService.loadEffective();
    const profiles = await this.sonarr.listQualityProfiles(
      connectionFor(settings, 'sonarr'),
    );
    return { profiles };
  }

  /**
   * Saves the submitted service fields first, then probes with the effective
   * connection; the probe result becomes the service's health either way.
   */
  private async saveAndTest(service: ArrServiceKey, body: TestConnectionBody) {
    const label = ARR_SERVICE_LABELS[service];
    const patch = parseSettingsPatch({ [service]: body ?? {} });
    const stored = await this.settingsService.update(patch);
    const effective = this.settingsService.effective(stored);

    const health = await this.reconciler.probeService(
      service,
      connectionFor(effective, service),
    );
    if (!health.ok) {
      throw new ArrConnectivityError(
        `${label} saved but test failed: ${health.message}`,
      );
    }
    return {
      ok: true,
      message: `${label} saved and ${health.message.toLowerCase()}`,
      health,
    };
  }
}
