import { Body, Controller, Get, Put } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SettingsService } from './settings.service';
import { parseSettingsPatch } from './settings.validation';

type UpdateSettingsBody = {
  settings?: unknown;
};

@Controller('settings')
@ApiTags('settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  async get() {
    const settings = await this.settingsService.loadEffective();
    return {
      settings: this.settingsService.toPublic(settings),
      meta: {
        dataDir: process.env.APP_DATA_DIR ?? null,
      },
    };
  }

  @Put()
  async put(@Body() body: UpdateSettingsBody) {
    const patch = parseSettingsPatch(body?.settings);
    const stored = await this.settingsService.update(patch);
    return {
      ok: true,
      settings: this.settingsService.toPublic(
        this.settingsService.effective(stored),
      ),
    };
  }
}
