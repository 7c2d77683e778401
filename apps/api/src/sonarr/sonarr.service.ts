import { Injectable, Logger } from '@nestjs/common';
import {
  arrRequest,
  parseQualityProfiles,
  parseRecordList,
} from '../arr/arr-http';
import { readInt } from '../arr/arr-records';
import type {
  ArrConnection,
  ArrQualityProfile,
  ArrRecord,
} from '../arr/arr.types';

export type SonarrSeries = ArrRecord;
export type SonarrEpisode = ArrRecord;
export type SonarrEpisodeFile = ArrRecord;

const EPISODE_LIST_TIMEOUT_MS = 30_000;

@Injectable()
export class SonarrService {
  private readonly logger = new Logger(SonarrService.name);

  async listQualityProfiles(
    connection: ArrConnection,
  ): Promise<ArrQualityProfile[]> {
    const data = await arrRequest({
      service: 'Sonarr',
      action: 'Sonarr list quality profiles',
      connection,
      path: 'qualityprofile',
    });
    return parseQualityProfiles(data);
  }

  async listSeries(connection: ArrConnection): Promise<SonarrSeries[]> {
    const data = await arrRequest({
      service: 'Sonarr',
      action: 'Sonarr list series',
      connection,
      path: 'series',
    });
    return parseRecordList(data);
  }

  async getEpisodesBySeries(params: {
    connection: ArrConnection;
    seriesId: number;
  }): Promise<SonarrEpisode[]> {
    const { connection, seriesId } = params;
    const data = await arrRequest({
      service: 'Sonarr',
      action: 'Sonarr list episodes',
      connection,
      path: 'episode',
      query: { seriesId },
      timeoutMs: EPISODE_LIST_TIMEOUT_MS,
    });
    return parseRecordList(data);
  }

  async getEpisodeFilesBySeries(params: {
    connection: ArrConnection;
    seriesId: number;
  }): Promise<SonarrEpisodeFile[]> {
    const { connection, seriesId } = params;
    const data = await arrRequest({
      service: 'Sonarr',
      action: 'Sonarr list episode files',
      connection,
      path: 'episodefile',
      query: { seriesId },
      timeoutMs: EPISODE_LIST_TIMEOUT_MS,
    });
    return parseRecordList(data);
  }

  async setEpisodeMonitored(params: {
    connection: ArrConnection;
    episode: SonarrEpisode;
    monitored: boolean;
  }): Promise<boolean> {
    const { connection, episode, monitored } = params;
    const episodeId = readInt(episode, 'id');
    if (episodeId === null) {
      this.logger.warn('Skipping Sonarr update for an episode without an id');
      return false;
    }

    await arrRequest({
      service: 'Sonarr',
      action: 'Sonarr update episode',
      connection,
      path: `episode/${episodeId}`,
      method: 'PUT',
      body: { ...episode, monitored },
    });
    return true;
  }
}
