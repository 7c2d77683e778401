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

export type RadarrMovie = ArrRecord;

@Injectable()
export class RadarrService {
  private readonly logger = new Logger(RadarrService.name);

  async listQualityProfiles(
    connection: ArrConnection,
  ): Promise<ArrQualityProfile[]> {
    const data = await arrRequest({
      service: 'Radarr',
      action: 'Radarr list quality profiles',
      connection,
      path: 'qualityprofile',
    });
    return parseQualityProfiles(data);
  }

  async listMovies(connection: ArrConnection): Promise<RadarrMovie[]> {
    const data = await arrRequest({
      service: 'Radarr',
      action: 'Radarr list movies',
      connection,
      path: 'movie',
    });
    return parseRecordList(data);
  }

  /**
   * Radarr replaces the whole movie on PUT, so the full record goes back with
   * only `monitored` changed. Returns false when the record has no usable id.
   */
  async setMovieMonitored(params: {
    connection: ArrConnection;
    movie: RadarrMovie;
    monitored: boolean;
  }): Promise<boolean> {
    const { connection, movie, monitored } = params;
    const movieId = readInt(movie, 'id');
    if (movieId === null) {
      this.logger.warn('Skipping Radarr update for a movie without an id');
      return false;
    }

    await arrRequest({
      service: 'Radarr',
      action: 'Radarr update movie',
      connection,
      path: `movie/${movieId}`,
      method: 'PUT',
      body: { ...movie, monitored },
    });
    return true;
  }
}
