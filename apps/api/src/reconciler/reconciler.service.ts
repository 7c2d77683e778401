import { Injectable, Logger } from '@nestjs/common';
import {
  episodeFileQualityName,
  episodeLabel,
  movieQualityName,
  movieTitle,
  readBool,
  readInt,
} from '../arr/arr-records';
import {
  ARR_SERVICE_LABELS,
  ArrConnectivityError,
  type ArrConnection,
  type ArrServiceKey,
} from '../arr/arr.types';
import {
  CHANGE_LOG_DEFAULT_LIMIT,
  ChangeLogService,
  type ChangeLogInput,
} from '../change-log/change-log.service';
import { RadarrService, type RadarrMovie } from '../radarr/radarr.service';
import {
  connectionFor,
  SettingsService,
  type AppSettings,
} from '../settings/settings.service';
import {
  SonarrService,
  type SonarrEpisodeFile,
} from '../sonarr/sonarr.service';
import { qualityTextMatches } from './quality-match';
import type {
  PassTrigger,
  RunRecord,
  RunStatus,
  ServiceHealth,
  ServicePassResult,
  StatusPayload,
  UnmonitoredCounts,
} from './reconciler.types';
import { RunStatsStore } from './run-stats.store';
import { errToMessage } from '../lib/errors';

@Injectable()
export class ReconcilerService {
  private readonly logger = new Logger(ReconcilerService.name);
  // Scheduled and manual passes queue here; at most one runs at a time.
  private passChain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly settingsService: SettingsService,
    private readonly radarr: RadarrService,
    private readonly sonarr: SonarrService,
    private readonly changeLog: ChangeLogService,
    private readonly stats: RunStatsStore,
  ) {}

  /**
   * Runs one full pass over both services once any pass already in flight
   * has finished. Always resolves with the pass's RunRecord.
   */
  runOnce(trigger: PassTrigger = 'manual'): Promise<RunRecord> {
    const pass = this.passChain
      .catch(() => undefined)
      .then(() => this.executePass(trigger));
    this.passChain = pass;
    return pass;
  }

  clearHistory() {
    this.stats.clearHistory();
    this.logger.log('Run history cleared');
  }

  async statusPayload(): Promise<StatusPayload> {
    const settings = await this.settingsService.loadEffective();
    const recentChanges = await this.changeLog
      .recent(CHANGE_LOG_DEFAULT_LIMIT)
      .catch((err) => {
        this.logger.warn(`Change log unreadable: ${errToMessage(err)}`);
        return [];
      });
    return {
      ...this.stats.snapshot(),
      recentChanges,
      settings: this.settingsService.toPublic(settings),
    };
  }

  /**
   * Lists the service's quality profiles as a reachability and credential
   * check, and records the outcome as that service's health.
   */
  async probeService(
    service: ArrServiceKey,
    connection: ArrConnection,
  ): Promise<ServiceHealth> {
    const label = ARR_SERVICE_LABELS[service];
    const adapter = service === 'radarr' ? this.radarr : this.sonarr;
    const previous = this.stats.getServiceHealth(service).ok;

    try {
      const profiles = await adapter.listQualityProfiles(connection);
      const health = this.stats.setServiceHealth(
        service,
        true,
        `Connected (${profiles.length} profiles)`,
      );
      if (previous !== true) {
        this.logger.log(
          `${label} connectivity: ONLINE profiles=${profiles.length}`,
        );
      }
      return health;
    } catch (err) {
      if (!(err instanceof ArrConnectivityError)) throw err;
      const health = this.stats.setServiceHealth(service, false, err.message);
      if (previous !== false) {
        this.logger.warn(
          `${label} connectivity: OFFLINE error=${JSON.stringify(err.message)}`,
        );
      }
      return health;
    }
  }

  private async executePass(trigger: PassTrigger): Promise<RunRecord> {
    const startedAt = new Date();
    let counts: UnmonitoredCounts = { radarr: 0, sonarr: 0 };
    let status: RunStatus = 'completed';
    let error = '';

    this.logger.debug(`Pass started trigger=${trigger}`);

    try {
      const settings = await this.settingsService.loadEffective();
      const radarrConnection = connectionFor(settings, 'radarr');
      const sonarrConnection = connectionFor(settings, 'sonarr');

      const [radarrHealth, sonarrHealth] = await Promise.all([
        this.probeService('radarr', radarrConnection),
        this.probeService('sonarr', sonarrConnection),
      ]);

      if (!settings.enabled) {
        status = 'disabled';
        this.logger.log('Pass skipped: reconciliation is disabled');
      } else {
        const errors: string[] = [];
        if (!radarrHealth.ok) errors.push(`Radarr: ${radarrHealth.message}`);
        if (!sonarrHealth.ok) errors.push(`Sonarr: ${sonarrHealth.message}`);

        const radarr = await this.processRadarr(
          settings,
          radarrConnection,
          radarrHealth.ok === true,
        );
        const sonarr = await this.processSonarr(
          settings,
          sonarrConnection,
          sonarrHealth.ok === true,
        );

        counts = { radarr: radarr.count, sonarr: sonarr.count };
        if (radarr.error) errors.push(`Radarr: ${radarr.error}`);
        if (sonarr.error) errors.push(`Sonarr: ${sonarr.error}`);
        error = errors.join(' | ');
      }
    } catch (err) {
      status = 'failed';
      counts = { radarr: 0, sonarr: 0 };
      error = errToMessage(err);
      this.logger.error(`Pass failed trigger=${trigger}: ${error}`);
    }

    const finishedAt = new Date();
    const record = this.stats.recordRun({
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationSeconds:
        Math.round(finishedAt.getTime() - startedAt.getTime()) / 1000,
      trigger,
      status,
      radarrUnmonitored: counts.radarr,
      sonarrUnmonitored: counts.sonarr,
      error,
    });

    const msg = `Pass ${status} trigger=${trigger} radarr=${counts.radarr} sonarr=${counts.sonarr} durationSeconds=${record.durationSeconds}`;
    if (error) this.logger.warn(`${msg} error=${JSON.stringify(error)}`);
    else this.logger.log(msg);

    return record;
  }

  /** Records one change; returns the service error to stop on when it fails. */
  private async appendChange(entry: ChangeLogInput): Promise<string | null> {
    try {
      await this.changeLog.append(entry);
      return null;
    } catch (err) {
      const error = `Change log write failed: ${errToMessage(err)}`;
      this.logger.warn(
        `${ARR_SERVICE_LABELS[entry.service]} ${error} itemId=${entry.itemId ?? 'unknown'}`,
      );
      return error;
    }
  }

  private isMovieEligible(movie: RadarrMovie, targetQuality: string) {
    return (
      readInt(movie, 'id') !== null &&
      readBool(movie, 'monitored') === true &&
      readBool(movie, 'hasFile') === true &&
      qualityTextMatches(movieQualityName(movie), targetQuality)
    );
  }

  private async processRadarr(
    settings: AppSettings,
    connection: ArrConnection,
    healthy: boolean,
  ): Promise<ServicePassResult> {
    if (!healthy) return { count: 0, error: '' };

    const targetQuality = settings.radarr.targetQuality.trim();
    if (!targetQuality) {
      return { count: 0, error: 'Set Radarr target quality text' };
    }

    let count = 0;
    try {
      const movies = await this.radarr.listMovies(connection);
      for (const movie of movies) {
        if (!this.isMovieEligible(movie, targetQuality)) continue;

        const updated = await this.radarr.setMovieMonitored({
          connection,
          movie,
          monitored: false,
        });
        if (!updated) continue;

        const title = movieTitle(movie);
        const logError = await this.appendChange({
          service: 'radarr',
          itemId: readInt(movie, 'id'),
          title,
          profileId: readInt(movie, 'qualityProfileId'),
          action: 'unmonitor',
        });
        count += 1;
        if (logError) return { count, error: logError };
        this.logger.debug(
          `Radarr unmonitored movie id=${readInt(movie, 'id')} title=${JSON.stringify(title)} quality=${JSON.stringify(movieQualityName(movie))}`,
        );
      }
    } catch (err) {
      if (!(err instanceof ArrConnectivityError)) throw err;
      this.logger.warn(
        `Radarr pass stopped after ${count} change(s): ${err.message}`,
      );
      return { count, error: err.message };
    }

    return { count, error: '' };
  }

  private async processSonarr(
    settings: AppSettings,
    connection: ArrConnection,
    healthy: boolean,
  ): Promise<ServicePassResult> {
    if (!healthy) return { count: 0, error: '' };

    const targetQuality = settings.sonarr.targetQuality.trim();
    if (!targetQuality) {
      return { count: 0, error: 'Set Sonarr target quality text' };
    }

    let count = 0;
    try {
      const seriesList = await this.sonarr.listSeries(connection);
      for (const series of seriesList) {
        const seriesId = readInt(series, 'id');
        if (seriesId === null) continue;
        const profileId = readInt(series, 'qualityProfileId');

        const episodes = await this.sonarr.getEpisodesBySeries({
          connection,
          seriesId,
        });
        const episodeFiles = await this.sonarr.getEpisodeFilesBySeries({
          connection,
          seriesId,
        });

        const episodeFileById = new Map<number, SonarrEpisodeFile>();
        for (const episodeFile of episodeFiles) {
          const fileId = readInt(episodeFile, 'id');
          if (fileId !== null) episodeFileById.set(fileId, episodeFile);
        }

        for (const episode of episodes) {
          if (readBool(episode, 'monitored') !== true) continue;
          const episodeFileId = readInt(episode, 'episodeFileId');
          if (episodeFileId === null) continue;
          const episodeFile = episodeFileById.get(episodeFileId);
          if (!episodeFile) continue;

          const qualityName = episodeFileQualityName(episodeFile);
          if (!qualityTextMatches(qualityName, targetQuality)) continue;

          const updated = await this.sonarr.setEpisodeMonitored({
            connection,
            episode,
            monitored: false,
          });
          if (!updated) continue;

          const label = episodeLabel(episode, seriesId);
          const logError = await this.appendChange({
            service: 'sonarr',
            seriesId,
            itemId: readInt(episode, 'id'),
            title: label,
            profileId,
            action: 'unmonitor_episode',
          });
          count += 1;
          if (logError) return { count, error: logError };
          this.logger.debug(
            `Sonarr unmonitored episode seriesId=${seriesId} ${JSON.stringify(label)} quality=${JSON.stringify(qualityName)}`,
          );
        }
      }
    } catch (err) {
      if (!(err instanceof ArrConnectivityError)) throw err;
      this.logger.warn(
        `Sonarr pass stopped after ${count} change(s): ${err.message}`,
      );
      return { count, error: err.message };
    }

    return { count, error: '' };
  }
}
