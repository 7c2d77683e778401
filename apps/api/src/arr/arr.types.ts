import { BadGatewayException } from '@nestjs/common';

export type ArrServiceKey = 'radarr' | 'sonarr';

export const ARR_SERVICE_LABELS: Record<ArrServiceKey, string> = {
  radarr: 'Radarr',
  sonarr: 'Sonarr',
};

export type ArrConnection = {
  baseUrl: string;
  apiKey: string;
};

export type ArrQualityProfile = {
  id: number;
  name: string;
};

/**
 * Raw catalog record as returned by the *arr v3 API. Only a handful of fields
 * are ever read; everything else is echoed back untouched on update.
 */
export type ArrRecord = Record<string, unknown>;

/**
 * Every catalog failure (missing credentials, transport, timeout, non-2xx)
 * surfaces as this one error kind. Controllers let it through as HTTP 502.
 */
export class ArrConnectivityError extends BadGatewayException {
  constructor(message: string) {
    super(message);
    this.name = 'ArrConnectivityError';
  }
}
