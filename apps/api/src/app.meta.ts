export const APP_NAME = 'unmonitorr';
export const DEFAULT_APP_VERSION = '0.1.0';

export type AppMeta = {
  name: string;
  version: string;
  buildSha: string | null;
  buildTime: string | null;
};

export function readAppMeta(): AppMeta {
  const version = (process.env.APP_VERSION ?? '').trim() || DEFAULT_APP_VERSION;
  const buildSha = (process.env.APP_BUILD_SHA ?? '').trim() || null;
  const buildTime = (process.env.APP_BUILD_TIME ?? '').trim() || null;

  return {
    name: APP_NAME,
    version,
    buildSha,
    buildTime,
  };
}
