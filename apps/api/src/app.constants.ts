export const API_GLOBAL_PREFIX = 'api';
export const API_PREFIX_PATH = `/${API_GLOBAL_PREFIX}`;
export const API_DOCS_PATH = `${API_GLOBAL_PREFIX}/docs`;

export const API_DEFAULT_HOST = '0.0.0.0';
export const API_DEFAULT_PORT = 5200;
export const API_DEV_PORT_EXAMPLE = 5201;
export const HTTP_SLOW_REQUEST_THRESHOLD_MS = 1_500;
