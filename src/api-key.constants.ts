export const API_KEY_OPTIONS = 'API_KEY_OPTIONS';
export const API_KEY_ADAPTER = 'API_KEY_ADAPTER';
export const ITEM_ADAPTER = 'ITEM_ADAPTER';
export const DEFAULT_HEADER_NAME = 'x-api-key';
export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const PROCESS_TIME_HEADER = 'x-process-time';
export const API_PREFIX = 'api/v1';
export const APP_CONFIG = 'APP_CONFIG';
