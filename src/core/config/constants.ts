export const APP_NAME = 'feedgrab';

export const DEFAULT_MAX_RETRY = 5;
export const DEFAULT_CHUNK_SIZE = 131072; // 128 KiB
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_MAX_PAGES = 1;

// Subdirectory of the download root that holds recorder output
export const DATA_DIR_NAME = 'Data';

export const NO_IDENTIFIERS_MESSAGE = 'no identifiers extracted';

export const ENV_COOKIE = 'FEEDGRAB_COOKIE';
export const ENV_COOKIE_TIKTOK = 'FEEDGRAB_COOKIE_TIKTOK';
export const ENV_BACKEND = 'FEEDGRAB_BACKEND';
