export const CLI_NAME = "fleetwatch";
export const HOME_DIR_NAME = ".fleetwatch";

export const DEFAULT_HOME_REGION = "us-east-1";

export const DEFAULT_REFRESH_INTERVAL_MS = 30_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export const MIN_FETCH_CONCURRENCY = 1;
export const MAX_FETCH_CONCURRENCY = 16;
export const DEFAULT_FETCH_CONCURRENCY = 4;

export const DEFAULT_OPTIMISTIC_EXPIRY_TICKS = 2;
export const DEFAULT_REBOOT_EXPIRY_TICKS = 1;
export const DEFAULT_EVICTION_MISS_THRESHOLD = 3;

export const DESCRIBE_PAGE_SIZE = 100;
export const NAME_TAG_KEY = "Name";

export const PREFERENCES_FILE_NAME = "preferences.json";
export const SNAPSHOT_FILE_NAME = "instances-cache.json";
