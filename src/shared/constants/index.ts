/** Board scheduling constants. All durations are milliseconds. */
export const SIMULATION_CONFIG = {
  /** Default monotonic clock for wall-clock paced runs */
  CLOCK: (): number => performance.now(),
} as const;

/** Byte-addressable memory chip geometry */
export const MEMORY_CONFIG = {
  SIZE: 256,
  /** Bytes per row in the hex dump returned by `info()` */
  DUMP_ROW_LENGTH: 16,
} as const;

/** Saved board format */
export const PERSISTENCE_CONFIG = {
  SCHEMA_VERSION: 1,
  ENCODING: 'utf8',
  JSON_INDENT: 2,
} as const;

/** Logger defaults */
export const LOG_CONFIG = {
  /** Environment variable read once at startup to pick the level */
  LEVEL_ENV_VAR: 'LOGIC_BREADBOARD_LOG_LEVEL',
  DEFAULT_LEVEL: 'warn',
} as const;
