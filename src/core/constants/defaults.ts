/**
 * Default Configuration Constants
 *
 * Values used when the configuration file leaves a field out.
 * Durations are in the unit named by the constant.
 */

// =============================================================================
// Config File Defaults
// =============================================================================

/**
 * Config file used when HUB_CONFIG_PATH is not set
 */
export const CONFIG_DEFAULT_PATH = "./config/hub.json";

// =============================================================================
// Display Defaults
// =============================================================================

/**
 * Resolution of the common 7.5" e-paper panel
 */
export const DISPLAY_DEFAULT_WIDTH = 800;
export const DISPLAY_DEFAULT_HEIGHT = 480;

/**
 * Simulated push duration of the mock transport
 * Real panels take several seconds for a full refresh
 */
export const DISPLAY_DEFAULT_MOCK_LATENCY_MS = 2000;

/**
 * Where the png transport writes frames
 */
export const DISPLAY_DEFAULT_OUTPUT_PATH = "./data/display.png";

/**
 * Bitmaps the mock display keeps, newest last
 */
export const MOCK_DISPLAY_HISTORY_LIMIT = 5;

// =============================================================================
// Schedule Defaults
// =============================================================================

export const SCHEDULE_DEFAULT_ROTATION_INTERVAL_SECONDS = 300;

// =============================================================================
// Provider Defaults
// =============================================================================

/**
 * Refresh cadence of a provider job
 */
export const PROVIDER_DEFAULT_REFRESH_INTERVAL_SECONDS = 300;

/**
 * Age after which cached data counts as stale
 */
export const PROVIDER_DEFAULT_MAX_AGE_SECONDS = 900;

/**
 * A fetch still pending after this long is abandoned
 */
export const PROVIDER_DEFAULT_FETCH_TIMEOUT_SECONDS = 30;

// =============================================================================
// Scheduler Keys
// =============================================================================

/**
 * Prefix of every provider refresh job key
 */
export const PROVIDER_JOB_PREFIX = "provider:";

export const ROTATION_JOB_KEY = "rotation";

/**
 * Longest delay setTimeout honours; larger values fire after 1ms
 */
export const SCHEDULER_MAX_TIMER_DELAY_MS = 2147483647;

// =============================================================================
// Shutdown
// =============================================================================

/**
 * The process exits after this long even if shutdown has not finished
 */
export const SHUTDOWN_FORCE_EXIT_MS = 5000;
