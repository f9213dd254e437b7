/**
 * Shared constants
 */

// ============================================================================
// Image Downloads
// ============================================================================

/** Parallel downloads when not configured */
export const DEFAULT_DOWNLOAD_CONCURRENCY = 4;

/** Upper bound accepted by the configuration */
export const MAX_DOWNLOAD_CONCURRENCY = 32;

/** Attempts per image, the first included */
export const DEFAULT_MAX_RETRIES = 3;

/** Delay before the first retry; doubles on each further attempt */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/** Per-request timeout (60 seconds) */
export const DEFAULT_TIMEOUT_MS = 60000;

// ============================================================================
// Vault Layout
// ============================================================================

/** Config file looked up in the working and home directories */
export const CONFIG_FILENAME = '.wiki2vaultrc';

/** Extension of every note written */
export const NOTE_EXTENSION = '.md';

/** Index notes are named `<prefix><tag>.md` */
export const INDEX_FILE_PREFIX = '_';
