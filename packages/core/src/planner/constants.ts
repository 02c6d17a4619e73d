/**
 * Configuration constants for the organizer pipeline.
 * Defaults that the config file can override live here, next to the fixed values.
 */

// ============================================================================
// DESTINATIONS
// ============================================================================

/**
 * Bucket used when no rule matches and no usable suggestion comes back.
 */
export const FALLBACK_DESTINATION = 'Unsorted';

// ============================================================================
// IGNORE POLICY
// ============================================================================

/**
 * Prefix of platform metadata files (AppleDouble). Always ignored.
 */
export const HIDDEN_FILE_PREFIX = '._';

/**
 * Files the OS drops into folders on its own. Ignored when `useOsDefaults` is set.
 */
export const OS_DEFAULT_IGNORED_NAMES: readonly string[] = ['.DS_Store', 'Thumbs.db', 'desktop.ini'];

// ============================================================================
// TIMING & CAPACITY
// ============================================================================

/**
 * Delay before a new file is inspected, to let the writer finish (milliseconds).
 */
export const DEFAULT_SETTLE_DELAY_MS = 500;

/**
 * Minimum spacing between two suggestion requests (milliseconds).
 */
export const DEFAULT_RATE_LIMIT_MS = 3000;

/**
 * Suggestion jobs that may wait in the queue before the dispatcher blocks.
 */
export const DEFAULT_QUEUE_CAPACITY = 100;

// ============================================================================
// LLM
// ============================================================================

export const DEFAULT_SUGGESTION_MODEL = 'gpt-5-nano';
export const DEFAULT_SUGGESTION_INSTRUCTIONS =
  'You organize a downloads folder. Suggest the folder a new file belongs in.';
/**
 * Completion cap. Reasoning models spend part of it before answering,
 * so it is far above what a folder path needs.
 */
export const SUGGESTION_MAX_TOKENS = 5000;
