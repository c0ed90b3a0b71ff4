/**
 * Centralized constants for timeouts, limits and defaults.
 */

/** Timeout values in milliseconds */
export const TIMEOUTS = {
  /** Default base delay for retry backoff */
  DEFAULT_RETRY_BASE_DELAY_MS: 1000,
  /** Grace period between SIGTERM and SIGKILL for a timed out process */
  PROCESS_KILL_GRACE_MS: 2000,
} as const;

/** Limit values for various operations */
export const LIMITS = {
  /** Maximum bytes to capture from process stdout/stderr */
  MAX_PROCESS_OUTPUT_BYTES: 2 * 1024 * 1024,
  /** Maximum bytes read_file will return */
  MAX_FILE_READ_BYTES: 5 * 1024 * 1024,
  /** Maximum nesting of sub-workflows */
  MAX_WORKFLOW_DEPTH: 10,
  /** Maximum step records kept by a debug session */
  MAX_DEBUG_HISTORY: 1000,
  /** Largest delay setTimeout honors */
  MAX_TIMER_MS: 2_147_483_647,
  /** Largest step or workflow timeout, in seconds */
  MAX_TIMEOUT_SECONDS: 2_147_483,
  /** Maximum string length for CLI input values */
  MAX_INPUT_STRING_LENGTH: 100_000,
} as const;

/** Suffix appended when captured output hits the byte cap */
export const TRUNCATION_SUFFIX = '\n... [truncated output]';

/** Input keys rejected on the command line */
export const BLOCKED_INPUT_KEYS = new Set(['__proto__', 'prototype', 'constructor']);
