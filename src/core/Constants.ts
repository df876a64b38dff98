/**
 * @fileoverview Application-wide constants
 * @module core/Constants
 *
 * Centralized constants to eliminate magic strings and improve maintainability.
 * All constants are exported for use across the application.
 */

import type { ClipboardContentType } from '../types';

/**
 * Application name, used for the per-user data directory
 */
export const APP_NAME = 'cliptrail';

/**
 * Clipboard poll period in milliseconds
 */
export const POLL_INTERVAL_MS = 1000;

/**
 * File name of the persisted history document
 */
export const HISTORY_FILE_NAME = 'history.json';

/**
 * Suffix of the temporary file written before it replaces the history document
 */
export const TEMP_FILE_SUFFIX = '.tmp';

/**
 * Lines shown by text previews
 */
export const PREVIEW_LINE_COUNT = 5;

/**
 * Content types this build knows how to read and write.
 * Persisted entries of any other type are skipped on load.
 */
export const CONTENT_TYPES: readonly ClipboardContentType[] = Object.freeze(['text', 'image'] as const);

/**
 * Environment variables read by loadConfig()
 */
export const ENV_KEYS = Object.freeze({
  POLL_INTERVAL_MS: 'CLIPTRAIL_POLL_INTERVAL_MS',
  HISTORY_FILE: 'CLIPTRAIL_HISTORY_FILE',
  APP_NAME: 'CLIPTRAIL_APP_NAME',
} as const);

/**
 * Check if a persisted content type is one this build understands
 * @param type - Content type tag read from storage
 * @returns True if known
 */
export function isKnownContentType(type: string): type is ClipboardContentType {
  return CONTENT_TYPES.some(known => known === type);
}
