// =============================================================================
// CORE TYPES - cliptrail
// =============================================================================

/**
 * Content kinds the history can hold
 * - text: UTF-16 string content
 * - image: raw bitmap/container bytes (e.g. TIFF), opaque to the core
 */
export type ClipboardContentType = 'text' | 'image';

/**
 * Text payload captured from the clipboard
 */
export interface TextPayload {
  readonly type: 'text';
  /** Never empty */
  readonly value: string;
}

/**
 * Image payload captured from the clipboard
 */
export interface ImagePayload {
  readonly type: 'image';
  /** Never zero-length */
  readonly bytes: Uint8Array;
}

/**
 * Captured clipboard content
 */
export type ClipboardPayload = TextPayload | ImagePayload;

/**
 * A single captured clipboard item
 */
export interface HistoryEntry {
  /** Unique, immutable, never reused - stable key for UI binding */
  readonly id: string;
  /** Capture time */
  readonly timestamp: Date;
  readonly content: ClipboardPayload;
}

/**
 * Ordered history, newest first
 */
export type History = readonly HistoryEntry[];

// =============================================================================
// OPERATION RESULTS
// =============================================================================

/**
 * Outcome of restoring a history entry to the clipboard
 */
export type RestoreResult =
  | { status: 'restored'; entry: HistoryEntry }
  | { status: 'not-found'; id: string }
  | { status: 'failed'; id: string; error: Error };

/**
 * Error published by the history manager
 * - load: persisted history could not be read or parsed
 * - persist: persisted history could not be written
 * - restore: the clipboard backend rejected a write
 */
export interface HistoryError {
  kind: 'load' | 'persist' | 'restore';
  message: string;
  error: Error;
}

// =============================================================================
// UTILITY TYPES
// =============================================================================

/**
 * Value that may be returned synchronously or through a promise
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Callback function type
 */
export type Callback<T = void> = (value: T) => void;
