/**
 * @fileoverview Public API of the clipboard history core
 * @module cliptrail
 */

export type {
  ClipboardContentType,
  ClipboardPayload,
  TextPayload,
  ImagePayload,
  HistoryEntry,
  History,
  RestoreResult,
  HistoryError,
  MaybePromise,
} from './types';

export * from './core/ClipboardContent';
export { loadConfig, DEFAULT_CONFIG, type AppConfig } from './core/AppConfig';
export { APP_NAME, POLL_INTERVAL_MS, HISTORY_FILE_NAME } from './core/Constants';

export { HistoryManager, type HistoryManagerOptions } from './data/HistoryManager';
export { PersistenceService } from './data/PersistenceService';
export { encodeHistory, decodeHistory } from './data/HistoryCodec';
export { HistoryFormatError, HistoryPersistenceError } from './data/PersistenceErrors';
export { resolveAppDataDirectory, createHistoryPathResolver, type PathEnvironment } from './data/storagePath';

export { ChangeDetector } from './services/ChangeDetector';
export { ClipboardPoller, type ClipboardPollerOptions, type PollerStats } from './services/ClipboardPoller';
export { AppInitializer, type AppInitializerOptions } from './services/AppInitializer';
export { MemoryClipboardBackend } from './services/clipboard/MemoryClipboardBackend';
export type * from './services/interfaces';
