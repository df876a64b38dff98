/**
 * @fileoverview Service Interfaces - External I/O Boundaries
 * @module services/interfaces
 *
 * Interfaces for services that cross external boundaries (clipboard, file system).
 *
 * These interfaces enable:
 * - Easy mocking in unit tests
 * - Clear API contracts
 * - Dependency inversion
 *
 * Note: Internal services (ChangeDetector, ClipboardPoller) don't need
 * interfaces - use their class types directly.
 */

export type { IClipboardBackend } from './IClipboardBackend';
export type { IPersistenceService, HistoryLoadResult } from './IPersistenceService';
export type { IHistoryManager, HistoryListener } from './IHistoryManager';
