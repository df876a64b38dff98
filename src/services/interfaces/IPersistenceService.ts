/**
 * @fileoverview IPersistenceService Interface
 * @module services/interfaces/IPersistenceService
 *
 * Interface for PersistenceService - history document storage.
 */

import type { HistoryEntry } from '../../types';
import type { HistoryPersistenceError } from '../../data/PersistenceErrors';

/**
 * Outcome of loading the persisted history.
 * Loading never throws: failures are reported through the result.
 */
export type HistoryLoadResult =
    | { status: 'loaded'; entries: HistoryEntry[]; skipped: number }
    | { status: 'missing'; entries: HistoryEntry[] }
    | { status: 'failed'; entries: HistoryEntry[]; error: HistoryPersistenceError };

/**
 * PersistenceService Interface
 *
 * Reads and writes the full history as one document.
 * External I/O boundary - requires interface for testing.
 */
export interface IPersistenceService {
    /**
     * Load the persisted history
     */
    load(): Promise<HistoryLoadResult>;

    /**
     * Overwrite the persisted history with the full sequence
     * @throws HistoryPersistenceError when the write fails
     */
    save(entries: readonly HistoryEntry[]): Promise<void>;

    /**
     * Path of the history document
     */
    getFilePath(): string;
}
