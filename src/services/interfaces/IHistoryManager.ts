/**
 * @fileoverview IHistoryManager Interface
 * @module services/interfaces/IHistoryManager
 *
 * Interface for HistoryManager - the component presentation code talks to.
 */

import type { BehaviorSubject, Subject } from 'rxjs';
import type { ClipboardPayload, History, HistoryEntry, HistoryError, RestoreResult } from '../../types';
import type { HistoryLoadResult } from './IPersistenceService';

/**
 * History change callback, fired with the full ordered sequence
 */
export type HistoryListener = (entries: History) => void;

/**
 * HistoryManager Interface
 *
 * Owns the ordered clipboard history and coordinates change detection,
 * persistence and self-write suppression.
 */
export interface IHistoryManager {
    /** Current history, newest first */
    readonly entries$: BehaviorSubject<History>;

    /** Load, persist and restore failures */
    readonly errors$: Subject<HistoryError>;

    /**
     * Load persisted history and prime change detection
     */
    init(): Promise<HistoryLoadResult>;

    /**
     * Run one change-detection tick
     * @returns The recorded entry, or null if nothing was recorded
     */
    pollOnce(): Promise<HistoryEntry | null>;

    /**
     * Record a payload as the newest entry
     * @returns The recorded entry, or null when suppressed or empty
     */
    capture(payload: ClipboardPayload): Promise<HistoryEntry | null>;

    /**
     * Write an entry back to the clipboard without recapturing it
     */
    restore(entryId: string): Promise<RestoreResult>;

    /**
     * Remove every entry
     */
    clear(): Promise<void>;

    /**
     * Current history snapshot
     */
    getEntries(): History;

    /**
     * Look up an entry by id
     */
    getEntry(entryId: string): HistoryEntry | undefined;

    /**
     * Subscribe to history changes (no replay of the current value)
     * @returns Unsubscribe function
     */
    subscribe(listener: HistoryListener): () => void;

    /**
     * Check if the next detected change will be ignored
     */
    isSuppressionArmed(): boolean;
}
