/**
 * @fileoverview History manager - owns the clipboard history
 * @module data/HistoryManager
 *
 * Coordinates the change detector, the persistence service and self-write
 * suppression:
 * - A detected external change is classified and prepended (newest first)
 * - Every mutation re-persists the full sequence, then notifies observers
 * - restore() arms a single-shot "ignore next change" flag before writing
 *   to the clipboard, so the write is not recaptured
 *
 * All operations run through one OperationQueue; mutation, persistence and
 * notification never interleave with a poll tick.
 */

import { randomUUID } from 'node:crypto';
import { BehaviorSubject, Subject, skip } from 'rxjs';
import type {
  ClipboardPayload,
  History,
  HistoryEntry,
  HistoryError,
  RestoreResult,
} from '../types';
import type { IClipboardBackend } from '../services/interfaces/IClipboardBackend';
import type { HistoryLoadResult, IPersistenceService } from '../services/interfaces/IPersistenceService';
import type { HistoryListener, IHistoryManager } from '../services/interfaces/IHistoryManager';
import { ChangeDetector } from '../services/ChangeDetector';
import { OperationQueue } from '../core/OperationQueue';
import { describePayload, isRepresentable } from '../core/ClipboardContent';

/**
 * History manager options
 */
export interface HistoryManagerOptions {
  backend: IClipboardBackend;
  persistence: IPersistenceService;
  /** Defaults to a detector over `backend` */
  detector?: ChangeDetector;
  /** Entry id generator (defaults to RFC 4122 UUIDs) */
  generateId?: () => string;
  /** Capture clock */
  now?: () => Date;
}

/**
 * Copy of a payload that shares no buffer with the caller
 */
function ownPayload(payload: ClipboardPayload): ClipboardPayload {
  return payload.type === 'text'
    ? { type: 'text', value: payload.value }
    : { type: 'image', bytes: new Uint8Array(payload.bytes) };
}

export class HistoryManager implements IHistoryManager {
  /** Current history, newest first */
  public readonly entries$ = new BehaviorSubject<History>([]);

  /** Load, persist and restore failures */
  public readonly errors$ = new Subject<HistoryError>();

  private readonly backend: IClipboardBackend;
  private readonly persistence: IPersistenceService;
  private readonly detector: ChangeDetector;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly queue = new OperationQueue();

  // Single flag, not a counter: see restore()
  private ignoreNextChange = false;

  constructor(options: HistoryManagerOptions) {
    this.backend = options.backend;
    this.persistence = options.persistence;
    this.detector = options.detector ?? new ChangeDetector(options.backend);
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted history and take the current clipboard state as baseline
   */
  init(): Promise<HistoryLoadResult> {
    return this.queue.enqueue(async () => {
      const result = await this.persistence.load();

      if (result.status === 'failed') {
        this._reportError('load', result.error);
      }

      await this.detector.prime();
      this.entries$.next(Object.freeze([...result.entries]));
      return result;
    });
  }

  /**
   * One change-detection tick
   */
  pollOnce(): Promise<HistoryEntry | null> {
    return this.queue.enqueue(async () => {
      if (!(await this.detector.hasChanged())) return null;
      if (this._consumeSuppression()) return null;

      const payload = await this.detector.readPayload();
      if (!payload) return null;

      return this._record(payload);
    });
  }

  /**
   * Record a payload directly. No-op while suppression is armed; the flag is
   * left for the tick that observes the restore's own clipboard write.
   */
  capture(payload: ClipboardPayload): Promise<HistoryEntry | null> {
    return this.queue.enqueue(async () => {
      if (this.ignoreNextChange) return null;
      if (!isRepresentable(payload)) return null;
      return this._record(payload);
    });
  }

  /**
   * Write an entry back to the clipboard.
   *
   * The suppression flag is armed before the backend is touched. If another
   * process writes the clipboard before the next tick, that write is
   * swallowed too; if two restores happen before a tick, only one change is
   * ignored.
   */
  restore(entryId: string): Promise<RestoreResult> {
    return this.queue.enqueue(async (): Promise<RestoreResult> => {
      const entry = this._find(entryId);
      if (!entry) {
        console.warn(`[HistoryManager] Restore requested for unknown entry ${entryId}`);
        return { status: 'not-found', id: entryId };
      }

      this.ignoreNextChange = true;

      try {
        await this.backend.clear();
        if (entry.content.type === 'text') {
          await this.backend.writeText(entry.content.value);
        } else {
          await this.backend.writeImageBytes(entry.content.bytes);
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this._reportError('restore', err);
        return { status: 'failed', id: entryId, error: err };
      }

      return { status: 'restored', entry };
    });
  }

  clear(): Promise<void> {
    return this.queue.enqueue(async () => {
      await this._commit(Object.freeze([]));
      console.log('[HistoryManager] History cleared');
    });
  }

  getEntries(): History {
    return this.entries$.getValue();
  }

  getEntry(entryId: string): HistoryEntry | undefined {
    return this._find(entryId);
  }

  subscribe(listener: HistoryListener): () => void {
    const subscription = this.entries$.pipe(skip(1)).subscribe(listener);
    return () => subscription.unsubscribe();
  }

  isSuppressionArmed(): boolean {
    return this.ignoreNextChange;
  }

  /**
   * Complete the observable streams
   */
  dispose(): void {
    this.entries$.complete();
    this.errors$.complete();
  }

  // =========================================================================
  // Internals (run inside the queue)
  // =========================================================================

  private _consumeSuppression(): boolean {
    if (!this.ignoreNextChange) return false;
    this.ignoreNextChange = false;
    return true;
  }

  private _find(entryId: string): HistoryEntry | undefined {
    return this.entries$.getValue().find(entry => entry.id === entryId);
  }

  private async _record(payload: ClipboardPayload): Promise<HistoryEntry> {
    const entry: HistoryEntry = Object.freeze({
      id: this.generateId(),
      timestamp: this.now(),
      content: Object.freeze(ownPayload(payload)),
    });

    await this._commit(Object.freeze([entry, ...this.entries$.getValue()]));
    console.log(`[HistoryManager] Captured ${describePayload(payload)}`);
    return entry;
  }

  /**
   * Persist the new sequence, then publish it. A failed write is reported
   * but the in-memory history still advances.
   */
  private async _commit(next: History): Promise<void> {
    try {
      await this.persistence.save(next);
    } catch (error) {
      this._reportError('persist', error instanceof Error ? error : new Error(String(error)));
    }
    this.entries$.next(next);
  }

  private _reportError(kind: HistoryError['kind'], error: Error): void {
    console.error(`[HistoryManager] ${kind} failed:`, error.message);
    this.errors$.next({ kind, message: error.message, error });
  }
}
