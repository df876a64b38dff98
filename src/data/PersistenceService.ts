/**
 * @fileoverview Persistence Service - History document on local storage
 * @module data/PersistenceService
 *
 * - Whole-document writes: every save re-serializes the full history
 * - Writes go to a temporary sibling file that is renamed over the target
 * - Loads never throw; a missing or unreadable file yields an empty history
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { HistoryEntry } from '../types';
import type { HistoryLoadResult, IPersistenceService } from '../services/interfaces/IPersistenceService';
import { TEMP_FILE_SUFFIX } from '../core/Constants';
import { decodeHistory, encodeHistory } from './HistoryCodec';
import { HistoryPersistenceError, isErrnoException } from './PersistenceErrors';

export class PersistenceService implements IPersistenceService {
  private readonly resolvePath: () => string;
  private filePath: string | null = null;

  /**
   * @param resolvePath - Yields a writable path for the history document
   */
  constructor(resolvePath: () => string) {
    this.resolvePath = resolvePath;
  }

  getFilePath(): string {
    if (this.filePath === null) {
      this.filePath = this.resolvePath();
    }
    return this.filePath;
  }

  async load(): Promise<HistoryLoadResult> {
    const filePath = this.getFilePath();

    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        console.log(`[PersistenceService] No history at ${filePath} - starting empty`);
        return { status: 'missing', entries: [] };
      }
      return { status: 'failed', entries: [], error: new HistoryPersistenceError('read', filePath, error) };
    }

    try {
      const { entries, skipped } = decodeHistory(text);
      if (skipped > 0) {
        console.warn(`[PersistenceService] Skipped ${skipped} entries with unknown content types`);
      }
      console.log(`[PersistenceService] ✅ Loaded ${entries.length} entries`);
      return { status: 'loaded', entries, skipped };
    } catch (error) {
      return { status: 'failed', entries: [], error: new HistoryPersistenceError('read', filePath, error) };
    }
  }

  async save(entries: readonly HistoryEntry[]): Promise<void> {
    const filePath = this.getFilePath();
    const tempPath = `${filePath}${TEMP_FILE_SUFFIX}`;

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, encodeHistory(entries), 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      throw new HistoryPersistenceError('write', filePath, error);
    }
  }
}
