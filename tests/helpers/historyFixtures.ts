/**
 * @fileoverview Shared fixtures for history tests
 * @module tests/helpers/historyFixtures
 */

import { vi, type Mock } from 'vitest';
import type { HistoryEntry } from '../../src/types';
import type { HistoryLoadResult, IPersistenceService } from '../../src/services/interfaces/IPersistenceService';

/**
 * Persistence double that records every saved sequence
 */
export interface MockPersistence extends IPersistenceService {
  saved: HistoryEntry[][];
  load: Mock<() => Promise<HistoryLoadResult>>;
  save: Mock<(entries: readonly HistoryEntry[]) => Promise<void>>;
}

export function createMockPersistence(
  loadResult: HistoryLoadResult = { status: 'missing', entries: [] }
): MockPersistence {
  const saved: HistoryEntry[][] = [];
  return {
    saved,
    load: vi.fn(async () => loadResult),
    save: vi.fn(async (entries: readonly HistoryEntry[]) => {
      saved.push([...entries]);
    }),
    getFilePath: () => '/tmp/cliptrail-test/history.json',
  };
}

/**
 * Sequential ids: entry-1, entry-2, ...
 */
export function sequentialIds(prefix = 'entry'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * Clock that advances one second per call, starting at the given instant
 */
export function steppingClock(startIso = '2026-03-01T09:00:00.000Z'): () => Date {
  let current = new Date(startIso).getTime();
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

export function textEntry(id: string, value: string, iso = '2026-03-01T09:00:00.000Z'): HistoryEntry {
  return { id, timestamp: new Date(iso), content: { type: 'text', value } };
}

export function imageEntry(id: string, bytes: number[], iso = '2026-03-01T09:00:00.000Z'): HistoryEntry {
  return { id, timestamp: new Date(iso), content: { type: 'image', bytes: new Uint8Array(bytes) } };
}
