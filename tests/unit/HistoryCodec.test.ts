/**
 * @fileoverview Unit tests for the history document codec
 * @module tests/unit/HistoryCodec.test
 */

import { describe, it, expect } from 'vitest';
import { decodeHistory, encodeHistory, toStoredEntry } from '../../src/data/HistoryCodec';
import { HistoryFormatError } from '../../src/data/PersistenceErrors';
import { imageEntry, textEntry } from '../helpers/historyFixtures';

describe('HistoryCodec', () => {
    describe('encodeHistory', () => {
        it('should write the documented shape', () => {
            const entries = [
                textEntry('b', 'world', '2026-03-01T09:00:02.000Z'),
                imageEntry('a', [0x49, 0x49, 0x2a, 0x00], '2026-03-01T09:00:01.500Z'),
            ];

            expect(JSON.parse(encodeHistory(entries))).toEqual([
                { id: 'b', date: '2026-03-01T09:00:02.000Z', content: { type: 'text', value: 'world' } },
                { id: 'a', date: '2026-03-01T09:00:01.500Z', content: { type: 'image', bytes: 'SUkqAA==' } },
            ]);
        });

        it('should write an empty array for an empty history', () => {
            expect(encodeHistory([])).toBe('[]');
        });

        it('should convert a single entry', () => {
            expect(toStoredEntry(textEntry('x', 'hi'))).toEqual({
                id: 'x',
                date: '2026-03-01T09:00:00.000Z',
                content: { type: 'text', value: 'hi' },
            });
        });
    });

    describe('decodeHistory', () => {
        it('should restore ids, timestamps, text and bytes in order', () => {
            const original = [
                textEntry('e2', 'line one\nline two', '2026-03-01T09:00:05.123Z'),
                imageEntry('e1', [1, 2, 3, 250], '2026-03-01T09:00:04.000Z'),
            ];

            const { entries, skipped } = decodeHistory(encodeHistory(original));

            expect(skipped).toBe(0);
            expect(entries).toEqual(original);
            expect(entries[1].content).toEqual({ type: 'image', bytes: new Uint8Array([1, 2, 3, 250]) });
            expect(entries[0].timestamp.getTime()).toBe(Date.parse('2026-03-01T09:00:05.123Z'));
        });

        it('should return frozen entries', () => {
            const { entries } = decodeHistory(encodeHistory([textEntry('e1', 'a')]));
            expect(Object.isFrozen(entries[0])).toBe(true);
        });

        it('should skip entries with an unknown content type', () => {
            const text = JSON.stringify([
                { id: 'n', date: '2026-03-01T09:00:02.000Z', content: { type: 'rtf', data: '{\\rtf1}' } },
                { id: 'o', date: '2026-03-01T09:00:01.000Z', content: { type: 'text', value: 'kept' } },
            ]);

            const { entries, skipped } = decodeHistory(text);

            expect(skipped).toBe(1);
            expect(entries.map(entry => entry.id)).toEqual(['o']);
        });

        it('should ignore unknown extra fields', () => {
            const text = JSON.stringify([
                { id: 'o', date: '2026-03-01T09:00:01.000Z', pinned: true, content: { type: 'text', value: 'v', lang: 'en' } },
            ]);

            expect(decodeHistory(text).entries).toEqual([textEntry('o', 'v', '2026-03-01T09:00:01.000Z')]);
        });

        it('should reject text that is not JSON', () => {
            expect(() => decodeHistory('{ not json')).toThrow(HistoryFormatError);
        });

        it('should reject a document that is not an array', () => {
            expect(() => decodeHistory('{"entries": []}')).toThrow(HistoryFormatError);
        });

        it('should reject entries without a valid date', () => {
            const text = JSON.stringify([{ id: 'a', date: 'yesterday', content: { type: 'text', value: 'x' } }]);
            expect(() => decodeHistory(text)).toThrow(/0\.date/);
        });

        it('should reject empty text content', () => {
            const text = JSON.stringify([{ id: 'a', date: '2026-03-01T09:00:00.000Z', content: { type: 'text', value: '' } }]);
            expect(() => decodeHistory(text)).toThrow('Invalid content in entry 0');
        });

        it('should reject image bytes that are not base64', () => {
            const text = JSON.stringify([{ id: 'a', date: '2026-03-01T09:00:00.000Z', content: { type: 'image', bytes: '***' } }]);
            expect(() => decodeHistory(text)).toThrow(HistoryFormatError);
        });
    });
});
