/**
 * @fileoverview Unit tests for ChangeDetector
 * @module tests/unit/ChangeDetector.test
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChangeDetector } from '../../src/services/ChangeDetector';
import { MemoryClipboardBackend } from '../../src/services/clipboard/MemoryClipboardBackend';
import type { IClipboardBackend } from '../../src/services/interfaces/IClipboardBackend';

describe('ChangeDetector', () => {
    let backend: MemoryClipboardBackend;
    let detector: ChangeDetector;

    beforeEach(() => {
        backend = new MemoryClipboardBackend(40);
        detector = new ChangeDetector(backend);
    });

    describe('Change detection', () => {
        it('should take the current counter as baseline when primed', async () => {
            backend.writeText('already there');
            await detector.prime();

            expect(detector.getLastObservedCount()).toBe(41);
            expect(await detector.hasChanged()).toBe(false);
        });

        it('should prime itself on the first check', async () => {
            expect(detector.getLastObservedCount()).toBeNull();
            expect(await detector.hasChanged()).toBe(false);
            expect(detector.getLastObservedCount()).toBe(40);
        });

        it('should report a change once per counter movement', async () => {
            await detector.prime();
            backend.writeText('a');

            expect(await detector.hasChanged()).toBe(true);
            expect(await detector.hasChanged()).toBe(false);
        });

        it('should report one change for several writes between checks', async () => {
            await detector.prime();
            backend.writeText('first');
            backend.writeText('second');

            expect(await detector.hasChanged()).toBe(true);
            expect(await detector.readPayload()).toEqual({ type: 'text', value: 'second' });
            expect(await detector.hasChanged()).toBe(false);
        });

        it('should treat any counter difference as a change', async () => {
            let count = 10;
            const counting: IClipboardBackend = {
                currentMutationCount: () => count,
                readText: () => null,
                readImageBytes: () => null,
                writeText: vi.fn(),
                writeImageBytes: vi.fn(),
                clear: vi.fn(),
            };
            const countingDetector = new ChangeDetector(counting);
            await countingDetector.prime();

            count = 3;
            expect(await countingDetector.hasChanged()).toBe(true);
        });
    });

    describe('Payload classification', () => {
        it('should read text first and skip the image read', async () => {
            const readImageBytes = vi.fn(() => new Uint8Array([1]));
            const asyncBackend: IClipboardBackend = {
                currentMutationCount: async () => 1,
                readText: async () => 'text wins',
                readImageBytes,
                writeText: vi.fn(),
                writeImageBytes: vi.fn(),
                clear: vi.fn(),
            };

            const payload = await new ChangeDetector(asyncBackend).readPayload();

            expect(payload).toEqual({ type: 'text', value: 'text wins' });
            expect(readImageBytes).not.toHaveBeenCalled();
        });

        it('should fall back to image bytes', async () => {
            const bytes = new Uint8Array([0x4d, 0x4d, 0x00, 0x2a]);
            backend.writeImageBytes(bytes);

            expect(await detector.readPayload()).toEqual({ type: 'image', bytes });
        });

        it('should return null for an empty clipboard', async () => {
            backend.clear();
            expect(await detector.readPayload()).toBeNull();
        });

        it('should return null for empty text and no image', async () => {
            backend.writeText('');
            expect(await detector.readPayload()).toBeNull();
        });
    });
});
