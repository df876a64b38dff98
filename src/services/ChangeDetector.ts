/**
 * @fileoverview ChangeDetector - Detects clipboard changes via the mutation counter
 * @module services/ChangeDetector
 *
 * Comparing an integer is cheap and holds no lock on the clipboard; content is
 * only read once a change has been seen. When the counter moves more than once
 * between two checks, only the latest clipboard state is observed.
 */

import type { ClipboardPayload } from '../types';
import type { IClipboardBackend } from './interfaces/IClipboardBackend';
import { imagePayload, textPayload } from '../core/ClipboardContent';

export class ChangeDetector {
    private lastCount: number | null = null;

    constructor(private readonly backend: IClipboardBackend) {}

    /**
     * Take the current counter as the baseline.
     * Content already on the clipboard is not reported as a change.
     */
    async prime(): Promise<void> {
        this.lastCount = await this.backend.currentMutationCount();
    }

    /**
     * Check whether the clipboard was written since the last check.
     * An unprimed detector primes itself and reports no change.
     */
    async hasChanged(): Promise<boolean> {
        const current = await this.backend.currentMutationCount();

        if (this.lastCount === null) {
            this.lastCount = current;
            return false;
        }

        if (current === this.lastCount) return false;

        this.lastCount = current;
        return true;
    }

    /**
     * Read the clipboard once and classify it. Text is tried first; image
     * bytes are only read when there is no text.
     * @returns Payload, or null when the clipboard holds nothing representable
     */
    async readPayload(): Promise<ClipboardPayload | null> {
        const text = textPayload(await this.backend.readText());
        if (text) return text;

        return imagePayload(await this.backend.readImageBytes());
    }

    /**
     * Last counter value seen, null before priming
     */
    getLastObservedCount(): number | null {
        return this.lastCount;
    }
}
