/**
 * @fileoverview In-memory clipboard backend
 * @module services/clipboard/MemoryClipboardBackend
 *
 * Holds at most one kind of content at a time, like a system clipboard after
 * a clear-then-write. Every write and clear bumps the mutation counter.
 * Image bytes are copied in both directions.
 */

import type { IClipboardBackend } from '../interfaces/IClipboardBackend';

export class MemoryClipboardBackend implements IClipboardBackend {
    private mutationCount: number;
    private text: string | null = null;
    private image: Uint8Array | null = null;

    constructor(initialCount: number = 0) {
        this.mutationCount = initialCount;
    }

    currentMutationCount(): number {
        return this.mutationCount;
    }

    readText(): string | null {
        return this.text;
    }

    readImageBytes(): Uint8Array | null {
        return this.image === null ? null : new Uint8Array(this.image);
    }

    writeText(text: string): void {
        this.text = text;
        this.image = null;
        this.mutationCount++;
    }

    writeImageBytes(bytes: Uint8Array): void {
        this.image = new Uint8Array(bytes);
        this.text = null;
        this.mutationCount++;
    }

    clear(): void {
        this.text = null;
        this.image = null;
        this.mutationCount++;
    }
}
