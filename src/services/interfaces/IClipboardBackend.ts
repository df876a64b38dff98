/**
 * @fileoverview IClipboardBackend Interface
 * @module services/interfaces/IClipboardBackend
 *
 * Contract for the OS clipboard. The core never calls a platform API
 * directly; any implementation of this interface is interchangeable.
 */

import type { MaybePromise } from '../../types';

/**
 * Clipboard backend capability
 *
 * External I/O boundary - requires interface for testing.
 */
export interface IClipboardBackend {
    /**
     * Opaque counter that changes on every write by any process
     */
    currentMutationCount(): MaybePromise<number>;

    /**
     * Current text content, if any
     */
    readText(): MaybePromise<string | null | undefined>;

    /**
     * Current image content as raw bytes, if any
     */
    readImageBytes(): MaybePromise<Uint8Array | null | undefined>;

    /**
     * Replace the clipboard content with text
     */
    writeText(text: string): MaybePromise<void>;

    /**
     * Replace the clipboard content with image bytes
     */
    writeImageBytes(bytes: Uint8Array): MaybePromise<void>;

    /**
     * Empty the clipboard
     */
    clear(): MaybePromise<void>;
}
