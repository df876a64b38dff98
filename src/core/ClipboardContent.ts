/**
 * @fileoverview Clipboard content model
 * @module core/ClipboardContent
 *
 * Builds ClipboardPayload values from raw clipboard reads and converts them
 * back to the form a clipboard backend accepts. Pure functions, no I/O.
 *
 * Empty strings and zero-length byte arrays are never representable.
 */

import type { ClipboardPayload, ImagePayload, TextPayload } from '../types';
import { PREVIEW_LINE_COUNT } from './Constants';

/**
 * Raw clipboard read, one slot per media kind
 */
export interface RawClipboardContent {
  text?: string | null;
  image?: Uint8Array | null;
}

/**
 * Build a text payload
 * @returns Payload, or null if the value is absent or empty
 */
export function textPayload(value: string | null | undefined): TextPayload | null {
  if (typeof value !== 'string' || value.length === 0) return null;
  return { type: 'text', value };
}

/**
 * Build an image payload. The bytes are kept as-is.
 * @returns Payload, or null if the bytes are absent or empty
 */
export function imagePayload(bytes: Uint8Array | null | undefined): ImagePayload | null {
  if (!bytes || bytes.byteLength === 0) return null;
  return { type: 'image', bytes };
}

/**
 * Classify a raw clipboard read. Text is checked before image; the first
 * representable kind wins.
 */
export function classifyClipboard(raw: RawClipboardContent): ClipboardPayload | null {
  return textPayload(raw.text) ?? imagePayload(raw.image);
}

/**
 * Check the non-empty invariant on a payload built elsewhere
 */
export function isRepresentable(payload: ClipboardPayload): boolean {
  switch (payload.type) {
    case 'text':
      return payload.value.length > 0;
    case 'image':
      return payload.bytes.byteLength > 0;
  }
}

/**
 * Concrete form handed to a clipboard backend
 */
export function toTransferable(payload: TextPayload): string;
export function toTransferable(payload: ImagePayload): Uint8Array;
export function toTransferable(payload: ClipboardPayload): string | Uint8Array;
export function toTransferable(payload: ClipboardPayload): string | Uint8Array {
  return payload.type === 'text' ? payload.value : payload.bytes;
}

/**
 * First lines of a text payload, for list previews
 */
export function previewText(text: string, maxLines: number = PREVIEW_LINE_COUNT): string {
  return text.split('\n').slice(0, Math.max(0, maxLines)).join('\n');
}

/**
 * Short label for log lines
 */
export function describePayload(payload: ClipboardPayload): string {
  return payload.type === 'text'
    ? `text (${payload.value.length} chars)`
    : `image (${payload.bytes.byteLength} bytes)`;
}
