/**
 * @fileoverview History document codec
 * @module data/HistoryCodec
 *
 * On-disk shape (top-level array, newest first):
 *
 * ```json
 * [
 *   { "id": "…", "date": "2026-01-02T03:04:05.678Z", "content": { "type": "text", "value": "hello" } },
 *   { "id": "…", "date": "2026-01-02T03:04:01.000Z", "content": { "type": "image", "bytes": "SUkqAA==" } }
 * ]
 * ```
 *
 * Entries whose content type this build does not know are skipped on decode
 * rather than failing the whole document.
 */

import { z } from 'zod';
import type { ClipboardPayload, HistoryEntry } from '../types';
import { isKnownContentType } from '../core/Constants';
import { HistoryFormatError } from './PersistenceErrors';

const storedTextSchema = z.object({
  type: z.literal('text'),
  value: z.string().min(1),
});

const storedImageSchema = z.object({
  type: z.literal('image'),
  bytes: z.string().min(1).base64(),
});

const storedContentSchema = z.discriminatedUnion('type', [storedTextSchema, storedImageSchema]);

const storedEntrySchema = z.object({
  id: z.string().min(1),
  date: z.string().datetime({ offset: true }),
  // Validated per type after the known-type check
  content: z.object({ type: z.string() }).passthrough(),
});

/**
 * Schema of the whole persisted document
 */
export const historyDocumentSchema = z.array(storedEntrySchema);

export type StoredContent = z.infer<typeof storedContentSchema>;

export interface StoredEntry {
  id: string;
  date: string;
  content: StoredContent;
}

/**
 * Result of decoding a history document
 */
export interface DecodedHistory {
  entries: HistoryEntry[];
  /** Entries dropped because their content type is unknown */
  skipped: number;
}

function encodeContent(content: ClipboardPayload): StoredContent {
  switch (content.type) {
    case 'text':
      return { type: 'text', value: content.value };
    case 'image':
      return { type: 'image', bytes: Buffer.from(content.bytes).toString('base64') };
  }
}

function decodeContent(content: StoredContent): ClipboardPayload {
  switch (content.type) {
    case 'text':
      return { type: 'text', value: content.value };
    case 'image':
      return { type: 'image', bytes: new Uint8Array(Buffer.from(content.bytes, 'base64')) };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Convert one entry to its stored form
 */
export function toStoredEntry(entry: HistoryEntry): StoredEntry {
  return {
    id: entry.id,
    date: entry.timestamp.toISOString(),
    content: encodeContent(entry.content),
  };
}

/**
 * Serialize the full history
 */
export function encodeHistory(entries: readonly HistoryEntry[]): string {
  return JSON.stringify(entries.map(toStoredEntry), null, 2);
}

/**
 * Parse a persisted history document
 * @throws HistoryFormatError if the text is not JSON or not a valid document
 */
export function decodeHistory(text: string): DecodedHistory {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new HistoryFormatError('History document is not valid JSON', { cause: error });
  }

  const parsed = historyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HistoryFormatError(`Invalid history document: ${formatIssues(parsed.error)}`);
  }

  const entries: HistoryEntry[] = [];
  let skipped = 0;

  parsed.data.forEach((stored, index) => {
    if (!isKnownContentType(stored.content.type)) {
      skipped++;
      return;
    }

    const content = storedContentSchema.safeParse(stored.content);
    if (!content.success) {
      throw new HistoryFormatError(`Invalid content in entry ${index}: ${formatIssues(content.error)}`);
    }

    entries.push(Object.freeze({
      id: stored.id,
      timestamp: new Date(stored.date),
      content: Object.freeze(decodeContent(content.data)),
    }));
  });

  return { entries, skipped };
}
