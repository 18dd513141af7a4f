import { isRecord } from '../lib/errors.js';
import type { ExternalDocument, RawDocument } from '../types.js';

// Firestore returns stored dates as Timestamp objects.
function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (isRecord(value) && typeof value.toDate === 'function') {
    const date: unknown = value.toDate();
    if (date instanceof Date) return date;
  }
  return undefined;
}

/**
 * Normalizes a stored document for API output: `_id` becomes a string `id` and
 * top-level timestamps become ISO-8601 strings. Everything else is passed through.
 */
export function serializeDocument(doc: RawDocument | null | undefined): ExternalDocument {
  if (!doc) return {};

  const out: ExternalDocument = {};
  for (const [key, value] of Object.entries(doc)) {
    if (key === '_id') continue;
    const date = toDate(value);
    out[key] = date ? date.toISOString() : value;
  }
  if ('_id' in doc) {
    out.id = String(doc._id);
  }
  return out;
}
