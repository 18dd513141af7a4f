const MAX_DOCUMENT_ID_BYTES = 1500;

/** Firestore document id rules: non-empty, no `/`, not `.`/`..`, not `__...__`, at most 1500 bytes. */
export function isValidDocumentId(id: string): boolean {
  if (id.length === 0) return false;
  if (id.includes('/')) return false;
  if (id === '.' || id === '..') return false;
  if (/^__.*__$/.test(id)) return false;
  return Buffer.byteLength(id, 'utf8') <= MAX_DOCUMENT_ID_BYTES;
}
