import { errorMessage } from '../lib/errors.js';
import type { Predicate } from '../filters/predicate.js';
import type { RawDocument } from '../types.js';

export type StoreErrorKind = 'InvalidIdentifier' | 'NotFound' | 'StoreUnavailable' | 'WriteError';

export interface StoreError {
  kind: StoreErrorKind;
  message: string;
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function fail(kind: StoreErrorKind, message: string): { ok: false; error: StoreError } {
  return { ok: false, error: { kind, message } };
}

/** Rejection reason for `DocumentStore.list`. */
export class StoreFailure extends Error {
  readonly kind: StoreErrorKind;

  constructor(error: StoreError) {
    super(error.message);
    this.name = 'StoreFailure';
    this.kind = error.kind;
  }
}

export interface DocumentStore {
  /** Rejects with a `StoreFailure` when the store cannot answer. See `listOrEmpty`. */
  list(collection: string, predicate: Predicate): Promise<RawDocument[]>;
  getById(collection: string, id: string): Promise<StoreResult<RawDocument>>;
  /** Resolves to the identity the store assigned. */
  create(collection: string, document: RawDocument): Promise<StoreResult<string>>;
  count(collection: string): Promise<StoreResult<number>>;
  ping(): Promise<StoreResult<true>>;
}

/**
 * Read policy for listing endpoints: a failed list is reported as "no results".
 * The failure is logged but never reaches the caller.
 */
export async function listOrEmpty(
  store: DocumentStore,
  collection: string,
  predicate: Predicate
): Promise<RawDocument[]> {
  try {
    return await store.list(collection, predicate);
  } catch (err) {
    console.warn('[store] list failed, returning no results', {
      collection,
      error: errorMessage(err)
    });
    return [];
  }
}
