import type admin from 'firebase-admin';
import { errorMessage, isRecord } from '../lib/errors.js';
import { equalityConstraints, matchesPredicate, type Predicate } from '../filters/predicate.js';
import type { RawDocument } from '../types.js';
import { isValidDocumentId } from './documentId.js';
import { fail, ok, StoreFailure, type DocumentStore, type StoreResult } from './documentStore.js';

/** Process-wide store handle, built once at startup. `db` is null when Firestore could not be initialized. */
export interface StoreContext {
  db: admin.firestore.Firestore | null;
}

// gRPC status codes that mean the backend could not be reached.
const UNAVAILABLE_CODES = new Set([
  4, // DEADLINE_EXCEEDED
  14, // UNAVAILABLE
  16 // UNAUTHENTICATED
]);

function isUnavailableError(err: unknown): boolean {
  return isRecord(err) && typeof err.code === 'number' && UNAVAILABLE_CODES.has(err.code);
}

function omitUndefined(obj: RawDocument): RawDocument {
  const out: RawDocument = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function toRawDocument(id: string, data: admin.firestore.DocumentData | undefined): RawDocument {
  return { ...(data ?? {}), _id: id };
}

export class FirestoreDocumentStore implements DocumentStore {
  constructor(private readonly context: StoreContext) {}

  async list(collection: string, predicate: Predicate): Promise<RawDocument[]> {
    const db = this.context.db;
    if (!db) {
      throw new StoreFailure({ kind: 'StoreUnavailable', message: 'Database not available' });
    }

    // Firestore has no substring operator, so only equality is pushed down;
    // the full predicate is applied to whatever comes back.
    let query: admin.firestore.Query = db.collection(collection);
    for (const constraint of equalityConstraints(predicate)) {
      query = query.where(constraint.field, '==', constraint.value);
    }

    let snap: admin.firestore.QuerySnapshot;
    try {
      snap = await query.get();
    } catch (err) {
      throw new StoreFailure({ kind: 'StoreUnavailable', message: errorMessage(err) });
    }

    return snap.docs.map((d) => toRawDocument(d.id, d.data())).filter((doc) => matchesPredicate(predicate, doc));
  }

  async getById(collection: string, id: string): Promise<StoreResult<RawDocument>> {
    const db = this.context.db;
    if (!db) return fail('StoreUnavailable', 'Database not available');
    if (!isValidDocumentId(id)) return fail('InvalidIdentifier', `Invalid id: ${id}`);

    try {
      const snap = await db.collection(collection).doc(id).get();
      if (!snap.exists) return fail('NotFound', `No ${collection} document with id ${id}`);
      return ok(toRawDocument(snap.id, snap.data()));
    } catch (err) {
      return fail('StoreUnavailable', errorMessage(err));
    }
  }

  async create(collection: string, document: RawDocument): Promise<StoreResult<string>> {
    const db = this.context.db;
    if (!db) return fail('StoreUnavailable', 'Database not available');

    try {
      const ref = await db.collection(collection).add(omitUndefined(document));
      return ok(ref.id);
    } catch (err) {
      return fail(isUnavailableError(err) ? 'StoreUnavailable' : 'WriteError', errorMessage(err));
    }
  }

  async count(collection: string): Promise<StoreResult<number>> {
    const db = this.context.db;
    if (!db) return fail('StoreUnavailable', 'Database not available');

    try {
      const snap = await db.collection(collection).count().get();
      return ok(snap.data().count);
    } catch (err) {
      return fail('StoreUnavailable', errorMessage(err));
    }
  }

  async ping(): Promise<StoreResult<true>> {
    const db = this.context.db;
    if (!db) return fail('StoreUnavailable', 'Database not available');

    try {
      // Read-only check: attempt to read a non-existent doc.
      await db.doc('_health/ping').get();
      return ok(true);
    } catch (err) {
      return fail('StoreUnavailable', errorMessage(err));
    }
  }
}
