import type { DocumentStore, StoreResult } from '../store/documentStore.js';
import { COLLECTIONS, type Inquiry } from '../types.js';

export function createInquiry(store: DocumentStore, inquiry: Inquiry): Promise<StoreResult<string>> {
  return store.create(COLLECTIONS.inquiry, { ...inquiry });
}
