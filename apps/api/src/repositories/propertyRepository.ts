import { buildPropertyFilter } from '../filters/propertyFilter.js';
import { serializeDocument } from '../serializers/document.js';
import { listOrEmpty, ok, type DocumentStore, type StoreResult } from '../store/documentStore.js';
import { COLLECTIONS, type ExternalDocument, type PropertyFilterCriteria } from '../types.js';

/** Never fails: an unavailable store yields an empty list. */
export async function searchProperties(
  store: DocumentStore,
  criteria: PropertyFilterCriteria
): Promise<ExternalDocument[]> {
  const docs = await listOrEmpty(store, COLLECTIONS.property, buildPropertyFilter(criteria));
  return docs.map((d) => serializeDocument(d));
}

export function listFeaturedProperties(store: DocumentStore): Promise<ExternalDocument[]> {
  return searchProperties(store, { featured: true });
}

export async function getProperty(store: DocumentStore, id: string): Promise<StoreResult<ExternalDocument>> {
  const result = await store.getById(COLLECTIONS.property, id);
  if (!result.ok) return result;
  return ok(serializeDocument(result.value));
}
