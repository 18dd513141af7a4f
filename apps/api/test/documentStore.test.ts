import { afterEach, describe, expect, it, vi } from 'vitest';
import { MATCH_ALL } from '../src/filters/predicate.js';
import { getProperty, listFeaturedProperties, searchProperties } from '../src/repositories/propertyRepository.js';
import { createInquiry } from '../src/repositories/inquiryRepository.js';
import { isValidDocumentId } from '../src/store/documentId.js';
import { listOrEmpty } from '../src/store/documentStore.js';
import { InMemoryDocumentStore } from './support/inMemoryDocumentStore.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('isValidDocumentId', () => {
  it('accepts Firestore auto ids and ordinary strings', () => {
    expect(isValidDocumentId('aB3dE5gH7jK9mN1pQ3sT')).toBe(true);
    expect(isValidDocumentId('listing-42')).toBe(true);
  });

  it('rejects ids Firestore cannot address', () => {
    expect(isValidDocumentId('')).toBe(false);
    expect(isValidDocumentId('a/b')).toBe(false);
    expect(isValidDocumentId('.')).toBe(false);
    expect(isValidDocumentId('..')).toBe(false);
    expect(isValidDocumentId('__reserved__')).toBe(false);
    expect(isValidDocumentId('x'.repeat(1501))).toBe(false);
  });
});

describe('listOrEmpty', () => {
  it('returns the store results when the list succeeds', async () => {
    const store = new InMemoryDocumentStore();
    await store.create('property', { title: 'A' });

    expect(await listOrEmpty(store, 'property', MATCH_ALL)).toEqual([{ title: 'A', _id: 'doc1' }]);
  });

  it('substitutes an empty list when the store fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new InMemoryDocumentStore();
    await store.create('property', { title: 'A' });
    store.unavailable = true;

    await expect(store.list('property', MATCH_ALL)).rejects.toThrow('connection refused');
    expect(await listOrEmpty(store, 'property', MATCH_ALL)).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[store] list failed, returning no results', {
      collection: 'property',
      error: 'connection refused'
    });
  });
});

describe('property repository', () => {
  it('featured listing is the same as filtering on featured=true', async () => {
    const store = new InMemoryDocumentStore();
    await store.create('property', { title: 'A', featured: true });
    await store.create('property', { title: 'B', featured: false });

    expect(await listFeaturedProperties(store)).toEqual([{ title: 'A', featured: true, id: 'doc1' }]);
    expect(await searchProperties(store, { featured: true })).toEqual(await listFeaturedProperties(store));
  });

  it('search degrades to no results when the store is down', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new InMemoryDocumentStore();
    store.unavailable = true;

    expect(await searchProperties(store, { q: 'house' })).toEqual([]);
  });

  it('getProperty distinguishes invalid, missing and found ids', async () => {
    const store = new InMemoryDocumentStore();
    await store.create('property', { title: 'A', listed_at: new Date('2024-01-01T00:00:00.000Z') });

    expect(await getProperty(store, 'doc1')).toEqual({
      ok: true,
      value: { title: 'A', listed_at: '2024-01-01T00:00:00.000Z', id: 'doc1' }
    });

    const missing = await getProperty(store, 'doc999');
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error.kind).toBe('NotFound');

    const invalid = await getProperty(store, 'not/an/id');
    expect(invalid.ok).toBe(false);
    if (!invalid.ok) expect(invalid.error.kind).toBe('InvalidIdentifier');
  });

  it('stores inquiries verbatim', async () => {
    const store = new InMemoryDocumentStore();
    const inquiry = { name: 'Sam Doe', email: 'sam@example.com', message: 'Is it still available?' };

    expect(await createInquiry(store, inquiry)).toEqual({ ok: true, value: 'doc1' });
    expect(store.collections.get('inquiry')?.get('doc1')).toEqual(inquiry);
  });
});
