import { describe, expect, it, vi } from 'vitest';
import { loadSampleProperties, seedProperties } from '../src/seed/seedProperties.js';
import { searchProperties } from '../src/repositories/propertyRepository.js';
import { InMemoryDocumentStore } from './support/inMemoryDocumentStore.js';

const fixedNow = () => new Date('2025-06-01T09:00:00.000Z');

describe('seedProperties', () => {
  it('loads the three sample listings', () => {
    expect(loadSampleProperties().map((p) => p.title)).toEqual([
      'Modern Family House',
      'Downtown City Apartment',
      'Cozy Suburban Condo'
    ]);
  });

  it('inserts every sample into an empty collection, then becomes a no-op', async () => {
    const store = new InMemoryDocumentStore();

    expect(await seedProperties(store, fixedNow)).toEqual({ ok: true, value: 3 });
    expect(store.createCalls).toBe(3);

    expect(await seedProperties(store, fixedNow)).toEqual({ ok: true, value: 0 });
    expect(store.createCalls).toBe(3);
  });

  it('stamps listed_at at seed time', async () => {
    const store = new InMemoryDocumentStore();
    await seedProperties(store, fixedNow);

    const stored = store.collections.get('property')?.get('doc1');
    expect(stored?.listed_at).toEqual(new Date('2025-06-01T09:00:00.000Z'));
  });

  it('skips a failed insert and keeps going', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new InMemoryDocumentStore();
    store.failCreateCall(2);

    expect(await seedProperties(store, fixedNow)).toEqual({ ok: true, value: 2 });
    expect(store.createCalls).toBe(3);
    expect(store.collections.get('property')?.size).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('does not write when the collection already has documents', async () => {
    const store = new InMemoryDocumentStore();
    await store.create('property', { title: 'Existing' });

    expect(await seedProperties(store, fixedNow)).toEqual({ ok: true, value: 0 });
    expect(store.createCalls).toBe(1);
  });

  it('reports an unavailable store without writing', async () => {
    const store = new InMemoryDocumentStore();
    store.unavailable = true;

    const result = await seedProperties(store, fixedNow);
    expect(result).toEqual({ ok: false, error: { kind: 'StoreUnavailable', message: 'connection refused' } });
    expect(store.createCalls).toBe(0);
  });

  it('seeded listings are searchable by city', async () => {
    const store = new InMemoryDocumentStore();
    await seedProperties(store, fixedNow);

    const results = await searchProperties(store, { city: 'metro' });
    expect(results).toHaveLength(1);
    expect(results[0].title).toBe('Downtown City Apartment');
    expect(results[0].id).toBe('doc2');
    expect(results[0].listed_at).toBe('2025-06-01T09:00:00.000Z');
    expect('_id' in results[0]).toBe(false);
  });
});
