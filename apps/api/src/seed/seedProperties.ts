import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { errorMessage } from '../lib/errors.js';
import { propertySchema, type PropertyInput } from '../schemas.js';
import { fail, ok, type DocumentStore, type StoreResult } from '../store/documentStore.js';
import { COLLECTIONS, type Property } from '../types.js';

const SAMPLE_PROPERTIES_PATH = fileURLToPath(new URL('../../data/sample-properties.json', import.meta.url));

let samples: PropertyInput[] | undefined;

export function loadSampleProperties(): PropertyInput[] {
  if (samples) return samples;

  const raw: unknown = JSON.parse(fs.readFileSync(SAMPLE_PROPERTIES_PATH, { encoding: 'utf8' }));
  const parsed = propertySchema.array().safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid sample properties: ${parsed.error.message}`);
  }
  samples = parsed.data;
  return samples;
}

/**
 * Populates the `property` collection with the sample listings, but only when it is empty.
 *
 * Inserts run one at a time; a failed insert is logged and skipped, so the count
 * returned can be lower than the number of samples.
 */
export async function seedProperties(store: DocumentStore, now: () => Date = () => new Date()): Promise<StoreResult<number>> {
  const existing = await store.count(COLLECTIONS.property);
  if (!existing.ok) return existing;
  if (existing.value > 0) return ok(0);

  let sampleData: PropertyInput[];
  try {
    sampleData = loadSampleProperties();
  } catch (err) {
    return fail('WriteError', errorMessage(err));
  }

  let inserted = 0;
  for (const item of sampleData) {
    const property: Property = { ...item, listed_at: now() };
    const result = await store.create(COLLECTIONS.property, { ...property });
    if (result.ok) {
      inserted += 1;
      continue;
    }
    console.warn('[seed] insert failed, skipping', {
      title: item.title,
      error: result.error.message
    });
  }

  console.log(`[seed] inserted ${inserted} of ${sampleData.length} sample properties`);
  return ok(inserted);
}
