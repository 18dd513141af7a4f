import type { PropertyFilterCriteria } from '../types.js';
import type { Clause, Predicate } from './predicate.js';

// Fields searched by the free-text `q` criterion.
const TEXT_SEARCH_FIELDS = ['title', 'description', 'city', 'state'] as const;

/**
 * Translates listing search criteria into a predicate over `property` documents.
 *
 * Every present criterion adds one clause and the clauses are ANDed. Empty strings
 * count as absent, so `{}` and `{ city: '' }` both produce a predicate that matches
 * every document.
 */
export function buildPropertyFilter(criteria: PropertyFilterCriteria): Predicate {
  const all: Clause[] = [];

  if (criteria.city) {
    all.push({ op: 'contains', field: 'city', value: criteria.city });
  }
  if (criteria.property_type) {
    all.push({ op: 'equalsIgnoreCase', field: 'property_type', value: criteria.property_type });
  }
  if (criteria.featured !== undefined) {
    all.push({ op: 'equals', field: 'featured', value: criteria.featured });
  }

  if (criteria.min_price !== undefined || criteria.max_price !== undefined) {
    all.push({
      op: 'range',
      field: 'price',
      ...(criteria.min_price !== undefined ? { gte: criteria.min_price } : {}),
      ...(criteria.max_price !== undefined ? { lte: criteria.max_price } : {})
    });
  }
  if (criteria.bedrooms !== undefined) {
    all.push({ op: 'range', field: 'bedrooms', gte: criteria.bedrooms });
  }
  if (criteria.bathrooms !== undefined) {
    all.push({ op: 'range', field: 'bathrooms', gte: criteria.bathrooms });
  }

  const q = criteria.q;
  if (q) {
    all.push({ any: TEXT_SEARCH_FIELDS.map((field) => ({ op: 'contains' as const, field, value: q })) });
  }

  return { all };
}
