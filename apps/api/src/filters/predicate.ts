import type { RawDocument } from '../types.js';

export type FieldConstraint =
  | { op: 'contains'; field: string; value: string }
  | { op: 'equalsIgnoreCase'; field: string; value: string }
  | { op: 'range'; field: string; gte?: number; lte?: number }
  | { op: 'equals'; field: string; value: string | number | boolean };

/** Matches when at least one of the constraints matches. */
export interface AnyOf {
  any: FieldConstraint[];
}

export type Clause = FieldConstraint | AnyOf;

/** AND of every clause. An empty list matches every document. */
export interface Predicate {
  all: Clause[];
}

export const MATCH_ALL: Predicate = { all: [] };

function isAnyOf(clause: Clause): clause is AnyOf {
  return 'any' in clause;
}

function matchesConstraint(constraint: FieldConstraint, doc: RawDocument): boolean {
  const value = doc[constraint.field];

  switch (constraint.op) {
    case 'contains':
      return typeof value === 'string' && value.toLowerCase().includes(constraint.value.toLowerCase());
    case 'equalsIgnoreCase':
      return typeof value === 'string' && value.toLowerCase() === constraint.value.toLowerCase();
    case 'range':
      if (typeof value !== 'number') return false;
      if (constraint.gte !== undefined && value < constraint.gte) return false;
      if (constraint.lte !== undefined && value > constraint.lte) return false;
      return true;
    case 'equals':
      return value === constraint.value;
  }
}

export function matchesPredicate(predicate: Predicate, doc: RawDocument): boolean {
  return predicate.all.every((clause) =>
    isAnyOf(clause) ? clause.any.some((c) => matchesConstraint(c, doc)) : matchesConstraint(clause, doc)
  );
}

/** Top-level `equals` constraints, which a store can apply natively. */
export function equalityConstraints(predicate: Predicate): Array<Extract<FieldConstraint, { op: 'equals' }>> {
  const out: Array<Extract<FieldConstraint, { op: 'equals' }>> = [];
  for (const clause of predicate.all) {
    if (!isAnyOf(clause) && clause.op === 'equals') out.push(clause);
  }
  return out;
}
