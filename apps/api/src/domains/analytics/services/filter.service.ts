// ============================================================================
// Filter Engine
// Pure selection over ServiceRecords. Predicates are AND-composed; ANY leaves
// a dimension unconstrained. An empty result is valid.
// ============================================================================

import { SERVICE_SIZES, type ServiceSize } from '@carelens/shared/constants/extract.constants.js';
import type { ServiceFilterQuery } from '@carelens/shared/schemas/validation/analytics.validation.js';
import type { ServiceRecord } from '../analytics.types.js';

export const ANY = 'ANY' as const;
export type Any = typeof ANY;

export interface ServicePredicates {
  states: ReadonlySet<string> | Any;
  providerId: string | Any;
  sizes: ReadonlySet<ServiceSize> | Any;
  /** MMM codes. */
  remoteness: ReadonlySet<number> | Any;
}

export const NO_PREDICATES: Readonly<ServicePredicates> = Object.freeze({
  states: ANY,
  providerId: ANY,
  sizes: ANY,
  remoteness: ANY,
});

export interface FilterOptions {
  states: string[];
  sizes: ServiceSize[];
  mmmCodes: number[];
  providers: Array<{ providerId: string; providerName: string }>;
}

// ---------------------------------------------------------------------------
// Predicate construction
// ---------------------------------------------------------------------------

function setOrAny<T>(values: readonly T[] | undefined): ReadonlySet<T> | Any {
  return values && values.length > 0 ? new Set(values) : ANY;
}

/** Builds predicates from a validated dashboard query; absent or empty lists mean ANY. */
export function predicatesFromQuery(query: ServiceFilterQuery): ServicePredicates {
  return {
    states: setOrAny(query.state),
    providerId: query.provider ?? ANY,
    sizes: setOrAny(query.size),
    remoteness: setOrAny(query.mmm),
  };
}

function canonical<T extends string | number>(value: ReadonlySet<T> | Any): T[] | Any {
  if (value === ANY) return ANY;
  return [...value].sort((a, b) =>
    typeof a === 'number' && typeof b === 'number' ? a - b : String(a).localeCompare(String(b)),
  );
}

/**
 * Canonical string form of a predicate set. Two sets selecting the same
 * services by the same rules produce the same key.
 */
export function normalizePredicates(predicates: ServicePredicates): string {
  return JSON.stringify({
    states: canonical(predicates.states),
    providerId: predicates.providerId,
    sizes: canonical(predicates.sizes),
    remoteness: canonical(predicates.remoteness),
  });
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export function matchesPredicates(record: ServiceRecord, predicates: ServicePredicates): boolean {
  if (predicates.states !== ANY && !predicates.states.has(record.state)) return false;
  if (predicates.providerId !== ANY && record.providerId !== predicates.providerId) return false;
  if (predicates.sizes !== ANY && (record.size === null || !predicates.sizes.has(record.size))) {
    return false;
  }
  if (
    predicates.remoteness !== ANY &&
    (record.mmmCode === null || !predicates.remoteness.has(record.mmmCode))
  ) {
    return false;
  }
  return true;
}

/**
 * Returns a new collection with the records that satisfy every predicate.
 * The input is never modified. Idempotent for a fixed predicate set.
 */
export function filterServices(
  records: readonly ServiceRecord[],
  predicates: ServicePredicates,
): readonly ServiceRecord[] {
  return Object.freeze(records.filter((record) => matchesPredicates(record, predicates)));
}

/** Distinct values available for each filter dimension, sorted for display. */
export function listFilterOptions(records: readonly ServiceRecord[]): FilterOptions {
  const states = new Set<string>();
  const sizes = new Set<ServiceSize>();
  const mmmCodes = new Set<number>();
  const providers = new Map<string, string>();

  for (const record of records) {
    states.add(record.state);
    if (record.size !== null) sizes.add(record.size);
    if (record.mmmCode !== null) mmmCodes.add(record.mmmCode);
    if (!providers.has(record.providerId)) {
      providers.set(record.providerId, record.providerName);
    }
  }

  return {
    states: [...states].sort((a, b) => a.localeCompare(b)),
    sizes: SERVICE_SIZES.filter((size) => sizes.has(size)),
    mmmCodes: [...mmmCodes].sort((a, b) => a - b),
    providers: [...providers.entries()]
      .map(([providerId, providerName]) => ({ providerId, providerName }))
      .sort((a, b) => a.providerName.localeCompare(b.providerName)),
  };
}
