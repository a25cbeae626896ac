import { describe, it, expect } from 'vitest';
import { makeRecord } from '../../../../test/fixtures/service-records.js';
import {
  ANY,
  NO_PREDICATES,
  filterServices,
  listFilterOptions,
  normalizePredicates,
  predicatesFromQuery,
} from './filter.service.js';

const RECORDS = Object.freeze([
  makeRecord({ serviceId: 'A', state: 'NSW', size: 'Small', mmmCode: 1, providerId: 'P1', providerName: 'Zenith Care' }),
  makeRecord({ serviceId: 'B', state: 'VIC', size: 'Large', mmmCode: 3, providerId: 'P2', providerName: 'Acacia Homes' }),
  makeRecord({ serviceId: 'C', state: 'NSW', size: null, mmmCode: null, providerId: 'P2', providerName: 'Acacia Homes' }),
  makeRecord({ serviceId: 'D', state: 'QLD', size: 'Medium', mmmCode: 5, providerId: 'P3', providerName: 'Banksia Living' }),
]);

function ids(records: readonly { serviceId: string }[]): string[] {
  return records.map((r) => r.serviceId);
}

describe('filterServices', () => {
  it('returns everything when no predicate is set', () => {
    expect(ids(filterServices(RECORDS, NO_PREDICATES))).toEqual(['A', 'B', 'C', 'D']);
  });

  it('AND-composes predicates', () => {
    const result = filterServices(RECORDS, {
      ...NO_PREDICATES,
      states: new Set(['NSW', 'VIC']),
      providerId: 'P2',
    });

    expect(ids(result)).toEqual(['B', 'C']);
  });

  it('excludes records with an unknown size or MMM code when those filters are set', () => {
    expect(ids(filterServices(RECORDS, { ...NO_PREDICATES, sizes: new Set(['Small', 'Large'] as const) }))).toEqual(['A', 'B']);
    expect(ids(filterServices(RECORDS, { ...NO_PREDICATES, remoteness: new Set([1, 5]) }))).toEqual(['A', 'D']);
  });

  it('returns an empty collection for a state with no services', () => {
    expect(filterServices(RECORDS, { ...NO_PREDICATES, states: new Set(['TAS']) })).toEqual([]);
  });

  it('is idempotent and leaves the input untouched', () => {
    const predicates = { ...NO_PREDICATES, states: new Set(['NSW']) };
    const once = filterServices(RECORDS, predicates);
    const twice = filterServices(once, predicates);

    expect(twice).toEqual(once);
    expect(RECORDS).toHaveLength(4);
  });
});

describe('predicatesFromQuery', () => {
  it('treats absent and empty lists as ANY', () => {
    expect(predicatesFromQuery({})).toEqual(NO_PREDICATES);
    expect(predicatesFromQuery({ state: [] }).states).toBe(ANY);
  });

  it('builds sets from query lists', () => {
    const predicates = predicatesFromQuery({ state: ['NSW'], size: ['Small'], mmm: [2, 3], provider: 'P1' });

    expect(predicates.states).toEqual(new Set(['NSW']));
    expect(predicates.sizes).toEqual(new Set(['Small']));
    expect(predicates.remoteness).toEqual(new Set([2, 3]));
    expect(predicates.providerId).toBe('P1');
  });
});

describe('normalizePredicates', () => {
  it('ignores the order values were given in', () => {
    const a = normalizePredicates({ ...NO_PREDICATES, states: new Set(['VIC', 'NSW']), remoteness: new Set([3, 1]) });
    const b = normalizePredicates({ ...NO_PREDICATES, states: new Set(['NSW', 'VIC']), remoteness: new Set([1, 3]) });

    expect(a).toBe(b);
  });

  it('distinguishes different selections', () => {
    expect(normalizePredicates(NO_PREDICATES)).not.toBe(
      normalizePredicates({ ...NO_PREDICATES, providerId: 'P1' }),
    );
  });
});

describe('listFilterOptions', () => {
  it('lists sorted distinct values per dimension', () => {
    expect(listFilterOptions(RECORDS)).toEqual({
      states: ['NSW', 'QLD', 'VIC'],
      sizes: ['Small', 'Medium', 'Large'],
      mmmCodes: [1, 3, 5],
      providers: [
        { providerId: 'P2', providerName: 'Acacia Homes' },
        { providerId: 'P3', providerName: 'Banksia Living' },
        { providerId: 'P1', providerName: 'Zenith Care' },
      ],
    });
  });
});
