import { describe, it, expect } from 'vitest';
import {
  QualityIndicator,
  ServiceMeasure,
  type ReFrequency,
} from '@carelens/shared/constants/extract.constants.js';
import { makeRecord, recordsWithFalls } from '../../../../test/fixtures/service-records.js';
import {
  aggregateProvider,
  summarizeIndicator,
  summarizeResidentsExperience,
  summarizeSector,
} from './aggregation.service.js';

const OPTIONS = { iqrMultiplier: 1.5 };

// ============================================================================
// aggregateProvider
// ============================================================================

describe('aggregateProvider', () => {
  const records = [
    makeRecord({ serviceId: 'A', suburb: 'Manly', size: 'Small', ratings: { overall: 1 }, rnCareCompliancePct: 70 }),
    makeRecord({ serviceId: 'B', suburb: 'Manly', size: null, ratings: { overall: 4 }, rnCareCompliancePct: null }),
    makeRecord({ serviceId: 'C', providerId: 'PRV-2', providerName: 'Other Group', ratings: { overall: 5 } }),
  ];

  it('summarizes the provider services in the subset', () => {
    const profile = aggregateProvider(records, 'PRV-1');

    expect(profile.providerName).toBe('Coastal Care Group');
    expect(profile.serviceCount).toBe(2);
    expect(profile.suburbCount).toBe(1);
    expect(profile.sizeCounts).toEqual({ Small: 1, Medium: 0, Large: 0, Unknown: 1 });
    expect(profile.meanOverallRating).toBe(2.5);
    expect(profile.meanRnCareCompliancePct).toBe(70);
    expect(profile.meanTotalCareCompliancePct).toBe(100);
    expect(profile.services.map((s) => s.serviceId)).toEqual(['A', 'B']);
  });

  it('returns zero counts and missing means for an absent provider', () => {
    const profile = aggregateProvider(records, 'PRV-9');

    expect(profile.serviceCount).toBe(0);
    expect(profile.providerName).toBeNull();
    expect(profile.meanOverallRating).toBeNull();
    expect(profile.sizeCounts).toEqual({ Small: 0, Medium: 0, Large: 0, Unknown: 0 });
  });

  it('excludes a missing rating from the mean but counts the service', () => {
    const profile = aggregateProvider(
      [makeRecord({ serviceId: 'A', ratings: { overall: null } }), makeRecord({ serviceId: 'B', ratings: { overall: 3 } })],
      'PRV-1',
    );

    expect(profile.serviceCount).toBe(2);
    expect(profile.meanOverallRating).toBe(3);
  });
});

// ============================================================================
// summarizeIndicator
// ============================================================================

describe('summarizeIndicator', () => {
  it('computes mean, standard error and IQR outliers', () => {
    const summary = summarizeIndicator(recordsWithFalls([10, 12, 11, 13, 50]), QualityIndicator.FALLS, OPTIONS);

    expect(summary.count).toBe(5);
    expect(summary.mean).toBeCloseTo(19.2, 10);
    expect(summary.standardError).toBeCloseTo(Math.sqrt(297.7) / Math.sqrt(5), 10);
    expect(summary.bounds).toEqual({ q1: 11, q3: 13, iqr: 2, lowerBound: 8, upperBound: 16 });
    expect(summary.values.filter((v) => v.isOutlier).map((v) => v.serviceId)).toEqual(['SVC-5']);
  });

  it('ignores missing values', () => {
    const summary = summarizeIndicator(recordsWithFalls([4, null, 8]), QualityIndicator.FALLS, OPTIONS);

    expect(summary.count).toBe(2);
    expect(summary.mean).toBe(6);
    expect(summary.values.map((v) => v.serviceId)).toEqual(['SVC-1', 'SVC-3']);
  });

  it('has no standard error below two values', () => {
    const summary = summarizeIndicator(recordsWithFalls([7]), QualityIndicator.FALLS, OPTIONS);

    expect(summary.mean).toBe(7);
    expect(summary.standardError).toBeNull();
  });

  it('has missing mean for an empty subset', () => {
    const summary = summarizeIndicator([], QualityIndicator.FALLS, OPTIONS);

    expect(summary.count).toBe(0);
    expect(summary.mean).toBeNull();
    expect(summary.standardError).toBeNull();
    expect(summary.bounds).toBeNull();
  });

  it('flags nothing when every value is the same', () => {
    const summary = summarizeIndicator(recordsWithFalls([5, 5, 5, 5]), QualityIndicator.FALLS, OPTIONS);

    expect(summary.values.some((v) => v.isOutlier)).toBe(false);
  });

  it('computes fences from the population when one is given', () => {
    const population = recordsWithFalls([10, 12, 11, 13, 50]);
    const subset = population.slice(4);

    const local = summarizeIndicator(subset, QualityIndicator.FALLS, OPTIONS);
    const national = summarizeIndicator(subset, QualityIndicator.FALLS, { ...OPTIONS, population });

    expect(local.values[0].isOutlier).toBe(false);
    expect(national.values[0].isOutlier).toBe(true);
  });

  it('works on service level measures', () => {
    const records = [
      makeRecord({ serviceId: 'A', ratings: { overall: 2 } }),
      makeRecord({ serviceId: 'B', ratings: { overall: 3 } }),
    ];

    expect(summarizeIndicator(records, ServiceMeasure.OVERALL_STAR_RATING, OPTIONS).mean).toBe(2.5);
  });
});

// ============================================================================
// summarizeSector
// ============================================================================

describe('summarizeSector', () => {
  it('counts services, providers and non-compliant services', () => {
    const overview = summarizeSector([
      makeRecord({ serviceId: 'A', ratings: { compliance: 1 }, rnCareCompliancePct: 80 }),
      makeRecord({ serviceId: 'B', providerId: 'PRV-2', rnCareCompliancePct: 100 }),
      makeRecord({ serviceId: 'C', providerId: 'PRV-2', ratings: { compliance: 1 }, rnCareCompliancePct: null }),
    ]);

    expect(overview).toEqual({
      serviceCount: 3,
      providerCount: 2,
      meanOverallRating: 4,
      meanRnCareCompliancePct: 90,
      meanTotalCareCompliancePct: 100,
      nonCompliantCount: 2,
    });
  });
});

// ============================================================================
// summarizeResidentsExperience
// ============================================================================

describe('summarizeResidentsExperience', () => {
  it('averages each category and frequency column in display order', () => {
    const items = summarizeResidentsExperience([
      makeRecord({
        serviceId: 'A',
        residentsExperience: {
          '[RE] Food - Never': 5,
          '[RE] Food - Always': 60,
          '[RE] Care - Always': 70,
          '[RE] Other': 1,
        },
      }),
      makeRecord({
        serviceId: 'B',
        residentsExperience: { '[RE] Food - Always': 40, '[RE] Food - Never': null },
      }),
    ]);

    expect(items).toEqual([
      { column: '[RE] Care - Always', category: 'Care', frequency: 'Always', meanPct: 70, count: 1 },
      { column: '[RE] Food - Always', category: 'Food', frequency: 'Always', meanPct: 50, count: 2 },
      { column: '[RE] Food - Never', category: 'Food', frequency: 'Never', meanPct: 5, count: 1 },
    ]);
  });

  it('orders frequencies from Always to Never within a category', () => {
    const items = summarizeResidentsExperience([
      makeRecord({
        residentsExperience: {
          '[RE] Safety - Never': 2,
          '[RE] Safety - Some of the time': 8,
          '[RE] Safety - Always': 70,
          '[RE] Safety - Most of the time': 20,
        },
      }),
    ]);

    const frequencies: ReFrequency[] = items.map((item) => item.frequency);
    expect(frequencies).toEqual(['Always', 'Most of the time', 'Some of the time', 'Never']);
  });
});
