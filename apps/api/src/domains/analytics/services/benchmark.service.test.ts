import { describe, it, expect } from 'vitest';
import {
  BenchmarkBand,
  QualityIndicator,
  ServiceMeasure,
} from '@carelens/shared/constants/extract.constants.js';
import { makeRecord } from '../../../../test/fixtures/service-records.js';
import { bandFor, computeRiskRadar, computeSectorBenchmarks } from './benchmark.service.js';

describe('bandFor', () => {
  it('places values against the median and 90th percentile', () => {
    expect(bandFor(9, 5, 9)).toBe(BenchmarkBand.TOP_DECILE);
    expect(bandFor(5, 5, 9)).toBe(BenchmarkBand.ABOVE_MEDIAN);
    expect(bandFor(4.9, 5, 9)).toBe(BenchmarkBand.BELOW_MEDIAN);
    expect(bandFor(null, 5, 9)).toBeNull();
  });
});

describe('computeSectorBenchmarks', () => {
  const records = [
    makeRecord({ serviceId: 'OWN-1', ratings: { overall: 2 }, totalCareCompliancePct: 80 }),
    makeRecord({ serviceId: 'OWN-2', ratings: { overall: 4 }, totalCareCompliancePct: 80 }),
    ...[1, 2, 3, 4, 5].map((overall, i) =>
      makeRecord({ serviceId: `PEER-${i}`, providerId: `PRV-${i + 10}`, ratings: { overall } }),
    ),
  ];

  it('compares the provider mean against peer quantiles', () => {
    const result = computeSectorBenchmarks(records, 'PRV-1');

    expect(result.peerServiceCount).toBe(5);
    const [overall, rn, total] = result.measures;

    expect(overall.measure).toBe(ServiceMeasure.OVERALL_STAR_RATING);
    expect(overall.median).toBe(3);
    expect(overall.p75).toBe(4);
    expect(overall.p90).toBeCloseTo(4.6, 10);
    expect(overall.providerValue).toBe(3);
    expect(overall.band).toBe(BenchmarkBand.ABOVE_MEDIAN);

    expect(rn.band).toBe(BenchmarkBand.TOP_DECILE);
    expect(total.providerValue).toBe(80);
    expect(total.band).toBe(BenchmarkBand.BELOW_MEDIAN);
  });

  it('has no band when the provider has no value', () => {
    const result = computeSectorBenchmarks(records, 'PRV-404');

    expect(result.peerServiceCount).toBe(7);
    expect(result.measures.every((m) => m.providerValue === null && m.band === null)).toBe(true);
  });
});

describe('computeRiskRadar', () => {
  it('ranks the provider on each quality indicator', () => {
    const records = [
      makeRecord({
        serviceId: 'OWN',
        qualityIndicators: { [QualityIndicator.FALLS]: 30, [QualityIndicator.PRESSURE_INJURIES]: 1 },
      }),
      ...[
        [10, 5],
        [20, 6],
        [5, 7],
        [15, 8],
      ].map(([falls, pressure], i) =>
        makeRecord({
          serviceId: `PEER-${i}`,
          providerId: 'PRV-2',
          qualityIndicators: {
            [QualityIndicator.FALLS]: falls,
            [QualityIndicator.PRESSURE_INJURIES]: pressure,
          },
        }),
      ),
    ];

    const radar = computeRiskRadar(records, 'PRV-1');

    expect(radar.sufficientData).toBe(true);
    expect(radar.axes).toEqual([
      { indicator: QualityIndicator.PRESSURE_INJURIES, providerMean: 1, percentileRank: 20 },
      { indicator: QualityIndicator.FALLS, providerMean: 30, percentileRank: 100 },
    ]);
    expect(radar.concerns).toEqual([QualityIndicator.FALLS]);
    expect(radar.strengths).toEqual([QualityIndicator.PRESSURE_INJURIES]);
  });

  it('needs at least three services in the subset', () => {
    const radar = computeRiskRadar(
      [makeRecord({ serviceId: 'A' }), makeRecord({ serviceId: 'B', providerId: 'PRV-2' })],
      'PRV-1',
    );

    expect(radar).toEqual({
      providerId: 'PRV-1',
      sufficientData: false,
      axes: [],
      concerns: [],
      strengths: [],
    });
  });
});
