import { describe, it, expect } from 'vitest';
import {
  ConcernDirection,
  DataWarningCode,
  QualityIndicator,
} from '@carelens/shared/constants/extract.constants.js';
import type { Anomaly, AnomalyReport, DataQualityWarning } from './analytics.types.js';
import { envelope, presentAnomalies } from './analytics.presenter.js';

const BOUNDS = { q1: 11, q3: 22.25, iqr: 11.25, lowerBound: 5.375, upperBound: 39.125 };

function anomaly(overrides: Partial<Anomaly>): Anomaly {
  return {
    serviceId: 'SVC-1',
    serviceName: 'Harbour View Care',
    providerId: 'PRV-1',
    providerName: 'Coastal Care Group',
    measure: QualityIndicator.FALLS,
    value: 50,
    direction: ConcernDirection.HIGH,
    bounds: BOUNDS,
    ...overrides,
  };
}

describe('presentAnomalies', () => {
  it('lists provider counts by id with the provider name attached', () => {
    const report: AnomalyReport = {
      anomalies: [
        anomaly({ serviceId: 'SVC-1', providerId: 'PRV-2' }),
        anomaly({ serviceId: 'SVC-2', providerId: 'PRV-1' }),
        anomaly({ serviceId: 'SVC-3', providerId: 'PRV-2', providerName: 'Coastal Care Group' }),
      ],
      skippedMeasures: [],
      countsByMeasure: { [QualityIndicator.FALLS]: 3 },
      countsByProvider: { 'PRV-1': 1, 'PRV-2': 2 },
    };

    expect(presentAnomalies(report).countsByProvider).toEqual([
      { providerId: 'PRV-2', providerName: 'Coastal Care Group', count: 2 },
      { providerId: 'PRV-1', providerName: 'Coastal Care Group', count: 1 },
    ]);
  });

  it('rounds values and bounds to one decimal', () => {
    const report: AnomalyReport = {
      anomalies: [anomaly({ value: 50.04 })],
      skippedMeasures: [],
      countsByMeasure: { [QualityIndicator.FALLS]: 1 },
      countsByProvider: { 'PRV-1': 1 },
    };

    const [first] = presentAnomalies(report).anomalies;
    expect(first.value).toBe(50);
    expect(first.label).toBe('Falls');
    expect(first.bounds).toEqual({ q1: 11, q3: 22.3, iqr: 11.3, lowerBound: 5.4, upperBound: 39.1 });
  });
});

describe('envelope', () => {
  it('omits warnings when there are none', () => {
    expect(envelope([])).toEqual({ data: [] });
  });

  it('attaches warnings when present', () => {
    const warning: DataQualityWarning = {
      code: DataWarningCode.EMPTY_RESULT,
      row: null,
      column: null,
      message: 'No services match the selected filters',
    };

    expect(envelope([], [warning])).toEqual({ data: [], warnings: [warning] });
  });
});
