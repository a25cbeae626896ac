// ============================================================================
// Analysis Session Service
// Owns the loaded extract for one upload. Loading is all-or-nothing: a
// session exists only once the workbook has been read and normalized. Every
// dashboard query runs against a filtered view of the session's records.
// ============================================================================

import { createHash, randomUUID } from 'node:crypto';
import {
  DataWarningCode,
  OutlierScope,
  type Measure,
} from '@carelens/shared/constants/extract.constants.js';
import { NotFoundError } from '../../../lib/errors.js';
import type { AnalysisConfig } from '../analysis.config.js';
import type {
  AnalysisSession,
  AnomalyReport,
  ConcernFlag,
  DataQualityWarning,
  FilterResult,
  IndicatorSummary,
  NormalizedExtract,
  ProviderProfile,
  ResidentsExperienceItem,
  RiskRadar,
  SectorBenchmarks,
  SectorOverview,
  ServiceRecord,
} from '../analytics.types.js';
import type { AnalysisSessionRepository } from '../repos/analysis-session.repo.js';
import {
  aggregateProvider,
  summarizeIndicator,
  summarizeResidentsExperience,
  summarizeSector,
} from './aggregation.service.js';
import { computeRiskRadar, computeSectorBenchmarks } from './benchmark.service.js';
import { loadExtract } from './extract-loader.service.js';
import {
  ANY,
  filterServices,
  listFilterOptions,
  normalizePredicates,
  NO_PREDICATES,
  type FilterOptions,
  type ServicePredicates,
} from './filter.service.js';
import { normalizeExtract } from './normalizer.service.js';
import { findAnomalies } from './outlier.service.js';
import { classifyServices } from './risk-classifier.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScopedResult<T> {
  data: T;
  /** Warnings produced by the filter, e.g. an empty selection. */
  warnings: DataQualityWarning[];
}

export interface ConcernEntry {
  record: ServiceRecord;
  flag: ConcernFlag;
}

interface AnalysisSessionDeps {
  repo: AnalysisSessionRepository;
  config: AnalysisConfig;
  now?: () => Date; // injectable for testing
  generateId?: () => string;
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Reads and normalizes one workbook. Throws SchemaError when a required sheet
 * or column is missing, and NormalizationError for a bad row in strict mode.
 */
export function loadServiceRecords(bytes: Buffer, config: AnalysisConfig): NormalizedExtract {
  return normalizeExtract(loadExtract(bytes), config);
}

export function hashSource(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export function createAnalysisSessionService(deps: AnalysisSessionDeps) {
  const { repo, config } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? randomUUID;

  function buildSession(id: string, bytes: Buffer, fileName: string): AnalysisSession {
    const { records, warnings } = loadServiceRecords(bytes, config);
    return Object.freeze({
      id,
      fileName,
      sourceHash: hashSource(bytes),
      records,
      warnings: Object.freeze(warnings),
      loadedAt: now(),
    });
  }

  function getSession(sessionId: string): AnalysisSession {
    const session = repo.findById(sessionId);
    if (!session) {
      throw new NotFoundError('Analysis session');
    }
    return session;
  }

  function filter(sessionId: string, predicates: ServicePredicates = NO_PREDICATES): FilterResult {
    const session = getSession(sessionId);
    const key = normalizePredicates(predicates);

    let records = repo.getCachedFilter(session, key);
    if (!records) {
      records = filterServices(session.records, predicates);
      repo.cacheFilter(session, key, records);
    }

    const warnings: DataQualityWarning[] =
      records.length === 0
        ? [
            {
              code: DataWarningCode.EMPTY_RESULT,
              row: null,
              column: null,
              message: 'No services match the selected filters',
            },
          ]
        : [];
    return { records, warnings };
  }

  function scoped<T>(
    sessionId: string,
    predicates: ServicePredicates,
    compute: (records: readonly ServiceRecord[], session: AnalysisSession) => T,
  ): ScopedResult<T> {
    const session = getSession(sessionId);
    const { records, warnings } = filter(sessionId, predicates);
    return { data: compute(records, session), warnings };
  }

  function requireProvider(session: AnalysisSession, providerId: string): void {
    if (!session.records.some((record) => record.providerId === providerId)) {
      throw new NotFoundError('Provider');
    }
  }

  // Peers for a provider comparison: the same filter, minus the provider itself
  function sectorPredicates(predicates: ServicePredicates): ServicePredicates {
    return { ...predicates, providerId: ANY };
  }

  function outlierPopulation(
    session: AnalysisSession,
  ): readonly ServiceRecord[] | undefined {
    return config.outlierScope === OutlierScope.NATIONAL ? session.records : undefined;
  }

  return {
    createSession(bytes: Buffer, fileName: string): AnalysisSession {
      return repo.save(buildSession(generateId(), bytes, fileName));
    },

    /** Loads a new workbook into an existing session. The old records stay if loading fails. */
    replaceExtract(sessionId: string, bytes: Buffer, fileName: string): AnalysisSession {
      getSession(sessionId);
      return repo.save(buildSession(sessionId, bytes, fileName));
    },

    getSession,

    endSession(sessionId: string): void {
      if (!repo.delete(sessionId)) {
        throw new NotFoundError('Analysis session');
      }
    },

    filter,

    filterOptions(sessionId: string): FilterOptions {
      return listFilterOptions(getSession(sessionId).records);
    },

    overview(sessionId: string, predicates: ServicePredicates): ScopedResult<SectorOverview> {
      return scoped(sessionId, predicates, (records) => summarizeSector(records));
    },

    providerProfile(
      sessionId: string,
      providerId: string,
      predicates: ServicePredicates,
    ): ScopedResult<ProviderProfile> {
      requireProvider(getSession(sessionId), providerId);
      return scoped(sessionId, predicates, (records) => aggregateProvider(records, providerId));
    },

    indicator(
      sessionId: string,
      indicator: Measure,
      predicates: ServicePredicates,
    ): ScopedResult<IndicatorSummary> {
      return scoped(sessionId, predicates, (records, session) =>
        summarizeIndicator(records, indicator, {
          iqrMultiplier: config.iqrMultiplier,
          population: outlierPopulation(session),
        }),
      );
    },

    concerns(sessionId: string, predicates: ServicePredicates): ScopedResult<ConcernEntry[]> {
      return scoped(sessionId, predicates, (records) => {
        const byId = new Map(records.map((record) => [record.serviceId, record]));
        const entries: ConcernEntry[] = [];
        for (const flag of classifyServices(records, config)) {
          const record = byId.get(flag.serviceId);
          if (record) entries.push({ record, flag });
        }
        return entries;
      });
    },

    anomalies(sessionId: string, predicates: ServicePredicates): ScopedResult<AnomalyReport> {
      return scoped(sessionId, predicates, (records, session) =>
        findAnomalies(records, {
          iqrMultiplier: config.iqrMultiplier,
          minOutlierSample: config.minOutlierSample,
          population: outlierPopulation(session),
        }),
      );
    },

    benchmarks(
      sessionId: string,
      providerId: string,
      predicates: ServicePredicates,
    ): ScopedResult<SectorBenchmarks> {
      requireProvider(getSession(sessionId), providerId);
      return scoped(sessionId, sectorPredicates(predicates), (records) =>
        computeSectorBenchmarks(records, providerId),
      );
    },

    radar(
      sessionId: string,
      providerId: string,
      predicates: ServicePredicates,
    ): ScopedResult<RiskRadar> {
      requireProvider(getSession(sessionId), providerId);
      return scoped(sessionId, sectorPredicates(predicates), (records) =>
        computeRiskRadar(records, providerId),
      );
    },

    residentsExperience(
      sessionId: string,
      predicates: ServicePredicates,
    ): ScopedResult<ResidentsExperienceItem[]> {
      return scoped(sessionId, predicates, (records) => summarizeResidentsExperience(records));
    },
  };
}

export type AnalysisSessionService = ReturnType<typeof createAnalysisSessionService>;
