// ============================================================================
// Dashboard Routes
// Read-only GET endpoints over one analysis session. Every endpoint accepts
// the same filter query (state, provider, size, mmm) and answers `{ data }`,
// plus `warnings` when the filter selects nothing.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  indicatorParamSchema,
  providerParamSchema,
  serviceFilterQuerySchema,
  sessionParamSchema,
  type IndicatorParam,
  type ProviderParam,
  type ServiceFilterQuery,
  type SessionParam,
} from '@carelens/shared/schemas/validation/analytics.validation.js';
import {
  envelope,
  presentAnomalies,
  presentBenchmarks,
  presentConcerns,
  presentIndicator,
  presentOverview,
  presentProfile,
  presentRadar,
  presentResidentsExperience,
  presentServices,
} from '../analytics.presenter.js';
import type { AnalysisSessionService } from '../services/analysis-session.service.js';
import { predicatesFromQuery } from '../services/filter.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DashboardRouteDeps {
  sessionService: AnalysisSessionService;
}

type SessionRequest = FastifyRequest<{ Params: SessionParam; Querystring: ServiceFilterQuery }>;
type ProviderRequest = FastifyRequest<{ Params: ProviderParam; Querystring: ServiceFilterQuery }>;

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function dashboardRoutes(
  app: FastifyInstance,
  opts: { deps: DashboardRouteDeps },
) {
  const { sessionService } = opts.deps;

  const sessionSchema = { params: sessionParamSchema, querystring: serviceFilterQuerySchema };
  const providerSchema = { params: providerParamSchema, querystring: serviceFilterQuerySchema };

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/filter-options
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/filter-options', {
    schema: { params: sessionParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: SessionParam }>,
      reply: FastifyReply,
    ) => {
      const options = sessionService.filterOptions(request.params.sessionId);
      return reply.code(200).send({ data: options });
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/services
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/services', {
    schema: sessionSchema,
    handler: async (request: SessionRequest, reply: FastifyReply) => {
      const { records, warnings } = sessionService.filter(
        request.params.sessionId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentServices(records), warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/overview
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/overview', {
    schema: sessionSchema,
    handler: async (request: SessionRequest, reply: FastifyReply) => {
      const result = sessionService.overview(
        request.params.sessionId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentOverview(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/providers/:providerId/profile
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/providers/:providerId/profile', {
    schema: providerSchema,
    handler: async (request: ProviderRequest, reply: FastifyReply) => {
      const result = sessionService.providerProfile(
        request.params.sessionId,
        request.params.providerId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentProfile(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/indicators/:indicator
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/indicators/:indicator', {
    schema: { params: indicatorParamSchema, querystring: serviceFilterQuerySchema },
    handler: async (
      request: FastifyRequest<{ Params: IndicatorParam; Querystring: ServiceFilterQuery }>,
      reply: FastifyReply,
    ) => {
      const result = sessionService.indicator(
        request.params.sessionId,
        request.params.indicator,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentIndicator(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/concerns
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/concerns', {
    schema: sessionSchema,
    handler: async (request: SessionRequest, reply: FastifyReply) => {
      const result = sessionService.concerns(
        request.params.sessionId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentConcerns(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/anomalies
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/anomalies', {
    schema: sessionSchema,
    handler: async (request: SessionRequest, reply: FastifyReply) => {
      const result = sessionService.anomalies(
        request.params.sessionId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentAnomalies(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/providers/:providerId/benchmarks
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/providers/:providerId/benchmarks', {
    schema: providerSchema,
    handler: async (request: ProviderRequest, reply: FastifyReply) => {
      const result = sessionService.benchmarks(
        request.params.sessionId,
        request.params.providerId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentBenchmarks(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/providers/:providerId/radar
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/providers/:providerId/radar', {
    schema: providerSchema,
    handler: async (request: ProviderRequest, reply: FastifyReply) => {
      const result = sessionService.radar(
        request.params.sessionId,
        request.params.providerId,
        predicatesFromQuery(request.query),
      );
      return reply.code(200).send(envelope(presentRadar(result.data), result.warnings));
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId/residents-experience
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId/residents-experience', {
    schema: sessionSchema,
    handler: async (request: SessionRequest, reply: FastifyReply) => {
      const result = sessionService.residentsExperience(
        request.params.sessionId,
        predicatesFromQuery(request.query),
      );
      return reply
        .code(200)
        .send(envelope(presentResidentsExperience(result.data), result.warnings));
    },
  });
}
