import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { pathToFileURL } from 'node:url';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { getEnv, type Env } from './lib/env.js';
import { analysisConfigFromEnv } from './domains/analytics/analysis.config.js';
import { createAnalysisSessionRepository } from './domains/analytics/repos/analysis-session.repo.js';
import {
  createAnalysisSessionService,
  type AnalysisSessionService,
} from './domains/analytics/services/analysis-session.service.js';
import { sessionRoutes } from './domains/analytics/routes/session.routes.js';
import { dashboardRoutes } from './domains/analytics/routes/dashboard.routes.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';

export interface BuildAppOptions {
  env?: Env;
  sessionService?: AnalysisSessionService;
  fastify?: FastifyServerOptions;
}

export function buildApp(opts: BuildAppOptions = {}) {
  const env = opts.env ?? getEnv();
  const sessionService =
    opts.sessionService ??
    createAnalysisSessionService({
      repo: createAnalysisSessionRepository({
        sessionTtlMinutes: env.SESSION_TTL_MINUTES,
        maxSessions: env.MAX_SESSIONS,
        maxCachedFilters: env.MAX_CACHED_FILTERS,
      }),
      config: analysisConfigFromEnv(env),
    });

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    genReqId: () => randomUUID(),
    ...opts.fastify,
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: env.CORS_ORIGIN,
  });
  app.register(rateLimitPluginFp);
  app.register(errorHandlerPluginFp);

  // Routes
  app.register(sessionRoutes, {
    deps: { sessionService, maxUploadBytes: env.MAX_UPLOAD_MB * 1024 * 1024 },
  });
  app.register(dashboardRoutes, { deps: { sessionService } });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return { app, sessionService };
}

/** Loads DEFAULT_EXTRACT_PATH into a first session, if configured. */
export async function loadDefaultExtract(
  env: Env,
  sessionService: AnalysisSessionService,
): Promise<string | null> {
  if (!env.DEFAULT_EXTRACT_PATH) return null;
  const bytes = await readFile(env.DEFAULT_EXTRACT_PATH);
  return sessionService.createSession(bytes, basename(env.DEFAULT_EXTRACT_PATH)).id;
}

// Start server when run directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  const env = getEnv();
  const { app, sessionService } = buildApp({ env });

  loadDefaultExtract(env, sessionService)
    .then((sessionId) => {
      if (sessionId) {
        app.log.info({ sessionId, path: env.DEFAULT_EXTRACT_PATH }, 'Default extract loaded');
      }
      return app.listen({ port: env.API_PORT, host: env.API_HOST });
    })
    .catch((err: unknown) => {
      app.log.error(err);
      process.exit(1);
    });
}
