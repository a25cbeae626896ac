// ============================================================================
// Analysis Session Routes
// Upload, replace and discard the extract a dashboard works on.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import multipart from '@fastify/multipart';
import { DataWarningCode } from '@carelens/shared/constants/extract.constants.js';
import {
  sessionParamSchema,
  type SessionParam,
} from '@carelens/shared/schemas/validation/analytics.validation.js';
import { ValidationError } from '../../../lib/errors.js';
import { uploadRateLimit } from '../../../plugins/rate-limit.plugin.js';
import { presentSession } from '../analytics.presenter.js';
import type { AnalysisSession } from '../analytics.types.js';
import type { AnalysisSessionService } from '../services/analysis-session.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionRouteDeps {
  sessionService: AnalysisSessionService;
  maxUploadBytes: number;
}

const ALLOWED_CONTENT_TYPES = new Set([
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
  'application/octet-stream',
]);

const FILE_TOO_LARGE = 'File exceeds the maximum upload size';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readUpload(
  request: FastifyRequest,
  maxUploadBytes: number,
): Promise<{ bytes: Buffer; fileName: string }> {
  const file = await request.file();
  if (!file) {
    throw new ValidationError('No file uploaded');
  }

  if (!ALLOWED_CONTENT_TYPES.has(file.mimetype)) {
    throw new ValidationError(
      `Invalid content type: ${file.mimetype}. Upload the .xlsx Star Ratings extract`,
    );
  }

  const chunks: Buffer[] = [];
  let totalSize = 0;
  for await (const chunk of file.file) {
    totalSize += chunk.length;
    if (totalSize > maxUploadBytes) {
      throw new ValidationError(FILE_TOO_LARGE, { maxBytes: maxUploadBytes });
    }
    chunks.push(chunk);
  }

  if (file.file.truncated) {
    throw new ValidationError(FILE_TOO_LARGE, { maxBytes: maxUploadBytes });
  }

  const bytes = Buffer.concat(chunks);
  if (bytes.length === 0) {
    throw new ValidationError('Uploaded file is empty');
  }
  return { bytes, fileName: file.filename };
}

function logLoad(request: FastifyRequest, session: AnalysisSession, action: string): void {
  const droppedRows = session.warnings.filter(
    (warning) => warning.code === DataWarningCode.ROW_DROPPED,
  ).length;
  request.log.info(
    {
      sessionId: session.id,
      fileName: session.fileName,
      serviceCount: session.records.length,
      warningCount: session.warnings.length,
      droppedRows,
    },
    `Extract ${action}`,
  );
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function sessionRoutes(
  app: FastifyInstance,
  opts: { deps: SessionRouteDeps },
) {
  const { sessionService, maxUploadBytes } = opts.deps;

  await app.register(multipart, {
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
    // Report oversized files through the truncated flag instead of a stream error
    throwFileSizeLimit: false,
  });

  // =========================================================================
  // POST /api/v1/sessions
  // =========================================================================

  app.post('/api/v1/sessions', {
    config: { rateLimit: uploadRateLimit() },
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const { bytes, fileName } = await readUpload(request, maxUploadBytes);
      const session = sessionService.createSession(bytes, fileName);
      logLoad(request, session, 'loaded');
      return reply.code(201).send({ data: presentSession(session) });
    },
  });

  // =========================================================================
  // PUT /api/v1/sessions/:sessionId/extract
  // =========================================================================

  app.put('/api/v1/sessions/:sessionId/extract', {
    schema: { params: sessionParamSchema },
    config: { rateLimit: uploadRateLimit() },
    handler: async (
      request: FastifyRequest<{ Params: SessionParam }>,
      reply: FastifyReply,
    ) => {
      // Fail before reading the body when the session is gone
      sessionService.getSession(request.params.sessionId);
      const { bytes, fileName } = await readUpload(request, maxUploadBytes);
      const session = sessionService.replaceExtract(request.params.sessionId, bytes, fileName);
      logLoad(request, session, 'replaced');
      return reply.code(200).send({ data: presentSession(session) });
    },
  });

  // =========================================================================
  // GET /api/v1/sessions/:sessionId
  // =========================================================================

  app.get('/api/v1/sessions/:sessionId', {
    schema: { params: sessionParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: SessionParam }>,
      reply: FastifyReply,
    ) => {
      const session = sessionService.getSession(request.params.sessionId);
      return reply.code(200).send({ data: presentSession(session) });
    },
  });

  // =========================================================================
  // DELETE /api/v1/sessions/:sessionId
  // =========================================================================

  app.delete('/api/v1/sessions/:sessionId', {
    schema: { params: sessionParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: SessionParam }>,
      reply: FastifyReply,
    ) => {
      sessionService.endSession(request.params.sessionId);
      request.log.info({ sessionId: request.params.sessionId }, 'Session ended');
      return reply.code(204).send();
    },
  });
}
