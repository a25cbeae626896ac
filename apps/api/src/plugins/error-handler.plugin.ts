import { type FastifyError, type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, message, details? } }
//   AppError            → its own status and code
//   schema validation   → 400 VALIDATION_ERROR
//   other Fastify 4xx   → passed through (payload too large, bad multipart)
//   anything else       → 500 INTERNAL_ERROR, logged
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
      });
    }

    // Zod schema failures arrive as the ZodError itself, tagged FST_ERR_VALIDATION
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: error instanceof ZodError ? error.issues : error.validation,
        },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: { code: error.code, message: error.message },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
