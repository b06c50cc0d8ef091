import { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, message, details? } }
//   AppError          → its own status and code
//   schema validation → 400 VALIDATION_ERROR
//   other 4xx         → passed through (bad JSON, payload too large, ...)
//   anything else     → 500 INTERNAL_ERROR, logged
// ---------------------------------------------------------------------------

export function errorHandler(
  error: FastifyError | AppError,
  request: FastifyRequest,
  reply: FastifyReply,
) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      request.log.warn({ err: error }, error.message);
    }
    return reply.code(error.statusCode).send({
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
  }

  if (error.validation || error.code === 'FST_ERR_VALIDATION') {
    return reply.code(400).send({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: error.validation ?? error.message,
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
}

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler(errorHandler);
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});
