import { type FastifyError, type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, message, details? } }
//   AppError 4xx        -> its own status and code
//   Schema validation   -> 400 VALIDATION_ERROR
//   Other Fastify 4xx   -> their status (e.g. 406 non-multipart, 413 too large)
//   Everything else     -> 500 INTERNAL_ERROR, logged, no internals exposed
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    if (error instanceof AppError && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
      });
    }

    // Zod failures arrive as FST_ERR_VALIDATION without `validation` set.
    // Neither path echoes the submitted values back.
    if (('validation' in error && error.validation) || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({
        error: { code: 'VALIDATION_ERROR', message: 'Validation failed' },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (!(error instanceof AppError) && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({
      error: { code: 'NOT_FOUND', message: 'Resource not found' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
