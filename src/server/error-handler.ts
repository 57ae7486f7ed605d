/**
 * Transport Error Handler
 * @module server/error-handler
 *
 * Answers requests the transport could not hand to the dispatcher (body over
 * the limit, malformed framing, a dispatcher fault) with the transport's
 * status code and an empty body.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

export interface ErrorHandlerOptions {
  logger?: StructuredLogger;
}

/**
 * Status code for a transport failure: the error's own when it is an HTTP
 * error status, 500 otherwise
 */
export function statusCodeFor(error: FastifyError | Error): number {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode <= 599) {
    return error.statusCode;
  }
  return 500;
}

async function errorHandlerPlugin(fastify: FastifyInstance, options: ErrorHandlerOptions): Promise<void> {
  const logger = options.logger ?? createModuleLogger('transport');

  fastify.setErrorHandler(async (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = statusCodeFor(error);
    logger.child({ method: request.method, url: request.url }).transportError(error, statusCode);

    return reply.status(statusCode).send();
  });
}

export default fp(errorHandlerPlugin, {
  name: 'mock-error-handler',
  fastify: '4.x',
});
