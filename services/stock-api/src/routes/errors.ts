import { FastifyReply } from 'fastify';
import { DomainError, LockTimeoutError } from '@spareline/shared/src/utils/errors';
import { logger } from '@spareline/shared/src/utils/logger';

export function sendError(reply: FastifyReply, error: unknown, context: string): FastifyReply {
     if (error instanceof DomainError) {
          if (error instanceof LockTimeoutError) {
               reply.header('Retry-After', '1');
          }
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
               details: error.details,
          });
     }

     logger.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}
