import type { FastifyReply } from 'fastify';
import { ValidationError } from '@depthcost/core';

export function handleServiceError(reply: FastifyReply, error: unknown): void {
  if (error instanceof ValidationError) {
    reply.status(400).send({ message: error.message, errors: error.fields });
    return;
  }
  throw error;
}
