import type { FastifyRequest } from 'fastify';

export type RequestWithPrincipal = FastifyRequest & {
  principal?: string;
};
