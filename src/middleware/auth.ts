import type { FastifyReply, FastifyRequest } from 'fastify';
import { replyWithError } from '../errors.js';

/** No key configured means the API is open. */
export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expectedKey) {
      return;
    }

    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey !== 'string' || apiKey !== expectedKey) {
      return replyWithError(reply, 401, 'INVALID_API_KEY', 'INVALID_API_KEY');
    }
  };
}
