import { FastifyInstance } from 'fastify';
import type { ServiceRouteOptions } from '../services/index.js';
import type { ResultsResponse } from '../types/index.js';

export async function resultsRoutes(
  fastify: FastifyInstance,
  { services }: ServiceRouteOptions
): Promise<void> {
  // GET /api/results - Summaries for every scenario plus participation
  fastify.get('/api/results', async (_request, reply) => {
    const [summaries, participation] = await Promise.all([
      services.votes.allSummaries(),
      services.votes.participation(),
    ]);
    const result: ResultsResponse = { summaries, participation };
    return reply.code(200).send(result);
  });
}
