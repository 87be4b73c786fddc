import { FastifyInstance } from 'fastify';
import type { ServiceRouteOptions } from '../services/index.js';
import type { ClientSettings } from '../types/index.js';

export async function settingsRoutes(
  fastify: FastifyInstance,
  { services }: ServiceRouteOptions
): Promise<void> {
  // GET /api/settings - Limits and policies the UI mirrors
  fastify.get('/api/settings', async (_request, reply) => {
    const settings: ClientSettings = {
      maxScenarioLength: services.scenarios.maxTextLength,
      preventDuplicateVotes: services.votes.preventDuplicateVotes,
      resetEnabled: services.admin.resetEnabled,
    };
    return reply.code(200).send(settings);
  });
}
