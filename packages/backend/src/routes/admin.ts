import { FastifyInstance } from 'fastify';
import { resetDataSchema } from '../schemas/admin.schema.js';
import type { ServiceRouteOptions } from '../services/index.js';

export async function adminRoutes(
  fastify: FastifyInstance,
  { services }: ServiceRouteOptions
): Promise<void> {
  // POST /api/admin/reset - Wipe all scenarios and votes (password required)
  fastify.post<{ Body: unknown }>('/api/admin/reset', async (request, reply) => {
    const { password } = resetDataSchema.parse(request.body);
    await services.admin.resetAll(password);
    request.log.warn('All scenarios and votes were reset');
    return reply.code(204).send();
  });
}
