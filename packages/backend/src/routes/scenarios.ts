import { FastifyInstance } from 'fastify';
import { scenarioIdParamsSchema, submitScenarioSchema } from '../schemas/scenarios.schema.js';
import type { ServiceRouteOptions } from '../services/index.js';

export async function scenariosRoutes(
  fastify: FastifyInstance,
  { services }: ServiceRouteOptions
): Promise<void> {
  // GET /api/scenarios - All scenarios in submission order
  fastify.get('/api/scenarios', async (_request, reply) => {
    const scenarios = await services.scenarios.list();
    return reply.code(200).send(scenarios);
  });

  // GET /api/scenarios/:id - Single scenario
  fastify.get<{ Params: Record<string, string> }>(
    '/api/scenarios/:id',
    async (request, reply) => {
      const { id } = scenarioIdParamsSchema.parse(request.params);
      const scenario = await services.scenarios.get(id);
      return reply.code(200).send(scenario);
    }
  );

  // POST /api/scenarios - Submit a new scenario
  fastify.post<{ Body: unknown }>('/api/scenarios', async (request, reply) => {
    const data = submitScenarioSchema.parse(request.body);
    const scenario = await services.scenarios.submit(data.text, data.submittedBy);
    request.log.info({ scenarioId: scenario.id }, 'Scenario submitted');
    return reply.code(201).send(scenario);
  });
}
