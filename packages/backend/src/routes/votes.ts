import { FastifyInstance } from 'fastify';
import { scenarioIdParamsSchema } from '../schemas/scenarios.schema.js';
import {
  castVoteSchema,
  scenarioVoterParamsSchema,
  voterParamsSchema,
} from '../schemas/votes.schema.js';
import type { ServiceRouteOptions } from '../services/index.js';

export async function votesRoutes(
  fastify: FastifyInstance,
  { services }: ServiceRouteOptions
): Promise<void> {
  // POST /api/scenarios/:id/votes - Cast a 1-5 rating
  fastify.post<{ Params: Record<string, string>; Body: unknown }>(
    '/api/scenarios/:id/votes',
    async (request, reply) => {
      const { id } = scenarioIdParamsSchema.parse(request.params);
      const data = castVoteSchema.parse(request.body);
      const vote = await services.votes.castVote(id, data.score, data.voterToken, data.voterName);
      request.log.info({ scenarioId: id, score: vote.score }, 'Vote cast');
      return reply.code(201).send(vote);
    }
  );

  // DELETE /api/scenarios/:id/votes/:voterToken - Retract a voter's rating
  fastify.delete<{ Params: Record<string, string> }>(
    '/api/scenarios/:id/votes/:voterToken',
    async (request, reply) => {
      const { id, voterToken } = scenarioVoterParamsSchema.parse(request.params);
      const removed = await services.votes.retractVote(id, voterToken);
      return reply.code(200).send({ removed });
    }
  );

  // GET /api/scenarios/:id/summary - Count, mean and histogram for one scenario
  fastify.get<{ Params: Record<string, string> }>(
    '/api/scenarios/:id/summary',
    async (request, reply) => {
      const { id } = scenarioIdParamsSchema.parse(request.params);
      const summary = await services.votes.summary(id);
      return reply.code(200).send(summary);
    }
  );

  // GET /api/voters/:voterToken/votes - A voter's own ratings
  fastify.get<{ Params: Record<string, string> }>(
    '/api/voters/:voterToken/votes',
    async (request, reply) => {
      const { voterToken } = voterParamsSchema.parse(request.params);
      const votes = await services.votes.votesBy(voterToken);
      return reply.code(200).send(votes);
    }
  );

  // DELETE /api/voters/:voterToken/votes - Clear every rating by a voter
  fastify.delete<{ Params: Record<string, string> }>(
    '/api/voters/:voterToken/votes',
    async (request, reply) => {
      const { voterToken } = voterParamsSchema.parse(request.params);
      const removed = await services.votes.clearVotes(voterToken);
      return reply.code(200).send({ removed });
    }
  );
}
