import { z } from 'zod';

// Range and integer checks live in VoteAggregator so every caller gets a ValidationError
export const castVoteSchema = z.object({
  score: z.number(),
  voterToken: z.string(),
  voterName: z.string().optional(),
});

export type CastVoteInput = z.infer<typeof castVoteSchema>;

export const voterParamsSchema = z.object({
  voterToken: z.string().min(1).max(128),
});

export const scenarioVoterParamsSchema = voterParamsSchema.extend({
  id: z.coerce.number().int().positive(),
});

export type ScenarioVoterParams = z.infer<typeof scenarioVoterParamsSchema>;
