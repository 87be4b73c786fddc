import { z } from 'zod';

export const scenarioIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export type ScenarioIdParams = z.infer<typeof scenarioIdParamsSchema>;

// Length and blank checks live in ScenarioStore so they follow MAX_SCENARIO_LENGTH
export const submitScenarioSchema = z.object({
  text: z.string(),
  submittedBy: z.string().optional(),
});

export type SubmitScenarioInput = z.infer<typeof submitScenarioSchema>;
