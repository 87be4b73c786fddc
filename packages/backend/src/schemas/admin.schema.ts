import { z } from 'zod';

export const resetDataSchema = z.object({
  password: z.string().min(1),
});

export type ResetDataInput = z.infer<typeof resetDataSchema>;
