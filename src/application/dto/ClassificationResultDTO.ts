import { z } from 'zod';

export const IntentCategorySchema = z.enum(['general', 'context_data', 'interaction_data']);

export type IntentCategory = z.infer<typeof IntentCategorySchema>;

export const ClassificationResultSchema = z.object({
  category: IntentCategorySchema,
  type: z.string(),
  confidence: z.number().min(0).max(1),
  method: z.enum(['local_embedding', 'remote_embedding', 'keyword', 'default']),
});

export type ClassificationResultDTO = z.infer<typeof ClassificationResultSchema>;
