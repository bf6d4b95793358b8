import { z } from 'zod';

export const CategorySuggestionSchema = z.object({
  category: z.string(),
  confidence: z.number().min(0).max(1),
  method: z.enum(['keywords', 'history']),
  message: z.string(),
  matchedKeywords: z.array(z.string()).optional(),
});

export type CategorySuggestionDTO = z.infer<typeof CategorySuggestionSchema>;
