import type { CategorySuggestionDTO } from '../dto/CategorySuggestionDTO.js';

export interface CategorySuggesterPort {
  suggest(
    description: string,
    context: { type: 'income' | 'expense'; userId?: string },
  ): Promise<CategorySuggestionDTO | null>;
}
