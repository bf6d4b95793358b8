import { z } from 'zod';

const wordList = z.array(z.string().min(1));

export const AccountVocabularySchema = z.object({
  accounts: z.record(z.string()),
  aliases: z.record(z.string()),
});

export type AccountVocabularyDTO = z.infer<typeof AccountVocabularySchema>;

export const CategoryVocabularySchema = z.object({
  valid: z.object({
    income: wordList,
    expense: wordList,
  }),
  genericIncome: wordList,
  keywords: z.object({
    income: z.record(wordList),
    expense: z.record(wordList),
  }),
});

export type CategoryVocabularyDTO = z.infer<typeof CategoryVocabularySchema>;

export const DateVocabularySchema = z.object({
  relative: z.record(z.tuple([z.number().int(), z.enum(['day', 'week', 'month', 'year'])])),
  months: z.record(z.number().int().min(1).max(12)),
});

export type DateVocabularyDTO = z.infer<typeof DateVocabularySchema>;

const intentTable = z.object({
  general: z.record(wordList),
  context_data: z.record(wordList),
  interaction_data: z.record(wordList),
});

export const IntentCorpusSchema = z.object({
  exemplars: intentTable,
  keywords: intentTable,
});

export type IntentCorpusDTO = z.infer<typeof IntentCorpusSchema>;

export interface FinanceVocabulary {
  accounts: AccountVocabularyDTO;
  categories: CategoryVocabularyDTO;
  dates: DateVocabularyDTO;
}
