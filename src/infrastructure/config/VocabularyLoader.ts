import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import {
  AccountVocabularySchema,
  CategoryVocabularySchema,
  DateVocabularySchema,
  IntentCorpusSchema,
  type FinanceVocabulary,
  type IntentCorpusDTO,
} from '../../application/dto/VocabularyDTO.js';

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

const readJson = <S extends z.ZodTypeAny>(dataDir: string, file: string, schema: S): z.output<S> => {
  const parsed = schema.safeParse(JSON.parse(readFileSync(join(dataDir, file), 'utf8')));
  if (!parsed.success) {
    throw new Error(`Invalid vocabulary file ${file}: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`);
  }
  return parsed.data;
};

export const loadFinanceVocabulary = (dataDir: string = DEFAULT_DATA_DIR): FinanceVocabulary => ({
  accounts: readJson(dataDir, 'accounts.json', AccountVocabularySchema),
  categories: readJson(dataDir, 'categories.json', CategoryVocabularySchema),
  dates: readJson(dataDir, 'date-vocabulary.json', DateVocabularySchema),
});

export const loadIntentCorpus = (dataDir: string = DEFAULT_DATA_DIR): IntentCorpusDTO =>
  readJson(dataDir, 'intent-corpus.json', IntentCorpusSchema);
