import type { CategorySuggestionDTO } from '../../../application/dto/CategorySuggestionDTO.js';
import type { CategoryVocabularyDTO } from '../../../application/dto/VocabularyDTO.js';
import type { CategorySuggesterPort } from '../../../application/ports/CategorySuggesterPort.js';
import type { FinanceStorePort } from '../../../application/ports/FinanceStorePort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { descriptionWords } from '../../../domain/services/DescriptionNormalizer.js';

type CategoryType = 'income' | 'expense';

interface Rule {
  keyword: string;
  exact: RegExp;
}

interface Scored {
  category: string;
  confidence: number;
  method: CategorySuggestionDTO['method'];
  matchedKeywords?: string[];
}

const KEYWORD_MIN_CONFIDENCE = 0.3;
const HISTORY_MIN_CONFIDENCE = 0.4;
const HISTORY_LIMIT = 50;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const suggestionMessage = (category: string, confidence: number): string => {
  if (confidence > 0.8) {
    return `Looks like '${category}'. Is that right?`;
  }
  if (confidence > 0.6) {
    return `Probably '${category}'. Or another category?`;
  }
  return `Maybe '${category}'? Or something else?`;
};

/**
 * Suggests a category from description keywords and, when a user is known,
 * from how that user categorised similar descriptions before.
 */
export class KeywordCategorySuggester implements CategorySuggesterPort {
  private readonly rules: Record<CategoryType, Record<string, Rule[]>>;

  constructor(
    private readonly vocabulary: CategoryVocabularyDTO,
    private readonly store: FinanceStorePort | null,
    private readonly logger: LoggerPort,
  ) {
    this.rules = {
      income: this.compile(vocabulary.keywords.income),
      expense: this.compile(vocabulary.keywords.expense),
    };
  }

  async suggest(description: string, context: { type: CategoryType; userId?: string }): Promise<CategorySuggestionDTO | null> {
    if (!description.trim()) {
      return null;
    }

    const candidates: Scored[] = [];

    const byKeywords = this.fromKeywords(description, context.type);
    if (byKeywords) {
      candidates.push(byKeywords);
    }

    if (context.userId && this.store) {
      const byHistory = await this.fromHistory(context.userId, description, context.type);
      if (byHistory) {
        candidates.push(byHistory);
      }
    }

    const best = candidates.reduce<Scored | null>(
      (current, candidate) => (!current || candidate.confidence > current.confidence ? candidate : current),
      null,
    );
    if (!best) {
      return null;
    }

    this.logger.debug('category_suggested', { description, category: best.category, confidence: best.confidence, method: best.method });

    return {
      category: best.category,
      confidence: best.confidence,
      method: best.method,
      message: suggestionMessage(best.category, best.confidence),
      matchedKeywords: best.matchedKeywords,
    };
  }

  fromKeywords(description: string, type: CategoryType): Scored | null {
    const lower = description.toLowerCase();
    let best: Scored | null = null;

    for (const [category, rules] of Object.entries(this.rules[type])) {
      let score = 0;
      const matched: string[] = [];

      for (const rule of rules) {
        if (rule.exact.test(lower)) {
          score += 1;
          matched.push(rule.keyword);
        } else if (lower.includes(rule.keyword)) {
          score += 0.5;
          matched.push(rule.keyword);
        }
      }

      if (score === 0) {
        continue;
      }

      // Normalised by bag size so large bags do not win on volume alone.
      const confidence = Math.min((score / rules.length) * 10, 1);
      if (!best || confidence > best.confidence) {
        best = { category, confidence, method: 'keywords', matchedKeywords: matched };
      }
    }

    return best && best.confidence > KEYWORD_MIN_CONFIDENCE ? best : null;
  }

  private async fromHistory(userId: string, description: string, type: CategoryType): Promise<Scored | null> {
    if (!this.store) {
      return null;
    }

    const valid = new Set(this.vocabulary.valid[type]);
    const history = await this.store.getDescriptionHistory(userId, type, HISTORY_LIMIT);
    const words = descriptionWords(description);
    let best: Scored | null = null;

    for (const entry of history) {
      if (!valid.has(entry.category)) {
        continue;
      }

      const pastWords = descriptionWords(entry.description);
      if (!words.size || !pastWords.size) {
        continue;
      }

      const common = Array.from(words).filter((word) => pastWords.has(word)).length;
      const similarity = common / Math.max(words.size, pastWords.size);
      const confidence = similarity * (0.7 + 0.3 * Math.min(entry.frequency / 10, 1));

      if (!best || confidence > best.confidence) {
        best = { category: entry.category, confidence, method: 'history' };
      }
    }

    return best && best.confidence > HISTORY_MIN_CONFIDENCE ? best : null;
  }

  private compile(bags: Record<string, string[]>): Record<string, Rule[]> {
    return Object.fromEntries(
      Object.entries(bags).map(([category, keywords]) => [
        category,
        keywords.map((keyword) => ({
          keyword: keyword.toLowerCase(),
          exact: new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`),
        })),
      ]),
    );
  }
}
