import { countWords } from '../../domain/services/DescriptionNormalizer.js';
import type { ClassificationResultDTO, IntentCategory } from '../dto/ClassificationResultDTO.js';
import type { IntentCorpusDTO } from '../dto/VocabularyDTO.js';
import type { EmbeddingBackendPort } from '../ports/EmbeddingBackendPort.js';
import type { LoggerPort } from '../ports/LoggerPort.js';

export const ACCEPT_CONFIDENCE = 0.7;
export const CLARIFICATION_THRESHOLD = 0.5;

const DEFAULT_RESULT: ClassificationResultDTO = {
  category: 'general',
  type: 'unknown',
  confidence: 0.3,
  method: 'default',
};

// Earlier categories win ties: the most specific request type comes first.
const KEYWORD_PRIORITY: readonly IntentCategory[] = ['interaction_data', 'context_data', 'general'];

interface KeywordMatch {
  category: IntentCategory;
  type: string;
  confidence: number;
  keywordLength: number;
}

const roundScore = (value: number): number => Math.round(value * 100) / 100;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const cosineSimilarity = (left: number[], right: number[]): number => {
  if (!left.length || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftMagnitude = 0;
  let rightMagnitude = 0;

  left.forEach((value, index) => {
    const other = right[index] ?? 0;
    dot += value * other;
    leftMagnitude += value * value;
    rightMagnitude += other * other;
  });

  if (leftMagnitude === 0 || rightMagnitude === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftMagnitude) * Math.sqrt(rightMagnitude));
};

export const similarityToConfidence = (similarity: number): number => {
  if (similarity > 0.65) {
    return Math.min(0.95, similarity);
  }
  if (similarity > 0.5) {
    return similarity * 0.85;
  }
  return similarity * 0.5;
};

/**
 * Hybrid classifier: local embeddings, then remote embeddings, then keyword
 * rules. Every exemplar is compared on every call; the embedding backends
 * are expected to cache.
 */
export class IntentClassifierService {
  private readonly failedBackends = new Set<string>();
  private readonly keywordPatterns = new Map<string, RegExp>();

  constructor(
    private readonly corpus: IntentCorpusDTO,
    private readonly backends: { local: EmbeddingBackendPort; remote?: EmbeddingBackendPort },
    private readonly logger: LoggerPort,
  ) {}

  async classify(text: string): Promise<ClassificationResultDTO> {
    const query = text.trim();
    if (!query) {
      return DEFAULT_RESULT;
    }

    const local = await this.classifyWithEmbeddings(query, this.backends.local, 'local_embedding');
    if (local && local.confidence >= ACCEPT_CONFIDENCE) {
      this.logger.debug('intent_classified', { ...local });
      return local;
    }

    const remote = this.backends.remote
      ? await this.classifyWithEmbeddings(query, this.backends.remote, 'remote_embedding')
      : null;
    if (remote && remote.confidence >= ACCEPT_CONFIDENCE) {
      this.logger.debug('intent_classified', { ...remote });
      return remote;
    }

    const keyword = this.classifyWithKeywords(query.toLowerCase()) ?? DEFAULT_RESULT;

    const best = [local, remote, keyword].reduce<ClassificationResultDTO | null>((current, candidate) => {
      if (!candidate) {
        return current;
      }
      return !current || candidate.confidence > current.confidence ? candidate : current;
    }, null);

    const result = best ?? DEFAULT_RESULT;
    this.logger.debug('intent_classified', { ...result });
    return result;
  }

  shouldAskForClarification(confidence: number): boolean {
    return confidence < CLARIFICATION_THRESHOLD;
  }

  isBackendAvailable(name: string): boolean {
    return !this.failedBackends.has(name);
  }

  classifyWithKeywords(queryLower: string): ClassificationResultDTO | null {
    const matches: KeywordMatch[] = [];
    const words = countWords(queryLower);

    for (const category of KEYWORD_PRIORITY) {
      for (const [type, keywords] of Object.entries(this.corpus.keywords[category])) {
        for (const keyword of keywords) {
          if (!this.keywordPattern(keyword).test(queryLower)) {
            continue;
          }

          let confidence = this.keywordConfidence(queryLower, keyword, words);
          if (keyword.includes(' ')) {
            confidence += 0.1;
          }
          matches.push({ category, type, confidence: roundScore(confidence), keywordLength: keyword.length });
        }
      }
    }

    // Stable sort keeps priority order among equal matches.
    matches.sort((left, right) => right.confidence - left.confidence || right.keywordLength - left.keywordLength);

    const [best] = matches;
    if (!best) {
      return null;
    }

    return {
      category: best.category,
      type: best.type,
      confidence: Math.min(1, best.confidence),
      method: 'keyword',
    };
  }

  private keywordConfidence(query: string, keyword: string, words: number): number {
    let confidence = 0.7;

    if (query.startsWith(keyword)) {
      confidence += 0.2;
    }
    if (words > 15) {
      confidence -= 0.1;
    }
    if (words <= 5) {
      confidence += 0.1;
    }

    return Math.min(1, Math.max(0, confidence));
  }

  private keywordPattern(keyword: string): RegExp {
    let pattern = this.keywordPatterns.get(keyword);
    if (!pattern) {
      pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}($|[^\\p{L}\\p{N}])`, 'u');
      this.keywordPatterns.set(keyword, pattern);
    }
    return pattern;
  }

  private async classifyWithEmbeddings(
    query: string,
    backend: EmbeddingBackendPort,
    method: 'local_embedding' | 'remote_embedding',
  ): Promise<ClassificationResultDTO | null> {
    if (this.failedBackends.has(backend.name)) {
      return null;
    }

    try {
      const queryVector = await backend.embed(query);
      let bestScore = 0;
      let best: { category: IntentCategory; type: string } | null = null;

      for (const category of KEYWORD_PRIORITY) {
        for (const [type, exemplars] of Object.entries(this.corpus.exemplars[category])) {
          for (const exemplar of exemplars) {
            const score = cosineSimilarity(queryVector, await backend.embed(exemplar));
            if (score > bestScore) {
              bestScore = score;
              best = { category, type };
            }
          }
        }
      }

      if (!best) {
        return null;
      }

      return { ...best, confidence: similarityToConfidence(bestScore), method };
    } catch (error) {
      this.failedBackends.add(backend.name);
      this.logger.warn('embedding_backend_unavailable', {
        backend: backend.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
