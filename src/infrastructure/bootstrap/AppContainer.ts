import type { FinanceVocabulary, IntentCorpusDTO } from '../../application/dto/VocabularyDTO.js';
import type { CategorySuggesterPort } from '../../application/ports/CategorySuggesterPort.js';
import { systemClock, type ClockPort } from '../../application/ports/ClockPort.js';
import type { ConversationStateStorePort } from '../../application/ports/ConversationStateStorePort.js';
import type { EmbeddingBackendPort } from '../../application/ports/EmbeddingBackendPort.js';
import type { FinanceStorePort } from '../../application/ports/FinanceStorePort.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';
import { ActionExecutorService } from '../../application/services/ActionExecutorService.js';
import { ChatFlowService } from '../../application/services/ChatFlowService.js';
import { ConversationStateService } from '../../application/services/ConversationStateService.js';
import { FieldInterpreterService } from '../../application/services/FieldInterpreterService.js';
import { IntentClassifierService } from '../../application/services/IntentClassifierService.js';
import { KeywordCategorySuggester } from '../adapters/categorizer/KeywordCategorySuggester.js';
import { CachedEmbeddingBackend } from '../adapters/embeddings/CachedEmbeddingBackend.js';
import { HashedNgramEmbeddingBackend } from '../adapters/embeddings/HashedNgramEmbeddingBackend.js';
import { OpenAIEmbeddingBackend } from '../adapters/embeddings/OpenAIEmbeddingBackend.js';
import { openDatabase, type SqliteConnection } from '../adapters/storage/SqliteDatabase.js';
import { SqliteConversationStateStore } from '../adapters/storage/SqliteConversationStateStore.js';
import { SqliteFinanceStore } from '../adapters/storage/SqliteFinanceStore.js';
import { loadConfig, type AppConfig } from '../config/Config.js';
import { loadFinanceVocabulary, loadIntentCorpus } from '../config/VocabularyLoader.js';
import { ConsoleLogger } from '../logging/ConsoleLogger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: LoggerPort;
  clock?: ClockPort;
  database?: SqliteConnection;
  financeStore?: FinanceStorePort;
  stateStore?: ConversationStateStorePort;
  vocabulary?: FinanceVocabulary;
  intentCorpus?: IntentCorpusDTO;
  localEmbeddings?: EmbeddingBackendPort;
  /** `null` disables the remote backend even when an API key is configured. */
  remoteEmbeddings?: EmbeddingBackendPort | null;
  categorySuggester?: CategorySuggesterPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: LoggerPort;
  readonly clock: ClockPort;
  readonly vocabulary: FinanceVocabulary;

  readonly financeStore: FinanceStorePort;
  readonly stateStore: ConversationStateStorePort;
  readonly categorySuggester: CategorySuggesterPort;

  readonly intentClassifier: IntentClassifierService;
  readonly conversationState: ConversationStateService;
  readonly fieldInterpreter: FieldInterpreterService;
  readonly actionExecutor: ActionExecutorService;
  readonly chatFlow: ChatFlowService;

  private readonly database: SqliteConnection | null;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? new ConsoleLogger(this.config.logLevel);
    this.clock = overrides.clock ?? systemClock;
    this.vocabulary = overrides.vocabulary ?? loadFinanceVocabulary();

    const needsDatabase = !overrides.financeStore || !overrides.stateStore;
    this.database = needsDatabase ? (overrides.database ?? openDatabase(this.config.database.path, this.logger)) : null;

    this.financeStore = overrides.financeStore ?? new SqliteFinanceStore(this.requireDatabase());
    this.stateStore = overrides.stateStore ?? new SqliteConversationStateStore(this.requireDatabase());

    const local = overrides.localEmbeddings ?? new CachedEmbeddingBackend(new HashedNgramEmbeddingBackend());
    const remote = overrides.remoteEmbeddings === undefined ? this.defaultRemoteEmbeddings() : overrides.remoteEmbeddings;

    this.intentClassifier = new IntentClassifierService(
      overrides.intentCorpus ?? loadIntentCorpus(),
      { local, remote: remote ?? undefined },
      this.logger,
    );

    this.conversationState = new ConversationStateService(this.stateStore, this.clock, this.logger, {
      ttlMinutes: this.config.conversation.ttlMinutes,
    });

    this.fieldInterpreter = new FieldInterpreterService(this.vocabulary, this.clock, { timeZone: this.config.app.timeZone });

    this.categorySuggester =
      overrides.categorySuggester ?? new KeywordCategorySuggester(this.vocabulary.categories, this.financeStore, this.logger);

    this.actionExecutor = new ActionExecutorService(
      this.financeStore,
      this.fieldInterpreter,
      this.categorySuggester,
      this.clock,
      this.logger,
      {
        largeAmountThreshold: this.config.limits.largeAmountThreshold,
        maxAmount: this.config.limits.maxTransactionAmount,
        duplicateWindowMs: this.config.limits.duplicateWindowSeconds * 1000,
        defaultAccount: this.config.app.defaultAccount,
        locale: this.config.app.locale,
        currency: this.config.app.baseCurrency,
      },
    );

    this.chatFlow = new ChatFlowService(
      this.intentClassifier,
      this.conversationState,
      this.fieldInterpreter,
      this.actionExecutor,
      this.logger,
    );
  }

  close(): void {
    if (this.database?.open) {
      this.database.close();
      this.logger.info('database_closed');
    }
  }

  private requireDatabase(): SqliteConnection {
    if (!this.database) {
      throw new Error('No SQLite connection available');
    }
    return this.database;
  }

  private defaultRemoteEmbeddings(): EmbeddingBackendPort | null {
    const backend = new OpenAIEmbeddingBackend(this.config.embeddings);
    if (!backend.isConfigured()) {
      this.logger.info('remote_embeddings_disabled', { reason: 'no API key configured' });
      return null;
    }
    return new CachedEmbeddingBackend(backend);
  }
}
