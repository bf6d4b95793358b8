export * from './domain/entities/ConversationState.js';
export * from './domain/entities/Interpretation.js';
export * from './domain/entities/SavingsGoal.js';
export * from './domain/entities/Transaction.js';
export { parseAmount, parseAmountDetailed } from './domain/services/AmountParser.js';
export { advanceState, initialState, missingRequiredFields, promptFor } from './domain/services/ConversationFlows.js';
export { formatAmount } from './domain/services/MoneyFormatter.js';
export { parseNaturalDate } from './domain/services/NaturalDateParser.js';
export { buildTransactionHash } from './domain/services/TransactionHasher.js';

export * from './application/dto/ActionArgsDTO.js';
export * from './application/dto/ActionResultDTO.js';
export * from './application/dto/CategorySuggestionDTO.js';
export * from './application/dto/ClassificationResultDTO.js';
export * from './application/dto/VocabularyDTO.js';

export type { CategorySuggesterPort } from './application/ports/CategorySuggesterPort.js';
export { systemClock, type ClockPort } from './application/ports/ClockPort.js';
export type { ConversationStateStorePort } from './application/ports/ConversationStateStorePort.js';
export type { EmbeddingBackendPort } from './application/ports/EmbeddingBackendPort.js';
export type { DescriptionHistoryEntry, FinanceStorePort } from './application/ports/FinanceStorePort.js';
export type { LogContext, LoggerPort, LogLevel } from './application/ports/LoggerPort.js';

export * from './application/services/ActionExecutorService.js';
export * from './application/services/ChatFlowService.js';
export * from './application/services/ConversationStateService.js';
export * from './application/services/FieldInterpreterService.js';
export * from './application/services/IntentClassifierService.js';

export { KeywordCategorySuggester } from './infrastructure/adapters/categorizer/KeywordCategorySuggester.js';
export { CachedEmbeddingBackend } from './infrastructure/adapters/embeddings/CachedEmbeddingBackend.js';
export { HashedNgramEmbeddingBackend } from './infrastructure/adapters/embeddings/HashedNgramEmbeddingBackend.js';
export { OpenAIEmbeddingBackend } from './infrastructure/adapters/embeddings/OpenAIEmbeddingBackend.js';
export { InMemoryConversationStateStore } from './infrastructure/adapters/storage/InMemoryConversationStateStore.js';
export { openDatabase, type SqliteConnection } from './infrastructure/adapters/storage/SqliteDatabase.js';
export { SqliteConversationStateStore } from './infrastructure/adapters/storage/SqliteConversationStateStore.js';
export { SqliteFinanceStore } from './infrastructure/adapters/storage/SqliteFinanceStore.js';
export { StorageError } from './infrastructure/adapters/storage/StorageError.js';
export { AppContainer, type AppContainerOverrides } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig, type AppConfig, type LogThreshold } from './infrastructure/config/Config.js';
export { loadFinanceVocabulary, loadIntentCorpus } from './infrastructure/config/VocabularyLoader.js';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';
