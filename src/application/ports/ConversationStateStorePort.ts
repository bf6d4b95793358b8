import type { PartialData, StoredConversationState } from '../../domain/entities/ConversationState.js';

export interface ConversationStateStorePort {
  deleteExpired(now: number): Promise<number>;
  deleteBySession(sessionId: string): Promise<number>;
  insert(state: Omit<StoredConversationState, 'id'>): Promise<StoredConversationState>;
  findBySession(sessionId: string): Promise<StoredConversationState | null>;
  update(
    sessionId: string,
    changes: { state: string; partialData: PartialData; expiresAt: number; updatedAt: number },
  ): Promise<void>;
}
