import type { ConversationStateStorePort } from '../../../application/ports/ConversationStateStorePort.js';
import type { PartialData, StoredConversationState } from '../../../domain/entities/ConversationState.js';

export class InMemoryConversationStateStore implements ConversationStateStorePort {
  private readonly states = new Map<string, StoredConversationState>();
  private nextId = 1;

  async deleteExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [sessionId, state] of this.states) {
      if (state.expiresAt <= now) {
        this.states.delete(sessionId);
        removed += 1;
      }
    }
    return removed;
  }

  async deleteBySession(sessionId: string): Promise<number> {
    return this.states.delete(sessionId) ? 1 : 0;
  }

  async insert(state: Omit<StoredConversationState, 'id'>): Promise<StoredConversationState> {
    const stored = { ...state, id: this.nextId++, partialData: { ...state.partialData } };
    this.states.set(state.sessionId, stored);
    return { ...stored, partialData: { ...stored.partialData } };
  }

  async findBySession(sessionId: string): Promise<StoredConversationState | null> {
    const state = this.states.get(sessionId);
    return state ? { ...state, partialData: { ...state.partialData } } : null;
  }

  async update(
    sessionId: string,
    changes: { state: string; partialData: PartialData; expiresAt: number; updatedAt: number },
  ): Promise<void> {
    const current = this.states.get(sessionId);
    if (current) {
      this.states.set(sessionId, { ...current, ...changes, partialData: { ...changes.partialData } });
    }
  }
}
