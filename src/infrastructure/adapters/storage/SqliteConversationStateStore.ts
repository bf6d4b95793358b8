import { z } from 'zod';
import type { ConversationStateStorePort } from '../../../application/ports/ConversationStateStorePort.js';
import type { PartialData, StoredConversationState } from '../../../domain/entities/ConversationState.js';
import type { SqliteConnection } from './SqliteDatabase.js';
import { StorageError } from './StorageError.js';

const PartialDataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const StateRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  session_id: z.string(),
  intent: z.string(),
  state: z.string(),
  partial_data: z.string(),
  expires_at: z.number(),
  updated_at: z.number(),
});

const toStoredState = (raw: unknown): StoredConversationState => {
  const row = StateRowSchema.parse(raw);
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    intent: row.intent,
    state: row.state,
    partialData: PartialDataSchema.parse(JSON.parse(row.partial_data)),
    expiresAt: row.expires_at,
    updatedAt: row.updated_at,
  };
};

export class SqliteConversationStateStore implements ConversationStateStorePort {
  constructor(private readonly db: SqliteConnection) {}

  async deleteExpired(now: number): Promise<number> {
    return this.run('delete_expired_states', () => this.db.prepare('DELETE FROM conversation_states WHERE expires_at <= ?').run(now).changes);
  }

  async deleteBySession(sessionId: string): Promise<number> {
    return this.run(
      'delete_session_state',
      () => this.db.prepare('DELETE FROM conversation_states WHERE session_id = ?').run(sessionId).changes,
    );
  }

  async insert(state: Omit<StoredConversationState, 'id'>): Promise<StoredConversationState> {
    return this.run('insert_state', () => {
      const result = this.db
        .prepare(
          `INSERT INTO conversation_states (user_id, session_id, intent, state, partial_data, expires_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(state.userId, state.sessionId, state.intent, state.state, JSON.stringify(state.partialData), state.expiresAt, state.updatedAt);

      return { ...state, id: Number(result.lastInsertRowid) };
    });
  }

  async findBySession(sessionId: string): Promise<StoredConversationState | null> {
    return this.run('find_session_state', () => {
      const row = this.db.prepare('SELECT * FROM conversation_states WHERE session_id = ?').get(sessionId);
      return row === undefined ? null : toStoredState(row);
    });
  }

  async update(
    sessionId: string,
    changes: { state: string; partialData: PartialData; expiresAt: number; updatedAt: number },
  ): Promise<void> {
    this.run('update_state', () => {
      this.db
        .prepare('UPDATE conversation_states SET state = ?, partial_data = ?, expires_at = ?, updated_at = ? WHERE session_id = ?')
        .run(changes.state, JSON.stringify(changes.partialData), changes.expiresAt, changes.updatedAt, sessionId);
    });
  }

  private run<T>(operation: string, work: () => T): T {
    try {
      return work();
    } catch (error) {
      throw new StorageError(operation, { cause: error });
    }
  }
}
