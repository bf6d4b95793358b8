import {
  isConversationIntent,
  type ConversationIntent,
  type ConversationState,
  type PartialData,
  type SlotValue,
} from '../../domain/entities/ConversationState.js';
import {
  advanceState,
  hydrateState,
  initialState,
  isDeclaredField,
  missingRequiredFields,
  promptFor,
} from '../../domain/services/ConversationFlows.js';
import type { ClockPort } from '../ports/ClockPort.js';
import type { ConversationStateStorePort } from '../ports/ConversationStateStorePort.js';
import type { LoggerPort } from '../ports/LoggerPort.js';

export type StateErrorKind = 'unknown_intent' | 'no_active_state' | 'unknown_field' | 'not_confirming' | 'storage_failure';

export type StateResult<T> = { ok: true; value: T } | { ok: false; error: StateErrorKind; message: string };

export interface InitStateValue {
  intent: ConversationIntent;
  state: string;
  prompt: string;
}

export interface UpdateFieldValue {
  state: string;
  partialData: PartialData;
  prompt: string;
  readyToExecute: boolean;
  missingFields: string[];
}

export type ConfirmValue =
  | { cancelled: true }
  | { cancelled: false; readyToExecute: true; intent: ConversationIntent; partialData: PartialData };

const ok = <T>(value: T): StateResult<T> => ({ ok: true, value });

const fail = <T>(error: StateErrorKind, message: string): StateResult<T> => ({ ok: false, error, message });

export class ConversationStateService {
  private readonly ttlMs: number;

  constructor(
    private readonly store: ConversationStateStorePort,
    private readonly clock: ClockPort,
    private readonly logger: LoggerPort,
    options: { ttlMinutes: number },
  ) {
    this.ttlMs = options.ttlMinutes * 60_000;
  }

  async initState(userId: string, sessionId: string, intent: string): Promise<StateResult<InitStateValue>> {
    if (!isConversationIntent(intent)) {
      return fail('unknown_intent', `Unknown conversation intent: ${intent}`);
    }
    const flowIntent: ConversationIntent = intent;

    return this.guard<InitStateValue>('init_state', sessionId, async () => {
      const now = this.clock.now();
      await this.store.deleteBySession(sessionId);
      const stored = await this.store.insert({
        userId,
        sessionId,
        intent: flowIntent,
        state: initialState(flowIntent),
        partialData: {},
        expiresAt: now + this.ttlMs,
        updatedAt: now,
      });

      const state = hydrateState(stored);
      if (!state) {
        return fail('storage_failure', 'Stored conversation state could not be read back.');
      }

      this.logger.info('conversation_state_init', { sessionId, intent: flowIntent, state: state.state });
      return ok({ intent: flowIntent, state: state.state, prompt: promptFor(state) });
    });
  }

  async updateField(sessionId: string, field: string, value: SlotValue): Promise<StateResult<UpdateFieldValue>> {
    return this.guard<UpdateFieldValue>('update_field', sessionId, async () => {
      const current = await this.loadActive(sessionId);
      if (!current) {
        return fail('no_active_state', 'There is no active conversation for this session.');
      }

      if (!isDeclaredField(current.intent, field)) {
        return fail('unknown_field', `Field '${field}' does not belong to ${current.intent}.`);
      }

      const now = this.clock.now();
      const next = advanceState(current, { ...current.partialData, [field]: value });

      await this.store.update(sessionId, {
        state: next.state,
        partialData: next.partialData,
        expiresAt: now + this.ttlMs,
        updatedAt: now,
      });

      this.logger.info('conversation_state_update', { sessionId, field, from: current.state, to: next.state });

      return ok({
        state: next.state,
        partialData: next.partialData,
        prompt: promptFor(next),
        readyToExecute: next.state === 'CONFIRMING',
        missingFields: missingRequiredFields(next.intent, next.partialData),
      });
    });
  }

  async confirm(sessionId: string, confirm: boolean): Promise<StateResult<ConfirmValue>> {
    return this.guard<ConfirmValue>('confirm', sessionId, async () => {
      if (!confirm) {
        await this.store.deleteBySession(sessionId);
        this.logger.info('conversation_cancelled', { sessionId });
        return ok({ cancelled: true });
      }

      const current = await this.loadActive(sessionId);
      if (!current) {
        return fail('no_active_state', 'There is no active conversation for this session.');
      }
      if (current.state !== 'CONFIRMING') {
        return fail('not_confirming', `Conversation is at ${current.state}, not waiting for confirmation.`);
      }

      const now = this.clock.now();
      await this.store.update(sessionId, {
        state: 'READY_TO_EXECUTE',
        partialData: current.partialData,
        expiresAt: now + this.ttlMs,
        updatedAt: now,
      });

      return ok({ cancelled: false, readyToExecute: true, intent: current.intent, partialData: current.partialData });
    });
  }

  async getState(sessionId: string): Promise<StateResult<ConversationState | null>> {
    return this.guard<ConversationState | null>('get_state', sessionId, async () => ok(await this.loadActive(sessionId)));
  }

  /** Like getState, but only returns a state owned by `userId`. */
  async getSessionState(userId: string, sessionId: string): Promise<StateResult<ConversationState | null>> {
    return this.guard<ConversationState | null>('get_session_state', sessionId, async () => {
      const state = await this.loadActive(sessionId);
      return ok(state && state.userId === userId ? state : null);
    });
  }

  async getNextQuestion(sessionId: string): Promise<StateResult<string | null>> {
    return this.guard<string | null>('get_next_question', sessionId, async () => {
      const state = await this.loadActive(sessionId);
      return ok(state ? promptFor(state) : null);
    });
  }

  async clearState(sessionId: string): Promise<StateResult<{ cleared: boolean }>> {
    return this.guard<{ cleared: boolean }>('clear_state', sessionId, async () => {
      const removed = await this.store.deleteBySession(sessionId);
      return ok({ cleared: removed > 0 });
    });
  }

  private async loadActive(sessionId: string): Promise<ConversationState | null> {
    const purged = await this.store.deleteExpired(this.clock.now());
    if (purged > 0) {
      this.logger.debug('conversation_states_expired', { purged });
    }

    const stored = await this.store.findBySession(sessionId);
    if (!stored) {
      return null;
    }

    const state = hydrateState(stored);
    if (!state) {
      this.logger.warn('conversation_state_unreadable', { sessionId, intent: stored.intent, state: stored.state });
    }
    return state;
  }

  private async guard<T>(operation: string, sessionId: string, work: () => Promise<StateResult<T>>): Promise<StateResult<T>> {
    try {
      return await work();
    } catch (error) {
      this.logger.error('conversation_state_storage_failed', {
        operation,
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return fail('storage_failure', 'Conversation state is temporarily unavailable.');
    }
  }
}
