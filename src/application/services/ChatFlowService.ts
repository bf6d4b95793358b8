import type { ConversationIntent, ConversationState, PartialData, SlotValue } from '../../domain/entities/ConversationState.js';
import type { FieldType, InterpretationResult } from '../../domain/entities/Interpretation.js';
import { promptFor } from '../../domain/services/ConversationFlows.js';
import type { ActionResultDTO } from '../dto/ActionResultDTO.js';
import type { ClassificationResultDTO } from '../dto/ClassificationResultDTO.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import type { ActionExecutorService } from './ActionExecutorService.js';
import type { StateErrorKind, UpdateFieldValue, ConversationStateService } from './ConversationStateService.js';
import type { FieldInterpreterService } from './FieldInterpreterService.js';
import type { IntentClassifierService } from './IntentClassifierService.js';

export type RouteOutcome =
  | { kind: 'flow'; resumed: boolean; intent: ConversationIntent; state: string; prompt: string; classification?: ClassificationResultDTO }
  | { kind: 'reply'; classification: ClassificationResultDTO; needsClarification: boolean }
  | { kind: 'error'; error: StateErrorKind; message: string };

export type SupplyFieldOutcome =
  | { kind: 'updated'; update: UpdateFieldValue }
  | { kind: 'invalid'; field: string; message: string }
  | { kind: 'confirm_value'; field: string; prompt: string; interpretation: InterpretationResult }
  | { kind: 'error'; error: StateErrorKind; message: string };

export type ExecuteOutcome =
  | { kind: 'cancelled' }
  | { kind: 'executed'; action: string; result: ActionResultDTO }
  | { kind: 'error'; error: StateErrorKind; message: string };

const INTENT_BY_REQUEST: Record<string, ConversationIntent> = {
  record: 'add_transaction',
  edit: 'edit_transaction',
  delete: 'delete_transaction',
  transfer: 'transfer',
  goal: 'create_goal',
};

const FIELD_TYPES: Record<string, FieldType> = {
  amount: 'amount',
  target_amount: 'amount',
  account: 'account',
  from_account: 'account',
  to_account: 'account',
  date: 'date',
  deadline: 'date',
  category: 'category',
  type: 'transaction_type',
};

const EDITABLE_FIELDS = ['amount', 'category', 'account', 'date', 'description'];

const optionalSlots = (data: PartialData, fields: Record<string, string>): Record<string, SlotValue> => {
  const picked: Record<string, SlotValue> = {};
  for (const [slot, arg] of Object.entries(fields)) {
    const value = data[slot];
    if (value !== undefined && value !== '') {
      picked[arg] = value;
    }
  }
  return picked;
};

/**
 * Drives one chat turn: resumes the session's slot-filling flow or classifies
 * the message, feeds user answers through the field interpreter, and hands a
 * confirmed flow to the action executor.
 */
export class ChatFlowService {
  constructor(
    private readonly classifier: IntentClassifierService,
    private readonly states: ConversationStateService,
    private readonly interpreter: FieldInterpreterService,
    private readonly executor: ActionExecutorService,
    private readonly logger: LoggerPort,
  ) {}

  async routeMessage(userId: string, sessionId: string, text: string): Promise<RouteOutcome> {
    const active = await this.states.getSessionState(userId, sessionId);
    if (!active.ok) {
      return { kind: 'error', error: active.error, message: active.message };
    }
    if (active.value) {
      return {
        kind: 'flow',
        resumed: true,
        intent: active.value.intent,
        state: active.value.state,
        prompt: promptFor(active.value),
      };
    }

    const classification = await this.classifier.classify(text);
    const needsClarification = this.classifier.shouldAskForClarification(classification.confidence);
    const intent = classification.category === 'interaction_data' ? INTENT_BY_REQUEST[classification.type] : undefined;

    if (!intent || needsClarification) {
      return { kind: 'reply', classification, needsClarification };
    }

    const started = await this.states.initState(userId, sessionId, intent);
    if (!started.ok) {
      return { kind: 'error', error: started.error, message: started.message };
    }

    this.logger.info('chat_flow_started', { userId, sessionId, intent, confidence: classification.confidence });
    return {
      kind: 'flow',
      resumed: false,
      intent: started.value.intent,
      state: started.value.state,
      prompt: started.value.prompt,
      classification,
    };
  }

  async supplyField(
    sessionId: string,
    field: string,
    raw: string,
    options: { confirmed?: boolean } = {},
  ): Promise<SupplyFieldOutcome> {
    const current = await this.states.getState(sessionId);
    if (!current.ok) {
      return { kind: 'error', error: current.error, message: current.message };
    }
    if (!current.value) {
      return { kind: 'error', error: 'no_active_state', message: 'There is no active conversation for this session.' };
    }

    const value = this.canonicalValue(current.value, field, raw, options.confirmed === true);
    if (value.kind !== 'value') {
      return value;
    }

    const updated = await this.states.updateField(sessionId, field, value.value);
    if (!updated.ok) {
      return { kind: 'error', error: updated.error, message: updated.message };
    }
    return { kind: 'updated', update: updated.value };
  }

  async confirmAndExecute(userId: string, sessionId: string, confirm: boolean): Promise<ExecuteOutcome> {
    const confirmed = await this.states.confirm(sessionId, confirm);
    if (!confirmed.ok) {
      return { kind: 'error', error: confirmed.error, message: confirmed.message };
    }
    if (confirmed.value.cancelled) {
      return { kind: 'cancelled' };
    }

    const { action, args } = this.toAction(confirmed.value.intent, confirmed.value.partialData);
    const result = await this.executor.executeAction(userId, action, args);

    if (result.success) {
      const cleared = await this.states.clearState(sessionId);
      if (!cleared.ok) {
        this.logger.warn('chat_flow_clear_failed', { sessionId, error: cleared.error });
      }
    }

    return { kind: 'executed', action, result };
  }

  private canonicalValue(
    state: ConversationState,
    field: string,
    raw: string,
    confirmed: boolean,
  ): { kind: 'value'; value: SlotValue } | Exclude<SupplyFieldOutcome, { kind: 'updated' } | { kind: 'error' }> {
    const input = raw.trim();

    if (field === 'transaction_id') {
      return /^\d+$/.test(input)
        ? { kind: 'value', value: Number(input) }
        : { kind: 'invalid', field, message: 'Transaction IDs are numbers, for example 42.' };
    }

    if (field === 'field' && state.intent === 'edit_transaction') {
      const lower = input.toLowerCase();
      return EDITABLE_FIELDS.includes(lower)
        ? { kind: 'value', value: lower }
        : { kind: 'invalid', field, message: `You can change one of: ${EDITABLE_FIELDS.join(', ')}.` };
    }

    const fieldType = this.fieldTypeFor(state, field);
    if (!fieldType) {
      return { kind: 'value', value: input };
    }

    const categoryType = state.partialData.type;
    const interpretation = this.interpreter.interpret(fieldType, input, {
      transactionType: categoryType === 'income' || categoryType === 'expense' ? categoryType : undefined,
    });

    if (interpretation.interpretedValue === null) {
      return { kind: 'invalid', field, message: interpretation.explanation ?? `'${input}' could not be understood.` };
    }

    if (interpretation.needsConfirmation && !confirmed) {
      return {
        kind: 'confirm_value',
        field,
        prompt: this.interpreter.formatConfirmationMessage(interpretation),
        interpretation,
      };
    }

    return { kind: 'value', value: interpretation.interpretedValue };
  }

  private fieldTypeFor(state: ConversationState, field: string): FieldType | undefined {
    // The edit flow's new value takes the type of the field being edited. Categories
    // pass through: the list to match against depends on the stored transaction.
    if (field === 'new_value' && state.intent === 'edit_transaction') {
      const edited = state.partialData.field;
      return typeof edited === 'string' && edited !== 'category' ? FIELD_TYPES[edited] : undefined;
    }
    return FIELD_TYPES[field];
  }

  private toAction(intent: ConversationIntent, data: PartialData): { action: string; args: Record<string, unknown> } {
    switch (intent) {
      case 'add_transaction':
        return {
          action: 'add_transaction',
          args: {
            ...optionalSlots(data, { type: 'type', amount: 'amount', category: 'category', account: 'account', date: 'date', description: 'description' }),
            confirmed: true,
          },
        };
      case 'edit_transaction': {
        const field = data.field;
        return {
          action: 'update_transaction',
          args: {
            transaction_id: data.transaction_id,
            ...(typeof field === 'string' ? { [field]: data.new_value } : {}),
            confirmed: true,
          },
        };
      }
      case 'delete_transaction':
        return { action: 'delete_transaction', args: { transaction_id: data.transaction_id } };
      case 'transfer':
        return {
          action: 'transfer_funds',
          args: {
            ...optionalSlots(data, {
              from_account: 'from_account',
              to_account: 'to_account',
              amount: 'amount',
              date: 'date',
              description: 'description',
            }),
            confirmed: true,
          },
        };
      case 'create_goal':
        return {
          action: 'create_savings_goal',
          args: optionalSlots(data, { name: 'name', target_amount: 'target_amount', deadline: 'target_date', description: 'description' }),
        };
    }
  }
}
