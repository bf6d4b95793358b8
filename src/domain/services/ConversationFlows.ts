import type {
  AwaitingStateMap,
  ConversationIntent,
  ConversationState,
  PartialData,
  StoredConversationState,
  TerminalState,
} from '../entities/ConversationState.js';

export interface FlowSpec<S extends string> {
  readonly awaiting: readonly S[];
  readonly collects: Readonly<Record<S, string>>;
  readonly required: readonly string[];
  readonly optional: readonly string[];
  readonly prompts: Readonly<Record<S | TerminalState, string>>;
}

export const FLOWS: { readonly [I in ConversationIntent]: FlowSpec<AwaitingStateMap[I]> } = {
  add_transaction: {
    awaiting: ['AWAITING_AMOUNT', 'AWAITING_TYPE', 'AWAITING_CATEGORY', 'AWAITING_ACCOUNT'],
    collects: {
      AWAITING_AMOUNT: 'amount',
      AWAITING_TYPE: 'type',
      AWAITING_CATEGORY: 'category',
      AWAITING_ACCOUNT: 'account',
    },
    required: ['amount', 'type', 'category', 'account'],
    optional: ['date', 'description'],
    prompts: {
      AWAITING_AMOUNT: 'How much was it?',
      AWAITING_TYPE: 'Is {amount} income or an expense?',
      AWAITING_CATEGORY: 'Which category should this {type} go under?',
      AWAITING_ACCOUNT: 'Which account was used?',
      CONFIRMING: 'Record {type} of {amount} for {category} on {account}? (yes/no)',
      READY_TO_EXECUTE: 'Recording the transaction.',
    },
  },
  edit_transaction: {
    awaiting: ['AWAITING_TRANSACTION_ID', 'AWAITING_FIELD', 'AWAITING_NEW_VALUE'],
    collects: {
      AWAITING_TRANSACTION_ID: 'transaction_id',
      AWAITING_FIELD: 'field',
      AWAITING_NEW_VALUE: 'new_value',
    },
    required: ['transaction_id', 'field', 'new_value'],
    optional: [],
    prompts: {
      AWAITING_TRANSACTION_ID: 'Which transaction do you want to change?',
      AWAITING_FIELD: 'What should change on transaction {transaction_id}: amount, category, account, date or description?',
      AWAITING_NEW_VALUE: 'What is the new {field}?',
      CONFIRMING: 'Change the {field} of transaction {transaction_id} to {new_value}? (yes/no)',
      READY_TO_EXECUTE: 'Updating the transaction.',
    },
  },
  delete_transaction: {
    awaiting: ['AWAITING_TRANSACTION_ID'],
    collects: {
      AWAITING_TRANSACTION_ID: 'transaction_id',
    },
    required: ['transaction_id'],
    optional: [],
    prompts: {
      AWAITING_TRANSACTION_ID: 'Which transaction should be deleted?',
      CONFIRMING: 'Delete transaction {transaction_id}? This cannot be undone. (yes/no)',
      READY_TO_EXECUTE: 'Deleting the transaction.',
    },
  },
  transfer: {
    awaiting: ['AWAITING_FROM_ACCOUNT', 'AWAITING_TO_ACCOUNT', 'AWAITING_AMOUNT'],
    collects: {
      AWAITING_FROM_ACCOUNT: 'from_account',
      AWAITING_TO_ACCOUNT: 'to_account',
      AWAITING_AMOUNT: 'amount',
    },
    required: ['from_account', 'to_account', 'amount'],
    optional: ['date', 'description'],
    prompts: {
      AWAITING_FROM_ACCOUNT: 'Which account are you moving money from?',
      AWAITING_TO_ACCOUNT: 'Which account should receive the money from {from_account}?',
      AWAITING_AMOUNT: 'How much do you want to move from {from_account} to {to_account}?',
      CONFIRMING: 'Transfer {amount} from {from_account} to {to_account}? (yes/no)',
      READY_TO_EXECUTE: 'Moving the funds.',
    },
  },
  create_goal: {
    awaiting: ['AWAITING_GOAL_NAME', 'AWAITING_TARGET_AMOUNT', 'AWAITING_DEADLINE'],
    collects: {
      AWAITING_GOAL_NAME: 'name',
      AWAITING_TARGET_AMOUNT: 'target_amount',
      AWAITING_DEADLINE: 'deadline',
    },
    required: ['name', 'target_amount', 'deadline'],
    optional: ['description'],
    prompts: {
      AWAITING_GOAL_NAME: 'What are you saving for?',
      AWAITING_TARGET_AMOUNT: 'How much do you need for {name}?',
      AWAITING_DEADLINE: 'When do you want to reach {target_amount} for {name}?',
      CONFIRMING: 'Create the goal "{name}" with a target of {target_amount} by {deadline}? (yes/no)',
      READY_TO_EXECUTE: 'Creating the goal.',
    },
  },
};

export const getFlow = (intent: ConversationIntent): FlowSpec<string> => FLOWS[intent];

export const isDeclaredField = (intent: ConversationIntent, field: string): boolean => {
  const flow = getFlow(intent);
  return flow.required.includes(field) || flow.optional.includes(field);
};

const isFilled = (data: PartialData, field: string): boolean => {
  const value = data[field];
  return value !== undefined && value !== '';
};

export const missingRequiredFields = (intent: ConversationIntent, data: PartialData): string[] =>
  getFlow(intent).required.filter((field) => !isFilled(data, field));

/**
 * Picks the state that follows `current` once `data` has been merged.
 * Complete data always lands on CONFIRMING; otherwise the walk goes forward
 * through the ordered states, wrapping, to the first one whose field is missing.
 */
const nextState = <S extends string>(flow: FlowSpec<S>, current: S | TerminalState, data: PartialData): S | 'CONFIRMING' => {
  if (flow.required.every((field) => isFilled(data, field))) {
    return 'CONFIRMING';
  }

  const position = flow.awaiting.findIndex((state) => state === current);
  const count = flow.awaiting.length;

  for (let offset = 1; offset <= count; offset += 1) {
    const candidate = flow.awaiting[(position + offset + count) % count];
    if (candidate !== undefined && !isFilled(data, flow.collects[candidate])) {
      return candidate;
    }
  }

  // Only reachable if a required field has no awaiting state collecting it.
  return flow.awaiting[0] ?? 'CONFIRMING';
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled conversation intent: ${JSON.stringify(value)}`);
};

export const advanceState = (current: ConversationState, partialData: PartialData): ConversationState => {
  switch (current.intent) {
    case 'add_transaction':
      return { ...current, partialData, state: nextState(FLOWS.add_transaction, current.state, partialData) };
    case 'edit_transaction':
      return { ...current, partialData, state: nextState(FLOWS.edit_transaction, current.state, partialData) };
    case 'delete_transaction':
      return { ...current, partialData, state: nextState(FLOWS.delete_transaction, current.state, partialData) };
    case 'transfer':
      return { ...current, partialData, state: nextState(FLOWS.transfer, current.state, partialData) };
    case 'create_goal':
      return { ...current, partialData, state: nextState(FLOWS.create_goal, current.state, partialData) };
    default:
      return assertNever(current);
  }
};

export const initialState = <I extends ConversationIntent>(intent: I): AwaitingStateMap[I] => {
  const first = FLOWS[intent].awaiting[0];
  if (first === undefined) {
    throw new Error(`Flow ${intent} declares no awaiting states`);
  }
  return first;
};

const matchState = <S extends string>(flow: FlowSpec<S>, value: string): S | TerminalState | null => {
  if (value === 'CONFIRMING' || value === 'READY_TO_EXECUTE') {
    return value;
  }
  return flow.awaiting.find((state) => state === value) ?? null;
};

/**
 * Checks a stored row against the flow table. Rows whose intent or state the
 * flows no longer know are rejected.
 */
export const hydrateState = (stored: StoredConversationState): ConversationState | null => {
  const base = {
    id: stored.id,
    userId: stored.userId,
    sessionId: stored.sessionId,
    partialData: stored.partialData,
    expiresAt: stored.expiresAt,
    updatedAt: stored.updatedAt,
  };

  switch (stored.intent) {
    case 'add_transaction': {
      const state = matchState(FLOWS.add_transaction, stored.state);
      return state ? { ...base, intent: 'add_transaction', state } : null;
    }
    case 'edit_transaction': {
      const state = matchState(FLOWS.edit_transaction, stored.state);
      return state ? { ...base, intent: 'edit_transaction', state } : null;
    }
    case 'delete_transaction': {
      const state = matchState(FLOWS.delete_transaction, stored.state);
      return state ? { ...base, intent: 'delete_transaction', state } : null;
    }
    case 'transfer': {
      const state = matchState(FLOWS.transfer, stored.state);
      return state ? { ...base, intent: 'transfer', state } : null;
    }
    case 'create_goal': {
      const state = matchState(FLOWS.create_goal, stored.state);
      return state ? { ...base, intent: 'create_goal', state } : null;
    }
    default:
      return null;
  }
};

export const promptFor = (state: ConversationState): string => {
  const prompts: Readonly<Record<string, string>> = getFlow(state.intent).prompts;
  return fillPlaceholders(prompts[state.state] ?? '', state.partialData);
};

// Unknown placeholders are left verbatim.
export const fillPlaceholders = (template: string, data: PartialData): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    const value = data[key];
    return value === undefined ? placeholder : String(value);
  });
