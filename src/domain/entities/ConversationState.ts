export type TerminalState = 'CONFIRMING' | 'READY_TO_EXECUTE';

export interface AwaitingStateMap {
  add_transaction: 'AWAITING_AMOUNT' | 'AWAITING_TYPE' | 'AWAITING_CATEGORY' | 'AWAITING_ACCOUNT';
  edit_transaction: 'AWAITING_TRANSACTION_ID' | 'AWAITING_FIELD' | 'AWAITING_NEW_VALUE';
  delete_transaction: 'AWAITING_TRANSACTION_ID';
  transfer: 'AWAITING_FROM_ACCOUNT' | 'AWAITING_TO_ACCOUNT' | 'AWAITING_AMOUNT';
  create_goal: 'AWAITING_GOAL_NAME' | 'AWAITING_TARGET_AMOUNT' | 'AWAITING_DEADLINE';
}

export type ConversationIntent = keyof AwaitingStateMap;

export const CONVERSATION_INTENTS: readonly ConversationIntent[] = [
  'add_transaction',
  'edit_transaction',
  'delete_transaction',
  'transfer',
  'create_goal',
];

export type FlowState<I extends ConversationIntent> = AwaitingStateMap[I] | TerminalState;

export type SlotValue = string | number | boolean;

export type PartialData = Record<string, SlotValue>;

interface ConversationStateBase {
  id: number;
  userId: string;
  sessionId: string;
  partialData: PartialData;
  expiresAt: number; // epoch ms
  updatedAt: number;
}

/**
 * One active slot-filling session. Tagged by intent so that `state` can only
 * hold a value from that intent's own flow.
 */
export type ConversationState = {
  [I in ConversationIntent]: ConversationStateBase & { intent: I; state: FlowState<I> };
}[ConversationIntent];

// Shape persisted by state stores before it is checked against the flow table.
export interface StoredConversationState {
  id: number;
  userId: string;
  sessionId: string;
  intent: string;
  state: string;
  partialData: PartialData;
  expiresAt: number;
  updatedAt: number;
}

export const isConversationIntent = (value: string): value is ConversationIntent =>
  CONVERSATION_INTENTS.some((intent) => intent === value);
