import { z } from 'zod';

export const ACTION_CODES = [
  'TRANSACTION_ADDED',
  'TRANSACTION_UPDATED',
  'TRANSACTION_DELETED',
  'TRANSFER_COMPLETED',
  'GOAL_CREATED',
  'GOAL_UPDATED',
  'SAVINGS_TRANSFERRED',
  'MISSING_AMOUNT',
  'INVALID_AMOUNT',
  'AMOUNT_TOO_LARGE',
  'MISSING_TYPE',
  'INVALID_TYPE',
  'MISSING_CATEGORY',
  'INVALID_CATEGORY',
  'AMBIGUOUS_CATEGORY',
  'NEED_CATEGORY',
  'INVALID_DATE',
  'CONFIRM_DATE',
  'INVALID_ACCOUNT',
  'CONFIRM_ACCOUNT',
  'MISSING_FROM_ACCOUNT',
  'MISSING_TO_ACCOUNT',
  'SAME_ACCOUNT',
  'LARGE_AMOUNT_CONFIRMATION',
  'DUPLICATE_TRANSACTION',
  'INSUFFICIENT_BALANCE',
  'MISSING_TRANSACTION_ID',
  'TRANSACTION_NOT_FOUND',
  'TRANSFER_NOT_EDITABLE',
  'NO_UPDATES',
  'MISSING_GOAL_NAME',
  'NAME_TOO_LONG',
  'MISSING_TARGET_AMOUNT',
  'DUPLICATE_GOAL',
  'MISSING_GOAL',
  'GOAL_NOT_FOUND',
  'UNKNOWN_ACTION',
  'INVALID_ARGUMENTS',
  'EXECUTION_ERROR',
] as const;

export const ActionCodeSchema = z.enum(ACTION_CODES);

export type ActionCode = z.infer<typeof ActionCodeSchema>;

export const ActionErrorKindSchema = z.enum(['validation', 'not_found', 'conflict', 'insufficient_balance', 'execution']);

export type ActionErrorKind = z.infer<typeof ActionErrorKindSchema>;

export const ActionResultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  code: ActionCodeSchema,
  errorKind: ActionErrorKindSchema.optional(),
  askUser: z.string().optional(),
  requiresConfirmation: z.boolean().optional(),
  details: z.record(z.unknown()).optional(),
});

export type ActionResultDTO = z.infer<typeof ActionResultSchema>;
