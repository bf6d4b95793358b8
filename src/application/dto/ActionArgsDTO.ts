import { z } from 'zod';

// Tool-calling layers send numbers as strings as often as not.
const amountInput = z.union([z.number(), z.string()]);
const idInput = z.union([z.number().int(), z.string().regex(/^\s*\d+\s*$/)]).transform((value) => Number(value));
const optionalText = z.string().optional();

export const AddTransactionArgsSchema = z.object({
  type: optionalText,
  amount: amountInput.optional(),
  category: optionalText,
  description: optionalText,
  date: optionalText,
  account: optionalText,
  confirmed: z.boolean().optional(),
});

export type AddTransactionArgs = z.infer<typeof AddTransactionArgsSchema>;

export const UpdateTransactionArgsSchema = z.object({
  transaction_id: idInput.optional(),
  amount: amountInput.optional(),
  category: optionalText,
  description: optionalText,
  date: optionalText,
  account: optionalText,
  confirmed: z.boolean().optional(),
});

export type UpdateTransactionArgs = z.infer<typeof UpdateTransactionArgsSchema>;

export const DeleteTransactionArgsSchema = z.object({
  transaction_id: idInput.optional(),
});

export type DeleteTransactionArgs = z.infer<typeof DeleteTransactionArgsSchema>;

export const TransferFundsArgsSchema = z.object({
  from_account: optionalText,
  to_account: optionalText,
  amount: amountInput.optional(),
  date: optionalText,
  description: optionalText,
  confirmed: z.boolean().optional(),
});

export type TransferFundsArgs = z.infer<typeof TransferFundsArgsSchema>;

export const CreateSavingsGoalArgsSchema = z.object({
  name: optionalText,
  target_amount: amountInput.optional(),
  target_date: optionalText,
  description: optionalText,
});

export type CreateSavingsGoalArgs = z.infer<typeof CreateSavingsGoalArgsSchema>;

export const UpdateSavingsGoalArgsSchema = z.object({
  goal_id: idInput.optional(),
  goal_name: optionalText,
  name: optionalText,
  target_amount: amountInput.optional(),
  current_amount: amountInput.optional(),
  target_date: optionalText,
  description: optionalText,
});

export type UpdateSavingsGoalArgs = z.infer<typeof UpdateSavingsGoalArgsSchema>;

export const TransferToSavingsArgsSchema = z.object({
  goal_id: idInput.optional(),
  goal_name: optionalText,
  amount: amountInput.optional(),
  account: optionalText,
  date: optionalText,
  confirmed: z.boolean().optional(),
});

export type TransferToSavingsArgs = z.infer<typeof TransferToSavingsArgsSchema>;
