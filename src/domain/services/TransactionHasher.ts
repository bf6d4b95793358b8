import crypto from 'node:crypto';
import type { TransactionType } from '../entities/Transaction.js';

export interface TransactionFingerprintInput {
  userId: string;
  date: string;
  type: TransactionType;
  category: string;
  amount: number;
  account: string;
}

/** Identity of a submission for the duplicate guard. Amount is compared unsigned. */
export const buildTransactionHash = (input: TransactionFingerprintInput): string => {
  const serialized = [
    input.userId,
    input.date,
    input.type,
    input.category.trim().toLowerCase(),
    Math.abs(input.amount).toFixed(2),
    input.account.trim().toLowerCase(),
  ].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex');
};
