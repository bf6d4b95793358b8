export type TransactionType = 'income' | 'expense' | 'transfer';

export interface Transaction {
  id: number;
  userId: string;
  date: string; // YYYY-MM-DD
  type: TransactionType;
  category: string;
  description: string;
  amount: number; // signed: expense and outgoing transfer legs are negative
  account: string;
  transferGroup: string | null;
  dedupeHash: string;
  createdAt: number; // epoch ms
}

export type NewTransaction = Omit<Transaction, 'id'>;

export interface TransactionChanges {
  date?: string;
  category?: string;
  description?: string;
  amount?: number;
  account?: string;
  dedupeHash?: string;
}

export const signedAmount = (type: Exclude<TransactionType, 'transfer'>, amount: number): number =>
  type === 'expense' ? -Math.abs(amount) : Math.abs(amount);
