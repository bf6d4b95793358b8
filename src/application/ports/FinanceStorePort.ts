import type { NewSavingsGoal, SavingsGoal, SavingsGoalChanges } from '../../domain/entities/SavingsGoal.js';
import type { NewTransaction, Transaction, TransactionChanges, TransactionType } from '../../domain/entities/Transaction.js';

export interface DescriptionHistoryEntry {
  category: string;
  description: string;
  frequency: number;
}

export interface FinanceStorePort {
  /**
   * Runs `work` inside BEGIN/COMMIT; any rejection rolls everything back and is rethrown.
   * Concurrent callers wait their turn; a call made from inside `work` joins it.
   */
  withTransaction<T>(work: () => Promise<T>): Promise<T>;

  insertTransaction(transaction: NewTransaction): Promise<Transaction>;
  findTransaction(userId: string, id: number): Promise<Transaction | null>;
  findTransferLegs(userId: string, transferGroup: string): Promise<Transaction[]>;
  updateTransaction(userId: string, id: number, changes: TransactionChanges): Promise<Transaction | null>;
  deleteTransactions(userId: string, ids: number[]): Promise<number>;
  findRecentDuplicate(userId: string, dedupeHash: string, createdSince: number): Promise<Transaction | null>;
  listTransactions(userId: string, params?: { account?: string; limit?: number }): Promise<Transaction[]>;
  getAccountBalance(userId: string, account: string): Promise<number>;
  getDescriptionHistory(userId: string, type: TransactionType, limit: number): Promise<DescriptionHistoryEntry[]>;

  insertGoal(goal: NewSavingsGoal): Promise<SavingsGoal>;
  findGoalById(userId: string, id: number): Promise<SavingsGoal | null>;
  findGoalsByName(userId: string, fragment: string): Promise<SavingsGoal[]>;
  listGoals(userId: string): Promise<SavingsGoal[]>;
  updateGoal(userId: string, id: number, changes: SavingsGoalChanges): Promise<SavingsGoal | null>;
  addToGoal(userId: string, id: number, amount: number): Promise<SavingsGoal | null>;
}
