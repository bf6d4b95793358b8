import { AsyncLocalStorage } from 'node:async_hooks';
import { z } from 'zod';
import type { DescriptionHistoryEntry, FinanceStorePort } from '../../../application/ports/FinanceStorePort.js';
import type { NewSavingsGoal, SavingsGoal, SavingsGoalChanges } from '../../../domain/entities/SavingsGoal.js';
import type { NewTransaction, Transaction, TransactionChanges, TransactionType } from '../../../domain/entities/Transaction.js';
import type { SqliteConnection } from './SqliteDatabase.js';
import { StorageError } from './StorageError.js';

type SqlValue = string | number | null;

const TransactionRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  date: z.string(),
  type: z.enum(['income', 'expense', 'transfer']),
  category: z.string(),
  description: z.string(),
  amount: z.number(),
  account: z.string(),
  transfer_group: z.string().nullable(),
  dedupe_hash: z.string(),
  created_at: z.number(),
});

const GoalRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  name: z.string(),
  target_amount: z.number(),
  current_amount: z.number(),
  description: z.string().nullable(),
  target_date: z.string().nullable(),
  created_at: z.number(),
});

const HistoryRowSchema = z.object({
  category: z.string(),
  description: z.string(),
  frequency: z.number().int(),
});

const BalanceRowSchema = z.object({ balance: z.number().nullable() });

const toTransaction = (raw: unknown): Transaction => {
  const row = TransactionRowSchema.parse(raw);
  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    type: row.type,
    category: row.category,
    description: row.description,
    amount: row.amount,
    account: row.account,
    transferGroup: row.transfer_group,
    dedupeHash: row.dedupe_hash,
    createdAt: row.created_at,
  };
};

const toGoal = (raw: unknown): SavingsGoal => {
  const row = GoalRowSchema.parse(raw);
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    targetAmount: row.target_amount,
    currentAmount: row.current_amount,
    description: row.description,
    targetDate: row.target_date,
    createdAt: row.created_at,
  };
};

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

/**
 * better-sqlite3 backed store. Calls are synchronous underneath; the async
 * surface matches the port so other stores can be swapped in.
 */
export class SqliteFinanceStore implements FinanceStorePort {
  private readonly unitOfWork = new AsyncLocalStorage<true>();
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly db: SqliteConnection) {}

  /**
   * Units of work share one connection, so they run one at a time in call
   * order. A call made from inside a running unit joins it.
   */
  async withTransaction<T>(work: () => Promise<T>): Promise<T> {
    if (this.unitOfWork.getStore()) {
      return work();
    }

    const result = this.queue.then(() => this.unitOfWork.run(true, () => this.transact(work)));
    // The queue only waits for settlement; the caller gets the rejection.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async transact<T>(work: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN IMMEDIATE');
    try {
      const result = await work();
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
      throw error;
    }
  }

  async insertTransaction(transaction: NewTransaction): Promise<Transaction> {
    return this.run('insert_transaction', () => {
      const result = this.db
        .prepare(
          `INSERT INTO transactions (
            user_id, date, type, category, description, amount, account, transfer_group, dedupe_hash, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          transaction.userId,
          transaction.date,
          transaction.type,
          transaction.category,
          transaction.description,
          transaction.amount,
          transaction.account,
          transaction.transferGroup,
          transaction.dedupeHash,
          transaction.createdAt,
        );

      return { ...transaction, id: Number(result.lastInsertRowid) };
    });
  }

  async findTransaction(userId: string, id: number): Promise<Transaction | null> {
    return this.run('find_transaction', () => {
      const row = this.db.prepare('SELECT * FROM transactions WHERE user_id = ? AND id = ?').get(userId, id);
      return row === undefined ? null : toTransaction(row);
    });
  }

  async findTransferLegs(userId: string, transferGroup: string): Promise<Transaction[]> {
    return this.run('find_transfer_legs', () =>
      this.db
        .prepare('SELECT * FROM transactions WHERE user_id = ? AND transfer_group = ? ORDER BY id')
        .all(userId, transferGroup)
        .map(toTransaction),
    );
  }

  async updateTransaction(userId: string, id: number, changes: TransactionChanges): Promise<Transaction | null> {
    return this.run('update_transaction', () => {
      const columns: Array<[string, SqlValue | undefined]> = [
        ['date', changes.date],
        ['category', changes.category],
        ['description', changes.description],
        ['amount', changes.amount],
        ['account', changes.account],
        ['dedupe_hash', changes.dedupeHash],
      ];
      const set = columns.filter((entry): entry is [string, SqlValue] => entry[1] !== undefined);

      if (set.length) {
        const result = this.db
          .prepare(`UPDATE transactions SET ${set.map(([column]) => `${column} = ?`).join(', ')} WHERE user_id = ? AND id = ?`)
          .run(...set.map(([, value]) => value), userId, id);
        if (result.changes === 0) {
          return null;
        }
      }

      const row = this.db.prepare('SELECT * FROM transactions WHERE user_id = ? AND id = ?').get(userId, id);
      return row === undefined ? null : toTransaction(row);
    });
  }

  async deleteTransactions(userId: string, ids: number[]): Promise<number> {
    if (!ids.length) {
      return 0;
    }

    return this.run('delete_transactions', () => {
      const placeholders = ids.map(() => '?').join(', ');
      return this.db.prepare(`DELETE FROM transactions WHERE user_id = ? AND id IN (${placeholders})`).run(userId, ...ids).changes;
    });
  }

  async findRecentDuplicate(userId: string, dedupeHash: string, createdSince: number): Promise<Transaction | null> {
    return this.run('find_recent_duplicate', () => {
      const row = this.db
        .prepare(
          'SELECT * FROM transactions WHERE user_id = ? AND dedupe_hash = ? AND created_at >= ? ORDER BY created_at DESC LIMIT 1',
        )
        .get(userId, dedupeHash, createdSince);
      return row === undefined ? null : toTransaction(row);
    });
  }

  async listTransactions(userId: string, params: { account?: string; limit?: number } = {}): Promise<Transaction[]> {
    return this.run('list_transactions', () => {
      const limit = params.limit ?? 50;
      const rows =
        params.account !== undefined
          ? this.db
              .prepare('SELECT * FROM transactions WHERE user_id = ? AND account = ? ORDER BY date DESC, id DESC LIMIT ?')
              .all(userId, params.account, limit)
          : this.db.prepare('SELECT * FROM transactions WHERE user_id = ? ORDER BY date DESC, id DESC LIMIT ?').all(userId, limit);
      return rows.map(toTransaction);
    });
  }

  async getAccountBalance(userId: string, account: string): Promise<number> {
    return this.run('get_account_balance', () => {
      const row = BalanceRowSchema.parse(
        this.db.prepare('SELECT SUM(amount) AS balance FROM transactions WHERE user_id = ? AND account = ?').get(userId, account),
      );
      return Math.round((row.balance ?? 0) * 100) / 100;
    });
  }

  async getDescriptionHistory(userId: string, type: TransactionType, limit: number): Promise<DescriptionHistoryEntry[]> {
    return this.run('get_description_history', () =>
      this.db
        .prepare(
          `SELECT category, MAX(description) AS description, COUNT(*) AS frequency
           FROM transactions
           WHERE user_id = ? AND type = ? AND description != ''
           GROUP BY category, LOWER(description)
           ORDER BY frequency DESC, MAX(created_at) DESC
           LIMIT ?`,
        )
        .all(userId, type, limit)
        .map((row) => HistoryRowSchema.parse(row)),
    );
  }

  async insertGoal(goal: NewSavingsGoal): Promise<SavingsGoal> {
    return this.run('insert_goal', () => {
      const result = this.db
        .prepare(
          `INSERT INTO savings_goals (user_id, name, target_amount, current_amount, description, target_date, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(goal.userId, goal.name, goal.targetAmount, goal.currentAmount, goal.description, goal.targetDate, goal.createdAt);

      return { ...goal, id: Number(result.lastInsertRowid) };
    });
  }

  async findGoalById(userId: string, id: number): Promise<SavingsGoal | null> {
    return this.run('find_goal', () => {
      const row = this.db.prepare('SELECT * FROM savings_goals WHERE user_id = ? AND id = ?').get(userId, id);
      return row === undefined ? null : toGoal(row);
    });
  }

  async findGoalsByName(userId: string, fragment: string): Promise<SavingsGoal[]> {
    return this.run('find_goals_by_name', () =>
      this.db
        .prepare("SELECT * FROM savings_goals WHERE user_id = ? AND LOWER(name) LIKE ? ESCAPE '\\' ORDER BY id")
        .all(userId, `%${escapeLike(fragment.toLowerCase())}%`)
        .map(toGoal),
    );
  }

  async listGoals(userId: string): Promise<SavingsGoal[]> {
    return this.run('list_goals', () =>
      this.db.prepare('SELECT * FROM savings_goals WHERE user_id = ? ORDER BY id').all(userId).map(toGoal),
    );
  }

  async updateGoal(userId: string, id: number, changes: SavingsGoalChanges): Promise<SavingsGoal | null> {
    return this.run('update_goal', () => {
      const columns: Array<[string, SqlValue | undefined]> = [
        ['name', changes.name],
        ['target_amount', changes.targetAmount],
        ['current_amount', changes.currentAmount],
        ['description', changes.description],
        ['target_date', changes.targetDate],
      ];
      const set = columns.filter((entry): entry is [string, SqlValue] => entry[1] !== undefined);

      if (set.length) {
        const result = this.db
          .prepare(`UPDATE savings_goals SET ${set.map(([column]) => `${column} = ?`).join(', ')} WHERE user_id = ? AND id = ?`)
          .run(...set.map(([, value]) => value), userId, id);
        if (result.changes === 0) {
          return null;
        }
      }

      const row = this.db.prepare('SELECT * FROM savings_goals WHERE user_id = ? AND id = ?').get(userId, id);
      return row === undefined ? null : toGoal(row);
    });
  }

  async addToGoal(userId: string, id: number, amount: number): Promise<SavingsGoal | null> {
    return this.run('add_to_goal', () => {
      const result = this.db
        .prepare('UPDATE savings_goals SET current_amount = current_amount + ? WHERE user_id = ? AND id = ?')
        .run(amount, userId, id);
      if (result.changes === 0) {
        return null;
      }
      const row = this.db.prepare('SELECT * FROM savings_goals WHERE user_id = ? AND id = ?').get(userId, id);
      return row === undefined ? null : toGoal(row);
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
