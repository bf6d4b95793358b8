import { describe, it, expect, beforeEach } from 'vitest';
import { ActionExecutorService } from '../src/application/services/ActionExecutorService.js';
import { FieldInterpreterService } from '../src/application/services/FieldInterpreterService.js';
import type { SavingsGoal } from '../src/domain/entities/SavingsGoal.js';
import type { NewTransaction, Transaction } from '../src/domain/entities/Transaction.js';
import { KeywordCategorySuggester } from '../src/infrastructure/adapters/categorizer/KeywordCategorySuggester.js';
import { openDatabase, type SqliteConnection } from '../src/infrastructure/adapters/storage/SqliteDatabase.js';
import { SqliteFinanceStore } from '../src/infrastructure/adapters/storage/SqliteFinanceStore.js';
import { createLogger, FIXED_NOW, FixedClock, TEST_TIMEZONE, vocabulary } from './fixtures.js';

const USER = 'user-1';

// Fails the nth insert, counting from the first one made through it.
class FailingInsertStore extends SqliteFinanceStore {
  private inserts = 0;

  constructor(
    db: SqliteConnection,
    private readonly failOn: number,
  ) {
    super(db);
  }

  override async insertTransaction(transaction: NewTransaction): Promise<Transaction> {
    this.inserts += 1;
    if (this.inserts === this.failOn) {
      throw new Error('disk full');
    }
    return super.insertTransaction(transaction);
  }
}

class VanishingGoalStore extends SqliteFinanceStore {
  override async addToGoal(): Promise<SavingsGoal | null> {
    return null;
  }
}

describe('ActionExecutorService', () => {
  let db: SqliteConnection;
  let store: SqliteFinanceStore;
  let clock: FixedClock;
  let logger: ReturnType<typeof createLogger>;
  let executor: ActionExecutorService;

  const buildExecutor = (financeStore: SqliteFinanceStore) =>
    new ActionExecutorService(
      financeStore,
      new FieldInterpreterService(vocabulary, clock, { timeZone: TEST_TIMEZONE }),
      new KeywordCategorySuggester(vocabulary.categories, financeStore, logger),
      clock,
      logger,
      {
        largeAmountThreshold: 10_000_000,
        maxAmount: 100_000_000_000,
        duplicateWindowMs: 5_000,
        defaultAccount: 'Cash',
        locale: 'id-ID',
        currency: 'IDR',
      },
    );

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteFinanceStore(db);
    clock = new FixedClock();
    logger = createLogger();
    executor = buildExecutor(store);
  });

  const seedIncome = (amount: string, account: string) =>
    executor.executeAction(USER, 'record_income', { amount, category: 'Gaji', account, description: 'gaji juni' });

  describe('add_transaction', () => {
    it('records a signed expense with canonical values', async () => {
      const result = await executor.executeAction(USER, 'add_transaction', {
        type: 'pengeluaran',
        amount: '50rb',
        category: 'makan',
        account: 'bank bca',
        description: '  nasi padang ',
      });

      expect(result.success).toBe(true);
      expect(result.code).toBe('TRANSACTION_ADDED');

      const [saved] = await store.listTransactions(USER);
      expect(saved).toMatchObject({
        date: '2025-06-15',
        type: 'expense',
        category: 'Makan',
        description: 'nasi padang',
        amount: -50_000,
        account: 'BCA',
        transferGroup: null,
      });
    });

    it('defaults the account and the date', async () => {
      await executor.executeAction(USER, 'add_transaction', { type: 'income', amount: 1000, category: 'Bonus' });

      const [saved] = await store.listTransactions(USER);
      expect(saved).toMatchObject({ account: 'Cash', date: '2025-06-15', amount: 1000 });
    });

    it('asks for the category when it is missing', async () => {
      const result = await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 30000 });

      expect(result).toMatchObject({ success: false, code: 'MISSING_CATEGORY', errorKind: 'validation' });
      expect(result.askUser).toBe(
        'Which category is this expense? Options: Makan, Transport, Hiburan, Belanja, Kesehatan, Investasi, Utilitas, Pendidikan, Lainnya',
      );
      expect(await store.listTransactions(USER)).toEqual([]);
    });

    it('suggests a category from the description', async () => {
      const result = await executor.executeAction(USER, 'add_transaction', {
        type: 'expense',
        amount: 30000,
        description: 'bensin pertamax parkir',
      });

      expect(result.code).toBe('MISSING_CATEGORY');
      expect(result.askUser).toBe("Looks like 'Transport'. Is that right?");
      expect(result.details?.suggestion).toMatchObject({ category: 'Transport', confidence: 1, method: 'keywords' });
    });

    it('validates type and amount before anything else', async () => {
      expect((await executor.executeAction(USER, 'add_transaction', { amount: 1000 })).code).toBe('MISSING_TYPE');
      expect((await executor.executeAction(USER, 'add_transaction', { type: 'maybe', amount: 1000 })).code).toBe('INVALID_TYPE');
      expect((await executor.executeAction(USER, 'add_transaction', { type: 'expense' })).code).toBe('MISSING_AMOUNT');
      expect((await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 'abc' })).code).toBe('INVALID_AMOUNT');
      expect((await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: '200 miliar' })).code).toBe(
        'AMOUNT_TOO_LARGE',
      );
    });

    it('forces the type for expense and income aliases', async () => {
      const result = await executor.executeAction(USER, ' Record_Expense ', { type: 'income', amount: 5000, category: 'Makan' });

      expect(result.code).toBe('TRANSACTION_ADDED');
      const [saved] = await store.listTransactions(USER);
      expect(saved?.type).toBe('expense');
      expect(saved?.amount).toBe(-5000);
    });

    it('asks for a specific income category instead of a generic one', async () => {
      const result = await executor.executeAction(USER, 'record_income', { amount: 100000, category: 'lainnya' });
      expect(result.code).toBe('NEED_CATEGORY');
    });

    it('asks before using a fuzzy category, account or date', async () => {
      const category = await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 1000, category: 'makn' });
      expect(category.code).toBe('AMBIGUOUS_CATEGORY');
      expect(category.details?.interpreted_value).toBe('Makan');

      const account = await executor.executeAction(USER, 'add_transaction', {
        type: 'expense',
        amount: 1000,
        category: 'Makan',
        account: 'maybnk',
      });
      expect(account).toMatchObject({ code: 'CONFIRM_ACCOUNT', requiresConfirmation: true });
      expect(account.details?.interpreted_value).toBe('Maybank');

      const date = await executor.executeAction(USER, 'add_transaction', {
        type: 'expense',
        amount: 1000,
        category: 'Makan',
        date: '25 desember',
      });
      expect(date).toMatchObject({ code: 'CONFIRM_DATE', requiresConfirmation: true });
      expect(date.details?.interpreted_value).toBe('2025-12-25');

      expect(await store.listTransactions(USER)).toEqual([]);
    });

    it('rejects unknown accounts and dates', async () => {
      const args = { type: 'expense', amount: 1000, category: 'Makan' };
      expect((await executor.executeAction(USER, 'add_transaction', { ...args, account: 'zzzzzzzz' })).code).toBe('INVALID_ACCOUNT');
      expect((await executor.executeAction(USER, 'add_transaction', { ...args, date: 'someday' })).code).toBe('INVALID_DATE');
    });

    it('asks to confirm large amounts unless already confirmed', async () => {
      const args = { type: 'expense', amount: '20jt', category: 'Belanja' };

      const pending = await executor.executeAction(USER, 'add_transaction', args);
      expect(pending).toMatchObject({
        code: 'LARGE_AMOUNT_CONFIRMATION',
        requiresConfirmation: true,
        details: { amount: 20_000_000, threshold: 10_000_000 },
      });

      const confirmed = await executor.executeAction(USER, 'add_transaction', { ...args, confirmed: true });
      expect(confirmed.code).toBe('TRANSACTION_ADDED');
    });

    it('stores an identical transaction once within the duplicate window', async () => {
      const args = { type: 'expense', amount: 25000, category: 'Makan', account: 'cash' };

      const first = await executor.executeAction(USER, 'add_transaction', args);
      const second = await executor.executeAction(USER, 'add_transaction', args);

      expect(first.details?.duplicate).toBe(false);
      expect(second).toMatchObject({ success: false, code: 'DUPLICATE_TRANSACTION', errorKind: 'conflict' });
      expect(second.details?.duplicate).toBe(true);
      expect(await store.listTransactions(USER)).toHaveLength(1);

      clock.advance(6_000);
      const later = await executor.executeAction(USER, 'add_transaction', args);
      expect(later.code).toBe('TRANSACTION_ADDED');
      expect(await store.listTransactions(USER)).toHaveLength(2);
    });

    it('stores one row when identical requests arrive together', async () => {
      const args = { type: 'expense', amount: 30000, category: 'Makan', account: 'Cash' };

      const results = await Promise.all([
        executor.executeAction(USER, 'add_transaction', args),
        executor.executeAction(USER, 'add_transaction', args),
      ]);

      expect(results.map((result) => result.code).sort()).toEqual(['DUPLICATE_TRANSACTION', 'TRANSACTION_ADDED']);
      expect(await store.listTransactions(USER)).toHaveLength(1);
    });

    it('keeps a request out of an unrelated unit of work that rolls back', async () => {
      const unrelated = store.withTransaction(async () => {
        await store.insertTransaction({
          userId: USER,
          date: '2025-06-15',
          type: 'income',
          category: 'Gaji',
          description: '',
          amount: 5000,
          account: 'Cash',
          transferGroup: null,
          dedupeHash: 'other',
          createdAt: FIXED_NOW,
        });
        await new Promise((resolve) => setTimeout(resolve, 5));
        throw new Error('abort');
      });
      const added = executor.executeAction(USER, 'add_transaction', {
        type: 'expense',
        amount: 30000,
        category: 'Makan',
        account: 'Cash',
      });

      await expect(unrelated).rejects.toThrow('abort');
      expect((await added).code).toBe('TRANSACTION_ADDED');

      const rows = await store.listTransactions(USER);
      expect(rows.map((row) => [row.category, row.amount])).toEqual([['Makan', -30_000]]);
    });
  });

  describe('transfer_funds', () => {
    it('stores two equal and opposite legs sharing a group', async () => {
      await seedIncome('1jt', 'bca');

      const result = await executor.executeAction(USER, 'transfer_funds', {
        from_account: 'bca',
        to_account: 'tunai',
        amount: '250rb',
      });

      expect(result.code).toBe('TRANSFER_COMPLETED');
      expect(result.details?.from_balance).toBe(750_000);

      const group = result.details?.transfer_group;
      expect(typeof group).toBe('string');
      const legs = await store.findTransferLegs(USER, String(group));
      expect(legs.map((leg) => [leg.account, leg.amount, leg.type, leg.category])).toEqual([
        ['BCA', -250_000, 'transfer', 'Transfer'],
        ['Cash', 250_000, 'transfer', 'Transfer'],
      ]);

      expect(await store.getAccountBalance(USER, 'BCA')).toBe(750_000);
      expect(await store.getAccountBalance(USER, 'Cash')).toBe(250_000);
    });

    it('reports the shortfall when the balance is too low', async () => {
      await seedIncome('750rb', 'bca');

      const result = await executor.executeAction(USER, 'transfer_funds', {
        from_account: 'BCA',
        to_account: 'gopay',
        amount: '2jt',
      });

      expect(result).toMatchObject({
        success: false,
        code: 'INSUFFICIENT_BALANCE',
        errorKind: 'insufficient_balance',
        details: { account: 'BCA', balance: 750_000, requested: 2_000_000, shortfall: 1_250_000 },
      });
      expect(await store.listTransactions(USER)).toHaveLength(1);
    });

    it('needs two different accounts', async () => {
      expect((await executor.executeAction(USER, 'transfer_funds', { to_account: 'cash', amount: 1 })).code).toBe(
        'MISSING_FROM_ACCOUNT',
      );
      expect((await executor.executeAction(USER, 'transfer_funds', { from_account: 'cash', amount: 1 })).code).toBe(
        'MISSING_TO_ACCOUNT',
      );
      expect(
        (await executor.executeAction(USER, 'transfer_funds', { from_account: 'bca', to_account: 'bank bca', amount: 1 })).code,
      ).toBe('SAME_ACCOUNT');
    });

    it('lets only one of two concurrent transfers spend the same balance', async () => {
      await seedIncome('1jt', 'bca');

      const args = { from_account: 'bca', to_account: 'cash', amount: '750rb' };
      const results = await Promise.all([
        executor.executeAction(USER, 'transfer_funds', args),
        executor.executeAction(USER, 'transfer_funds', args),
      ]);

      expect(results.map((result) => result.code).sort()).toEqual(['INSUFFICIENT_BALANCE', 'TRANSFER_COMPLETED']);
      expect(await store.getAccountBalance(USER, 'BCA')).toBe(250_000);
      expect(await store.getAccountBalance(USER, 'Cash')).toBe(750_000);
    });

    it('rolls the first leg back when the second one fails', async () => {
      const failing = new FailingInsertStore(db, 3);
      const failingExecutor = buildExecutor(failing);
      await failingExecutor.executeAction(USER, 'record_income', { amount: '1jt', category: 'Gaji', account: 'bca' });

      const result = await failingExecutor.executeAction(USER, 'transfer_funds', {
        from_account: 'bca',
        to_account: 'cash',
        amount: '250rb',
      });

      expect(result).toMatchObject({ success: false, code: 'EXECUTION_ERROR', errorKind: 'execution' });
      const rows = await store.listTransactions(USER);
      expect(rows.map((row) => [row.type, row.account, row.amount])).toEqual([['income', 'BCA', 1_000_000]]);
      expect(await store.getAccountBalance(USER, 'BCA')).toBe(1_000_000);
      expect(await store.getAccountBalance(USER, 'Cash')).toBe(0);
    });
  });

  describe('update_transaction and delete_transaction', () => {
    it('updates fields and recomputes the fingerprint', async () => {
      await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 50000, category: 'Makan' });
      const [original] = await store.listTransactions(USER);

      const result = await executor.executeAction(USER, 'update_transaction', {
        transaction_id: String(original?.id),
        amount: '75rb',
        account: 'ovo',
      });

      expect(result.code).toBe('TRANSACTION_UPDATED');
      expect(result.details?.changed).toEqual(['amount', 'account']);

      const [updated] = await store.listTransactions(USER);
      expect(updated).toMatchObject({ amount: -75_000, account: 'Ovo', category: 'Makan' });
      expect(updated?.dedupeHash).not.toBe(original?.dedupeHash);
    });

    it('reports missing ids, missing rows and empty updates', async () => {
      expect((await executor.executeAction(USER, 'update_transaction', {})).code).toBe('MISSING_TRANSACTION_ID');

      const missing = await executor.executeAction(USER, 'update_transaction', { transaction_id: 999, amount: 1 });
      expect(missing).toMatchObject({ code: 'TRANSACTION_NOT_FOUND', errorKind: 'not_found' });

      await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 50000, category: 'Makan' });
      const [saved] = await store.listTransactions(USER);
      expect((await executor.executeAction(USER, 'update_transaction', { transaction_id: saved?.id })).code).toBe('NO_UPDATES');
    });

    it('does not touch another user\'s transactions', async () => {
      await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 50000, category: 'Makan' });
      const [saved] = await store.listTransactions(USER);

      const result = await executor.executeAction('user-2', 'delete_transaction', { transaction_id: saved?.id });
      expect(result.code).toBe('TRANSACTION_NOT_FOUND');
      expect(await store.listTransactions(USER)).toHaveLength(1);
    });

    it('keeps transfers immutable and deletes both legs together', async () => {
      await seedIncome('1jt', 'bca');
      await executor.executeAction(USER, 'transfer_funds', { from_account: 'bca', to_account: 'cash', amount: 100000 });
      const legs = (await store.listTransactions(USER)).filter((transaction) => transaction.type === 'transfer');
      const [leg] = legs;

      const edit = await executor.executeAction(USER, 'update_transaction', { transaction_id: leg?.id, amount: 1 });
      expect(edit.code).toBe('TRANSFER_NOT_EDITABLE');

      const removed = await executor.executeAction(USER, 'delete_transaction', { transaction_id: leg?.id });
      expect(removed.code).toBe('TRANSACTION_DELETED');
      expect(removed.details?.deleted).toBe(2);

      const remaining = await store.listTransactions(USER);
      expect(remaining.map((transaction) => transaction.type)).toEqual(['income']);
    });
  });

  describe('savings goals', () => {
    it('creates a goal and refuses a duplicate name', async () => {
      const created = await executor.executeAction(USER, 'create_savings_goal', {
        name: 'Laptop',
        target_amount: '10jt',
        target_date: '2025-12-31',
      });
      expect(created.code).toBe('GOAL_CREATED');
      expect(created.details?.goal).toMatchObject({ name: 'Laptop', target_amount: 10_000_000, current_amount: 0, target_date: '2025-12-31' });

      const duplicate = await executor.executeAction(USER, 'create_savings_goal', { name: 'laptop', target_amount: 1000 });
      expect(duplicate).toMatchObject({ code: 'DUPLICATE_GOAL', errorKind: 'conflict' });
    });

    it('validates the goal name and target', async () => {
      expect((await executor.executeAction(USER, 'create_savings_goal', { target_amount: 1000 })).code).toBe('MISSING_GOAL_NAME');
      expect((await executor.executeAction(USER, 'create_savings_goal', { name: 'x'.repeat(201), target_amount: 1000 })).code).toBe(
        'NAME_TOO_LONG',
      );
      expect((await executor.executeAction(USER, 'create_savings_goal', { name: 'Trip' })).code).toBe('MISSING_TARGET_AMOUNT');
    });

    it('moves money into a goal as a savings expense', async () => {
      await executor.executeAction(USER, 'create_savings_goal', { name: 'Laptop', target_amount: '10jt' });

      const result = await executor.executeAction(USER, 'transfer_to_savings', { goal_name: 'lap', amount: '1jt', account: 'cash' });

      expect(result.code).toBe('SAVINGS_TRANSFERRED');
      expect(result.details?.progress).toBe(10);
      expect(result.details?.goal).toMatchObject({ name: 'Laptop', current_amount: 1_000_000 });

      const [saved] = await store.listTransactions(USER);
      expect(saved).toMatchObject({ type: 'expense', category: 'Tabungan', amount: -1_000_000, account: 'Cash' });
    });

    it('lists goals when none is named and updates the chosen one', async () => {
      await executor.executeAction(USER, 'create_savings_goal', { name: 'Laptop', target_amount: '10jt' });

      const ask = await executor.executeAction(USER, 'update_savings_goal', { target_amount: '12jt' });
      expect(ask.code).toBe('MISSING_GOAL');
      expect(ask.askUser).toBe('Which goal do you mean? Your goals: Laptop');

      expect((await executor.executeAction(USER, 'update_savings_goal', { goal_id: 99, target_amount: 1 })).code).toBe('GOAL_NOT_FOUND');

      const [goal] = await store.listGoals(USER);
      const updated = await executor.executeAction(USER, 'update_savings_goal', { goal_id: goal?.id, target_amount: '12jt' });
      expect(updated.code).toBe('GOAL_UPDATED');
      expect(updated.details?.goal).toMatchObject({ target_amount: 12_000_000 });
    });

    it('resets the saved amount to zero but refuses negative amounts', async () => {
      await executor.executeAction(USER, 'create_savings_goal', { name: 'Laptop', target_amount: '10jt' });
      await executor.executeAction(USER, 'transfer_to_savings', { goal_name: 'Laptop', amount: '1jt', account: 'cash' });
      const [goal] = await store.listGoals(USER);

      const reset = await executor.executeAction(USER, 'update_savings_goal', { goal_id: goal?.id, current_amount: 0 });
      expect(reset.code).toBe('GOAL_UPDATED');
      expect(reset.details?.goal).toMatchObject({ current_amount: 0 });
      expect(reset.details?.changed).toEqual(['currentAmount']);

      const negative = await executor.executeAction(USER, 'update_savings_goal', { goal_id: goal?.id, current_amount: -5 });
      expect(negative.code).toBe('INVALID_AMOUNT');
      expect((await store.listGoals(USER))[0]?.currentAmount).toBe(0);
    });

    it('rolls the savings expense back when the goal cannot be credited', async () => {
      const vanishing = new VanishingGoalStore(db);
      const vanishingExecutor = buildExecutor(vanishing);
      await vanishingExecutor.executeAction(USER, 'create_savings_goal', { name: 'Laptop', target_amount: '10jt' });

      const result = await vanishingExecutor.executeAction(USER, 'transfer_to_savings', {
        goal_name: 'Laptop',
        amount: '1jt',
        account: 'cash',
      });

      expect(result).toMatchObject({ success: false, code: 'EXECUTION_ERROR', errorKind: 'execution' });
      expect(await store.listTransactions(USER)).toEqual([]);
      expect((await store.listGoals(USER))[0]?.currentAmount).toBe(0);
      expect(logger.error).toHaveBeenCalledWith(
        'action_execution_failed',
        expect.objectContaining({ userId: USER, action: 'transfer_to_savings' }),
      );
    });
  });

  describe('dispatch', () => {
    it('rejects unknown actions', async () => {
      const result = await executor.executeAction(USER, 'launch_rocket', {});
      expect(result).toMatchObject({ success: false, code: 'UNKNOWN_ACTION' });
    });

    it('rejects arguments of the wrong shape', async () => {
      const result = await executor.executeAction(USER, 'add_transaction', { amount: { value: 5 } });
      expect(result.code).toBe('INVALID_ARGUMENTS');
      expect(result.askUser).toBe('Some details could not be read: amount. Could you rephrase them?');
    });

    it('converts unexpected failures into an execution error', async () => {
      db.close();

      const result = await executor.executeAction(USER, 'add_transaction', { type: 'expense', amount: 1000, category: 'Makan' });

      expect(result).toMatchObject({ success: false, code: 'EXECUTION_ERROR', errorKind: 'execution' });
      expect(result.message).not.toContain('database');
      expect(logger.error).toHaveBeenCalledWith(
        'action_execution_failed',
        expect.objectContaining({ userId: USER, action: 'add_transaction' }),
      );
    });
  });
});
