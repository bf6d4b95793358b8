import crypto from 'node:crypto';
import type { z } from 'zod';
import type { InterpretationResult } from '../../domain/entities/Interpretation.js';
import type { SavingsGoal } from '../../domain/entities/SavingsGoal.js';
import { signedAmount, type Transaction, type TransactionChanges } from '../../domain/entities/Transaction.js';
import { parseAmount } from '../../domain/services/AmountParser.js';
import { formatAmount } from '../../domain/services/MoneyFormatter.js';
import { buildTransactionHash } from '../../domain/services/TransactionHasher.js';
import {
  AddTransactionArgsSchema,
  CreateSavingsGoalArgsSchema,
  DeleteTransactionArgsSchema,
  TransferFundsArgsSchema,
  TransferToSavingsArgsSchema,
  UpdateSavingsGoalArgsSchema,
  UpdateTransactionArgsSchema,
  type AddTransactionArgs,
  type CreateSavingsGoalArgs,
  type DeleteTransactionArgs,
  type TransferFundsArgs,
  type TransferToSavingsArgs,
  type UpdateSavingsGoalArgs,
  type UpdateTransactionArgs,
} from '../dto/ActionArgsDTO.js';
import type { ActionCode, ActionErrorKind, ActionResultDTO } from '../dto/ActionResultDTO.js';
import type { CategorySuggesterPort } from '../ports/CategorySuggesterPort.js';
import type { ClockPort } from '../ports/ClockPort.js';
import type { FinanceStorePort } from '../ports/FinanceStorePort.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import type { CategoryType, FieldInterpreterService } from './FieldInterpreterService.js';

export interface ActionExecutorOptions {
  largeAmountThreshold: number;
  maxAmount: number;
  duplicateWindowMs: number;
  defaultAccount: string;
  locale: string;
  currency: string;
  maxGoalNameLength?: number;
}

export const SUPPORTED_ACTIONS = [
  'add_transaction',
  'record_expense',
  'record_income',
  'add_expense',
  'add_income',
  'update_transaction',
  'delete_transaction',
  'transfer_funds',
  'create_savings_goal',
  'update_savings_goal',
  'transfer_to_savings',
] as const;

export type ActionName = (typeof SUPPORTED_ACTIONS)[number];

const isActionName = (value: string): value is ActionName => SUPPORTED_ACTIONS.some((action) => action === value);

type Resolved<T> = { ok: true; value: T } | { ok: false; result: ActionResultDTO };

const TRANSFER_CATEGORY = 'Transfer';
const SAVINGS_CATEGORY = 'Tabungan';

const resolved = <T>(value: T): Resolved<T> => ({ ok: true, value });

const rejected = <T>(result: ActionResultDTO): Resolved<T> => ({ ok: false, result });

const roundCents = (value: number): number => Math.round(value * 100) / 100;

const hasText = (value: string | undefined): value is string => value !== undefined && value.trim() !== '';

const hasValue = (value: string | number | undefined): value is string | number =>
  typeof value === 'number' || hasText(value);

const failure = (
  code: ActionCode,
  errorKind: ActionErrorKind,
  message: string,
  extra: Pick<ActionResultDTO, 'askUser' | 'requiresConfirmation' | 'details'> = {},
): ActionResultDTO => ({ success: false, code, errorKind, message, ...extra });

const ask = (code: ActionCode, askUser: string, details?: Record<string, unknown>): ActionResultDTO =>
  failure(code, 'validation', askUser, { askUser, details });

export class ActionExecutorService {
  private readonly maxGoalNameLength: number;

  constructor(
    private readonly store: FinanceStorePort,
    private readonly interpreter: FieldInterpreterService,
    private readonly categorySuggester: CategorySuggesterPort,
    private readonly clock: ClockPort,
    private readonly logger: LoggerPort,
    private readonly options: ActionExecutorOptions,
  ) {
    this.maxGoalNameLength = options.maxGoalNameLength ?? 200;
  }

  async executeAction(userId: string, actionName: string, rawArgs: Record<string, unknown>): Promise<ActionResultDTO> {
    const action = actionName.trim().toLowerCase();
    if (!isActionName(action)) {
      return failure('UNKNOWN_ACTION', 'validation', `Unknown action: ${actionName}`, {
        details: { supported: [...SUPPORTED_ACTIONS] },
      });
    }

    try {
      const result = await this.dispatch(userId, action, rawArgs);
      this.logger.info('action_executed', { userId, action, code: result.code, success: result.success });
      return result;
    } catch (error) {
      this.logger.error('action_execution_failed', {
        userId,
        action,
        args: rawArgs,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return failure('EXECUTION_ERROR', 'execution', 'Something went wrong while saving your request. Nothing was changed; please try again.');
    }
  }

  private async dispatch(userId: string, action: ActionName, rawArgs: Record<string, unknown>): Promise<ActionResultDTO> {
    switch (action) {
      case 'add_transaction':
        return this.withArgs(AddTransactionArgsSchema, rawArgs, (args) => this.addTransaction(userId, args));
      case 'record_expense':
      case 'add_expense':
        return this.withArgs(AddTransactionArgsSchema, rawArgs, (args) =>
          this.addTransaction(userId, { ...args, type: 'expense' }),
        );
      case 'record_income':
      case 'add_income':
        return this.withArgs(AddTransactionArgsSchema, rawArgs, (args) =>
          this.addTransaction(userId, { ...args, type: 'income' }),
        );
      case 'update_transaction':
        return this.withArgs(UpdateTransactionArgsSchema, rawArgs, (args) => this.updateTransaction(userId, args));
      case 'delete_transaction':
        return this.withArgs(DeleteTransactionArgsSchema, rawArgs, (args) => this.deleteTransaction(userId, args));
      case 'transfer_funds':
        return this.withArgs(TransferFundsArgsSchema, rawArgs, (args) => this.transferFunds(userId, args));
      case 'create_savings_goal':
        return this.withArgs(CreateSavingsGoalArgsSchema, rawArgs, (args) => this.createSavingsGoal(userId, args));
      case 'update_savings_goal':
        return this.withArgs(UpdateSavingsGoalArgsSchema, rawArgs, (args) => this.updateSavingsGoal(userId, args));
      case 'transfer_to_savings':
        return this.withArgs(TransferToSavingsArgsSchema, rawArgs, (args) => this.transferToSavings(userId, args));
    }
  }

  private async withArgs<S extends z.ZodTypeAny>(
    schema: S,
    rawArgs: Record<string, unknown>,
    run: (args: z.output<S>) => Promise<ActionResultDTO>,
  ): Promise<ActionResultDTO> {
    const parsed = schema.safeParse(rawArgs);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'arguments');
      return ask('INVALID_ARGUMENTS', `Some details could not be read: ${Array.from(new Set(fields)).join(', ')}. Could you rephrase them?`, {
        fields,
      });
    }
    return run(parsed.data);
  }

  private async addTransaction(userId: string, args: AddTransactionArgs): Promise<ActionResultDTO> {
    const type = this.resolveType(args.type);
    if (!type.ok) {
      return type.result;
    }

    const amount = this.resolveAmount(args.amount, type.value === 'income' ? 'How much did you receive?' : 'How much did you spend?');
    if (!amount.ok) {
      return amount.result;
    }

    const category = await this.resolveCategory(userId, args.category, type.value, args.description);
    if (!category.ok) {
      return category.result;
    }

    const date = this.resolveDate(args.date);
    if (!date.ok) {
      return date.result;
    }

    const account = this.resolveAccount(args.account, 'account', null);
    if (!account.ok) {
      return account.result;
    }

    const large = this.checkLargeAmount(amount.value, args.confirmed, `${type.value} of`);
    if (large) {
      return large;
    }

    const description = args.description?.trim() ?? '';
    const dedupeHash = buildTransactionHash({
      userId,
      date: date.value,
      type: type.value,
      category: category.value,
      amount: amount.value,
      account: account.value,
    });
    const now = this.clock.now();

    return this.store.withTransaction(async () => {
      const duplicate = await this.store.findRecentDuplicate(userId, dedupeHash, now - this.options.duplicateWindowMs);
      if (duplicate) {
        this.logger.warn('duplicate_transaction_blocked', { userId, transactionId: duplicate.id });
        return failure('DUPLICATE_TRANSACTION', 'conflict', 'That transaction was already recorded a moment ago, so it was not added again.', {
          details: { duplicate: true, transaction_id: duplicate.id },
        });
      }

      const saved = await this.store.insertTransaction({
        userId,
        date: date.value,
        type: type.value,
        category: category.value,
        description,
        amount: signedAmount(type.value, amount.value),
        account: account.value,
        transferGroup: null,
        dedupeHash,
        createdAt: now,
      });

      return {
        success: true,
        code: 'TRANSACTION_ADDED',
        message: `Recorded ${type.value} of ${this.money(amount.value)} for ${category.value} on ${account.value} (${date.value}).`,
        details: { duplicate: false, transaction: this.describeTransaction(saved) },
      };
    });
  }

  private async updateTransaction(userId: string, args: UpdateTransactionArgs): Promise<ActionResultDTO> {
    if (args.transaction_id === undefined) {
      return ask('MISSING_TRANSACTION_ID', 'Which transaction should be changed? Please give its ID.');
    }

    const transactionId = args.transaction_id;

    return this.store.withTransaction(async () => {
      const existing = await this.store.findTransaction(userId, transactionId);
      if (!existing) {
        return this.transactionNotFound(transactionId);
      }
      if (existing.type === 'transfer') {
        return failure(
          'TRANSFER_NOT_EDITABLE',
          'validation',
          'Transfers cannot be edited. Delete the transfer and record it again instead.',
          { details: { transaction_id: existing.id, transfer_group: existing.transferGroup } },
        );
      }

      const changes: TransactionChanges = {};

      if (hasValue(args.amount)) {
        const amount = this.resolveAmount(args.amount, 'What is the new amount?');
        if (!amount.ok) {
          return amount.result;
        }
        const large = this.checkLargeAmount(amount.value, args.confirmed, `${existing.type} of`);
        if (large) {
          return large;
        }
        changes.amount = signedAmount(existing.type, amount.value);
      }

      if (hasText(args.category)) {
        const category = await this.resolveCategory(userId, args.category, existing.type, args.description ?? existing.description);
        if (!category.ok) {
          return category.result;
        }
        changes.category = category.value;
      }

      if (hasText(args.account)) {
        const account = this.resolveAccount(args.account, 'account', null);
        if (!account.ok) {
          return account.result;
        }
        changes.account = account.value;
      }

      if (hasText(args.date)) {
        const date = this.resolveDate(args.date);
        if (!date.ok) {
          return date.result;
        }
        changes.date = date.value;
      }

      if (args.description !== undefined) {
        changes.description = args.description.trim();
      }

      if (!Object.keys(changes).length) {
        return ask('NO_UPDATES', 'What should change: amount, category, account, date or description?', {
          transaction_id: existing.id,
        });
      }

      changes.dedupeHash = buildTransactionHash({
        userId,
        date: changes.date ?? existing.date,
        type: existing.type,
        category: changes.category ?? existing.category,
        amount: changes.amount ?? existing.amount,
        account: changes.account ?? existing.account,
      });

      const updated = await this.store.updateTransaction(userId, existing.id, changes);
      if (!updated) {
        return this.transactionNotFound(existing.id);
      }

      return {
        success: true,
        code: 'TRANSACTION_UPDATED',
        message: `Updated transaction ${updated.id}.`,
        details: { transaction: this.describeTransaction(updated), changed: Object.keys(changes).filter((key) => key !== 'dedupeHash') },
      };
    });
  }

  private async deleteTransaction(userId: string, args: DeleteTransactionArgs): Promise<ActionResultDTO> {
    if (args.transaction_id === undefined) {
      return ask('MISSING_TRANSACTION_ID', 'Which transaction should be deleted? Please give its ID.');
    }

    const transactionId = args.transaction_id;

    return this.store.withTransaction(async () => {
      const existing = await this.store.findTransaction(userId, transactionId);
      if (!existing) {
        return this.transactionNotFound(transactionId);
      }

      // Both legs of a transfer go together.
      const legs = existing.transferGroup ? await this.store.findTransferLegs(userId, existing.transferGroup) : [existing];
      const ids = legs.map((leg) => leg.id);
      const deleted = await this.store.deleteTransactions(userId, ids);

      return {
        success: true,
        code: 'TRANSACTION_DELETED',
        message:
          legs.length > 1
            ? `Deleted the transfer (${legs.length} linked entries).`
            : `Deleted transaction ${existing.id}.`,
        details: { deleted_ids: ids, deleted },
      };
    });
  }

  private async transferFunds(userId: string, args: TransferFundsArgs): Promise<ActionResultDTO> {
    const from = this.resolveAccount(args.from_account, 'from_account', 'MISSING_FROM_ACCOUNT');
    if (!from.ok) {
      return from.result;
    }

    const to = this.resolveAccount(args.to_account, 'to_account', 'MISSING_TO_ACCOUNT');
    if (!to.ok) {
      return to.result;
    }

    if (from.value === to.value) {
      return ask('SAME_ACCOUNT', `Both ends of the transfer are ${from.value}. Which account should receive the money?`, {
        account: from.value,
      });
    }

    const amount = this.resolveAmount(args.amount, `How much should move from ${from.value} to ${to.value}?`);
    if (!amount.ok) {
      return amount.result;
    }

    const date = this.resolveDate(args.date);
    if (!date.ok) {
      return date.result;
    }

    const large = this.checkLargeAmount(amount.value, args.confirmed, 'transfer of');
    if (large) {
      return large;
    }

    const description = hasText(args.description) ? args.description.trim() : `Transfer from ${from.value} to ${to.value}`;
    const transferGroup = crypto.randomUUID();
    const now = this.clock.now();

    return this.store.withTransaction(async () => {
      const balance = await this.store.getAccountBalance(userId, from.value);
      if (balance < amount.value) {
        const shortfall = roundCents(amount.value - balance);
        return failure(
          'INSUFFICIENT_BALANCE',
          'insufficient_balance',
          `${from.value} only has ${this.money(balance)}, which is ${this.money(shortfall)} short of ${this.money(amount.value)}.`,
          {
            askUser: `Would you like to transfer a smaller amount, or pick another account than ${from.value}?`,
            details: { account: from.value, balance, requested: amount.value, shortfall },
          },
        );
      }

      const legs: Transaction[] = [];
      for (const [account, sign] of [
        [from.value, -1],
        [to.value, 1],
      ] as const) {
        legs.push(
          await this.store.insertTransaction({
            userId,
            date: date.value,
            type: 'transfer',
            category: TRANSFER_CATEGORY,
            description,
            amount: sign * amount.value,
            account,
            transferGroup,
            dedupeHash: buildTransactionHash({
              userId,
              date: date.value,
              type: 'transfer',
              category: TRANSFER_CATEGORY,
              amount: amount.value,
              account,
            }),
            createdAt: now,
          }),
        );
      }

      this.logger.info('transfer_completed', { userId, from: from.value, to: to.value, amount: amount.value, transferGroup });

      return {
        success: true,
        code: 'TRANSFER_COMPLETED',
        message: `Moved ${this.money(amount.value)} from ${from.value} to ${to.value}.`,
        details: {
          transfer_group: transferGroup,
          transactions: legs.map((leg) => this.describeTransaction(leg)),
          from_balance: roundCents(balance - amount.value),
        },
      };
    });
  }

  private async createSavingsGoal(userId: string, args: CreateSavingsGoalArgs): Promise<ActionResultDTO> {
    const name = this.resolveGoalName(args.name);
    if (!name.ok) {
      return name.result;
    }

    if (!hasValue(args.target_amount)) {
      return ask('MISSING_TARGET_AMOUNT', `How much do you want to save for ${name.value}?`);
    }
    const target = this.resolveAmount(args.target_amount, `How much do you want to save for ${name.value}?`);
    if (!target.ok) {
      return target.result;
    }

    let targetDate: string | null = null;
    if (hasText(args.target_date)) {
      const date = this.resolveDate(args.target_date);
      if (!date.ok) {
        return date.result;
      }
      targetDate = date.value;
    }

    return this.store.withTransaction(async () => {
      const conflict = await this.findGoalNamed(userId, name.value);
      if (conflict) {
        return failure('DUPLICATE_GOAL', 'conflict', `You already have a goal called "${conflict.name}".`, {
          askUser: `Do you want to update "${conflict.name}" instead, or use another name?`,
          details: { goal_id: conflict.id },
        });
      }

      const goal = await this.store.insertGoal({
        userId,
        name: name.value,
        targetAmount: target.value,
        currentAmount: 0,
        description: hasText(args.description) ? args.description.trim() : null,
        targetDate,
        createdAt: this.clock.now(),
      });

      return {
        success: true,
        code: 'GOAL_CREATED',
        message:
          `Created the goal "${goal.name}" with a target of ${this.money(goal.targetAmount)}` +
          (goal.targetDate ? ` by ${goal.targetDate}.` : '.'),
        details: { goal: this.describeGoal(goal) },
      };
    });
  }

  private async updateSavingsGoal(userId: string, args: UpdateSavingsGoalArgs): Promise<ActionResultDTO> {
    return this.store.withTransaction(async () => {
      const goal = await this.resolveGoal(userId, args.goal_id, args.goal_name);
      if (!goal.ok) {
        return goal.result;
      }

      const changes: {
        name?: string;
        targetAmount?: number;
        currentAmount?: number;
        targetDate?: string;
        description?: string;
      } = {};

      if (hasText(args.name) && args.name.trim() !== goal.value.name) {
        const name = this.resolveGoalName(args.name);
        if (!name.ok) {
          return name.result;
        }
        const conflict = await this.findGoalNamed(userId, name.value);
        if (conflict && conflict.id !== goal.value.id) {
          return failure('DUPLICATE_GOAL', 'conflict', `You already have a goal called "${conflict.name}".`, {
            askUser: 'Which other name should this goal get?',
            details: { goal_id: conflict.id },
          });
        }
        changes.name = name.value;
      }

      if (hasValue(args.target_amount)) {
        const target = this.resolveAmount(args.target_amount, 'What is the new target amount?');
        if (!target.ok) {
          return target.result;
        }
        changes.targetAmount = target.value;
      }

      if (hasValue(args.current_amount)) {
        const current = this.resolveSavedAmount(args.current_amount, 'How much has been saved so far?');
        if (!current.ok) {
          return current.result;
        }
        changes.currentAmount = current.value;
      }

      if (hasText(args.target_date)) {
        const date = this.resolveDate(args.target_date);
        if (!date.ok) {
          return date.result;
        }
        changes.targetDate = date.value;
      }

      if (args.description !== undefined) {
        changes.description = args.description.trim();
      }

      if (!Object.keys(changes).length) {
        return ask('NO_UPDATES', `What should change on "${goal.value.name}": name, target amount, saved amount, deadline or description?`, {
          goal_id: goal.value.id,
        });
      }

      const updated = await this.store.updateGoal(userId, goal.value.id, changes);
      if (!updated) {
        return failure('GOAL_NOT_FOUND', 'not_found', 'That savings goal no longer exists.', { details: { goal_id: goal.value.id } });
      }

      return {
        success: true,
        code: 'GOAL_UPDATED',
        message: `Updated the goal "${updated.name}".`,
        details: { goal: this.describeGoal(updated), changed: Object.keys(changes) },
      };
    });
  }

  private async transferToSavings(userId: string, args: TransferToSavingsArgs): Promise<ActionResultDTO> {
    return this.store.withTransaction(async () => {
      const goal = await this.resolveGoal(userId, args.goal_id, args.goal_name);
      if (!goal.ok) {
        return goal.result;
      }

      const amount = this.resolveAmount(args.amount, `How much do you want to put towards "${goal.value.name}"?`);
      if (!amount.ok) {
        return amount.result;
      }

      const account = this.resolveAccount(args.account, 'account', null);
      if (!account.ok) {
        return account.result;
      }

      const date = this.resolveDate(args.date);
      if (!date.ok) {
        return date.result;
      }

      const large = this.checkLargeAmount(amount.value, args.confirmed, 'savings transfer of');
      if (large) {
        return large;
      }

      const now = this.clock.now();

      const saved = await this.store.insertTransaction({
        userId,
        date: date.value,
        type: 'expense',
        category: SAVINGS_CATEGORY,
        description: `Savings for ${goal.value.name}`,
        amount: signedAmount('expense', amount.value),
        account: account.value,
        transferGroup: null,
        dedupeHash: buildTransactionHash({
          userId,
          date: date.value,
          type: 'expense',
          category: SAVINGS_CATEGORY,
          amount: amount.value,
          account: account.value,
        }),
        createdAt: now,
      });

      const updated = await this.store.addToGoal(userId, goal.value.id, amount.value);
      if (!updated) {
        // Rolls the expense back with it.
        throw new Error(`Savings goal ${goal.value.id} disappeared during contribution`);
      }

      const progress = updated.targetAmount > 0 ? Math.round((updated.currentAmount / updated.targetAmount) * 1000) / 10 : 0;

      return {
        success: true,
        code: 'SAVINGS_TRANSFERRED',
        message: `Put ${this.money(amount.value)} from ${account.value} towards "${updated.name}" (${progress}% of ${this.money(updated.targetAmount)}).`,
        details: { goal: this.describeGoal(updated), transaction: this.describeTransaction(saved), progress },
      };
    });
  }

  private resolveType(raw: string | undefined): Resolved<CategoryType> {
    if (!hasText(raw)) {
      return rejected(ask('MISSING_TYPE', 'Is this income or an expense?'));
    }

    const interpretation = this.interpreter.interpretTransactionType(raw);
    const value = interpretation.interpretedValue;
    if (value === 'income' || value === 'expense') {
      return resolved(value);
    }

    return rejected(ask('INVALID_TYPE', `I could not tell whether '${raw}' is income or an expense. Which is it?`));
  }

  private resolveAmount(raw: string | number | undefined, question: string): Resolved<number> {
    if (!hasValue(raw)) {
      return rejected(ask('MISSING_AMOUNT', question));
    }

    const amount = parseAmount(raw);
    if (amount === null) {
      return rejected(
        ask('INVALID_AMOUNT', `I could not read '${raw}' as an amount. ${question}`, { original_input: String(raw) }),
      );
    }

    if (amount > this.options.maxAmount) {
      return rejected(
        failure('AMOUNT_TOO_LARGE', 'validation', `${this.money(amount)} is above the limit of ${this.money(this.options.maxAmount)}.`, {
          askUser: `Please double-check the amount. ${question}`,
          details: { amount, max: this.options.maxAmount },
        }),
      );
    }

    return resolved(amount);
  }

  // A goal's saved amount may be reset to zero; every other amount must be positive.
  private resolveSavedAmount(raw: string | number, question: string): Resolved<number> {
    const zero = typeof raw === 'number' ? raw === 0 : /^0+(?:[.,]0+)?$/.test(raw.trim());
    return zero ? resolved(0) : this.resolveAmount(raw, question);
  }

  private resolveDate(raw: string | undefined): Resolved<string> {
    if (!hasText(raw)) {
      return resolved(this.interpreter.today());
    }

    const interpretation = this.interpreter.interpretDate(raw);
    if (interpretation.interpretedValue === null) {
      return rejected(
        ask('INVALID_DATE', interpretation.explanation ?? `I could not read '${raw}' as a date. Which date was it?`, {
          field: 'date',
          original_input: raw,
        }),
      );
    }

    if (interpretation.needsConfirmation) {
      return rejected(this.confirmInterpretation('CONFIRM_DATE', 'date', interpretation));
    }

    return resolved(interpretation.interpretedValue);
  }

  private resolveAccount(raw: string | undefined, field: string, missingCode: ActionCode | null): Resolved<string> {
    if (!hasText(raw)) {
      if (missingCode) {
        const question =
          missingCode === 'MISSING_TO_ACCOUNT' ? 'Which account should receive the money?' : 'Which account should the money come from?';
        return rejected(ask(missingCode, question, { field, valid_accounts: this.interpreter.validAccounts() }));
      }
      return resolved(this.options.defaultAccount);
    }

    const interpretation = this.interpreter.interpretAccount(raw);
    if (interpretation.interpretedValue === null) {
      return rejected(
        ask('INVALID_ACCOUNT', interpretation.explanation ?? `Account '${raw}' is not recognised.`, {
          field,
          original_input: raw,
          valid_accounts: this.interpreter.validAccounts(),
        }),
      );
    }

    if (interpretation.needsConfirmation) {
      return rejected(this.confirmInterpretation('CONFIRM_ACCOUNT', field, interpretation));
    }

    return resolved(interpretation.interpretedValue);
  }

  private async resolveCategory(
    userId: string,
    raw: string | undefined,
    type: CategoryType,
    description: string | undefined,
  ): Promise<Resolved<string>> {
    const valid = this.interpreter.validCategories(type);

    if (!hasText(raw)) {
      const suggestion = hasText(description)
        ? await this.categorySuggester.suggest(description, { type, userId })
        : null;
      const question = suggestion
        ? suggestion.message
        : `Which category is this ${type}? Options: ${valid.join(', ')}`;
      return rejected(
        ask('MISSING_CATEGORY', question, {
          valid_categories: valid,
          suggestion: suggestion ?? undefined,
        }),
      );
    }

    if (type === 'income' && this.interpreter.isGenericIncomeCategory(raw)) {
      return rejected(
        ask('NEED_CATEGORY', `Where did this income come from? Options: ${valid.filter((category) => !this.interpreter.isGenericIncomeCategory(category)).join(', ')}`, {
          valid_categories: valid,
        }),
      );
    }

    const interpretation = this.interpreter.interpretCategory(raw, type);
    if (interpretation.interpretedValue === null) {
      return rejected(
        ask('INVALID_CATEGORY', interpretation.explanation ?? `Category '${raw}' is not recognised.`, {
          original_input: raw,
          valid_categories: valid,
        }),
      );
    }

    if (interpretation.needsConfirmation) {
      return rejected(
        ask('AMBIGUOUS_CATEGORY', this.interpreter.formatConfirmationMessage(interpretation), {
          field: 'category',
          original_input: raw,
          interpreted_value: interpretation.interpretedValue,
          confidence: interpretation.confidence,
          alternatives: interpretation.alternatives,
        }),
      );
    }

    return resolved(interpretation.interpretedValue);
  }

  private resolveGoalName(raw: string | undefined): Resolved<string> {
    if (!hasText(raw)) {
      return rejected(ask('MISSING_GOAL_NAME', 'What should the savings goal be called?'));
    }

    const name = raw.trim();
    if (name.length > this.maxGoalNameLength) {
      return rejected(
        ask('NAME_TOO_LONG', `That name is ${name.length} characters long; please keep it under ${this.maxGoalNameLength}.`, {
          length: name.length,
          max: this.maxGoalNameLength,
        }),
      );
    }

    return resolved(name);
  }

  private async resolveGoal(userId: string, goalId: number | undefined, goalName: string | undefined): Promise<Resolved<SavingsGoal>> {
    if (goalId !== undefined) {
      const goal = await this.store.findGoalById(userId, goalId);
      return goal
        ? resolved(goal)
        : rejected(failure('GOAL_NOT_FOUND', 'not_found', `No savings goal with ID ${goalId} was found.`, { details: { goal_id: goalId } }));
    }

    if (hasText(goalName)) {
      const candidates = await this.store.findGoalsByName(userId, goalName.trim());
      const exact = candidates.find((goal) => goal.name.toLowerCase() === goalName.trim().toLowerCase());
      const goal = exact ?? candidates[0];
      return goal
        ? resolved(goal)
        : rejected(failure('GOAL_NOT_FOUND', 'not_found', `No savings goal matching "${goalName.trim()}" was found.`, {
            details: { goal_name: goalName.trim() },
          }));
    }

    const goals = await this.store.listGoals(userId);
    return rejected(
      ask(
        'MISSING_GOAL',
        goals.length
          ? `Which goal do you mean? Your goals: ${goals.map((goal) => goal.name).join(', ')}`
          : 'You have no savings goals yet. Would you like to create one?',
        { goals: goals.map((goal) => ({ id: goal.id, name: goal.name })) },
      ),
    );
  }

  private async findGoalNamed(userId: string, name: string): Promise<SavingsGoal | null> {
    const candidates = await this.store.findGoalsByName(userId, name);
    return candidates.find((goal) => goal.name.toLowerCase() === name.toLowerCase()) ?? null;
  }

  private checkLargeAmount(amount: number, confirmed: boolean | undefined, label: string): ActionResultDTO | null {
    if (amount <= this.options.largeAmountThreshold || confirmed === true) {
      return null;
    }

    return failure('LARGE_AMOUNT_CONFIRMATION', 'validation', `That is a large ${label} ${this.money(amount)}.`, {
      askUser: `Please confirm the ${label} ${this.money(amount)}. Is that correct?`,
      requiresConfirmation: true,
      details: { amount, threshold: this.options.largeAmountThreshold },
    });
  }

  private confirmInterpretation(code: ActionCode, field: string, interpretation: InterpretationResult): ActionResultDTO {
    const question = this.interpreter.formatConfirmationMessage(interpretation);
    return failure(code, 'validation', question, {
      askUser: question,
      requiresConfirmation: true,
      details: {
        field,
        original_input: interpretation.originalInput,
        interpreted_value: interpretation.interpretedValue,
        confidence: interpretation.confidence,
        alternatives: interpretation.alternatives,
      },
    });
  }

  private transactionNotFound(transactionId: number): ActionResultDTO {
    return failure('TRANSACTION_NOT_FOUND', 'not_found', `Transaction ${transactionId} was not found.`, {
      details: { transaction_id: transactionId },
    });
  }

  private money(amount: number): string {
    return formatAmount(amount, { locale: this.options.locale, currency: this.options.currency });
  }

  private describeTransaction(transaction: Transaction): Record<string, unknown> {
    return {
      id: transaction.id,
      date: transaction.date,
      type: transaction.type,
      category: transaction.category,
      description: transaction.description,
      amount: transaction.amount,
      account: transaction.account,
      transfer_group: transaction.transferGroup,
    };
  }

  private describeGoal(goal: SavingsGoal): Record<string, unknown> {
    return {
      id: goal.id,
      name: goal.name,
      target_amount: goal.targetAmount,
      current_amount: goal.currentAmount,
      target_date: goal.targetDate,
      description: goal.description,
    };
  }
}
