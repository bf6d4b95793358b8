import dayjs from 'dayjs';
import type { FieldType, InterpretationResult, MatchConfidence } from '../../domain/entities/Interpretation.js';
import type { TransactionType } from '../../domain/entities/Transaction.js';
import { parseAmountDetailed } from '../../domain/services/AmountParser.js';
import { calendarDateIn, parseNaturalDate } from '../../domain/services/NaturalDateParser.js';
import { closeMatches, confidenceFromRatio } from '../../domain/services/StringSimilarity.js';
import type { FinanceVocabulary } from '../dto/VocabularyDTO.js';
import type { ClockPort } from '../ports/ClockPort.js';

export type CategoryType = Exclude<TransactionType, 'transfer'>;

export interface InterpretContext {
  transactionType?: CategoryType;
}

const TRANSACTION_TYPE_WORDS: Record<string, CategoryType> = {
  income: 'income',
  pemasukan: 'income',
  masuk: 'income',
  pendapatan: 'income',
  expense: 'expense',
  pengeluaran: 'expense',
  keluar: 'expense',
  belanja: 'expense',
};

const MAX_ALTERNATIVES = 2;

export class FieldInterpreterService {
  private readonly timeZone: string;

  constructor(
    private readonly vocabulary: FinanceVocabulary,
    private readonly clock: ClockPort,
    options: { timeZone: string },
  ) {
    this.timeZone = options.timeZone;
  }

  interpret(fieldType: FieldType, rawInput: string, context: InterpretContext = {}): InterpretationResult {
    switch (fieldType) {
      case 'account':
        return this.interpretAccount(rawInput);
      case 'date':
        return this.interpretDate(rawInput);
      case 'category':
        return this.interpretCategory(rawInput, context.transactionType ?? 'expense');
      case 'amount':
        return this.interpretAmount(rawInput);
      case 'transaction_type':
        return this.interpretTransactionType(rawInput);
    }
  }

  today(): string {
    return calendarDateIn(this.clock.now(), this.timeZone);
  }

  validAccounts(): string[] {
    return Array.from(new Set(Object.values(this.vocabulary.accounts.accounts)));
  }

  validCategories(type: CategoryType): string[] {
    return [...this.vocabulary.categories.valid[type]];
  }

  isGenericIncomeCategory(category: string): boolean {
    return this.vocabulary.categories.genericIncome.includes(category.trim().toLowerCase());
  }

  interpretAccount(rawInput: string): InterpretationResult<string> {
    const input = rawInput.trim();
    if (!input) {
      return this.noMatch('account', rawInput, 'No account was given.');
    }

    const lower = input.toLowerCase();
    const { accounts, aliases } = this.vocabulary.accounts;
    const direct =
      aliases[lower] ?? accounts[lower] ?? this.validAccounts().find((account) => account.toLowerCase() === lower);
    if (direct !== undefined) {
      return this.exact('account', input, direct);
    }

    const fuzzy =
      this.fuzzyAgainst('account', input, lower, aliases) ?? this.fuzzyAgainst('account', input, lower, accounts);
    if (fuzzy) {
      return fuzzy;
    }

    return this.noMatch('account', input, `Account '${input}' is not recognised. Choose one of: ${this.validAccounts().join(', ')}`);
  }

  interpretDate(rawInput: string): InterpretationResult<string> {
    const input = rawInput.trim();
    if (!input) {
      return this.noMatch('date', rawInput, 'No date was given; today is used when the date is left out.');
    }

    const parsed = parseNaturalDate(input, this.today(), this.vocabulary.dates);
    if (!parsed) {
      return this.noMatch(
        'date',
        input,
        "That date format is not recognised. Try 'today', '25 december', '2025-12-25' or '2025'.",
      );
    }

    if (parsed.kind === 'relative' || parsed.kind === 'iso') {
      return this.exact('date', input, parsed.date);
    }

    return {
      fieldType: 'date',
      originalInput: input,
      interpretedValue: parsed.date,
      confidence: 'MEDIUM',
      needsConfirmation: true,
      alternatives: [],
      explanation:
        parsed.kind === 'year'
          ? `Read '${input}' as the last day of that year, ${dayjs(parsed.date).format('D MMMM YYYY')}.`
          : `Read '${input}' as ${dayjs(parsed.date).format('dddd, D MMMM YYYY')}.`,
    };
  }

  interpretCategory(rawInput: string, transactionType: CategoryType = 'expense'): InterpretationResult<string> {
    const valid = this.validCategories(transactionType);
    const input = rawInput.trim();
    if (!input) {
      return this.noMatch('category', rawInput, `Available categories: ${valid.join(', ')}`);
    }

    const lower = input.toLowerCase();
    const exact = valid.find((category) => category.toLowerCase() === lower);
    if (exact) {
      return this.exact('category', input, exact);
    }

    const table = Object.fromEntries(valid.map((category) => [category.toLowerCase(), category]));
    const fuzzy = this.fuzzyAgainst('category', input, lower, table);
    if (fuzzy) {
      return fuzzy;
    }

    return this.noMatch('category', input, `Category '${input}' is not recognised. Choose one of: ${valid.join(', ')}`);
  }

  interpretAmount(rawInput: string): InterpretationResult<number> {
    const parsed = parseAmountDetailed(rawInput);
    if (!parsed) {
      return {
        fieldType: 'amount',
        originalInput: rawInput,
        interpretedValue: null,
        confidence: 'NO_MATCH',
        needsConfirmation: false,
        alternatives: [],
        explanation: "That amount is not recognised. Try '50000', '50rb', '1.5jt' or 'lima puluh ribu'.",
      };
    }

    // Digits are taken at face value; number words are read back to the user.
    const confidence: MatchConfidence = parsed.method === 'words' ? 'HIGH' : 'EXACT';

    return {
      fieldType: 'amount',
      originalInput: rawInput,
      interpretedValue: parsed.value,
      confidence,
      needsConfirmation: confidence !== 'EXACT',
      alternatives: [],
      explanation: confidence === 'EXACT' ? undefined : `Read '${rawInput}' as ${parsed.value}.`,
    };
  }

  interpretTransactionType(rawInput: string): InterpretationResult<string> {
    const input = rawInput.trim();
    const type = TRANSACTION_TYPE_WORDS[input.toLowerCase()];
    if (type) {
      return this.exact('transaction_type', input, type);
    }

    return this.noMatch('transaction_type', input, "Say whether this is 'income' or an 'expense'.");
  }

  formatConfirmationMessage(result: InterpretationResult): string {
    if (!result.needsConfirmation || result.interpretedValue === null) {
      return '';
    }

    const labels: Record<FieldType, string> = {
      account: 'account',
      date: 'date',
      category: 'category',
      amount: 'amount',
      transaction_type: 'type',
    };

    let message = `I read '${result.originalInput}' as ${labels[result.fieldType]} **${result.interpretedValue}**.`;
    if (result.alternatives.length) {
      message += `\n\nOther options: ${result.alternatives.join(', ')}`;
    }
    return `${message}\n\nIs that right? (yes/no)`;
  }

  private fuzzyAgainst(
    fieldType: FieldType,
    originalInput: string,
    query: string,
    table: Record<string, string>,
  ): InterpretationResult<string> | null {
    const matches = closeMatches(query, Object.keys(table));
    const [best, ...rest] = matches;
    const value = best ? table[best.candidate] : undefined;
    if (!best || value === undefined) {
      return null;
    }

    const confidence = confidenceFromRatio(best.ratio);
    const alternatives = Array.from(
      new Set(rest.map((match) => table[match.candidate]).filter((alt): alt is string => alt !== undefined && alt !== value)),
    ).slice(0, MAX_ALTERNATIVES);

    const explanation =
      `Read '${originalInput}' as ${fieldType} ${value}` +
      (alternatives.length ? `\nAlternatives: ${alternatives.join(', ')}` : '');

    return {
      fieldType,
      originalInput,
      interpretedValue: value,
      confidence,
      needsConfirmation: confidence !== 'EXACT',
      alternatives,
      explanation,
    };
  }

  private exact<T>(fieldType: FieldType, originalInput: string, value: T): InterpretationResult<T> {
    return {
      fieldType,
      originalInput,
      interpretedValue: value,
      confidence: 'EXACT',
      needsConfirmation: false,
      alternatives: [],
    };
  }

  private noMatch(fieldType: FieldType, originalInput: string, explanation: string): InterpretationResult<string> {
    return {
      fieldType,
      originalInput,
      interpretedValue: null,
      confidence: 'NO_MATCH',
      needsConfirmation: false,
      alternatives: [],
      explanation,
    };
  }
}
