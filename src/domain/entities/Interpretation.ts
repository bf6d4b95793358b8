export type MatchConfidence = 'EXACT' | 'HIGH' | 'MEDIUM' | 'LOW' | 'NO_MATCH';

export type FieldType = 'account' | 'date' | 'category' | 'amount' | 'transaction_type';

export interface InterpretationResult<T = string | number> {
  fieldType: FieldType;
  originalInput: string;
  interpretedValue: T | null;
  confidence: MatchConfidence;
  needsConfirmation: boolean;
  alternatives: string[];
  explanation?: string;
}
