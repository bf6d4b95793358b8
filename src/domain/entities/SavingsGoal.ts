export interface SavingsGoal {
  id: number;
  userId: string;
  name: string;
  targetAmount: number;
  currentAmount: number;
  description: string | null;
  targetDate: string | null;
  createdAt: number;
}

export type NewSavingsGoal = Omit<SavingsGoal, 'id'>;

export interface SavingsGoalChanges {
  name?: string;
  targetAmount?: number;
  currentAmount?: number;
  description?: string | null;
  targetDate?: string | null;
}
