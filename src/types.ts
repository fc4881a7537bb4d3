export const TRANSACTION_TYPES = ['Income', 'Expense', 'Savings'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface Transaction {
  id?: string; // Notion page id
  date: string; // YYYY-MM-DD
  type: string; // normally a TransactionType; rows read back may carry anything
  category: string;
  amount: number;
}

export interface NewTransaction {
  date: string;
  type: TransactionType;
  category: string;
  amount: number;
}

export interface DateRange {
  start?: string; // YYYY-MM-DD, inclusive
  end?: string;
}

export interface Summary {
  totalIncome: number;
  totalExpense: number;
  totalSavings: number;
  balance: number; // income - expense - savings
}

export interface TransactionStore {
  addRecord(type: TransactionType, category: string, amount: number, today?: string): Promise<Transaction[]>;
  fetchTransactions(range?: DateRange): Promise<Transaction[]>;
}

export function isTransactionType(value: unknown): value is TransactionType {
  return TRANSACTION_TYPES.some((t) => t === value);
}
