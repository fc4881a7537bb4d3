import type { Summary, Transaction } from './types';

export function summarize(rows: Transaction[]): Summary {
  let totalIncome = 0;
  let totalExpense = 0;
  let totalSavings = 0;
  for (const t of rows) {
    if (t.type === 'Income') totalIncome += t.amount;
    else if (t.type === 'Expense') totalExpense += t.amount;
    else if (t.type === 'Savings') totalSavings += t.amount;
    // anything else is not counted
  }
  const balance = totalIncome - totalExpense - totalSavings;
  return { totalIncome, totalExpense, totalSavings, balance };
}

export function round2(n: number) {
  return Math.round(n * 100) / 100;
}

// Plain numeric text: no grouping or currency, at most two decimals.
export function formatAmount(n: number): string {
  return String(round2(n));
}
