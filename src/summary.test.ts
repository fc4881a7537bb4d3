import { describe, it, expect } from 'vitest';
import { formatAmount, summarize } from './summary';
import type { Transaction } from './types';

const scenario: Transaction[] = [
  { date: '2024-01-01', type: 'Income', category: 'Salary', amount: 5000 },
  { date: '2024-01-05', type: 'Expense', category: 'Rent', amount: 1200 },
  { date: '2024-01-10', type: 'Savings', category: 'Bond', amount: 300 },
];

describe('summarize', () => {
  it('totals each type and derives the balance', () => {
    expect(summarize(scenario)).toEqual({ totalIncome: 5000, totalExpense: 1200, totalSavings: 300, balance: 3500 });
  });

  it('returns zeros for no rows', () => {
    expect(summarize([])).toEqual({ totalIncome: 0, totalExpense: 0, totalSavings: 0, balance: 0 });
  });

  it('ignores unrecognised types entirely', () => {
    const rows: Transaction[] = [
      ...scenario,
      { date: '2024-01-11', type: 'Transfer', category: 'Card', amount: 999 },
      { date: '2024-01-12', type: 'income', category: 'Lowercase', amount: 50 },
      { date: '2024-01-13', type: '', category: 'Blank', amount: 7 },
    ];
    expect(summarize(rows)).toEqual({ totalIncome: 5000, totalExpense: 1200, totalSavings: 300, balance: 3500 });
  });

  it('keeps balance equal to income minus expense minus savings', () => {
    const lists: Transaction[][] = [
      [{ date: '2024-02-01', type: 'Expense', category: 'Food', amount: 42.5 }],
      [
        { date: '2024-02-01', type: 'Income', category: 'Gift', amount: 0.1 },
        { date: '2024-02-02', type: 'Income', category: 'Gift', amount: 0.2 },
        { date: '2024-02-03', type: 'Savings', category: 'Jar', amount: 0.3 },
      ],
      [
        { date: '2024-02-01', type: 'Savings', category: 'Fund', amount: 250 },
        { date: '2024-02-02', type: 'Expense', category: 'Bills', amount: 80 },
      ],
    ];
    for (const rows of lists) {
      const s = summarize(rows);
      expect(s.balance).toBe(s.totalIncome - s.totalExpense - s.totalSavings);
      expect(s.totalIncome).toBeGreaterThanOrEqual(0);
      expect(s.totalExpense).toBeGreaterThanOrEqual(0);
      expect(s.totalSavings).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('formatAmount', () => {
  it('prints plain numbers with at most two decimals', () => {
    expect(formatAmount(5000)).toBe('5000');
    expect(formatAmount(42.5)).toBe('42.5');
    expect(formatAmount(0.1 + 0.2)).toBe('0.3');
    expect(formatAmount(-3500)).toBe('-3500');
  });
});
